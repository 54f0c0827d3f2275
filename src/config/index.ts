export const DATA_URL: string =
  import.meta.env.VITE_DATA_URL || "/board-snapshot.json";

// Scatter map point budget
export const DEFAULT_MAX_POINTS = 2000;
export const MIN_MAX_POINTS = 500;
export const MAX_POINTS_STEP = 500;

export const SAMPLE_SEED = 42;

export { DEFAULT_ROLE_TABLE } from "./roles";
export { DEFAULT_BOARD_THEME } from "./theme";
