export type Range = [number, number];

export interface ViewportState {
  x: Range;
  y: Range;
}

export type ViewportAction =
  | "in"
  | "out"
  | "left"
  | "right"
  | "up"
  | "down"
  | "reset";
