export { apiClient } from "./client";
export { SnapshotError } from "./errors";
export type { SnapshotErrorCode } from "./errors";
export { getBoardSnapshot, parseSnapshot } from "./snapshot";
