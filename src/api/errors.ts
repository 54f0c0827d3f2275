export type SnapshotErrorCode = "not-found" | "malformed" | "network";

/**
 * Raised when the board dataset cannot be loaded. This is the only failure
 * the explorer surfaces to the user.
 */
export class SnapshotError extends Error {
  readonly code: SnapshotErrorCode;

  constructor(message: string, code: SnapshotErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "SnapshotError";
    this.code = code;
  }
}
