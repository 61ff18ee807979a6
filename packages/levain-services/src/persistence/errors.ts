/**
 * Persistence Errors
 */

export class SnapshotNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Snapshot not found: ${key}`);
    this.name = 'SnapshotNotFoundError';
  }
}

/**
 * A stored snapshot that cannot be read back: not JSON, wrong version,
 * or values outside the ranges a state may hold.
 */
export class SnapshotFormatError extends Error {
  constructor(
    public readonly key: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Snapshot ${key} is invalid: ${reason}`);
    this.name = 'SnapshotFormatError';
    this.cause = cause;
  }
}
