/**
 * @fundledger/store — Store error types.
 */

/** Error codes for store operations. */
export type StoreErrorCode = "UNKNOWN_TABLE";

/**
 * Structured error from a record store.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly table?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
