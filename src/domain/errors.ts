/**
 * Raised when an Event is constructed with a value outside its contract
 * (currently: an unknown `action`). Always surfaced to the caller.
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError';
}

/**
 * Raised by an event store when a write cannot be completed.
 * The underlying driver error is kept as `cause`.
 */
export class StoreError extends Error {
  override readonly name = 'StoreError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
