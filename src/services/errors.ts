export type LedgerErrorCode =
  | "VALIDATION_ERROR"
  | "INSUFFICIENT_BALANCE"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTEGRITY_ERROR";

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
  readonly retryable: boolean = false;
}

// Rejected before any lock is taken; nothing was written.
export class ValidationError extends LedgerError {
  readonly code = "VALIDATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

// Rejected under lock, before any write.
export class InsufficientBalanceError extends LedgerError {
  readonly code = "INSUFFICIENT_BALANCE";

  constructor(
    message: string,
    readonly accountId: string,
    readonly balance: string,
    readonly requested: string,
  ) {
    super(message);
    this.name = "InsufficientBalanceError";
  }
}

export class NotFoundError extends LedgerError {
  readonly code = "NOT_FOUND";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** Lock or statement timeout, deadlock, serialization failure. Safe to retry with the same key. */
export class ConflictError extends LedgerError {
  readonly code = "CONFLICT";
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConflictError";
  }
}

export class IntegrityError extends LedgerError {
  readonly code = "INTEGRITY_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrityError";
  }
}

/**
 * Raised by the persistence layer when the idempotency key is already taken
 * by a committed transaction. The engine turns it into a replay; it never
 * reaches callers.
 */
export class DuplicateIdempotencyKeyError extends Error {
  constructor(readonly idempotencyKey: string) {
    super(`Idempotency key already used: ${idempotencyKey}`);
    this.name = "DuplicateIdempotencyKeyError";
  }
}
