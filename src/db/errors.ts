import postgres from "postgres";
import {
  ConflictError,
  DuplicateIdempotencyKeyError,
  IntegrityError,
} from "../services/errors";

export const IDEMPOTENCY_KEY_CONSTRAINT = "transactions_idempotency_key_key";

// SQLSTATE codes that mean "nothing was applied, try again".
const TRANSIENT_STATES: Record<string, string> = {
  "55P03": "lock timeout",
  "57014": "statement timeout",
  "40P01": "deadlock detected",
  "40001": "serialization failure",
};

/**
 * Maps driver errors onto the ledger's error taxonomy. Anything that is not
 * a PostgresError is returned untouched.
 */
export function translateDatabaseError(
  err: unknown,
  context: { idempotencyKey?: string } = {},
): unknown {
  if (!(err instanceof postgres.PostgresError)) return err;

  const transient = TRANSIENT_STATES[err.code];
  if (transient) {
    return new ConflictError(`Transaction aborted (${transient}), retry later`, {
      cause: err,
    });
  }

  if (
    err.code === "23505" &&
    err.constraint_name === IDEMPOTENCY_KEY_CONSTRAINT &&
    context.idempotencyKey !== undefined
  ) {
    return new DuplicateIdempotencyKeyError(context.idempotencyKey);
  }

  if (err.code.startsWith("23")) {
    return new IntegrityError(
      `Constraint violation (${err.code}${err.constraint_name ? ` on ${err.constraint_name}` : ""})`,
      { cause: err },
    );
  }

  return err;
}
