import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError, type LedgerErrorCode } from "../services/errors";
import { logger } from "../utils/logger";

const STATUS_BY_CODE: Record<LedgerErrorCode, 400 | 402 | 404 | 409 | 500> = {
  VALIDATION_ERROR: 400,
  INSUFFICIENT_BALANCE: 402,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTEGRITY_ERROR: 500,
};

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof LedgerError) {
    const status = STATUS_BY_CODE[err.code];
    if (err.code === "INTEGRITY_ERROR") {
      logger.error({ err, path: c.req.path }, "Integrity error");
      return c.json(
        { error: "Internal ledger error", code: err.code, retryable: false },
        status,
      );
    }
    if (err.retryable) {
      c.header("Retry-After", "1");
    }
    return c.json(
      { error: err.message, code: err.code, retryable: err.retryable },
      status,
    );
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  logger.error({ err, path: c.req.path }, "Unhandled error");
  return c.json(
    { error: "Internal server error", code: "INTERNAL_ERROR", retryable: false },
    500,
  );
};
