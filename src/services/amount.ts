import { Decimal } from "decimal.js";
import { ValidationError } from "./errors";

const FIXED_POINT = /^\d+(\.\d+)?$/;

/**
 * Parses a fixed-point amount string. Amounts with more fractional digits
 * than `scale` are rejected rather than rounded.
 */
export function parseAmount(raw: string, scale: number): Decimal {
  if (!FIXED_POINT.test(raw)) {
    throw new ValidationError(
      `Amount must be a positive decimal string, got "${raw}"`,
    );
  }

  const amount = new Decimal(raw);
  if (amount.isZero()) {
    throw new ValidationError("Amount must be positive");
  }
  if (amount.decimalPlaces() > scale) {
    throw new ValidationError(
      `Amount ${raw} has more than ${scale} decimal places`,
    );
  }
  return amount;
}

export function assertWithinBounds(
  amount: Decimal,
  min: string,
  max: string,
): void {
  if (amount.lessThan(min)) {
    throw new ValidationError(`Amount must be at least ${min}`);
  }
  if (amount.greaterThan(max)) {
    throw new ValidationError(`Amount must not exceed ${max}`);
  }
}

export function formatAmount(value: Decimal.Value, scale: number): string {
  return new Decimal(value).toFixed(scale);
}
