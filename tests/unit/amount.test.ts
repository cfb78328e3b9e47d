import { describe, test, expect } from "vitest";
import {
  assertWithinBounds,
  formatAmount,
  parseAmount,
} from "../../src/services/amount";
import { ValidationError } from "../../src/services/errors";
import { testAmounts } from "../fixtures/transactions";

describe("parseAmount()", () => {
  test("accepts integers and fixed-point strings within scale", () => {
    expect(parseAmount("100", 2).toString()).toBe("100");
    expect(parseAmount(testAmounts.small, 2).toString()).toBe("10.5");
    expect(parseAmount(testAmounts.tiny, 2).toString()).toBe("0.01");
  });

  test("rejects zero", () => {
    expect(() => parseAmount(testAmounts.zero, 2)).toThrow(
      "Amount must be positive",
    );
    expect(() => parseAmount("0.00", 2)).toThrow(ValidationError);
  });

  test("rejects negative, signed and malformed input", () => {
    for (const raw of [testAmounts.negative, "+5", "1e3", "abc", "", "1.", ".5", " 1"]) {
      expect(() => parseAmount(raw, 2)).toThrow(
        `Amount must be a positive decimal string, got "${raw}"`,
      );
    }
  });

  test("rejects more fractional digits than the scale instead of rounding", () => {
    expect(() => parseAmount(testAmounts.tooPrecise, 2)).toThrow(
      "Amount 1.005 has more than 2 decimal places",
    );
    expect(() => parseAmount("5.5", 0)).toThrow(ValidationError);
  });

  test("trailing zeros do not count against the scale", () => {
    expect(parseAmount("1.500", 2).toString()).toBe("1.5");
  });
});

describe("assertWithinBounds()", () => {
  test("passes at both bounds", () => {
    expect(() =>
      assertWithinBounds(parseAmount("0.01", 2), "0.01", "1000000.00"),
    ).not.toThrow();
    expect(() =>
      assertWithinBounds(parseAmount("1000000", 2), "0.01", "1000000.00"),
    ).not.toThrow();
  });

  test("rejects amounts outside the configured range", () => {
    expect(() =>
      assertWithinBounds(parseAmount("0.5", 2), "1", "10"),
    ).toThrow("Amount must be at least 1");
    expect(() =>
      assertWithinBounds(parseAmount(testAmounts.overMax, 2), "0.01", "1000000.00"),
    ).toThrow("Amount must not exceed 1000000.00");
  });
});

describe("formatAmount()", () => {
  test("pads to the scale", () => {
    expect(formatAmount("25", 2)).toBe("25.00");
    expect(formatAmount(0, 2)).toBe("0.00");
    expect(formatAmount("-100.5", 2)).toBe("-100.50");
    expect(formatAmount("7.12345678", 8)).toBe("7.12345678");
  });
});
