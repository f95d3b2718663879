/**
 * Tests for the fixed-point arithmetic engine.
 *
 * Covers:
 * - parseUnits / formatUnits and the rate equivalents
 * - Checked arithmetic and the 64-bit range
 * - Half-even rounding and single-rounding mulDiv
 */

import { describe, it, expect } from "vitest";
import {
  parseUnits,
  formatUnits,
  parseRate,
  formatRate,
  assertInRange,
  addUnits,
  subtractUnits,
  negateUnits,
  absUnits,
  minUnits,
  maxUnits,
  compareUnits,
  divideRoundHalfEven,
  mulDiv,
  MAX_UNITS,
  MIN_UNITS,
  RATE_SCALE,
} from "../src/units.js";
import { MathError, ValidationError } from "../src/errors.js";

// ─── parseUnits ──────────────────────────────────────────────────────────

describe("parseUnits", () => {
  it("parses a whole number", () => {
    expect(parseUnits("500000")).toBe(500_000_000_000n);
  });

  it("parses a fractional amount", () => {
    expect(parseUnits("0.079274")).toBe(79_274n);
  });

  it("pads short fractional parts", () => {
    expect(parseUnits("1.5")).toBe(1_500_000n);
  });

  it("parses negative amounts", () => {
    expect(parseUnits("-50.25")).toBe(-50_250_000n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseUnits("  42 ")).toBe(42_000_000n);
  });

  it("rejects empty string", () => {
    expect(() => parseUnits("")).toThrow(ValidationError);
  });

  it("rejects non-numeric input", () => {
    expect(() => parseUnits("abc")).toThrow(ValidationError);
  });

  it("rejects a leading plus sign", () => {
    expect(() => parseUnits("+1")).toThrow(ValidationError);
  });

  it("rejects more than six decimal places", () => {
    expect(() => parseUnits("1.1234567")).toThrow(/at most 6 allowed/);
  });

  it("rejects amounts outside the 64-bit range", () => {
    expect(() => parseUnits("9223372036855")).toThrow(ValidationError);
  });

  it("reports INVALID_AMOUNT", () => {
    try {
      parseUnits("1.2.3");
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).code).toBe("INVALID_AMOUNT");
    }
  });
});

// ─── formatUnits ─────────────────────────────────────────────────────────

describe("formatUnits", () => {
  it("formats whole amounts with six places", () => {
    expect(formatUnits(500_000_000_000n)).toBe("500000.000000");
  });

  it("formats sub-unit amounts", () => {
    expect(formatUnits(79_274n)).toBe("0.079274");
  });

  it("formats zero", () => {
    expect(formatUnits(0n)).toBe("0.000000");
  });

  it("formats negative amounts", () => {
    expect(formatUnits(-500_000_000_000n)).toBe("-500000.000000");
  });

  it("round-trips through parseUnits", () => {
    expect(parseUnits(formatUnits(-123_456_789n))).toBe(-123_456_789n);
  });
});

// ─── Rates ───────────────────────────────────────────────────────────────

describe("parseRate / formatRate", () => {
  it("parses five percent", () => {
    expect(parseRate("0.05")).toBe(50_000n);
  });

  it("formats a rate", () => {
    expect(formatRate(50_000n)).toBe("0.050000");
  });

  it("reports INVALID_RATE for malformed input", () => {
    try {
      parseRate("5%");
      expect.fail("should have thrown");
    } catch (err) {
      expect((err as ValidationError).code).toBe("INVALID_RATE");
    }
  });

  it("has a scale of one million", () => {
    expect(parseRate("1")).toBe(RATE_SCALE);
  });
});

// ─── Checked arithmetic ──────────────────────────────────────────────────

describe("checked arithmetic", () => {
  it("adds and subtracts", () => {
    expect(addUnits(10n, 5n)).toBe(15n);
    expect(subtractUnits(10n, 15n)).toBe(-5n);
  });

  it("throws MathError on addition overflow", () => {
    expect(() => addUnits(MAX_UNITS, 1n)).toThrow(MathError);
  });

  it("throws MathError on subtraction underflow", () => {
    expect(() => subtractUnits(MIN_UNITS, 1n)).toThrow(MathError);
  });

  it("cannot negate the minimum value", () => {
    expect(() => negateUnits(MIN_UNITS)).toThrow(MathError);
    expect(negateUnits(7n)).toBe(-7n);
  });

  it("takes absolute values", () => {
    expect(absUnits(-7n)).toBe(7n);
    expect(absUnits(7n)).toBe(7n);
  });

  it("picks min and max", () => {
    expect(minUnits(3n, -4n)).toBe(-4n);
    expect(maxUnits(3n, -4n)).toBe(3n);
  });

  it("compares", () => {
    expect(compareUnits(1n, 2n)).toBe(-1);
    expect(compareUnits(2n, 2n)).toBe(0);
    expect(compareUnits(3n, 2n)).toBe(1);
  });

  it("reports OVERFLOW with the operation name", () => {
    try {
      assertInRange(MAX_UNITS + 1n, "interest accrual");
      expect.fail("should have thrown");
    } catch (err) {
      expect((err as MathError).code).toBe("OVERFLOW");
      expect((err as MathError).message).toContain("interest accrual");
    }
  });
});

// ─── Rounding ────────────────────────────────────────────────────────────

describe("divideRoundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(divideRoundHalfEven(5n, 2n)).toBe(2n);
    expect(divideRoundHalfEven(7n, 2n)).toBe(4n);
    expect(divideRoundHalfEven(25n, 10n)).toBe(2n);
    expect(divideRoundHalfEven(35n, 10n)).toBe(4n);
  });

  it("rounds non-ties to the nearest value", () => {
    expect(divideRoundHalfEven(26n, 10n)).toBe(3n);
    expect(divideRoundHalfEven(24n, 10n)).toBe(2n);
  });

  it("is symmetric for negative values", () => {
    expect(divideRoundHalfEven(-5n, 2n)).toBe(-2n);
    expect(divideRoundHalfEven(-7n, 2n)).toBe(-4n);
    expect(divideRoundHalfEven(7n, -2n)).toBe(-4n);
    expect(divideRoundHalfEven(-26n, -10n)).toBe(3n);
  });

  it("throws DIVISION_BY_ZERO", () => {
    try {
      divideRoundHalfEven(1n, 0n);
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(MathError);
      expect((err as MathError).code).toBe("DIVISION_BY_ZERO");
    }
  });
});

describe("mulDiv", () => {
  it("computes interest with a single rounding", () => {
    // 500000 × 0.05 × 100s / (1 × 31536000s)
    const interest = mulDiv([500_000_000_000n, 50_000n, 100n], RATE_SCALE * 31_536_000n);
    expect(interest).toBe(79_274n);
  });

  it("keeps intermediate products exact", () => {
    expect(mulDiv([MAX_UNITS, 2n], 2n)).toBe(MAX_UNITS);
  });

  it("range-checks the final result", () => {
    expect(() => mulDiv([MAX_UNITS, 3n], 2n)).toThrow(MathError);
  });
});
