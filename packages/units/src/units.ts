/**
 * @actus-sm/units: Deterministic fixed-point arithmetic.
 *
 * Money (`Units`) and rates (`Rate`) are bigints scaled by 10^6.
 * Decimal strings are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Every produced value must fit a signed 64-bit integer
 * - Rounding is half-even and happens once, at the end of a computation
 */

import { MathError, ValidationError } from "./errors.js";

/** Fixed-point monetary quantity, scaled by {@link UNITS_SCALE}. */
export type Units = bigint;

/** Fixed-point fraction (0.05 = 5%), scaled by {@link RATE_SCALE}. */
export type Rate = bigint;

export const UNITS_DECIMALS = 6;
export const UNITS_SCALE = 1_000_000n;
export const RATE_DECIMALS = 6;
export const RATE_SCALE = 1_000_000n;

export const MIN_UNITS: Units = -(2n ** 63n);
export const MAX_UNITS: Units = 2n ** 63n - 1n;

export const ZERO: Units = 0n;

// ─── Decimal Strings ─────────────────────────────────────────────────────

function parseScaled(
  value: string,
  decimals: number,
  code: "INVALID_AMOUNT" | "INVALID_RATE",
): bigint {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(code, `Invalid decimal: "${String(value)}"`);
  }

  const trimmed = value.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError(code, `Invalid decimal format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new ValidationError(
      code,
      `"${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(decimals)} allowed`,
    );
  }

  const scaled = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  const result = negative ? -scaled : scaled;

  if (result < MIN_UNITS || result > MAX_UNITS) {
    throw new ValidationError(code, `"${trimmed}" is outside the 64-bit fixed-point range`);
  }

  return result;
}

function formatScaled(scaled: bigint, decimals: number): string {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = decimals === 0 ? intPart : `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a decimal string into Units.
 *
 * "500000" → 500000000000n
 * "-0.5"   → -500000n
 */
export function parseUnits(amount: string): Units {
  return parseScaled(amount, UNITS_DECIMALS, "INVALID_AMOUNT");
}

/**
 * Render Units as a decimal string with all six places.
 *
 * 79274n → "0.079274"
 */
export function formatUnits(value: Units): string {
  return formatScaled(value, UNITS_DECIMALS);
}

/** Parse a decimal fraction ("0.05") into a Rate. */
export function parseRate(rate: string): Rate {
  return parseScaled(rate, RATE_DECIMALS, "INVALID_RATE");
}

export function formatRate(rate: Rate): string {
  return formatScaled(rate, RATE_DECIMALS);
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

/**
 * Return `value` unchanged if it fits the 64-bit range.
 * Throws MathError("OVERFLOW") otherwise.
 */
export function assertInRange(value: bigint, operation = "result"): Units {
  if (value < MIN_UNITS || value > MAX_UNITS) {
    throw new MathError(
      "OVERFLOW",
      `Fixed-point overflow in ${operation}: ${value.toString()} is outside [${MIN_UNITS.toString()}, ${MAX_UNITS.toString()}]`,
    );
  }
  return value;
}

export function addUnits(a: Units, b: Units): Units {
  return assertInRange(a + b, "addition");
}

export function subtractUnits(a: Units, b: Units): Units {
  return assertInRange(a - b, "subtraction");
}

export function negateUnits(value: Units): Units {
  return assertInRange(-value, "negation");
}

export function absUnits(value: Units): Units {
  return assertInRange(value < 0n ? -value : value, "absolute value");
}

export function minUnits(a: Units, b: Units): Units {
  return a < b ? a : b;
}

export function maxUnits(a: Units, b: Units): Units {
  return a > b ? a : b;
}

export function compareUnits(a: Units, b: Units): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Divide with round-half-even (banker's rounding).
 *
 * 5n / 2n → 2n, 7n / 2n → 4n, -5n / 2n → -2n.
 * The quotient is not range-checked; callers decide where the result lands.
 */
export function divideRoundHalfEven(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new MathError("DIVISION_BY_ZERO", "Division by zero in fixed-point computation");
  }

  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let quotient = n / d;
  const twiceRemainder = (n % d) * 2n;

  if (twiceRemainder > d || (twiceRemainder === d && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

/**
 * Multiply all factors exactly, then divide once with half-even rounding.
 *
 * This is the only place accrual formulas round, so a computation such as
 * `notional × rate × elapsed / (RATE_SCALE × yearLength)` loses at most
 * half a unit regardless of how many factors it has.
 */
export function mulDiv(factors: readonly bigint[], divisor: bigint, operation = "mulDiv"): Units {
  let product = 1n;
  for (const factor of factors) {
    product *= factor;
  }
  return assertInRange(divideRoundHalfEven(product, divisor), operation);
}
