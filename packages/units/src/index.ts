/**
 * @actus-sm/units: Fixed-point monetary primitives and error taxonomy.
 *
 * Every money and rate field in the engine is a bigint scaled by 10^6.
 * Arithmetic is range-checked against the signed 64-bit interval and
 * rounds half-even exactly once per computation.
 *
 * Zero runtime dependencies.
 */

// Fixed-point arithmetic
export {
  UNITS_DECIMALS,
  UNITS_SCALE,
  RATE_DECIMALS,
  RATE_SCALE,
  MIN_UNITS,
  MAX_UNITS,
  ZERO,
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
} from "./units.js";
export type { Units, Rate } from "./units.js";

// Errors
export {
  ActusError,
  ValidationError,
  TransitionError,
  MathError,
  isActusError,
} from "./errors.js";
export type {
  ActusErrorKind,
  ValidationErrorCode,
  TransitionErrorCode,
  MathErrorCode,
} from "./errors.js";
