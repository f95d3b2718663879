/**
 * @actus-sm/units: Error taxonomy shared by every layer.
 *
 * Three kinds, all recoverable by the caller:
 * - ValidationError: malformed terms, configuration or enum codes
 * - TransitionError: an event that does not apply to the current state
 * - MathError: fixed-point overflow or division by zero
 *
 * Errors are always thrown, never returned as codes.
 */

/** Discriminant shared by all engine errors. */
export type ActusErrorKind = "validation" | "transition" | "math";

/** Error codes for malformed input. */
export type ValidationErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_RATE"
  | "INVALID_TIMESTAMP"
  | "UNKNOWN_CODE"
  | "MISSING_TERM"
  | "INVALID_TERMS"
  | "INVALID_SCHEDULE"
  | "INVALID_CYCLE"
  | "DECODE_FAILED";

/** Error codes for events rejected by the state machine. */
export type TransitionErrorCode =
  | "EVENT_OUT_OF_ORDER"
  | "EVENT_NOT_APPLICABLE"
  | "INVALID_REPAYMENT"
  | "TERMINAL_INCONSISTENT"
  | "CONCURRENT_WRITE"
  | "NOT_INITIALIZED";

/** Error codes for fixed-point arithmetic failures. */
export type MathErrorCode = "OVERFLOW" | "DIVISION_BY_ZERO";

/**
 * Base class for every error the engine throws.
 * Narrow on `kind` (or `instanceof`) to decide how to react.
 */
export abstract class ActusError extends Error {
  abstract readonly kind: ActusErrorKind;
  abstract readonly code: string;
}

export class ValidationError extends ActusError {
  readonly kind = "validation" as const;
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

/**
 * An event that is inapplicable to the current lifecycle stage,
 * ordering or timestamp. `invariant` names the rule that was violated.
 */
export class TransitionError extends ActusError {
  readonly kind = "transition" as const;
  readonly code: TransitionErrorCode;
  readonly invariant: string;

  constructor(code: TransitionErrorCode, invariant: string, message: string) {
    super(message);
    this.name = "TransitionError";
    this.code = code;
    this.invariant = invariant;
  }
}

export class MathError extends ActusError {
  readonly kind = "math" as const;
  readonly code: MathErrorCode;

  constructor(code: MathErrorCode, message: string) {
    super(message);
    this.name = "MathError";
    this.code = code;
  }
}

/** Type guard for any engine error. */
export function isActusError(value: unknown): value is ActusError {
  return value instanceof ActusError;
}
