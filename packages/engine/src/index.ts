/**
 * @actus-sm/engine: ACTUS transition engine.
 *
 * Folds lifecycle events into contract state, one event at a time:
 * - validateTerms() / initialState() at contract creation
 * - transition() per event, per contract type
 * - projectCashFlows() to replay the whole schedule
 *
 * Design rules:
 * - Pure functions; no I/O, clocks or randomness
 * - Fixed-point bigint arithmetic with one half-even rounding per event
 * - Every failure is a ValidationError, TransitionError or MathError
 */

export { dayCountFraction } from "./day-count.js";
export type { YearFraction } from "./day-count.js";

export { accrue, accruedInterestBetween } from "./accrual.js";

export { validateTerms, initialState } from "./validate-terms.js";
export type { ValidateTermsOptions } from "./validate-terms.js";

export { transition, rulesFor, assertNever } from "./transition.js";
export type {
  TransitionOptions,
  TransitionResult,
  EventContext,
  EventRule,
  RuleTable,
} from "./types.js";

export { PAM_RULES } from "./rules/pam.js";
export { LAM_RULES, redemptionCount } from "./rules/lam.js";
export { ANN_RULES, annuityInstalment } from "./rules/ann.js";

export { projectCashFlows } from "./projection.js";
export type { CashFlow, ProjectionOptions } from "./projection.js";
