/**
 * @actus-sm/engine: The state transition function.
 *
 * transition(event, timestamp, state, terms) → { state, payoff }
 *
 * Rules:
 * - Pure: the input state is never modified; the caller commits the result
 * - Events must not precede the state's status date
 * - PENDING accepts only IED and AD; ACTIVE never IED; CLOSED nothing
 * - A defaulted contract makes no scheduled payments (IP, IPCI, PR, FP, MD)
 * - Nothing but MD happens after maturity
 * - Interest and fees accrue up to the event before its own effect
 * - A closed contract holds no principal, interest or fees
 */

import { TransitionError, ValidationError } from "@actus-sm/units";
import type { ContractState, ContractTerms, ContractType, EventType, Timestamp } from "@actus-sm/types";
import { isTimestamp, roleSign } from "@actus-sm/types";
import { shiftedEventDay } from "@actus-sm/schedule";
import { accrue } from "./accrual.js";
import { ANN_RULES } from "./rules/ann.js";
import { LAM_RULES } from "./rules/lam.js";
import { PAM_RULES } from "./rules/pam.js";
import type { EventContext, RuleTable, TransitionOptions, TransitionResult } from "./types.js";

/** Compile-time exhaustiveness check for switches over closed unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

/** The rule table of a contract type. */
export function rulesFor(contractType: ContractType): RuleTable {
  switch (contractType) {
    case "PAM":
      return PAM_RULES;
    case "LAM":
      return LAM_RULES;
    case "ANN":
      return ANN_RULES;
    default:
      return assertNever(contractType);
  }
}

const PENDING_EVENTS: ReadonlySet<EventType> = new Set<EventType>(["IED", "AD"]);
const SUSPENDED_ON_DEFAULT: ReadonlySet<EventType> = new Set<EventType>(["IP", "IPCI", "PR", "FP", "MD"]);

function notApplicable(invariant: string, message: string): TransitionError {
  return new TransitionError("EVENT_NOT_APPLICABLE", invariant, message);
}

/** Latest instant the contract is alive: maturity, or its shifted payment day. */
function maturityBound(terms: ContractTerms): Timestamp | undefined {
  const maturity = terms.maturityDate;
  if (maturity === undefined) return undefined;
  return Math.max(maturity, shiftedEventDay(terms, maturity).paymentTime);
}

function checkApplicable(eventType: EventType, timestamp: Timestamp, state: ContractState, terms: ContractTerms): void {
  if (timestamp < state.statusDate) {
    throw new TransitionError(
      "EVENT_OUT_OF_ORDER",
      "status-date-monotonic",
      `${eventType} at ${String(timestamp)} precedes the status date ${String(state.statusDate)}`,
    );
  }

  switch (state.stage) {
    case "CLOSED":
      throw notApplicable("lifecycle-stage", `${eventType} rejected: contract is closed`);
    case "PENDING":
      if (!PENDING_EVENTS.has(eventType)) {
        throw notApplicable("lifecycle-stage", `${eventType} rejected: principal not yet exchanged`);
      }
      return;
    case "ACTIVE":
      break;
    default:
      return assertNever(state.stage);
  }

  if (eventType === "IED") {
    throw notApplicable("lifecycle-stage", "IED rejected: principal already exchanged");
  }
  if (state.performance === "DF" && SUSPENDED_ON_DEFAULT.has(eventType)) {
    throw notApplicable("performance-status", `${eventType} rejected: contract is in default`);
  }

  const bound = maturityBound(terms);
  if (eventType !== "MD" && bound !== undefined && timestamp > bound) {
    throw notApplicable("contract-lifetime", `${eventType} at ${String(timestamp)} is after maturity`);
  }
}

function checkTerminal(state: ContractState): void {
  if (state.notionalPrincipal !== 0n || state.accruedInterest !== 0n || state.feeAccrued !== 0n) {
    throw new TransitionError(
      "TERMINAL_INCONSISTENT",
      "terminal-zero",
      "A closed contract must hold no principal, interest or fees",
    );
  }
}

/**
 * Apply one event to a contract state.
 *
 * @throws {ValidationError} for an invalid timestamp or a missing term
 * @throws {TransitionError} when the event does not apply to the state
 * @throws {MathError} when a computed amount leaves the 64-bit range
 */
export function transition(
  eventType: EventType,
  timestamp: Timestamp,
  state: ContractState,
  terms: ContractTerms,
  options: TransitionOptions = {},
): TransitionResult {
  if (!isTimestamp(timestamp)) {
    throw new ValidationError("INVALID_TIMESTAMP", `Invalid event timestamp: ${String(timestamp)}`);
  }

  checkApplicable(eventType, timestamp, state, terms);

  const context: EventContext = {
    eventType,
    timestamp,
    terms,
    sign: roleSign(terms.contractRole),
    options,
  };

  const accrued = accrue(state, terms, timestamp);
  const result = rulesFor(terms.contractType)[eventType](accrued, context);

  if (result.state.stage === "CLOSED") {
    checkTerminal(result.state);
  }

  return result;
}
