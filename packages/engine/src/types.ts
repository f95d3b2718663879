/**
 * @actus-sm/engine: Transition types.
 */

import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, EventType, Timestamp } from "@actus-sm/types";

/** Caller-supplied parameters of a single event. */
export interface TransitionOptions {
  /** Principal to redeem on a PR event. Default depends on the contract type. */
  readonly amount?: Units | undefined;
  /** Bound on schedule sizes when a rule needs to count scheduled dates. */
  readonly maxScheduleEvents?: number | undefined;
}

/** The outcome of one applied event. `payoff` is null for events without a cash flow. */
export interface TransitionResult {
  readonly state: ContractState;
  readonly payoff: Units | null;
}

/** Everything a rule can read besides the state. */
export interface EventContext {
  readonly eventType: EventType;
  readonly timestamp: Timestamp;
  readonly terms: ContractTerms;
  /** +1 for creditors (RPA), -1 for debtors (RPL). */
  readonly sign: 1n | -1n;
  readonly options: TransitionOptions;
}

/**
 * Applies one event to a state that interest and fees have already been
 * accrued into up to `context.timestamp`. Never mutates its input.
 */
export type EventRule = (state: ContractState, context: EventContext) => TransitionResult;

/** One rule per event type: the complete behaviour of a contract type. */
export type RuleTable = Readonly<Record<EventType, EventRule>>;
