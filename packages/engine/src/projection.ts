/**
 * @actus-sm/engine: Cash-flow projection.
 *
 * Replays the generated schedule from the initial state. Each event is
 * applied at its calculation time and reported at its payment time.
 */

import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, EventType, Timestamp } from "@actus-sm/types";
import { transition } from "./transition.js";
import { initialState, validateTerms } from "./validate-terms.js";

export interface ProjectionOptions {
  readonly maxScheduleEvents?: number | undefined;
}

export interface CashFlow {
  readonly eventType: EventType;
  /** When the payoff settles. */
  readonly time: Timestamp;
  /** When the event is applied to the state. */
  readonly calculationTime: Timestamp;
  readonly payoff: Units | null;
  /** State after the event. */
  readonly state: ContractState;
}

/**
 * Project every scheduled cash flow of a contract.
 * Deterministic: identical terms give identical projections.
 */
export function projectCashFlows(terms: ContractTerms, options: ProjectionOptions = {}): CashFlow[] {
  const schedule = validateTerms(terms, options);
  const flows: CashFlow[] = [];
  let state = initialState(terms);

  for (const { eventType, day } of schedule) {
    const result = transition(eventType, day.calculationTime, state, terms, options);
    state = result.state;
    flows.push({
      eventType,
      time: day.paymentTime,
      calculationTime: day.calculationTime,
      payoff: result.payoff,
      state,
    });
  }

  return flows;
}
