/**
 * Shared contract terms for engine tests.
 */

import type { ContractState, ContractTerms, Cycle, EventType } from "@actus-sm/types";
import type { Units } from "@actus-sm/units";
import { transition } from "../src/transition.js";
import type { TransitionOptions } from "../src/types.js";

export const ts = (iso: string): number => Date.parse(iso) / 1000;

/** 500 000 lent at 5% from t=1000 to t=1300. */
export const PAM_TERMS: ContractTerms = {
  contractId: "pam-scenario",
  contractType: "PAM",
  contractRole: "RPA",
  statusDate: 1000,
  initialExchangeDate: 1000,
  maturityDate: 1300,
  notionalPrincipal: 500_000_000_000n,
  nominalInterestRate: 50_000n,
  scheduleConfig: {},
};

export const QUARTERLY: Cycle = { count: 1, unit: "Q", stub: "SHORT" };
export const MONTHLY: Cycle = { count: 1, unit: "M", stub: "SHORT" };

/** 1 000 over one year from 2024-01-15. */
export const YEAR_TERMS: ContractTerms = {
  contractId: "loan-2024",
  contractType: "PAM",
  contractRole: "RPA",
  statusDate: ts("2024-01-15T00:00:00Z"),
  initialExchangeDate: ts("2024-01-15T00:00:00Z"),
  maturityDate: ts("2025-01-15T00:00:00Z"),
  notionalPrincipal: 1_000_000_000n,
  scheduleConfig: {},
};

export interface Step {
  readonly event: EventType;
  readonly at: number;
  readonly options?: TransitionOptions;
}

/** Apply steps in order, collecting each payoff. */
export function run(
  terms: ContractTerms,
  start: ContractState,
  steps: readonly Step[],
): { state: ContractState; payoffs: (Units | null)[] } {
  let state = start;
  const payoffs: (Units | null)[] = [];
  for (const step of steps) {
    const result = transition(step.event, step.at, state, terms, step.options);
    state = result.state;
    payoffs.push(result.payoff);
  }
  return { state, payoffs };
}
