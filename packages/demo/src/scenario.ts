/**
 * @actus-sm/demo: Scenario runner.
 *
 * Drives a contract through the host facade, one scheduled event at a
 * time, and sets each live payoff beside the projected one.
 */

import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import { ActusContract } from "@actus-sm/contract";
import type { ContractStore, HistoryVerification } from "@actus-sm/contract";
import { encodeTerms, parseTermsJson } from "@actus-sm/codec";
import { isoDate } from "@actus-sm/schedule";
import { ContractRoles, ContractTypes, EventTypes } from "@actus-sm/types";
import type { ContractState, ContractTerms, EventType, Timestamp } from "@actus-sm/types";
import { formatUnits } from "@actus-sm/units";
import type { Units } from "@actus-sm/units";

export const DEFAULT_SCENARIO = new URL("../scenarios/lam-quarterly.json", import.meta.url);

export interface ScenarioRow {
  readonly sequence: number;
  readonly eventType: EventType;
  readonly time: Timestamp;
  readonly date: string;
  readonly payoff: Units | null;
  readonly projected: Units | null;
  /** Outstanding notional after the event. */
  readonly notional: Units;
}

export interface ScenarioResult {
  readonly contractId: string;
  readonly currency: string;
  readonly rows: readonly ScenarioRow[];
  readonly finalState: ContractState;
  readonly verification: HistoryVerification;
  readonly historyHead: string | undefined;
}

export interface RunScenarioOptions {
  readonly store?: ContractStore | undefined;
  readonly logger?: Logger | undefined;
  readonly maxScheduleEvents?: number | undefined;
}

/** Read scenario terms from a JSON file. */
export function loadScenario(path: URL | string = DEFAULT_SCENARIO): ContractTerms {
  return parseTermsJson(readFileSync(path, "utf8"));
}

/**
 * Initialize a contract from terms and apply every projected event.
 *
 * Events are applied at their calculation time, so live payoffs equal the
 * projection unless the engine disagrees with itself.
 */
export function runScenario(terms: ContractTerms, options: RunScenarioOptions = {}): ScenarioResult {
  const currency = terms.settlementCurrency ?? "USDC";
  const contract = new ActusContract(options);
  contract.init(
    ContractTypes.encode(terms.contractType),
    ContractRoles.encode(terms.contractRole),
    currency,
    encodeTerms(terms),
  );

  const rows: ScenarioRow[] = [];
  for (const flow of contract.projectCashFlows()) {
    const payoff = contract.processEvent(EventTypes.encode(flow.eventType), flow.calculationTime);
    rows.push({
      sequence: rows.length + 1,
      eventType: flow.eventType,
      time: flow.time,
      date: isoDate(flow.time),
      payoff,
      projected: flow.payoff,
      notional: contract.getStateSnapshot().notionalPrincipal,
    });
  }

  const history = contract.getHistory();
  return {
    contractId: terms.contractId,
    currency,
    rows,
    finalState: contract.getStateSnapshot(),
    verification: contract.verifyHistory(),
    historyHead: history[history.length - 1]?.hash,
  };
}

/** Sum of the non-null payoffs. */
export function netCashFlow(rows: readonly ScenarioRow[]): Units {
  return rows.reduce((sum, row) => sum + (row.payoff ?? 0n), 0n);
}

export function formatPayoff(payoff: Units | null): string {
  return payoff === null ? "-" : formatUnits(payoff);
}
