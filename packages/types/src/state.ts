/**
 * Contract State
 *
 * The evolving ledger of one contract instance. Replaced wholesale on
 * every successful event; never partially updated.
 */

import type { Rate, Units } from "@actus-sm/units";
import { defineCodeTable } from "./vocabulary.js";
import type { EventType } from "./vocabulary.js";
import type { Timestamp } from "./terms.js";

/** PF: performing. DF: defaulted after a credit event. */
export type PerformanceStatus = "PF" | "DF";

export const PerformanceStatuses = defineCodeTable<PerformanceStatus>(
  "PerformanceStatus",
  ["PF", "DF"],
  { PF: 0, DF: 1 },
);

/**
 * Where the contract is in its lifecycle.
 *
 * - PENDING: created, principal not yet exchanged
 * - ACTIVE: between initial exchange and maturity/termination
 * - CLOSED: matured or terminated; accepts no further events
 */
export type LifecycleStage = "PENDING" | "ACTIVE" | "CLOSED";

export const LifecycleStages = defineCodeTable<LifecycleStage>(
  "LifecycleStage",
  ["PENDING", "ACTIVE", "CLOSED"],
  { PENDING: 0, ACTIVE: 1, CLOSED: 2 },
);

export interface ContractState {
  /** Outstanding principal. Positive for creditors, negative for debtors. */
  readonly notionalPrincipal: Units;
  /** Interest accrued but not yet settled, signed like the notional. */
  readonly accruedInterest: Units;
  /** Timestamp of the last applied event. Never decreases. */
  readonly statusDate: Timestamp;
  /** Notional-basis fees accrued but not yet paid, signed like the notional. */
  readonly feeAccrued: Units;
  readonly nominalInterestRate: Rate;
  /** Principal (LAM) or instalment (ANN) due per redemption, unsigned. */
  readonly nextPrincipalRedemptionPayment: Units;
  readonly performance: PerformanceStatus;
  readonly stage: LifecycleStage;
}

/**
 * A calendar date together with its convention-adjusted settlement date.
 *
 * `calculationTime` is the instant interest accrues to; `paymentTime`
 * is when cash moves. They differ only under calculate-shift conventions.
 */
export interface ShiftedDay {
  readonly calculationTime: Timestamp;
  readonly paymentTime: Timestamp;
}

/** A contractual event due on a shifted day. */
export interface ScheduledEvent {
  readonly eventType: EventType;
  readonly day: ShiftedDay;
}
