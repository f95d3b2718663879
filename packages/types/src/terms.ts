/**
 * Contract Terms
 *
 * The immutable inputs of a contract. Set once at creation; every
 * per-instance value that changes over time lives in ContractState.
 *
 * Rules:
 * - All fields are readonly
 * - Optional terms are explicitly absent (undefined), never zero-filled
 * - Absent terms resolve to the named defaults in TERM_DEFAULTS
 * - Timestamps are integer seconds since the Unix epoch (UTC)
 */

import type { Rate, Units } from "@actus-sm/units";
import type {
  BusinessDayConvention,
  CalendarId,
  Cycle,
  DayCountConvention,
  EndOfMonthConvention,
  FeeBasis,
} from "./conventions.js";
import type { ContractRole, ContractType } from "./vocabulary.js";

/** Seconds since 1970-01-01T00:00:00Z. */
export type Timestamp = number;

/** Latest instant a JavaScript Date can represent (+275760-09-13), in seconds. */
export const MAX_TIMESTAMP: Timestamp = 8_640_000_000_000;

/**
 * Calendar and shift configuration for every schedule of the contract.
 */
export interface ScheduleConfig {
  readonly calendar?: CalendarId | undefined;
  readonly endOfMonthConvention?: EndOfMonthConvention | undefined;
  readonly businessDayConvention?: BusinessDayConvention | undefined;
  /** Extra non-business days for the MF calendar, as `YYYY-MM-DD`. */
  readonly holidays?: readonly string[] | undefined;
}

export interface ContractTerms {
  /** Opaque contract identifier */
  readonly contractId: string;
  readonly contractType: ContractType;
  readonly contractRole: ContractRole;

  /** Identifier of the settlement asset. Passed through, never interpreted. */
  readonly settlementCurrency?: string | undefined;

  readonly statusDate: Timestamp;
  readonly initialExchangeDate?: Timestamp | undefined;
  readonly maturityDate?: Timestamp | undefined;

  /** Principal amount (unsigned; the role decides the sign). */
  readonly notionalPrincipal?: Units | undefined;
  /** Annual nominal rate, e.g. 50000n for 5%. */
  readonly nominalInterestRate?: Rate | undefined;
  readonly dayCountConvention?: DayCountConvention | undefined;
  /** Premium (positive) or discount (negative) paid on top of the notional at IED. */
  readonly premiumDiscountAtIED?: Units | undefined;

  readonly scheduleConfig: ScheduleConfig;

  // Interest payment schedule
  readonly cycleAnchorDateOfInterestPayment?: Timestamp | undefined;
  readonly cycleOfInterestPayment?: Cycle | undefined;
  /** Interest events up to and including this date capitalize instead of paying. */
  readonly capitalizationEndDate?: Timestamp | undefined;

  // Principal redemption schedule (LAM, ANN)
  readonly cycleAnchorDateOfPrincipalRedemption?: Timestamp | undefined;
  readonly cycleOfPrincipalRedemption?: Cycle | undefined;
  /** LAM: principal per redemption. ANN: full instalment. Derived at IED when absent. */
  readonly nextPrincipalRedemptionPayment?: Units | undefined;

  // Fees
  readonly cycleAnchorDateOfFee?: Timestamp | undefined;
  readonly cycleOfFee?: Cycle | undefined;
  readonly feeBasis?: FeeBasis | undefined;
  /** Absolute amount per FP (basis A) or annual rate on the notional (basis N). */
  readonly feeRate?: bigint | undefined;

  // Secondary market
  readonly purchaseDate?: Timestamp | undefined;
  readonly priceAtPurchaseDate?: Units | undefined;
  readonly terminationDate?: Timestamp | undefined;
  readonly priceAtTerminationDate?: Units | undefined;
}

/**
 * Defaults applied when an optional term is absent.
 *
 * - calendar NC: every day is a business day
 * - endOfMonthConvention SD: keep the anchor's day-of-month
 * - businessDayConvention NOS: no business-day shift, raw dates are used
 * - dayCountConvention A365: actual elapsed seconds over a 365-day year
 * - nominalInterestRate 0: no interest accrues
 * - premiumDiscountAtIED 0, feeRate 0, feeBasis A
 */
export const TERM_DEFAULTS = {
  calendar: "NC",
  endOfMonthConvention: "SD",
  businessDayConvention: "NOS",
  dayCountConvention: "A365",
  nominalInterestRate: 0n,
  premiumDiscountAtIED: 0n,
  feeBasis: "A",
  feeRate: 0n,
} as const satisfies {
  calendar: CalendarId;
  endOfMonthConvention: EndOfMonthConvention;
  businessDayConvention: BusinessDayConvention;
  dayCountConvention: DayCountConvention;
  nominalInterestRate: Rate;
  premiumDiscountAtIED: Units;
  feeBasis: FeeBasis;
  feeRate: bigint;
};

/** ScheduleConfig with every default applied. */
export interface ResolvedScheduleConfig {
  readonly calendar: CalendarId;
  readonly endOfMonthConvention: EndOfMonthConvention;
  readonly businessDayConvention: BusinessDayConvention;
  readonly holidays: readonly string[];
}

export function resolveScheduleConfig(config: ScheduleConfig): ResolvedScheduleConfig {
  return {
    calendar: config.calendar ?? TERM_DEFAULTS.calendar,
    endOfMonthConvention: config.endOfMonthConvention ?? TERM_DEFAULTS.endOfMonthConvention,
    businessDayConvention: config.businessDayConvention ?? TERM_DEFAULTS.businessDayConvention,
    holidays: config.holidays ?? [],
  };
}
