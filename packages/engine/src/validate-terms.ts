/**
 * @actus-sm/engine: Init-time validation of contract terms.
 *
 * Everything that can be checked without an event is checked here, once,
 * so that a contract which passes never fails later on a missing term or
 * an unschedulable cycle.
 *
 * Rules:
 * - initial exchange, maturity and notional are required for every type
 * - LAM and ANN also need a principal redemption cycle
 * - statusDate ≤ initialExchangeDate < maturityDate
 * - purchase lies strictly inside the lifetime; termination after IED, at or before MD
 * - amounts are non-negative; the interest rate is above -100%
 */

import {
  MAX_UNITS,
  MIN_UNITS,
  RATE_SCALE,
  ValidationError,
} from "@actus-sm/units";
import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, ScheduledEvent, Timestamp } from "@actus-sm/types";
import {
  BusinessDayConventions,
  CalendarIds,
  DayCountConventions,
  EndOfMonthConventions,
  FeeBases,
  TERM_DEFAULTS,
  isContractRole,
  isContractType,
  isCycle,
  isTimestamp,
} from "@actus-sm/types";
import { DEFAULT_MAX_SCHEDULE_EVENTS, generateContractSchedule, lifecycleDates } from "@actus-sm/schedule";

export interface ValidateTermsOptions {
  /** Bound on the dates of each cycle schedule. Default: 10 000 */
  readonly maxScheduleEvents?: number | undefined;
}

type TimestampTerm =
  | "statusDate"
  | "initialExchangeDate"
  | "maturityDate"
  | "cycleAnchorDateOfInterestPayment"
  | "capitalizationEndDate"
  | "cycleAnchorDateOfPrincipalRedemption"
  | "cycleAnchorDateOfFee"
  | "purchaseDate"
  | "terminationDate";

const TIMESTAMP_TERMS: readonly TimestampTerm[] = [
  "statusDate",
  "initialExchangeDate",
  "maturityDate",
  "cycleAnchorDateOfInterestPayment",
  "capitalizationEndDate",
  "cycleAnchorDateOfPrincipalRedemption",
  "cycleAnchorDateOfFee",
  "purchaseDate",
  "terminationDate",
];

type AmountTerm =
  | "notionalPrincipal"
  | "premiumDiscountAtIED"
  | "nextPrincipalRedemptionPayment"
  | "feeRate"
  | "priceAtPurchaseDate"
  | "priceAtTerminationDate";

/** Amount terms and whether they may be negative. */
const AMOUNT_TERMS: ReadonlyArray<readonly [AmountTerm, boolean]> = [
  ["notionalPrincipal", false],
  // a discount is a negative premium
  ["premiumDiscountAtIED", true],
  ["nextPrincipalRedemptionPayment", false],
  ["feeRate", false],
  ["priceAtPurchaseDate", false],
  ["priceAtTerminationDate", false],
];

function invalid(message: string): ValidationError {
  return new ValidationError("INVALID_TERMS", message);
}

function missing(terms: ContractTerms, term: string): ValidationError {
  return new ValidationError("MISSING_TERM", `Contract "${terms.contractId}" requires ${term}`);
}

function checkAmount(name: string, value: Units | undefined, allowNegative: boolean): void {
  if (value === undefined) return;
  if (typeof value !== "bigint" || value < MIN_UNITS || value > MAX_UNITS) {
    throw new ValidationError("INVALID_AMOUNT", `${name} is not a 64-bit fixed-point amount`);
  }
  if (!allowNegative && value < 0n) {
    throw new ValidationError("INVALID_AMOUNT", `${name} must not be negative`);
  }
}

function checkConventions(terms: ContractTerms): void {
  const config = terms.scheduleConfig;
  if (config.calendar !== undefined && !CalendarIds.is(config.calendar)) {
    throw invalid(`Unknown calendar "${String(config.calendar)}"`);
  }
  if (config.endOfMonthConvention !== undefined && !EndOfMonthConventions.is(config.endOfMonthConvention)) {
    throw invalid(`Unknown end-of-month convention "${String(config.endOfMonthConvention)}"`);
  }
  if (config.businessDayConvention !== undefined && !BusinessDayConventions.is(config.businessDayConvention)) {
    throw invalid(`Unknown business-day convention "${String(config.businessDayConvention)}"`);
  }
  if (terms.dayCountConvention !== undefined && !DayCountConventions.is(terms.dayCountConvention)) {
    throw invalid(`Unknown day-count convention "${String(terms.dayCountConvention)}"`);
  }
  if (terms.feeBasis !== undefined && !FeeBases.is(terms.feeBasis)) {
    throw invalid(`Unknown fee basis "${String(terms.feeBasis)}"`);
  }
  for (const cycle of [terms.cycleOfInterestPayment, terms.cycleOfPrincipalRedemption, terms.cycleOfFee]) {
    if (cycle !== undefined && !isCycle(cycle)) {
      throw new ValidationError("INVALID_CYCLE", "Cycle count must be a positive integer with a known unit and stub");
    }
  }
}

function within(
  name: string,
  value: Timestamp | undefined,
  lower: Timestamp,
  upper: Timestamp,
  includeUpper: boolean,
): void {
  if (value === undefined) return;
  const aboveLower = value > lower;
  const belowUpper = includeUpper ? value <= upper : value < upper;
  if (!aboveLower || !belowUpper) {
    throw invalid(`${name} must lie after the initial exchange and ${includeUpper ? "at or " : ""}before maturity`);
  }
}

/**
 * Check terms for completeness and consistency and build the event
 * schedule once, so schedule errors surface at initialization.
 *
 * @returns the contract's event schedule
 * @throws {ValidationError} for the first problem found
 */
export function validateTerms(
  terms: ContractTerms,
  options: ValidateTermsOptions = {},
): ScheduledEvent[] {
  if (typeof terms.contractId !== "string" || terms.contractId.trim() === "") {
    throw invalid("contractId must be a non-empty string");
  }
  if (!isContractType(terms.contractType)) {
    throw invalid(`Unknown contract type "${String(terms.contractType)}"`);
  }
  if (!isContractRole(terms.contractRole)) {
    throw invalid(`Unknown contract role "${String(terms.contractRole)}"`);
  }
  if (terms.settlementCurrency !== undefined && typeof terms.settlementCurrency !== "string") {
    throw invalid("settlementCurrency must be a string");
  }

  for (const name of TIMESTAMP_TERMS) {
    const value = terms[name];
    if (value !== undefined && !isTimestamp(value)) {
      throw new ValidationError("INVALID_TIMESTAMP", `${name} is not a valid timestamp: ${String(value)}`);
    }
  }

  if (terms.notionalPrincipal === undefined) {
    throw missing(terms, "notionalPrincipal");
  }
  if (terms.contractType !== "PAM" && terms.cycleOfPrincipalRedemption === undefined) {
    throw missing(terms, "cycleOfPrincipalRedemption");
  }

  const { initialExchangeDate, maturityDate } = lifecycleDates(terms);
  if (terms.statusDate > initialExchangeDate) {
    throw invalid("statusDate must not be after initialExchangeDate");
  }

  within("purchaseDate", terms.purchaseDate, initialExchangeDate, maturityDate, false);
  within("terminationDate", terms.terminationDate, initialExchangeDate, maturityDate, true);
  if (terms.purchaseDate !== undefined && terms.priceAtPurchaseDate === undefined) {
    throw missing(terms, "priceAtPurchaseDate");
  }
  if (terms.terminationDate !== undefined && terms.priceAtTerminationDate === undefined) {
    throw missing(terms, "priceAtTerminationDate");
  }
  if (terms.capitalizationEndDate !== undefined && terms.capitalizationEndDate < initialExchangeDate) {
    throw invalid("capitalizationEndDate must not be before initialExchangeDate");
  }

  for (const [name, allowNegative] of AMOUNT_TERMS) {
    checkAmount(name, terms[name], allowNegative);
  }

  const rate = terms.nominalInterestRate ?? TERM_DEFAULTS.nominalInterestRate;
  if (typeof rate !== "bigint" || rate <= -RATE_SCALE || rate > MAX_UNITS) {
    throw new ValidationError("INVALID_RATE", "nominalInterestRate must be above -100%");
  }

  checkConventions(terms);

  return generateContractSchedule(terms, {
    maxEvents: options.maxScheduleEvents ?? DEFAULT_MAX_SCHEDULE_EVENTS,
  });
}

/**
 * The state of a freshly created contract: nothing exchanged yet,
 * stage PENDING at the terms' status date.
 */
export function initialState(terms: ContractTerms): ContractState {
  return {
    notionalPrincipal: 0n,
    accruedInterest: 0n,
    statusDate: terms.statusDate,
    feeAccrued: 0n,
    nominalInterestRate: terms.nominalInterestRate ?? TERM_DEFAULTS.nominalInterestRate,
    nextPrincipalRedemptionPayment: 0n,
    performance: "PF",
    stage: "PENDING",
  };
}
