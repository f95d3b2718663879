/**
 * @actus-sm/schedule: Contract event schedules.
 *
 * Derives every contractual event of a contract from its terms:
 * IED, PRD, the interest (IP/IPCI), principal (PR) and fee (FP) cycles,
 * TD and MD. Without any cycle the schedule degenerates to [IED, MD].
 */

import { ValidationError } from "@actus-sm/units";
import type {
  ContractTerms,
  Cycle,
  EventType,
  ResolvedScheduleConfig,
  ScheduledEvent,
  ShiftedDay,
  Timestamp,
} from "@actus-sm/types";
import { EVENT_SEQUENCE, resolveScheduleConfig } from "@actus-sm/types";
import type { BusinessCalendar } from "./calendar.js";
import { createCalendar } from "./calendar.js";
import { shiftDay } from "./business-day.js";
import { addCycle, isoDate } from "./dates.js";
import { DEFAULT_MAX_SCHEDULE_EVENTS, Schedule } from "./schedule.js";

export interface ContractScheduleOptions {
  /** Bound on the number of dates of each cycle. */
  readonly maxEvents?: number | undefined;
}

/** Lifecycle bounds every contract schedule needs. */
export interface LifecycleDates {
  readonly initialExchangeDate: Timestamp;
  readonly maturityDate: Timestamp;
}

/**
 * Extract and check the initial exchange and maturity dates.
 *
 * @throws {ValidationError} MISSING_TERM when either is absent,
 *   INVALID_SCHEDULE when maturity is not after the initial exchange
 */
export function lifecycleDates(terms: ContractTerms): LifecycleDates {
  const { initialExchangeDate, maturityDate } = terms;
  if (initialExchangeDate === undefined) {
    throw new ValidationError("MISSING_TERM", `Contract "${terms.contractId}" has no initialExchangeDate`);
  }
  if (maturityDate === undefined) {
    throw new ValidationError("MISSING_TERM", `Contract "${terms.contractId}" has no maturityDate`);
  }
  if (maturityDate <= initialExchangeDate) {
    throw new ValidationError(
      "INVALID_SCHEDULE",
      `Maturity (${String(maturityDate)}) must be after initial exchange (${String(initialExchangeDate)})`,
    );
  }
  return { initialExchangeDate, maturityDate };
}

/**
 * The shifted day of a single lifecycle date under the terms' conventions.
 */
export function shiftedEventDay(terms: ContractTerms, date: Timestamp): ShiftedDay {
  const config = resolveScheduleConfig(terms.scheduleConfig);
  return shiftDay(date, config.businessDayConvention, createCalendar(config));
}

/**
 * Whether `timestamp` is the given lifecycle date, either unadjusted or
 * as shifted under the terms' business-day convention.
 */
export function isLifecycleTime(terms: ContractTerms, date: Timestamp, timestamp: Timestamp): boolean {
  if (timestamp === date) {
    return true;
  }
  const day = shiftedEventDay(terms, date);
  return timestamp === day.paymentTime || timestamp === day.calculationTime;
}

interface CycleContext {
  readonly config: ResolvedScheduleConfig;
  readonly calendar: BusinessCalendar;
  readonly maxEvents: number;
}

function cycleDays(
  context: CycleContext,
  cycle: Cycle,
  anchor: Timestamp | undefined,
  dates: LifecycleDates,
  includeEnd: boolean,
): ShiftedDay[] {
  // Without an anchor the first date is one period after IED, capped at maturity
  const start =
    anchor ??
    Math.min(addCycle(dates.initialExchangeDate, cycle, 1, context.config.endOfMonthConvention), dates.maturityDate);
  if (start > dates.maturityDate) {
    throw new ValidationError(
      "INVALID_SCHEDULE",
      `Cycle anchor ${isoDate(start)} is after maturity ${isoDate(dates.maturityDate)}`,
    );
  }

  const schedule = new Schedule({
    anchor: start,
    end: dates.maturityDate,
    cycle,
    endOfMonthConvention: context.config.endOfMonthConvention,
    businessDayConvention: context.config.businessDayConvention,
    calendar: context.calendar,
    includeEnd,
    maxEvents: context.maxEvents,
  });

  return schedule.toArray().filter((day) => day.calculationTime > dates.initialExchangeDate);
}

function compareEvents(a: ScheduledEvent, b: ScheduledEvent): number {
  return (
    a.day.calculationTime - b.day.calculationTime ||
    a.day.paymentTime - b.day.paymentTime ||
    EVENT_SEQUENCE[a.eventType] - EVENT_SEQUENCE[b.eventType]
  );
}

/**
 * Generate the ordered event schedule of a contract.
 *
 * Ordering: calculation time, then payment time, then EVENT_SEQUENCE.
 * Events are applied at their calculation time, so replaying the schedule
 * never moves the status date backwards; under calculate-shift conventions
 * payment times may then be out of order.
 *
 * @throws {ValidationError} for missing or contradictory lifecycle dates
 *   and for cycles that cannot be scheduled
 */
export function generateContractSchedule(
  terms: ContractTerms,
  options: ContractScheduleOptions = {},
): ScheduledEvent[] {
  const dates = lifecycleDates(terms);
  const config = resolveScheduleConfig(terms.scheduleConfig);
  const context: CycleContext = {
    config,
    calendar: createCalendar(config),
    maxEvents: options.maxEvents ?? DEFAULT_MAX_SCHEDULE_EVENTS,
  };
  const shift = (ts: Timestamp): ShiftedDay => shiftDay(ts, config.businessDayConvention, context.calendar);
  const events: ScheduledEvent[] = [];
  const push = (eventType: EventType, day: ShiftedDay): void => {
    events.push({ eventType, day });
  };

  push("IED", shift(dates.initialExchangeDate));

  if (terms.purchaseDate !== undefined) {
    push("PRD", shift(terms.purchaseDate));
  }

  if (terms.cycleOfInterestPayment !== undefined) {
    const capitalizationEnd = terms.capitalizationEndDate;
    for (const day of cycleDays(context, terms.cycleOfInterestPayment, terms.cycleAnchorDateOfInterestPayment, dates, true)) {
      const capitalizes = capitalizationEnd !== undefined && day.calculationTime <= capitalizationEnd;
      push(capitalizes ? "IPCI" : "IP", day);
    }
  }

  if (terms.contractType !== "PAM" && terms.cycleOfPrincipalRedemption !== undefined) {
    for (const day of cycleDays(context, terms.cycleOfPrincipalRedemption, terms.cycleAnchorDateOfPrincipalRedemption, dates, false)) {
      push("PR", day);
    }
  }

  if (terms.cycleOfFee !== undefined) {
    for (const day of cycleDays(context, terms.cycleOfFee, terms.cycleAnchorDateOfFee, dates, true)) {
      push("FP", day);
    }
  }

  push("MD", shift(dates.maturityDate));

  const termination = terms.terminationDate;
  if (termination !== undefined) {
    const td = shift(termination);
    const kept = events.filter((event) => event.eventType !== "MD" && event.day.calculationTime <= td.calculationTime);
    kept.push({ eventType: "TD", day: td });
    return kept.sort(compareEvents);
  }

  return events.sort(compareEvents);
}
