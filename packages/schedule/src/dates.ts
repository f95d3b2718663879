/**
 * @actus-sm/schedule: UTC calendar arithmetic on epoch-second timestamps.
 *
 * Month-based steps are always computed from the anchor (anchor + k·cycle),
 * never by repeatedly adding to the previous date, so a 31st anchor does not
 * drift to the 28th after February.
 *
 * Instants outside [0, MAX_TIMESTAMP] raise INVALID_TIMESTAMP rather than
 * turning into an Invalid Date.
 */

import { ValidationError } from "@actus-sm/units";
import { MAX_TIMESTAMP } from "@actus-sm/types";
import type { Cycle, CycleUnit, EndOfMonthConvention, Timestamp } from "@actus-sm/types";

export const SECONDS_PER_DAY = 86_400;

/** Broken-down UTC date. `month` is 1-based. */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly secondOfDay: number;
}

function outOfRange(ts: Timestamp): ValidationError {
  return new ValidationError("INVALID_TIMESTAMP", `${String(ts)} is outside the representable date range`);
}

function checkRange(ts: Timestamp): Timestamp {
  if (!Number.isFinite(ts) || ts < 0 || ts > MAX_TIMESTAMP) {
    throw outOfRange(ts);
  }
  return ts;
}

function utcDate(ts: Timestamp): Date {
  return new Date(checkRange(ts) * 1000);
}

export function toCalendarDate(ts: Timestamp): CalendarDate {
  const date = utcDate(ts);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    secondOfDay: ts % SECONDS_PER_DAY,
  };
}

export function fromCalendarDate(date: CalendarDate): Timestamp {
  return checkRange(Date.UTC(date.year, date.month - 1, date.day) / 1000 + date.secondOfDay);
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isLastDayOfMonth(ts: Timestamp): boolean {
  const { year, month, day } = toCalendarDate(ts);
  return day === daysInMonth(year, month);
}

/** 0 = Sunday … 6 = Saturday. */
export function weekday(ts: Timestamp): number {
  return utcDate(ts).getUTCDay();
}

export function addDays(ts: Timestamp, days: number): Timestamp {
  return checkRange(ts + days * SECONDS_PER_DAY);
}

/** `YYYY-MM-DD` of the UTC day containing `ts`. */
export function isoDate(ts: Timestamp): string {
  return utcDate(ts).toISOString().slice(0, 10);
}

const MONTHS_PER_UNIT: Readonly<Record<CycleUnit, number>> = {
  D: 0,
  W: 0,
  M: 1,
  Q: 3,
  H: 6,
  Y: 12,
};

const DAYS_PER_UNIT: Readonly<Record<CycleUnit, number>> = {
  D: 1,
  W: 7,
  M: 0,
  Q: 0,
  H: 0,
  Y: 0,
};

/** Whether the cycle steps in whole months (and so is subject to EOM). */
export function isMonthBased(cycle: Cycle): boolean {
  return MONTHS_PER_UNIT[cycle.unit] > 0;
}

/** Nominal length of one period: whole months, or days for D and W cycles. */
export function cyclePeriod(cycle: Cycle): { readonly months: number; readonly days: number } {
  return {
    months: cycle.count * MONTHS_PER_UNIT[cycle.unit],
    days: cycle.count * DAYS_PER_UNIT[cycle.unit],
  };
}

/**
 * The k-th date of a cycle started at `anchor`.
 *
 * Month-based cycles keep the anchor's day-of-month, clamped to the target
 * month's length. Under EOM, an anchor on the last day of its month lands
 * on the last day of every target month.
 */
export function addCycle(
  anchor: Timestamp,
  cycle: Cycle,
  k: number,
  endOfMonthConvention: EndOfMonthConvention = "SD",
): Timestamp {
  if (!isMonthBased(cycle)) {
    return addDays(anchor, k * cycle.count * DAYS_PER_UNIT[cycle.unit]);
  }

  const start = toCalendarDate(anchor);
  const totalMonths = start.month - 1 + k * cycle.count * MONTHS_PER_UNIT[cycle.unit];
  const year = start.year + Math.floor(totalMonths / 12);
  const month = (totalMonths % 12) + 1;
  const length = daysInMonth(year, month);

  const stickToEnd = endOfMonthConvention === "EOM" && isLastDayOfMonth(anchor);
  const day = stickToEnd ? length : Math.min(start.day, length);

  return fromCalendarDate({ year, month, day, secondOfDay: start.secondOfDay });
}
