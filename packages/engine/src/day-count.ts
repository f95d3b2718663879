/**
 * @actus-sm/engine: Day-count fractions.
 *
 * A fraction is kept as an exact rational so that accrual can multiply it
 * into the notional and rate before the single rounding step.
 */

import { ValidationError } from "@actus-sm/units";
import type { DayCountConvention, Timestamp } from "@actus-sm/types";
import { SECONDS_PER_DAY, fromCalendarDate, isLeapYear, toCalendarDate } from "@actus-sm/schedule";

/** `numerator / denominator` years between two instants. */
export interface YearFraction {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

const DAY = BigInt(SECONDS_PER_DAY);
const YEAR_365 = 365n * DAY;
const YEAR_360 = 360n * DAY;
// Common denominator of 365- and 366-day years
const YEAR_AA = 365n * 366n * DAY;

function actualActualIsda(from: Timestamp, to: Timestamp): YearFraction {
  let numerator = 0n;
  let cursor = from;
  let year = toCalendarDate(from).year;

  while (cursor < to) {
    const nextYear = fromCalendarDate({ year: year + 1, month: 1, day: 1, secondOfDay: 0 });
    const until = Math.min(to, nextYear);
    const seconds = BigInt(until - cursor);
    numerator += seconds * (isLeapYear(year) ? 365n : 366n);
    cursor = until;
    year++;
  }

  return { numerator, denominator: YEAR_AA };
}

function thirtyE360(from: Timestamp, to: Timestamp): YearFraction {
  const start = toCalendarDate(from);
  const end = toCalendarDate(to);
  const d1 = Math.min(start.day, 30);
  const d2 = Math.min(end.day, 30);
  const days = 360 * (end.year - start.year) + 30 * (end.month - start.month) + (d2 - d1);
  const seconds = BigInt(days) * DAY + BigInt(end.secondOfDay - start.secondOfDay);

  return { numerator: seconds > 0n ? seconds : 0n, denominator: YEAR_360 };
}

/**
 * Year fraction between `from` and `to` under a day-count convention.
 *
 * @throws {ValidationError} INVALID_TIMESTAMP when `to` precedes `from`
 */
export function dayCountFraction(
  convention: DayCountConvention,
  from: Timestamp,
  to: Timestamp,
): YearFraction {
  if (to < from) {
    throw new ValidationError(
      "INVALID_TIMESTAMP",
      `Day count end ${String(to)} precedes its start ${String(from)}`,
    );
  }

  switch (convention) {
    case "A365":
      return { numerator: BigInt(to - from), denominator: YEAR_365 };
    case "A360":
      return { numerator: BigInt(to - from), denominator: YEAR_360 };
    case "AA":
      return actualActualIsda(from, to);
    case "30E360":
      return thirtyE360(from, to);
  }
}
