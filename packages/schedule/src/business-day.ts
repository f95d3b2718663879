/**
 * @actus-sm/schedule: Business-day shifting.
 *
 * Rules:
 * - Following moves forward to the next business day
 * - Preceding moves back to the previous business day
 * - Modified variants switch direction when the move would leave the month
 * - Shift-calculate (SC*) accrues to the shifted day
 * - Calculate-shift (CS*) accrues to the unadjusted day, pays on the shifted one
 * - NOS applies no shift at all
 */

import { ValidationError } from "@actus-sm/units";
import type { BusinessDayConvention, ShiftedDay, Timestamp } from "@actus-sm/types";
import type { BusinessCalendar } from "./calendar.js";
import { addDays, isoDate, toCalendarDate } from "./dates.js";

/** Longest run of non-business days a calendar may contain. */
export const MAX_SHIFT_DAYS = 366;

type Direction = 1 | -1;

interface ConventionRule {
  readonly direction: Direction | null;
  readonly modified: boolean;
  readonly calculateOnShifted: boolean;
}

const RULES: Readonly<Record<BusinessDayConvention, ConventionRule>> = {
  NOS: { direction: null, modified: false, calculateOnShifted: true },
  SCF: { direction: 1, modified: false, calculateOnShifted: true },
  SCMF: { direction: 1, modified: true, calculateOnShifted: true },
  CSF: { direction: 1, modified: false, calculateOnShifted: false },
  CSMF: { direction: 1, modified: true, calculateOnShifted: false },
  SCP: { direction: -1, modified: false, calculateOnShifted: true },
  SCMP: { direction: -1, modified: true, calculateOnShifted: true },
  CSP: { direction: -1, modified: false, calculateOnShifted: false },
  CSMP: { direction: -1, modified: true, calculateOnShifted: false },
};

function moveToBusinessDay(ts: Timestamp, direction: Direction, calendar: BusinessCalendar): Timestamp {
  let current = ts;
  for (let i = 0; i <= MAX_SHIFT_DAYS; i++) {
    if (calendar.isBusinessDay(current)) {
      return current;
    }
    current = addDays(current, direction);
  }
  throw new ValidationError(
    "INVALID_SCHEDULE",
    `No business day within ${String(MAX_SHIFT_DAYS)} days of ${isoDate(ts)} on calendar ${calendar.id}`,
  );
}

function sameMonth(a: Timestamp, b: Timestamp): boolean {
  const da = toCalendarDate(a);
  const db = toCalendarDate(b);
  return da.year === db.year && da.month === db.month;
}

/**
 * Adjust a date to the calendar under the given convention.
 */
export function shiftDay(
  ts: Timestamp,
  convention: BusinessDayConvention,
  calendar: BusinessCalendar,
): ShiftedDay {
  const rule = RULES[convention];
  if (rule.direction === null) {
    return { calculationTime: ts, paymentTime: ts };
  }

  let shifted = moveToBusinessDay(ts, rule.direction, calendar);
  if (rule.modified && !sameMonth(ts, shifted)) {
    shifted = moveToBusinessDay(ts, rule.direction === 1 ? -1 : 1, calendar);
  }

  return {
    calculationTime: rule.calculateOnShifted ? shifted : ts,
    paymentTime: shifted,
  };
}
