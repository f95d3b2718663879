/**
 * @actus-sm/schedule: Business calendars.
 *
 * - NC: no calendar, every day is a business day
 * - MF: Monday to Friday, minus configured holidays
 */

import { ValidationError } from "@actus-sm/units";
import type { ResolvedScheduleConfig, Timestamp } from "@actus-sm/types";
import { isoDate, weekday } from "./dates.js";

export interface BusinessCalendar {
  readonly id: string;
  isBusinessDay(ts: Timestamp): boolean;
}

export const NO_CALENDAR: BusinessCalendar = {
  id: "NC",
  isBusinessDay: () => true,
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Weekday calendar with an optional holiday list.
 */
export class MondayToFridayCalendar implements BusinessCalendar {
  readonly id = "MF";
  private readonly _holidays: ReadonlySet<string>;

  constructor(holidays: readonly string[] = []) {
    for (const holiday of holidays) {
      if (!ISO_DATE.test(holiday) || Number.isNaN(Date.parse(`${holiday}T00:00:00Z`))) {
        throw new ValidationError(
          "INVALID_SCHEDULE",
          `Invalid holiday "${holiday}". Expected YYYY-MM-DD`,
        );
      }
    }
    this._holidays = new Set(holidays);
  }

  isBusinessDay(ts: Timestamp): boolean {
    const day = weekday(ts);
    if (day === 0 || day === 6) {
      return false;
    }
    return !this._holidays.has(isoDate(ts));
  }
}

export function createCalendar(config: ResolvedScheduleConfig): BusinessCalendar {
  switch (config.calendar) {
    case "NC":
      return NO_CALENDAR;
    case "MF":
      return new MondayToFridayCalendar(config.holidays);
  }
}
