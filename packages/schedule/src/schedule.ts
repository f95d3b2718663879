/**
 * @actus-sm/schedule: Cycle schedules.
 *
 * A Schedule is validated when it is constructed and produces its
 * ShiftedDays lazily. It can be iterated any number of times and always
 * yields the same finite, strictly increasing sequence.
 */

import { ValidationError } from "@actus-sm/units";
import type {
  BusinessDayConvention,
  Cycle,
  EndOfMonthConvention,
  ShiftedDay,
  Timestamp,
} from "@actus-sm/types";
import { isCycle, isTimestamp, TERM_DEFAULTS } from "@actus-sm/types";
import type { BusinessCalendar } from "./calendar.js";
import { NO_CALENDAR } from "./calendar.js";
import { shiftDay } from "./business-day.js";
import { addCycle, isoDate } from "./dates.js";

/** Upper bound on the number of dates a single schedule may produce. */
export const DEFAULT_MAX_SCHEDULE_EVENTS = 10_000;

export interface ScheduleOptions {
  /** First date of the schedule. */
  readonly anchor: Timestamp;
  /** Last date; required when a cycle is given. */
  readonly end?: Timestamp | undefined;
  /** Absent: only the anchor (and end) are produced. */
  readonly cycle?: Cycle | undefined;
  readonly endOfMonthConvention?: EndOfMonthConvention | undefined;
  readonly businessDayConvention?: BusinessDayConvention | undefined;
  readonly calendar?: BusinessCalendar | undefined;
  /** Whether `end` itself is part of the schedule. Default: true */
  readonly includeEnd?: boolean | undefined;
  readonly maxEvents?: number | undefined;
}

export class Schedule implements Iterable<ShiftedDay> {
  private readonly _anchor: Timestamp;
  private readonly _end: Timestamp | undefined;
  private readonly _cycle: Cycle | undefined;
  private readonly _eom: EndOfMonthConvention;
  private readonly _bdc: BusinessDayConvention;
  private readonly _calendar: BusinessCalendar;
  private readonly _includeEnd: boolean;
  private readonly _size: number;

  /**
   * @throws {ValidationError} INVALID_SCHEDULE for contradictory dates,
   *   a cycle without an end, or more than `maxEvents` dates
   */
  constructor(options: ScheduleOptions) {
    const maxEvents = options.maxEvents ?? DEFAULT_MAX_SCHEDULE_EVENTS;

    if (!isTimestamp(options.anchor)) {
      throw new ValidationError("INVALID_TIMESTAMP", `Invalid schedule anchor: ${String(options.anchor)}`);
    }
    if (options.end !== undefined && !isTimestamp(options.end)) {
      throw new ValidationError("INVALID_TIMESTAMP", `Invalid schedule end: ${String(options.end)}`);
    }
    if (options.end !== undefined && options.end < options.anchor) {
      throw new ValidationError(
        "INVALID_SCHEDULE",
        `Schedule ends (${isoDate(options.end)}) before its anchor (${isoDate(options.anchor)})`,
      );
    }
    if (options.cycle !== undefined) {
      if (!isCycle(options.cycle)) {
        throw new ValidationError("INVALID_CYCLE", "Cycle count must be a positive integer");
      }
      if (options.end === undefined) {
        throw new ValidationError("INVALID_SCHEDULE", "A cyclic schedule needs an end date");
      }
    }
    if (!Number.isSafeInteger(maxEvents) || maxEvents < 1) {
      throw new ValidationError("INVALID_SCHEDULE", `maxEvents must be a positive integer, got ${String(maxEvents)}`);
    }

    this._anchor = options.anchor;
    this._end = options.end;
    this._cycle = options.cycle;
    this._eom = options.endOfMonthConvention ?? TERM_DEFAULTS.endOfMonthConvention;
    this._bdc = options.businessDayConvention ?? TERM_DEFAULTS.businessDayConvention;
    this._calendar = options.calendar ?? NO_CALENDAR;
    this._includeEnd = options.includeEnd ?? true;

    let size = 0;
    for (const date of this._unadjustedDates()) {
      size++;
      if (size > maxEvents) {
        throw new ValidationError(
          "INVALID_SCHEDULE",
          `Schedule exceeds ${String(maxEvents)} dates`,
        );
      }
      // Shift once up front so calendar errors surface here, not mid-iteration
      shiftDay(date, this._bdc, this._calendar);
    }
    this._size = size;
  }

  /** Number of unadjusted dates (before shifted duplicates are dropped). */
  get size(): number {
    return this._size;
  }

  *[Symbol.iterator](): Iterator<ShiftedDay> {
    let last: ShiftedDay | undefined;
    for (const date of this._unadjustedDates()) {
      const day = shiftDay(date, this._bdc, this._calendar);
      // Two dates shifted onto the same business day collapse into the first
      if (last !== undefined && day.paymentTime <= last.paymentTime) {
        continue;
      }
      last = day;
      yield day;
    }
  }

  toArray(): ShiftedDay[] {
    return [...this];
  }

  private *_unadjustedDates(): Generator<Timestamp> {
    const end = this._end;
    const cycle = this._cycle;

    if (cycle === undefined || end === undefined) {
      yield this._anchor;
      if (end !== undefined && end > this._anchor && this._includeEnd) {
        yield end;
      }
      return;
    }

    let k = 0;
    let current = this._anchor;
    let next = addCycle(this._anchor, cycle, 1, this._eom);

    while (current < end) {
      const hasStub = next > end;
      // A long stub absorbs the final short period into the previous one
      const dropForLongStub = cycle.stub === "LONG" && hasStub && k > 0;
      if (!dropForLongStub) {
        yield current;
      }
      k++;
      current = next;
      next = addCycle(this._anchor, cycle, k + 1, this._eom);
    }

    if (this._includeEnd) {
      yield end;
    }
  }
}
