/**
 * @actus-sm/schedule: Schedule engine.
 *
 * Turns anchors, cycles and conventions into ordered ShiftedDays, and a
 * contract's terms into its ordered event schedule.
 *
 * Design rules:
 * - Configuration errors surface when a schedule is built, not while iterating
 * - Schedules are finite, restartable and strictly increasing
 * - All date arithmetic is UTC
 */

// Dates
export {
  SECONDS_PER_DAY,
  toCalendarDate,
  fromCalendarDate,
  isLeapYear,
  daysInMonth,
  isLastDayOfMonth,
  weekday,
  addDays,
  isoDate,
  isMonthBased,
  cyclePeriod,
  addCycle,
} from "./dates.js";
export type { CalendarDate } from "./dates.js";

// Cycles
export { parseCycle, formatCycle } from "./cycle.js";

// Calendars and shifting
export { NO_CALENDAR, MondayToFridayCalendar, createCalendar } from "./calendar.js";
export type { BusinessCalendar } from "./calendar.js";
export { MAX_SHIFT_DAYS, shiftDay } from "./business-day.js";

// Schedules
export { DEFAULT_MAX_SCHEDULE_EVENTS, Schedule } from "./schedule.js";
export type { ScheduleOptions } from "./schedule.js";
export {
  lifecycleDates,
  shiftedEventDay,
  isLifecycleTime,
  generateContractSchedule,
} from "./contract-schedule.js";
export type { ContractScheduleOptions, LifecycleDates } from "./contract-schedule.js";
