/**
 * Schedule and accrual conventions.
 *
 * Each convention is a closed string-literal union with wire codes,
 * following the ACTUS data dictionary abbreviations.
 */

import { defineCodeTable } from "./vocabulary.js";

/**
 * Business-day shift conventions.
 *
 * - NOS: no shift
 * - SCF / SCMF: shift-calculate, following / modified following
 * - CSF / CSMF: calculate-shift, following / modified following
 * - SCP / SCMP: shift-calculate, preceding / modified preceding
 * - CSP / CSMP: calculate-shift, preceding / modified preceding
 *
 * "Shift-calculate" accrues to the shifted date; "calculate-shift" accrues
 * to the unadjusted date and only pays on the shifted one.
 */
export type BusinessDayConvention =
  | "NOS"
  | "SCF"
  | "SCMF"
  | "CSF"
  | "CSMF"
  | "SCP"
  | "SCMP"
  | "CSP"
  | "CSMP";

export const BusinessDayConventions = defineCodeTable<BusinessDayConvention>(
  "BusinessDayConvention",
  ["NOS", "SCF", "SCMF", "CSF", "CSMF", "SCP", "SCMP", "CSP", "CSMP"],
  { NOS: 0, SCF: 1, SCMF: 2, CSF: 3, CSMF: 4, SCP: 5, SCMP: 6, CSP: 7, CSMP: 8 },
);

/** SD: same day-of-month. EOM: stick to month end when the anchor is one. */
export type EndOfMonthConvention = "SD" | "EOM";

export const EndOfMonthConventions = defineCodeTable<EndOfMonthConvention>(
  "EndOfMonthConvention",
  ["SD", "EOM"],
  { SD: 0, EOM: 1 },
);

/** NC: every day is a business day. MF: Monday to Friday, minus holidays. */
export type CalendarId = "NC" | "MF";

export const CalendarIds = defineCodeTable<CalendarId>(
  "CalendarId",
  ["NC", "MF"],
  { NC: 0, MF: 1 },
);

/**
 * Day-count conventions for interest accrual.
 *
 * - A365: actual seconds / 365-day year
 * - A360: actual seconds / 360-day year
 * - AA: actual/actual ISDA (365- and 366-day years)
 * - 30E360: 30E/360 (Eurobond basis)
 */
export type DayCountConvention = "A365" | "A360" | "AA" | "30E360";

export const DayCountConventions = defineCodeTable<DayCountConvention>(
  "DayCountConvention",
  ["A365", "A360", "AA", "30E360"],
  { A365: 0, A360: 1, AA: 2, "30E360": 3 },
);

/** A: fee rate is an absolute amount per event. N: a rate on the notional. */
export type FeeBasis = "A" | "N";

export const FeeBases = defineCodeTable<FeeBasis>(
  "FeeBasis",
  ["A", "N"],
  { A: 0, N: 1 },
);

/** Cycle period units: day, week, month, quarter, half-year, year. */
export type CycleUnit = "D" | "W" | "M" | "Q" | "H" | "Y";

export const CycleUnits = defineCodeTable<CycleUnit>(
  "CycleUnit",
  ["D", "W", "M", "Q", "H", "Y"],
  { D: 0, W: 1, M: 2, Q: 3, H: 4, Y: 5 },
);

/** How a cycle that does not divide the schedule evenly ends. */
export type StubConvention = "SHORT" | "LONG";

export const StubConventions = defineCodeTable<StubConvention>(
  "StubConvention",
  ["SHORT", "LONG"],
  { SHORT: 0, LONG: 1 },
);

/** A recurring period, e.g. `1M-` is monthly with a short final stub. */
export interface Cycle {
  readonly count: number;
  readonly unit: CycleUnit;
  readonly stub: StubConvention;
}
