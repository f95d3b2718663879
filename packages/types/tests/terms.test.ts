/**
 * Tests for term defaults.
 */
import { describe, it, expect } from "vitest";
import { TERM_DEFAULTS, resolveScheduleConfig } from "../src/terms.js";

describe("resolveScheduleConfig", () => {
  it("applies the named defaults when nothing is configured", () => {
    expect(resolveScheduleConfig({})).toEqual({
      calendar: "NC",
      endOfMonthConvention: "SD",
      businessDayConvention: "NOS",
      holidays: [],
    });
  });

  it("keeps configured values", () => {
    expect(
      resolveScheduleConfig({
        calendar: "MF",
        endOfMonthConvention: "EOM",
        businessDayConvention: "SCMF",
        holidays: ["2024-12-25"],
      }),
    ).toEqual({
      calendar: "MF",
      endOfMonthConvention: "EOM",
      businessDayConvention: "SCMF",
      holidays: ["2024-12-25"],
    });
  });
});

describe("TERM_DEFAULTS", () => {
  it("defaults to no shift and actual/365", () => {
    expect(TERM_DEFAULTS.businessDayConvention).toBe("NOS");
    expect(TERM_DEFAULTS.dayCountConvention).toBe("A365");
    expect(TERM_DEFAULTS.nominalInterestRate).toBe(0n);
  });
});
