/**
 * Tests for the transition function on PAM contracts.
 */

import { describe, it, expect } from "vitest";
import { transition } from "../src/transition.js";
import { initialState } from "../src/validate-terms.js";
import { MAX_UNITS, MathError, TransitionError, ValidationError } from "@actus-sm/units";
import type { ContractTerms } from "@actus-sm/types";
import { PAM_TERMS, run } from "./fixtures.js";

function expectTransitionError(fn: () => unknown, code: string, invariant?: string): void {
  try {
    fn();
    expect.fail("should have thrown");
  } catch (err) {
    expect(err).toBeInstanceOf(TransitionError);
    expect(err).toMatchObject(invariant === undefined ? { code } : { code, invariant });
  }
}

describe("end-to-end PAM scenario", () => {
  const start = initialState(PAM_TERMS);

  it("disburses the principal at IED", () => {
    const { state, payoffs } = run(PAM_TERMS, start, [{ event: "IED", at: 1000 }]);
    expect(payoffs).toEqual([-500_000_000_000n]);
    expect(state.notionalPrincipal).toBe(500_000_000_000n);
    expect(state.nominalInterestRate).toBe(50_000n);
    expect(state.stage).toBe("ACTIVE");
  });

  it("pays interest proportional to elapsed time", () => {
    const { state, payoffs } = run(PAM_TERMS, start, [
      { event: "IED", at: 1000 },
      { event: "IP", at: 1100 },
    ]);
    // 500000 × 0.05 × 100 / 31536000 = 0.07927448… → 0.079274
    expect(payoffs[1]).toBe(79_274n);
    expect(state.accruedInterest).toBe(0n);
    expect(state.statusDate).toBe(1100);
  });

  it("repays the full principal on PR without an amount", () => {
    const { state, payoffs } = run(PAM_TERMS, start, [
      { event: "IED", at: 1000 },
      { event: "IP", at: 1100 },
      { event: "PR", at: 1200 },
    ]);
    expect(payoffs[2]).toBe(500_000_000_000n);
    expect(state.notionalPrincipal).toBe(0n);
    expect(state.accruedInterest).toBe(79_274n);
  });

  it("settles the residual interest at maturity and zeroes the state", () => {
    const { state, payoffs } = run(PAM_TERMS, start, [
      { event: "IED", at: 1000 },
      { event: "IP", at: 1100 },
      { event: "PR", at: 1200 },
      { event: "MD", at: 1300 },
    ]);
    expect(payoffs).toEqual([-500_000_000_000n, 79_274n, 500_000_000_000n, 79_274n]);
    expect(state).toEqual({
      notionalPrincipal: 0n,
      accruedInterest: 0n,
      statusDate: 1300,
      feeAccrued: 0n,
      nominalInterestRate: 50_000n,
      nextPrincipalRedemptionPayment: 0n,
      performance: "PF",
      stage: "CLOSED",
    });
  });

  it("repays principal and interest together at maturity", () => {
    const { payoffs } = run(PAM_TERMS, start, [
      { event: "IED", at: 1000 },
      { event: "MD", at: 1300 },
    ]);
    // 500000 × 0.05 × 300 / 31536000 = 0.23782343… → 0.237823
    expect(payoffs[1]).toBe(500_000_237_823n);
  });

  it("never mutates the input state", () => {
    const before = { ...start };
    transition("IED", 1000, start, PAM_TERMS);
    expect(start).toEqual(before);
  });
});

describe("ordering and lifecycle", () => {
  const active = transition("IED", 1000, initialState(PAM_TERMS), PAM_TERMS).state;

  it("rejects events before the status date", () => {
    const afterIp = transition("IP", 1100, active, PAM_TERMS).state;
    expectTransitionError(() => transition("AD", 1050, afterIp, PAM_TERMS), "EVENT_OUT_OF_ORDER", "status-date-monotonic");
  });

  it("accepts events at the status date", () => {
    const afterIp = transition("IP", 1100, active, PAM_TERMS).state;
    expect(transition("AD", 1100, afterIp, PAM_TERMS).payoff).toBeNull();
  });

  it("only accepts IED and AD before the initial exchange", () => {
    const pending = initialState(PAM_TERMS);
    expectTransitionError(() => transition("IP", 1000, pending, PAM_TERMS), "EVENT_NOT_APPLICABLE", "lifecycle-stage");
    expect(transition("AD", 1000, pending, PAM_TERMS).state.stage).toBe("PENDING");
  });

  it("rejects a second IED", () => {
    expectTransitionError(() => transition("IED", 1000, active, PAM_TERMS), "EVENT_NOT_APPLICABLE", "lifecycle-stage");
  });

  it("rejects IED away from the initial exchange date", () => {
    expectTransitionError(
      () => transition("IED", 1001, initialState(PAM_TERMS), PAM_TERMS),
      "EVENT_NOT_APPLICABLE",
      "initialExchangeDate",
    );
  });

  it("rejects MD away from the maturity date", () => {
    expectTransitionError(() => transition("MD", 1250, active, PAM_TERMS), "EVENT_NOT_APPLICABLE", "maturityDate");
  });

  it("rejects events after maturity", () => {
    expectTransitionError(() => transition("IP", 1400, active, PAM_TERMS), "EVENT_NOT_APPLICABLE", "contract-lifetime");
  });

  it("rejects everything once closed", () => {
    const closed = transition("MD", 1300, active, PAM_TERMS).state;
    for (const event of ["AD", "IP", "MD", "CE"] as const) {
      expectTransitionError(() => transition(event, 1300, closed, PAM_TERMS), "EVENT_NOT_APPLICABLE", "lifecycle-stage");
    }
  });

  it("rejects invalid timestamps", () => {
    expect(() => transition("IP", -1, active, PAM_TERMS)).toThrow(ValidationError);
    expect(() => transition("IP", 1100.5, active, PAM_TERMS)).toThrow(ValidationError);
  });

  it("rejects timestamps beyond the Date range under actual/actual", () => {
    const terms: ContractTerms = { ...PAM_TERMS, dayCountConvention: "AA" };
    const started = transition("IED", 1000, initialState(terms), terms).state;
    try {
      transition("MD", 9_000_000_000_000, started, terms);
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ code: "INVALID_TIMESTAMP" });
    }
  });
});

describe("principal redemption", () => {
  const active = transition("IED", 1000, initialState(PAM_TERMS), PAM_TERMS).state;

  it("redeems a partial amount", () => {
    const result = transition("PR", 1200, active, PAM_TERMS, { amount: 200_000_000_000n });
    expect(result.payoff).toBe(200_000_000_000n);
    expect(result.state.notionalPrincipal).toBe(300_000_000_000n);
    expect(result.state.accruedInterest).toBe(158_549n);
  });

  it("rejects more than the outstanding principal", () => {
    expectTransitionError(
      () => transition("PR", 1200, active, PAM_TERMS, { amount: 500_000_000_001n }),
      "INVALID_REPAYMENT",
      "repayment-within-outstanding",
    );
  });

  it("rejects a zero or negative amount", () => {
    expectTransitionError(() => transition("PR", 1200, active, PAM_TERMS, { amount: 0n }), "INVALID_REPAYMENT");
    expectTransitionError(() => transition("PR", 1200, active, PAM_TERMS, { amount: -1n }), "INVALID_REPAYMENT");
  });
});

describe("debtor role", () => {
  const terms: ContractTerms = { ...PAM_TERMS, contractRole: "RPL" };

  it("flips every sign", () => {
    const { state, payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "IP", at: 1100 },
      { event: "PR", at: 1200 },
      { event: "MD", at: 1300 },
    ]);
    expect(payoffs).toEqual([500_000_000_000n, -79_274n, -500_000_000_000n, -79_274n]);
    expect(state.notionalPrincipal).toBe(0n);
    expect(state.accruedInterest).toBe(0n);
  });

  it("holds a negative notional", () => {
    expect(transition("IED", 1000, initialState(terms), terms).state.notionalPrincipal).toBe(-500_000_000_000n);
  });
});

describe("credit events", () => {
  const defaulted = run(PAM_TERMS, initialState(PAM_TERMS), [
    { event: "IED", at: 1000 },
    { event: "CE", at: 1100 },
  ]).state;

  it("marks the contract defaulted and keeps balances", () => {
    expect(defaulted.performance).toBe("DF");
    expect(defaulted.notionalPrincipal).toBe(500_000_000_000n);
    expect(defaulted.accruedInterest).toBe(79_274n);
  });

  it("suspends scheduled payments", () => {
    for (const event of ["IP", "IPCI", "PR", "FP", "MD"] as const) {
      expectTransitionError(() => transition(event, 1300, defaulted, PAM_TERMS), "EVENT_NOT_APPLICABLE", "performance-status");
    }
  });

  it("still observes the contract", () => {
    const result = transition("AD", 1200, defaulted, PAM_TERMS);
    expect(result.payoff).toBeNull();
    // two separately rounded periods of 0.079274
    expect(result.state.accruedInterest).toBe(158_548n);
  });
});

describe("capitalization, fees, purchase and termination", () => {
  it("capitalizes accrued interest into the notional", () => {
    const { state, payoffs } = run(PAM_TERMS, initialState(PAM_TERMS), [
      { event: "IED", at: 1000 },
      { event: "IPCI", at: 1100 },
    ]);
    expect(payoffs[1]).toBeNull();
    expect(state.notionalPrincipal).toBe(500_000_079_274n);
    expect(state.accruedInterest).toBe(0n);
  });

  it("pays a fixed fee on basis A", () => {
    const terms: ContractTerms = { ...PAM_TERMS, feeBasis: "A", feeRate: 1_000_000n };
    const { payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "FP", at: 1100 },
    ]);
    expect(payoffs[1]).toBe(1_000_000n);

    const debtor: ContractTerms = { ...terms, contractRole: "RPL" };
    expect(run(debtor, initialState(debtor), [{ event: "IED", at: 1000 }, { event: "FP", at: 1100 }]).payoffs[1]).toBe(
      -1_000_000n,
    );
  });

  it("accrues notional-basis fees and settles them on FP", () => {
    const terms: ContractTerms = { ...PAM_TERMS, feeBasis: "N", feeRate: 10_000n };
    const { state, payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "FP", at: 1100 },
    ]);
    // 500000 × 0.01 × 100 / 31536000 = 0.01585489… → 0.015855
    expect(payoffs[1]).toBe(15_855n);
    expect(state.feeAccrued).toBe(0n);
  });

  it("settles outstanding fees at maturity", () => {
    const terms: ContractTerms = { ...PAM_TERMS, feeBasis: "N", feeRate: 10_000n };
    const { state, payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "MD", at: 1300 },
    ]);
    expect(payoffs[1]).toBe(500_000_000_000n + 237_823n + 47_565n);
    expect(state.feeAccrued).toBe(0n);
  });

  it("charges the purchase price plus accrued interest on PRD", () => {
    const terms: ContractTerms = { ...PAM_TERMS, purchaseDate: 1100, priceAtPurchaseDate: 450_000_000_000n };
    const { state, payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "PRD", at: 1100 },
    ]);
    expect(payoffs[1]).toBe(-450_000_079_274n);
    expect(state.accruedInterest).toBe(79_274n);
  });

  it("requires a purchase date for PRD", () => {
    const active = transition("IED", 1000, initialState(PAM_TERMS), PAM_TERMS).state;
    expect(() => transition("PRD", 1100, active, PAM_TERMS)).toThrow(ValidationError);
  });

  it("terminates at the termination price", () => {
    const terms: ContractTerms = { ...PAM_TERMS, terminationDate: 1200, priceAtTerminationDate: 400_000_000_000n };
    const { state, payoffs } = run(terms, initialState(terms), [
      { event: "IED", at: 1000 },
      { event: "TD", at: 1200 },
    ]);
    expect(payoffs[1]).toBe(400_000_158_549n);
    expect(state.stage).toBe("CLOSED");
    expect(state.notionalPrincipal).toBe(0n);
    expect(state.accruedInterest).toBe(0n);
  });

  it("rejects TD away from the termination date", () => {
    const terms: ContractTerms = { ...PAM_TERMS, terminationDate: 1200, priceAtTerminationDate: 400_000_000_000n };
    const active = transition("IED", 1000, initialState(terms), terms).state;
    expectTransitionError(() => transition("TD", 1150, active, terms), "EVENT_NOT_APPLICABLE", "terminationDate");
  });
});

describe("arithmetic overflow", () => {
  it("fails instead of wrapping on the initial exchange", () => {
    const terms: ContractTerms = { ...PAM_TERMS, notionalPrincipal: MAX_UNITS, premiumDiscountAtIED: 1n };
    expect(() => transition("IED", 1000, initialState(terms), terms)).toThrow(MathError);
  });

  it("fails when accrued interest leaves the 64-bit range", () => {
    const terms: ContractTerms = {
      ...PAM_TERMS,
      maturityDate: 100_000_000,
      notionalPrincipal: MAX_UNITS,
      nominalInterestRate: 1_000_000_000n,
    };
    const active = transition("IED", 1000, initialState(terms), terms).state;
    try {
      transition("IP", 1000 + 31_536_000, active, terms);
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(MathError);
      expect(err).toMatchObject({ code: "OVERFLOW" });
    }
  });
});
