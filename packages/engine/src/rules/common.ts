/**
 * @actus-sm/engine: Event rules shared by the debt contract types.
 *
 * Each rule receives a state already accrued up to the event's timestamp
 * and returns a new state plus the signed payoff. Positive payoffs are
 * received by the party the contract is booked for.
 */

import {
  TransitionError,
  ValidationError,
  absUnits,
  addUnits,
  assertInRange,
  negateUnits,
  subtractUnits,
} from "@actus-sm/units";
import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, Timestamp } from "@actus-sm/types";
import { TERM_DEFAULTS } from "@actus-sm/types";
import { isLifecycleTime } from "@actus-sm/schedule";
import type { EventContext, EventRule, TransitionResult } from "../types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function signed(amount: Units, sign: 1n | -1n): Units {
  return assertInRange(amount * sign, "signed amount");
}

export function requireTerm<T>(terms: ContractTerms, value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new ValidationError("MISSING_TERM", `Contract "${terms.contractId}" requires ${name}`);
  }
  return value;
}

/**
 * Reject an event whose timestamp is not the given lifecycle date
 * (unadjusted or shifted).
 */
export function requireLifecycleTime(
  context: EventContext,
  date: Timestamp | undefined,
  term: string,
): void {
  const expected = requireTerm(context.terms, date, term);
  if (!isLifecycleTime(context.terms, expected, context.timestamp)) {
    throw new TransitionError(
      "EVENT_NOT_APPLICABLE",
      term,
      `${context.eventType} must occur at ${term} (${String(expected)}), got ${String(context.timestamp)}`,
    );
  }
}

/** Zero every balance and close the contract. */
function closed(state: ContractState): ContractState {
  return {
    ...state,
    notionalPrincipal: 0n,
    accruedInterest: 0n,
    feeAccrued: 0n,
    nextPrincipalRedemptionPayment: 0n,
    stage: "CLOSED",
  };
}

// ─── Initial Exchange ────────────────────────────────────────────────────

/** Derives the per-redemption amount of a contract type at IED. */
export type RedemptionSizer = (terms: ContractTerms, context: EventContext) => Units;

/** IED: disburse the notional plus premium/discount. */
export function initialExchange(sizeRedemption: RedemptionSizer): EventRule {
  return (state, context) => {
    const { terms, sign } = context;
    requireLifecycleTime(context, terms.initialExchangeDate, "initialExchangeDate");

    const notional = requireTerm(terms, terms.notionalPrincipal, "notionalPrincipal");
    const premium = terms.premiumDiscountAtIED ?? TERM_DEFAULTS.premiumDiscountAtIED;

    return {
      state: {
        ...state,
        notionalPrincipal: signed(notional, sign),
        nominalInterestRate: terms.nominalInterestRate ?? TERM_DEFAULTS.nominalInterestRate,
        nextPrincipalRedemptionPayment: sizeRedemption(terms, context),
        stage: "ACTIVE",
      },
      payoff: negateUnits(signed(addUnits(notional, premium), sign)),
    };
  };
}

// ─── Principal Redemption ────────────────────────────────────────────────

/** Default unsigned amount a PR event redeems when the caller gives none. */
export type RedemptionAmount = (state: ContractState, context: EventContext) => Units;

/**
 * PR: redeem principal. An explicit amount must be positive and no larger
 * than the outstanding principal.
 */
export function principalRedemption(defaultAmount: RedemptionAmount): EventRule {
  return (state, context) => {
    const outstanding = absUnits(state.notionalPrincipal);
    const explicit = context.options.amount;

    if (explicit !== undefined && (explicit <= 0n || explicit > outstanding)) {
      throw new TransitionError(
        "INVALID_REPAYMENT",
        "repayment-within-outstanding",
        `Repayment ${explicit.toString()} must be positive and at most the outstanding ${outstanding.toString()}`,
      );
    }

    const amount = explicit ?? defaultAmount(state, context);
    const repaid = signed(amount, context.sign);

    return {
      state: { ...state, notionalPrincipal: subtractUnits(state.notionalPrincipal, repaid) },
      payoff: repaid,
    };
  };
}

// ─── Interest and Fees ───────────────────────────────────────────────────

/** IP: settle accrued interest. */
export const interestPayment: EventRule = (state) => ({
  state: { ...state, accruedInterest: 0n },
  payoff: state.accruedInterest,
});

/** IPCI: add accrued interest to the notional. */
export const interestCapitalization: EventRule = (state) => ({
  state: {
    ...state,
    notionalPrincipal: addUnits(state.notionalPrincipal, state.accruedInterest),
    accruedInterest: 0n,
  },
  payoff: null,
});

/** FP: a fixed fee (basis A) or the notional-basis fee accrued so far (basis N). */
export const feePayment: EventRule = (state, context) => {
  const { terms, sign } = context;
  if ((terms.feeBasis ?? TERM_DEFAULTS.feeBasis) === "N") {
    return { state: { ...state, feeAccrued: 0n }, payoff: state.feeAccrued };
  }
  return { state, payoff: signed(terms.feeRate ?? TERM_DEFAULTS.feeRate, sign) };
};

// ─── Lifecycle ───────────────────────────────────────────────────────────

/** MD: repay the remaining notional with all accrued interest and fees. */
export const maturity: EventRule = (state, context) => {
  requireLifecycleTime(context, context.terms.maturityDate, "maturityDate");
  const payoff = addUnits(addUnits(state.notionalPrincipal, state.accruedInterest), state.feeAccrued);
  return { state: closed(state), payoff };
};

/** PRD: the buyer pays the price plus the interest accrued to date. */
export const purchase: EventRule = (state, context) => {
  const { terms, sign } = context;
  requireLifecycleTime(context, terms.purchaseDate, "purchaseDate");
  const price = requireTerm(terms, terms.priceAtPurchaseDate, "priceAtPurchaseDate");
  return {
    state,
    payoff: negateUnits(addUnits(signed(price, sign), state.accruedInterest)),
  };
};

/** TD: sell the contract at the termination price, settling accruals. */
export const termination: EventRule = (state, context) => {
  const { terms, sign } = context;
  requireLifecycleTime(context, terms.terminationDate, "terminationDate");
  const price = requireTerm(terms, terms.priceAtTerminationDate, "priceAtTerminationDate");
  const payoff = addUnits(addUnits(signed(price, sign), state.accruedInterest), state.feeAccrued);
  return { state: closed(state), payoff };
};

/** CE: the counterparty defaults. Balances are kept; scheduled payments stop. */
export const creditEvent: EventRule = (state) => ({
  state: { ...state, performance: "DF" },
  payoff: null,
});

/** AD: observe the state; accrual has already happened. */
export const analysis: EventRule = (state): TransitionResult => ({ state, payoff: null });
