/**
 * @actus-sm/engine: Interest and fee accrual.
 *
 * accrued += notional × rate × dayCountFraction(statusDate, timestamp),
 * computed as one exact product and rounded half-even once.
 */

import { RATE_SCALE, addUnits, mulDiv } from "@actus-sm/units";
import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, Timestamp } from "@actus-sm/types";
import { TERM_DEFAULTS } from "@actus-sm/types";
import { dayCountFraction } from "./day-count.js";

/** Interest on `notional` at `rate` between two instants. Signed like the notional. */
export function accruedInterestBetween(
  terms: ContractTerms,
  notional: Units,
  rate: bigint,
  from: Timestamp,
  to: Timestamp,
): Units {
  if (notional === 0n || rate === 0n || to === from) {
    return 0n;
  }
  const fraction = dayCountFraction(terms.dayCountConvention ?? TERM_DEFAULTS.dayCountConvention, from, to);
  return mulDiv([notional, rate, fraction.numerator], RATE_SCALE * fraction.denominator, "interest accrual");
}

/**
 * Move the state's status date to `timestamp`, accruing interest and
 * notional-basis fees over the elapsed period.
 */
export function accrue(state: ContractState, terms: ContractTerms, timestamp: Timestamp): ContractState {
  if (timestamp === state.statusDate) {
    return state;
  }

  const interest = accruedInterestBetween(
    terms,
    state.notionalPrincipal,
    state.nominalInterestRate,
    state.statusDate,
    timestamp,
  );

  const feeBasis = terms.feeBasis ?? TERM_DEFAULTS.feeBasis;
  const fee =
    feeBasis === "N"
      ? accruedInterestBetween(terms, state.notionalPrincipal, terms.feeRate ?? TERM_DEFAULTS.feeRate, state.statusDate, timestamp)
      : 0n;

  return {
    ...state,
    accruedInterest: addUnits(state.accruedInterest, interest),
    feeAccrued: addUnits(state.feeAccrued, fee),
    statusDate: timestamp,
  };
}
