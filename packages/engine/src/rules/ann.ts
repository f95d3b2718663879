/**
 * @actus-sm/engine: annuity (ANN).
 *
 * Every redemption date pays the same instalment of principal plus
 * interest. Since PR is processed before IP on the same date, the
 * principal part is the instalment less the interest accrued so far.
 *
 * Instalment for notional N, periodic rate r and n payments:
 *
 *   N · r(1+r)^n / ((1+r)^n − 1)      (N / n when r = 0)
 *
 * With r = a/b this is N·a·(b+a)^n / (b·((b+a)^n − b^n)), evaluated
 * exactly and rounded once.
 */

import {
  RATE_SCALE,
  absUnits,
  assertInRange,
  divideRoundHalfEven,
  maxUnits,
  minUnits,
  mulDiv,
  subtractUnits,
} from "@actus-sm/units";
import type { Units } from "@actus-sm/units";
import type { ContractTerms } from "@actus-sm/types";
import { TERM_DEFAULTS } from "@actus-sm/types";
import { cyclePeriod } from "@actus-sm/schedule";
import type { EventContext, RuleTable } from "../types.js";
import { LAM_RULES, redemptionCount } from "./lam.js";
import { initialExchange, principalRedemption, requireTerm } from "./common.js";

/** Level instalment repaying `notional` over `count` periods at `periodicRate` = a/b. */
export function annuityInstalment(notional: Units, a: bigint, b: bigint, count: bigint): Units {
  if (a === 0n) {
    return assertInRange(divideRoundHalfEven(notional, count), "annuity instalment");
  }
  const growth = (b + a) ** count;
  const base = b ** count;
  return mulDiv([notional, a, growth], b * (growth - base), "annuity instalment");
}

function instalmentAtInitialExchange(terms: ContractTerms, context: EventContext): Units {
  if (terms.nextPrincipalRedemptionPayment !== undefined) {
    return terms.nextPrincipalRedemptionPayment;
  }

  const notional = requireTerm(terms, terms.notionalPrincipal, "notionalPrincipal");
  const cycle = requireTerm(terms, terms.cycleOfPrincipalRedemption, "cycleOfPrincipalRedemption");
  const rate = terms.nominalInterestRate ?? TERM_DEFAULTS.nominalInterestRate;

  // Nominal period fraction: months/12, or days/365 for day-based cycles
  const period = cyclePeriod(cycle);
  const monthly = period.months > 0;
  const periods = BigInt(monthly ? period.months : period.days);
  const perYear = monthly ? 12n : 365n;

  return annuityInstalment(notional, rate * periods, RATE_SCALE * perYear, redemptionCount(terms, context));
}

export const ANN_RULES: RuleTable = {
  ...LAM_RULES,
  IED: initialExchange(instalmentAtInitialExchange),
  PR: principalRedemption((state) => {
    const principalPart = maxUnits(
      subtractUnits(state.nextPrincipalRedemptionPayment, absUnits(state.accruedInterest)),
      0n,
    );
    return minUnits(principalPart, absUnits(state.notionalPrincipal));
  }),
};
