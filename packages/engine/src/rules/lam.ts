/**
 * @actus-sm/engine: linear amortizer (LAM).
 *
 * Principal is redeemed in equal parts on the principal cycle; whatever
 * remains is repaid at maturity.
 */

import { absUnits, assertInRange, divideRoundHalfEven, minUnits } from "@actus-sm/units";
import type { ContractTerms } from "@actus-sm/types";
import { DEFAULT_MAX_SCHEDULE_EVENTS, generateContractSchedule } from "@actus-sm/schedule";
import type { EventContext, RuleTable } from "../types.js";
import { PAM_RULES } from "./pam.js";
import { initialExchange, principalRedemption, requireTerm } from "./common.js";

/**
 * Number of principal repayments through maturity: every scheduled PR
 * date plus MD itself. Termination does not shorten the plan.
 */
export function redemptionCount(terms: ContractTerms, context: EventContext): bigint {
  const events = generateContractSchedule(
    { ...terms, terminationDate: undefined },
    { maxEvents: context.options.maxScheduleEvents ?? DEFAULT_MAX_SCHEDULE_EVENTS },
  );
  return BigInt(events.filter((event) => event.eventType === "PR").length + 1);
}

export const LAM_RULES: RuleTable = {
  ...PAM_RULES,
  IED: initialExchange((terms, context) => {
    if (terms.nextPrincipalRedemptionPayment !== undefined) {
      return terms.nextPrincipalRedemptionPayment;
    }
    const notional = requireTerm(terms, terms.notionalPrincipal, "notionalPrincipal");
    return assertInRange(divideRoundHalfEven(notional, redemptionCount(terms, context)), "principal redemption");
  }),
  PR: principalRedemption((state) =>
    minUnits(state.nextPrincipalRedemptionPayment, absUnits(state.notionalPrincipal)),
  ),
};
