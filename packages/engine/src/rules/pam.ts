/**
 * @actus-sm/engine: principal at maturity (PAM).
 *
 * Interest is paid on its cycle and the full principal is repaid at
 * maturity. Unscheduled PR events prepay principal; without an amount
 * they repay everything outstanding.
 */

import { absUnits } from "@actus-sm/units";
import type { RuleTable } from "../types.js";
import {
  analysis,
  creditEvent,
  feePayment,
  initialExchange,
  interestCapitalization,
  interestPayment,
  maturity,
  principalRedemption,
  purchase,
  termination,
} from "./common.js";

export const PAM_RULES: RuleTable = {
  IED: initialExchange(() => 0n),
  IP: interestPayment,
  PR: principalRedemption((state) => absUnits(state.notionalPrincipal)),
  PRD: purchase,
  MD: maturity,
  FP: feePayment,
  CE: creditEvent,
  IPCI: interestCapitalization,
  TD: termination,
  AD: analysis,
};
