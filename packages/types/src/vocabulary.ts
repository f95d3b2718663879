/**
 * Contract Vocabulary
 *
 * Closed sets of contract kinds, roles and lifecycle events, each with a
 * stable small-integer code used at the host boundary.
 *
 * Rules:
 * - The code mapping is total and injective
 * - Decoding an unknown code throws ValidationError("UNKNOWN_CODE")
 * - No open extension at runtime
 */

import { ValidationError } from "@actus-sm/units";

// =============================================================================
// Code tables
// =============================================================================

/**
 * Bidirectional mapping between a string-literal enumeration and
 * its numeric wire codes.
 */
export interface CodeTable<T extends string> {
  readonly name: string;
  readonly values: readonly T[];
  encode(value: T): number;
  decode(code: number): T;
  is(value: unknown): value is T;
}

export function defineCodeTable<T extends string>(
  name: string,
  values: readonly T[],
  codes: Readonly<Record<T, number>>,
): CodeTable<T> {
  const byCode = new Map<number, T>();
  for (const value of values) {
    const code = codes[value];
    if (byCode.has(code)) {
      throw new Error(`Duplicate ${name} code ${String(code)}`);
    }
    byCode.set(code, value);
  }

  const members = new Set<string>(values);

  return {
    name,
    values,
    encode: (value) => codes[value],
    decode: (code) => {
      const value = byCode.get(code);
      if (value === undefined) {
        throw new ValidationError(
          "UNKNOWN_CODE",
          `Unknown ${name} code: ${String(code)}`,
        );
      }
      return value;
    },
    is: (value): value is T => typeof value === "string" && members.has(value),
  };
}

// =============================================================================
// Contract types
// =============================================================================

/**
 * Contract types of the debt family.
 *
 * - PAM: principal at maturity
 * - LAM: linear amortizer (fixed principal redemptions)
 * - ANN: annuity (fixed instalments of principal plus interest)
 */
export type ContractType = "PAM" | "LAM" | "ANN";

export const ContractTypes = defineCodeTable<ContractType>(
  "ContractType",
  ["PAM", "LAM", "ANN"],
  { PAM: 0, LAM: 1, ANN: 2 },
);

// =============================================================================
// Contract roles
// =============================================================================

/**
 * The perspective the contract is booked from.
 *
 * - RPA: real position asset (creditor, lends the principal)
 * - RPL: real position liability (debtor, receives the principal)
 */
export type ContractRole = "RPA" | "RPL";

export const ContractRoles = defineCodeTable<ContractRole>(
  "ContractRole",
  ["RPA", "RPL"],
  { RPA: 0, RPL: 1 },
);

/** Sign applied to every cash flow computed for the role. */
export function roleSign(role: ContractRole): 1n | -1n {
  return role === "RPA" ? 1n : -1n;
}

// =============================================================================
// Event types
// =============================================================================

/**
 * Lifecycle events.
 *
 * - IED: initial exchange (principal disbursed)
 * - IP: interest payment
 * - PR: principal redemption
 * - PRD: purchase of the contract
 * - MD: maturity
 * - FP: fee payment
 * - CE: credit event (counterparty default)
 * - IPCI: interest capitalization
 * - TD: termination
 * - AD: analysis date (accrual only, no cash flow)
 */
export type EventType =
  | "IED"
  | "IP"
  | "PR"
  | "PRD"
  | "MD"
  | "FP"
  | "CE"
  | "IPCI"
  | "TD"
  | "AD";

export const EventTypes = defineCodeTable<EventType>(
  "EventType",
  ["IED", "IP", "PR", "PRD", "MD", "FP", "CE", "IPCI", "TD", "AD"],
  { IED: 0, IP: 1, PR: 2, PRD: 3, MD: 4, FP: 5, CE: 6, IPCI: 7, TD: 8, AD: 9 },
);

/**
 * Processing order of events that fall on the same instant.
 * Principal redemption precedes interest so annuity instalments can
 * split principal from the interest accrued up to the same date.
 */
export const EVENT_SEQUENCE: Readonly<Record<EventType, number>> = {
  AD: 0,
  IED: 1,
  PRD: 2,
  FP: 3,
  PR: 4,
  IP: 5,
  IPCI: 6,
  CE: 7,
  TD: 8,
  MD: 9,
};
