/**
 * Runtime Type Guards
 *
 * Narrowing functions for contract domain types.
 * These enable safe runtime validation at system boundaries
 * (decoded payloads, host storage, JSON inputs).
 */

import type { Cycle } from "./conventions.js";
import { CycleUnits, StubConventions } from "./conventions.js";
import type { ContractState, ShiftedDay } from "./state.js";
import { LifecycleStages, PerformanceStatuses } from "./state.js";
import { MAX_TIMESTAMP } from "./terms.js";
import type { Timestamp } from "./terms.js";
import type { ContractRole, ContractType, EventType } from "./vocabulary.js";
import { ContractRoles, ContractTypes, EventTypes } from "./vocabulary.js";

// =============================================================================
// Primitive guards
// =============================================================================

export function isTimestamp(value: unknown): value is Timestamp {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 && value <= MAX_TIMESTAMP;
}

// =============================================================================
// Vocabulary guards
// =============================================================================

export function isContractType(value: unknown): value is ContractType {
  return ContractTypes.is(value);
}

export function isContractRole(value: unknown): value is ContractRole {
  return ContractRoles.is(value);
}

export function isEventType(value: unknown): value is EventType {
  return EventTypes.is(value);
}

export function isCycle(value: unknown): value is Cycle {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.count === "number" &&
    Number.isSafeInteger(v.count) &&
    v.count > 0 &&
    CycleUnits.is(v.unit) &&
    StubConventions.is(v.stub)
  );
}

// =============================================================================
// State guards
// =============================================================================

export function isShiftedDay(value: unknown): value is ShiftedDay {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isTimestamp(v.calculationTime) && isTimestamp(v.paymentTime);
}

export function isContractState(value: unknown): value is ContractState {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.notionalPrincipal === "bigint" &&
    typeof v.accruedInterest === "bigint" &&
    isTimestamp(v.statusDate) &&
    typeof v.feeAccrued === "bigint" &&
    typeof v.nominalInterestRate === "bigint" &&
    typeof v.nextPrincipalRedemptionPayment === "bigint" &&
    PerformanceStatuses.is(v.performance) &&
    LifecycleStages.is(v.stage)
  );
}
