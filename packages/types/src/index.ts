/**
 * @actus-sm/types: Contract vocabulary and data model.
 *
 * These types are shared by every package:
 * - Contract types, roles and lifecycle events with wire codes
 * - Schedule and accrual conventions
 * - Immutable contract terms and the evolving contract state
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Enumerations are closed; unknown codes fail validation
 * - Absent terms map to named defaults, never to implicit zeros
 */

// Vocabulary
export {
  defineCodeTable,
  ContractTypes,
  ContractRoles,
  EventTypes,
  EVENT_SEQUENCE,
  roleSign,
} from "./vocabulary.js";
export type {
  CodeTable,
  ContractType,
  ContractRole,
  EventType,
} from "./vocabulary.js";

// Conventions
export {
  BusinessDayConventions,
  EndOfMonthConventions,
  CalendarIds,
  DayCountConventions,
  FeeBases,
  CycleUnits,
  StubConventions,
} from "./conventions.js";
export type {
  BusinessDayConvention,
  EndOfMonthConvention,
  CalendarId,
  DayCountConvention,
  FeeBasis,
  CycleUnit,
  StubConvention,
  Cycle,
} from "./conventions.js";

// Terms
export { MAX_TIMESTAMP, TERM_DEFAULTS, resolveScheduleConfig } from "./terms.js";
export type {
  Timestamp,
  ScheduleConfig,
  ResolvedScheduleConfig,
  ContractTerms,
} from "./terms.js";

// State
export { PerformanceStatuses, LifecycleStages } from "./state.js";
export type {
  PerformanceStatus,
  LifecycleStage,
  ContractState,
  ShiftedDay,
  ScheduledEvent,
} from "./state.js";

// Runtime type guards
export {
  isTimestamp,
  isContractType,
  isContractRole,
  isEventType,
  isCycle,
  isShiftedDay,
  isContractState,
} from "./guards.js";
