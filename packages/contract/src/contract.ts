/**
 * @actus-sm/contract: ActusContract, the host-facing facade.
 *
 * One instance per deployed contract. The host passes numeric codes and
 * encoded bytes; the facade decodes them, runs the engine and persists
 * the result through a ContractStore.
 *
 * API surface:
 * - init(): Decode, validate and persist terms with the initial state
 * - processEvent(): Apply one event and commit the new state atomically
 * - getState() / getStateSnapshot(): Current state, encoded or decoded
 * - getTerms(): The immutable terms
 * - getHistory() / verifyHistory(): Hash-chained event history
 * - projectCashFlows(): Preview the scheduled cash flows
 *
 * A failed call persists nothing.
 */

import type { Logger } from "pino";
import { TransitionError, ValidationError, formatUnits } from "@actus-sm/units";
import type { Units } from "@actus-sm/units";
import type { ContractState, ContractTerms, Timestamp } from "@actus-sm/types";
import { ContractRoles, ContractTypes, EventTypes, MAX_TIMESTAMP } from "@actus-sm/types";
import { initialState, projectCashFlows, transition, validateTerms } from "@actus-sm/engine";
import type { CashFlow } from "@actus-sm/engine";
import {
  computeStateHash,
  decodeState,
  decodeTerms,
  encodeState,
  encodeTerms,
} from "@actus-sm/codec";
import { silentLogger } from "./config.js";
import { appendHistory, verifyHistory } from "./history.js";
import type { HistoryRecord, HistoryVerification } from "./history.js";
import { InMemoryContractStore } from "./store.js";
import type { ContractRecord, ContractStore } from "./store.js";

export interface ActusContractOptions {
  /** Where records are persisted. Default: a private in-memory store */
  readonly store?: ContractStore | undefined;
  /** Default: a silent logger */
  readonly logger?: Logger | undefined;
  /** Bound on the dates of any single schedule. Default: 10 000 */
  readonly maxScheduleEvents?: number | undefined;
}

export interface ProcessEventOptions {
  /** Principal to redeem on PR */
  readonly amount?: Units | undefined;
}

function toTimestamp(value: number | bigint): Timestamp {
  if (typeof value === "bigint") {
    if (value < 0n || value > BigInt(MAX_TIMESTAMP)) {
      throw new ValidationError("INVALID_TIMESTAMP", `Timestamp out of range: ${value.toString()}`);
    }
    return Number(value);
  }
  return value;
}

export class ActusContract {
  private readonly _store: ContractStore;
  private readonly _logger: Logger;
  private readonly _maxScheduleEvents: number | undefined;
  private _contractId: string | undefined;
  private _busy = false;

  constructor(options: ActusContractOptions = {}) {
    this._store = options.store ?? new InMemoryContractStore();
    this._logger = options.logger ?? silentLogger();
    this._maxScheduleEvents = options.maxScheduleEvents;
  }

  /**
   * Attach to a contract that was initialized earlier in the same store.
   *
   * @throws {TransitionError} NOT_INITIALIZED if the store has no such contract
   */
  static open(contractId: string, options: ActusContractOptions = {}): ActusContract {
    const contract = new ActusContract(options);
    if (!contract._store.has(contractId)) {
      throw new TransitionError("NOT_INITIALIZED", "initialized", `Contract "${contractId}" has not been initialized`);
    }
    contract._contractId = contractId;
    return contract;
  }

  /** The contract id, once initialized. */
  get contractId(): string | undefined {
    return this._contractId;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Initialize the contract from encoded terms.
   *
   * The type and role codes must agree with the terms. `currency` becomes
   * the settlement currency and must agree with one already in the terms.
   *
   * @throws {ValidationError} for unknown codes, undecodable or invalid
   *   terms, disagreeing arguments, or a second initialization
   */
  init(contractType: number, contractRole: number, currency: string, terms: Uint8Array): void {
    this._exclusive(() => {
      if (this._contractId !== undefined) {
        throw new ValidationError("INVALID_TERMS", `Contract "${this._contractId}" is already initialized`);
      }

      const type = ContractTypes.decode(contractType);
      const role = ContractRoles.decode(contractRole);
      const decoded = decodeTerms(terms);

      if (decoded.contractType !== type) {
        throw new ValidationError("INVALID_TERMS", `Contract type ${type} does not match terms (${decoded.contractType})`);
      }
      if (decoded.contractRole !== role) {
        throw new ValidationError("INVALID_TERMS", `Contract role ${role} does not match terms (${decoded.contractRole})`);
      }
      if (currency.trim() === "") {
        throw new ValidationError("INVALID_TERMS", "Settlement currency must not be empty");
      }
      if (decoded.settlementCurrency !== undefined && decoded.settlementCurrency !== currency) {
        throw new ValidationError(
          "INVALID_TERMS",
          `Currency ${currency} does not match terms (${decoded.settlementCurrency})`,
        );
      }
      if (this._store.has(decoded.contractId)) {
        throw new ValidationError("INVALID_TERMS", `Contract "${decoded.contractId}" is already initialized`);
      }

      const finalTerms: ContractTerms = { ...decoded, settlementCurrency: currency };
      const schedule = validateTerms(finalTerms, { maxScheduleEvents: this._maxScheduleEvents });
      const state = initialState(finalTerms);

      this._store.save({
        contractId: finalTerms.contractId,
        terms: encodeTerms(finalTerms),
        state: encodeState(state),
        history: [],
      });
      this._contractId = finalTerms.contractId;

      this._logger.info(
        {
          contractId: finalTerms.contractId,
          contractType: type,
          contractRole: role,
          currency,
          scheduledEvents: schedule.length,
        },
        "Contract initialized",
      );
    });
  }

  /**
   * Apply one event.
   *
   * @returns the signed payoff, or null for events without a cash flow
   * @throws {TransitionError} NOT_INITIALIZED before init, CONCURRENT_WRITE
   *   on re-entrant calls, or when the event does not apply
   * @throws {ValidationError} for an unknown event code or bad timestamp
   * @throws {MathError} on fixed-point overflow
   */
  processEvent(eventType: number, timestamp: number | bigint, options: ProcessEventOptions = {}): Units | null {
    return this._exclusive(() => {
      const record = this._record();
      const event = EventTypes.decode(eventType);
      const at = toTimestamp(timestamp);
      const log = this._logger.child({ contractId: record.contractId, eventType: event, timestamp: at });

      try {
        const terms = decodeTerms(record.terms);
        const state = decodeState(record.state);
        const result = transition(event, at, state, terms, {
          amount: options.amount,
          maxScheduleEvents: this._maxScheduleEvents,
        });

        const stateHash = computeStateHash(result.state);
        const payoff = result.payoff === null ? null : formatUnits(result.payoff);
        this._store.save({
          contractId: record.contractId,
          terms: record.terms,
          state: encodeState(result.state),
          history: appendHistory(record.history, { eventType: event, timestamp: at, payoff, stateHash }),
        });

        log.debug({ payoff, stage: result.state.stage }, "Event applied");
        return result.payoff;
      } catch (err) {
        const code = err instanceof TransitionError || err instanceof ValidationError ? err.code : undefined;
        log.warn({ err, code }, "Event rejected");
        throw err;
      }
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** The encoded current state. */
  getState(): Uint8Array {
    return this._record().state;
  }

  getStateSnapshot(): ContractState {
    return decodeState(this._record().state);
  }

  getTerms(): ContractTerms {
    return decodeTerms(this._record().terms);
  }

  getHistory(): readonly HistoryRecord[] {
    return this._record().history;
  }

  /** Check the history chain and that it ends in the current state. */
  verifyHistory(): HistoryVerification {
    const record = this._record();
    const current = computeStateHash(decodeState(record.state));
    return verifyHistory(record.history, record.history.length > 0 ? current : undefined);
  }

  /** Scheduled cash flows from the terms, independent of the current state. */
  projectCashFlows(): CashFlow[] {
    return projectCashFlows(this.getTerms(), { maxScheduleEvents: this._maxScheduleEvents });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _record(): ContractRecord {
    const contractId = this._contractId;
    const record = contractId === undefined ? undefined : this._store.load(contractId);
    if (record === undefined) {
      throw new TransitionError("NOT_INITIALIZED", "initialized", "Contract has not been initialized");
    }
    return record;
  }

  private _exclusive<T>(fn: () => T): T {
    if (this._busy) {
      throw new TransitionError("CONCURRENT_WRITE", "single-writer", "Another mutation of this contract is in progress");
    }
    this._busy = true;
    try {
      return fn();
    } finally {
      this._busy = false;
    }
  }
}
