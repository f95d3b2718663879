/**
 * @actus-sm/contract: Contract persistence.
 *
 * The host owns storage. A record holds the encoded terms and state of
 * one contract plus its event history; the facade replaces the whole
 * record on every successful event and never writes on failure.
 */

import type { HistoryRecord } from "./history.js";

export interface ContractRecord {
  readonly contractId: string;
  /** encodeTerms() output; written once at init */
  readonly terms: Uint8Array;
  /** encodeState() output of the current state */
  readonly state: Uint8Array;
  readonly history: readonly HistoryRecord[];
}

/**
 * Storage interface for contract records.
 *
 * Implementations can use in-memory storage, file system, or the host's
 * key-value store.
 */
export interface ContractStore {
  /**
   * Load the record of a contract.
   *
   * @returns The record, or undefined if the contract was never initialized
   */
  load(contractId: string): ContractRecord | undefined;

  /** Create or replace the record of a contract. */
  save(record: ContractRecord): void;

  has(contractId: string): boolean;
}

function copyRecord(record: ContractRecord): ContractRecord {
  return {
    contractId: record.contractId,
    terms: record.terms.slice(),
    state: record.state.slice(),
    history: [...record.history],
  };
}

/**
 * In-memory contract store.
 *
 * Stores copies in a Map so callers cannot alter persisted bytes.
 * Suitable for tests and single-process hosts.
 */
export class InMemoryContractStore implements ContractStore {
  private readonly _records = new Map<string, ContractRecord>();

  load(contractId: string): ContractRecord | undefined {
    const record = this._records.get(contractId);
    return record === undefined ? undefined : copyRecord(record);
  }

  save(record: ContractRecord): void {
    this._records.set(record.contractId, copyRecord(record));
  }

  has(contractId: string): boolean {
    return this._records.has(contractId);
  }

  /** Number of stored contracts. */
  get size(): number {
    return this._records.size;
  }
}
