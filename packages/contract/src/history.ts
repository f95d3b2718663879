/**
 * @actus-sm/contract: Event history hash chain.
 *
 * Every applied event leaves a record linked to its predecessor:
 *
 *   record[0].hash = sha256(canonicalize(record[0]) + GENESIS_HASH)
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Each record also carries the hash of the state the event produced,
 * so the chain commits to the whole sequence of states.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EventType, Timestamp } from "@actus-sm/types";

/** The `previousHash` of the first record. */
export const GENESIS_HASH = "genesis";

export interface HistoryRecord {
  /** 1-based position in the history */
  readonly sequence: number;
  readonly eventType: EventType;
  readonly timestamp: Timestamp;
  /** Signed payoff as a decimal string, or null for events without a cash flow */
  readonly payoff: string | null;
  /** SHA-256 of the state after the event */
  readonly stateHash: string;
  readonly previousHash: string;
  readonly hash: string;
}

export type HistoryContent = Omit<HistoryRecord, "hash" | "previousHash">;

export interface HistoryError {
  readonly sequence: number;
  readonly reason: string;
}

export interface HistoryVerification {
  readonly valid: boolean;
  readonly errors: readonly HistoryError[];
}

export function computeHistoryHash(content: HistoryContent, previousHash: string): string {
  const canonical = canonicalize({
    sequence: content.sequence,
    eventType: content.eventType,
    timestamp: content.timestamp,
    payoff: content.payoff,
    stateHash: content.stateHash,
  });
  return createHash("sha256").update(canonical + previousHash).digest("hex");
}

/** Append a record to the end of a history. */
export function appendHistory(
  history: readonly HistoryRecord[],
  entry: Omit<HistoryContent, "sequence">,
): HistoryRecord[] {
  const last = history[history.length - 1];
  const previousHash = last?.hash ?? GENESIS_HASH;
  const content: HistoryContent = { ...entry, sequence: history.length + 1 };
  return [...history, { ...content, previousHash, hash: computeHistoryHash(content, previousHash) }];
}

/**
 * Recompute the chain and report every break.
 *
 * @param expectedStateHash - when given, the hash the last record must carry
 */
export function verifyHistory(
  history: readonly HistoryRecord[],
  expectedStateHash?: string,
): HistoryVerification {
  const errors: HistoryError[] = [];
  let previousHash = GENESIS_HASH;
  let previousTimestamp = -Infinity;

  history.forEach((record, index) => {
    const expectedSequence = index + 1;
    if (record.sequence !== expectedSequence) {
      errors.push({
        sequence: record.sequence,
        reason: `Sequence gap: expected ${String(expectedSequence)}, got ${String(record.sequence)}`,
      });
    }
    if (record.previousHash !== previousHash) {
      errors.push({
        sequence: record.sequence,
        reason: `previousHash mismatch: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }
    const expectedHash = computeHistoryHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      errors.push({
        sequence: record.sequence,
        reason: `Hash mismatch: expected "${expectedHash}", got "${record.hash}"`,
      });
    }
    if (record.timestamp < previousTimestamp) {
      errors.push({
        sequence: record.sequence,
        reason: `Timestamp ${String(record.timestamp)} precedes ${String(previousTimestamp)}`,
      });
    }
    previousHash = record.hash;
    previousTimestamp = record.timestamp;
  });

  const last = history[history.length - 1];
  if (expectedStateHash !== undefined && last !== undefined && last.stateHash !== expectedStateHash) {
    errors.push({
      sequence: last.sequence,
      reason: "Current state does not match the last recorded state hash",
    });
  }

  return { valid: errors.length === 0, errors };
}
