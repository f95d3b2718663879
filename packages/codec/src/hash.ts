/**
 * @actus-sm/codec: Canonical hashing.
 *
 * Values are canonicalized with RFC 8785 (JCS) and hashed with SHA-256.
 * bigints are rendered as decimal strings and absent fields are dropped,
 * so a hash depends only on the values present.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ContractState, ContractTerms } from "@actus-sm/types";

/** Convert a value into plain JSON: bigints become strings, undefined fields vanish. */
export function toCanonicalJson(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toCanonicalJson);
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) {
        result[key] = toCanonicalJson(field);
      }
    }
    return result;
  }
  return value;
}

/** Hex SHA-256 of the canonical JSON of a value. */
export function sha256Canonical(value: unknown): string {
  return createHash("sha256").update(canonicalize(toCanonicalJson(value))).digest("hex");
}

export function computeStateHash(state: ContractState): string {
  return sha256Canonical(state);
}

export function computeTermsHash(terms: ContractTerms): string {
  return sha256Canonical(terms);
}
