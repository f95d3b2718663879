/**
 * @actus-sm/codec: Binary encoding of ContractState.
 */

import { ValidationError } from "@actus-sm/units";
import type { ContractState } from "@actus-sm/types";
import { LifecycleStages, PerformanceStatuses } from "@actus-sm/types";
import { BinaryReader, BinaryWriter } from "./binary.js";

export const STATE_CODEC_VERSION = 1;

/** Fixed size of an encoded state: version, 5 × i64, u64, 2 × u8. */
export const ENCODED_STATE_LENGTH = 1 + 5 * 8 + 8 + 2;

export function encodeState(state: ContractState): Uint8Array {
  return new BinaryWriter()
    .u8(STATE_CODEC_VERSION)
    .i64(state.notionalPrincipal)
    .i64(state.accruedInterest)
    .u64(state.statusDate)
    .i64(state.feeAccrued)
    .i64(state.nominalInterestRate)
    .i64(state.nextPrincipalRedemptionPayment)
    .u8(PerformanceStatuses.encode(state.performance))
    .u8(LifecycleStages.encode(state.stage))
    .toBytes();
}

export function decodeState(bytes: Uint8Array): ContractState {
  const r = new BinaryReader(bytes);
  const version = r.u8("version");
  if (version !== STATE_CODEC_VERSION) {
    throw new ValidationError("DECODE_FAILED", `Unsupported state encoding version ${String(version)}`);
  }

  const state: ContractState = {
    notionalPrincipal: r.i64("notionalPrincipal"),
    accruedInterest: r.i64("accruedInterest"),
    statusDate: r.u64("statusDate"),
    feeAccrued: r.i64("feeAccrued"),
    nominalInterestRate: r.i64("nominalInterestRate"),
    nextPrincipalRedemptionPayment: r.i64("nextPrincipalRedemptionPayment"),
    performance: PerformanceStatuses.decode(r.u8("performance")),
    stage: LifecycleStages.decode(r.u8("stage")),
  };

  r.finish();
  return state;
}
