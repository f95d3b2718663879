/**
 * @actus-sm/codec: Binary encoding of ContractTerms.
 *
 * Field order is fixed here and versioned by a leading byte. Identical
 * terms always encode to identical bytes.
 */

import { ValidationError } from "@actus-sm/units";
import type { CodeTable, ContractTerms, Cycle, ScheduleConfig } from "@actus-sm/types";
import {
  BusinessDayConventions,
  CalendarIds,
  ContractRoles,
  ContractTypes,
  CycleUnits,
  DayCountConventions,
  EndOfMonthConventions,
  FeeBases,
  StubConventions,
} from "@actus-sm/types";
import { BinaryReader, BinaryWriter } from "./binary.js";

export const TERMS_CODEC_VERSION = 1;

function writeCode<T extends string>(writer: BinaryWriter, table: CodeTable<T>, value: T): void {
  writer.u8(table.encode(value));
}

function writeCycle(writer: BinaryWriter, cycle: Cycle): void {
  writer.u32(cycle.count);
  writeCode(writer, CycleUnits, cycle.unit);
  writeCode(writer, StubConventions, cycle.stub);
}

function readCycle(reader: BinaryReader): Cycle {
  const count = reader.u32("cycle count");
  const unit = CycleUnits.decode(reader.u8("cycle unit"));
  const stub = StubConventions.decode(reader.u8("cycle stub"));
  return { count, unit, stub };
}

export function encodeTerms(terms: ContractTerms): Uint8Array {
  const w = new BinaryWriter();
  const u64 = (value: number): void => void w.u64(value);
  const i64 = (value: bigint): void => void w.i64(value);
  const cycle = (value: Cycle): void => writeCycle(w, value);
  const config = terms.scheduleConfig;

  w.u8(TERMS_CODEC_VERSION);
  w.string(terms.contractId);
  writeCode(w, ContractTypes, terms.contractType);
  writeCode(w, ContractRoles, terms.contractRole);
  w.option(terms.settlementCurrency, (value) => w.string(value));
  w.u64(terms.statusDate);
  w.option(terms.initialExchangeDate, u64);
  w.option(terms.maturityDate, u64);
  w.option(terms.notionalPrincipal, i64);
  w.option(terms.nominalInterestRate, i64);
  w.option(terms.dayCountConvention, (value) => writeCode(w, DayCountConventions, value));
  w.option(terms.premiumDiscountAtIED, i64);

  w.option(config.calendar, (value) => writeCode(w, CalendarIds, value));
  w.option(config.endOfMonthConvention, (value) => writeCode(w, EndOfMonthConventions, value));
  w.option(config.businessDayConvention, (value) => writeCode(w, BusinessDayConventions, value));
  w.option(config.holidays, (holidays) => w.vector(holidays, (value) => w.string(value)));

  w.option(terms.cycleAnchorDateOfInterestPayment, u64);
  w.option(terms.cycleOfInterestPayment, cycle);
  w.option(terms.capitalizationEndDate, u64);
  w.option(terms.cycleAnchorDateOfPrincipalRedemption, u64);
  w.option(terms.cycleOfPrincipalRedemption, cycle);
  w.option(terms.nextPrincipalRedemptionPayment, i64);
  w.option(terms.cycleAnchorDateOfFee, u64);
  w.option(terms.cycleOfFee, cycle);
  w.option(terms.feeBasis, (value) => writeCode(w, FeeBases, value));
  w.option(terms.feeRate, i64);
  w.option(terms.purchaseDate, u64);
  w.option(terms.priceAtPurchaseDate, i64);
  w.option(terms.terminationDate, u64);
  w.option(terms.priceAtTerminationDate, i64);

  return w.toBytes();
}

/**
 * @throws {ValidationError} DECODE_FAILED for malformed bytes,
 *   UNKNOWN_CODE for an enum code outside its table
 */
export function decodeTerms(bytes: Uint8Array): ContractTerms {
  const r = new BinaryReader(bytes);
  const version = r.u8("version");
  if (version !== TERMS_CODEC_VERSION) {
    throw new ValidationError("DECODE_FAILED", `Unsupported terms encoding version ${String(version)}`);
  }

  const u64 = (what: string) => (): number => r.u64(what);
  const i64 = (what: string) => (): bigint => r.i64(what);
  const cycle = (): Cycle => readCycle(r);

  const contractId = r.string("contractId");
  const contractType = ContractTypes.decode(r.u8("contractType"));
  const contractRole = ContractRoles.decode(r.u8("contractRole"));
  const settlementCurrency = r.option(() => r.string("settlementCurrency"), "settlementCurrency");
  const statusDate = r.u64("statusDate");
  const initialExchangeDate = r.option(u64("initialExchangeDate"));
  const maturityDate = r.option(u64("maturityDate"));
  const notionalPrincipal = r.option(i64("notionalPrincipal"));
  const nominalInterestRate = r.option(i64("nominalInterestRate"));
  const dayCountConvention = r.option(() => DayCountConventions.decode(r.u8()));
  const premiumDiscountAtIED = r.option(i64("premiumDiscountAtIED"));

  const scheduleConfig: ScheduleConfig = {
    calendar: r.option(() => CalendarIds.decode(r.u8())),
    endOfMonthConvention: r.option(() => EndOfMonthConventions.decode(r.u8())),
    businessDayConvention: r.option(() => BusinessDayConventions.decode(r.u8())),
    holidays: r.option(() => r.vector(() => r.string("holiday"), "holidays")),
  };

  const terms: ContractTerms = {
    contractId,
    contractType,
    contractRole,
    settlementCurrency,
    statusDate,
    initialExchangeDate,
    maturityDate,
    notionalPrincipal,
    nominalInterestRate,
    dayCountConvention,
    premiumDiscountAtIED,
    scheduleConfig,
    cycleAnchorDateOfInterestPayment: r.option(u64("cycleAnchorDateOfInterestPayment")),
    cycleOfInterestPayment: r.option(cycle),
    capitalizationEndDate: r.option(u64("capitalizationEndDate")),
    cycleAnchorDateOfPrincipalRedemption: r.option(u64("cycleAnchorDateOfPrincipalRedemption")),
    cycleOfPrincipalRedemption: r.option(cycle),
    nextPrincipalRedemptionPayment: r.option(i64("nextPrincipalRedemptionPayment")),
    cycleAnchorDateOfFee: r.option(u64("cycleAnchorDateOfFee")),
    cycleOfFee: r.option(cycle),
    feeBasis: r.option(() => FeeBases.decode(r.u8())),
    feeRate: r.option(i64("feeRate")),
    purchaseDate: r.option(u64("purchaseDate")),
    priceAtPurchaseDate: r.option(i64("priceAtPurchaseDate")),
    terminationDate: r.option(u64("terminationDate")),
    priceAtTerminationDate: r.option(i64("priceAtTerminationDate")),
  };

  r.finish();
  return terms;
}
