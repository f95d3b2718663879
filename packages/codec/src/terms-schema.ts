/**
 * @actus-sm/codec: Human-readable JSON terms.
 *
 * Amounts and rates are decimal strings ("500000", "0.05"), cycles use
 * ACTUS notation ("3M-", "1Y+") and timestamps are epoch seconds.
 * zod checks the shape; the conversion to bigint fixed-point and Cycle
 * values is done by the units and schedule parsers.
 */

import { z } from "zod";
import { ValidationError, formatRate, formatUnits, parseRate, parseUnits } from "@actus-sm/units";
import { MAX_TIMESTAMP } from "@actus-sm/types";
import type { ContractTerms, Cycle } from "@actus-sm/types";
import { formatCycle, parseCycle } from "@actus-sm/schedule";

// =============================================================================
// Schema
// =============================================================================

const timestamp = z.number().int().nonnegative().max(MAX_TIMESTAMP);
const decimal = z.string().regex(/^-?\d+(\.\d+)?$/, "Expected a decimal string");
const cycle = z.string().regex(/^\d+[DWMQHY][+-]?$/, "Expected ACTUS cycle notation, e.g. 3M-");

export const ScheduleConfigInputSchema = z
  .object({
    calendar: z.enum(["NC", "MF"]).optional(),
    endOfMonthConvention: z.enum(["SD", "EOM"]).optional(),
    businessDayConvention: z
      .enum(["NOS", "SCF", "SCMF", "CSF", "CSMF", "SCP", "SCMP", "CSP", "CSMP"])
      .optional(),
    holidays: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/)).optional(),
  })
  .strict();

export const TermsInputSchema = z
  .object({
    contractId: z.string().min(1),
    contractType: z.enum(["PAM", "LAM", "ANN"]),
    contractRole: z.enum(["RPA", "RPL"]),
    settlementCurrency: z.string().optional(),
    statusDate: timestamp,
    initialExchangeDate: timestamp.optional(),
    maturityDate: timestamp.optional(),
    notionalPrincipal: decimal.optional(),
    nominalInterestRate: decimal.optional(),
    dayCountConvention: z.enum(["A365", "A360", "AA", "30E360"]).optional(),
    premiumDiscountAtIED: decimal.optional(),
    scheduleConfig: ScheduleConfigInputSchema.default({}),
    cycleAnchorDateOfInterestPayment: timestamp.optional(),
    cycleOfInterestPayment: cycle.optional(),
    capitalizationEndDate: timestamp.optional(),
    cycleAnchorDateOfPrincipalRedemption: timestamp.optional(),
    cycleOfPrincipalRedemption: cycle.optional(),
    nextPrincipalRedemptionPayment: decimal.optional(),
    cycleAnchorDateOfFee: timestamp.optional(),
    cycleOfFee: cycle.optional(),
    feeBasis: z.enum(["A", "N"]).optional(),
    feeRate: decimal.optional(),
    purchaseDate: timestamp.optional(),
    priceAtPurchaseDate: decimal.optional(),
    terminationDate: timestamp.optional(),
    priceAtTerminationDate: decimal.optional(),
  })
  .strict();

/** JSON terms as accepted by parseTermsInput(). */
export type TermsInput = z.input<typeof TermsInputSchema>;

// =============================================================================
// Conversion
// =============================================================================

function optional<T, U>(value: T | undefined, convert: (value: T) => U): U | undefined {
  return value === undefined ? undefined : convert(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse JSON terms into ContractTerms.
 *
 * @throws {ValidationError} INVALID_TERMS for a shape error; INVALID_AMOUNT,
 *   INVALID_RATE or INVALID_CYCLE for an unparsable value
 */
export function parseTermsInput(input: unknown): ContractTerms {
  const result = TermsInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError("INVALID_TERMS", `Invalid contract terms: ${formatIssues(result.error)}`);
  }
  const t = result.data;
  const parseFee = t.feeBasis === "N" ? parseRate : parseUnits;

  return {
    contractId: t.contractId,
    contractType: t.contractType,
    contractRole: t.contractRole,
    settlementCurrency: t.settlementCurrency,
    statusDate: t.statusDate,
    initialExchangeDate: t.initialExchangeDate,
    maturityDate: t.maturityDate,
    notionalPrincipal: optional(t.notionalPrincipal, parseUnits),
    nominalInterestRate: optional(t.nominalInterestRate, parseRate),
    dayCountConvention: t.dayCountConvention,
    premiumDiscountAtIED: optional(t.premiumDiscountAtIED, parseUnits),
    scheduleConfig: {
      calendar: t.scheduleConfig.calendar,
      endOfMonthConvention: t.scheduleConfig.endOfMonthConvention,
      businessDayConvention: t.scheduleConfig.businessDayConvention,
      holidays: t.scheduleConfig.holidays,
    },
    cycleAnchorDateOfInterestPayment: t.cycleAnchorDateOfInterestPayment,
    cycleOfInterestPayment: optional(t.cycleOfInterestPayment, parseCycle),
    capitalizationEndDate: t.capitalizationEndDate,
    cycleAnchorDateOfPrincipalRedemption: t.cycleAnchorDateOfPrincipalRedemption,
    cycleOfPrincipalRedemption: optional(t.cycleOfPrincipalRedemption, parseCycle),
    nextPrincipalRedemptionPayment: optional(t.nextPrincipalRedemptionPayment, parseUnits),
    cycleAnchorDateOfFee: t.cycleAnchorDateOfFee,
    cycleOfFee: optional(t.cycleOfFee, parseCycle),
    feeBasis: t.feeBasis,
    feeRate: optional(t.feeRate, parseFee),
    purchaseDate: t.purchaseDate,
    priceAtPurchaseDate: optional(t.priceAtPurchaseDate, parseUnits),
    terminationDate: t.terminationDate,
    priceAtTerminationDate: optional(t.priceAtTerminationDate, parseUnits),
  };
}

/**
 * Parse a JSON document of terms.
 *
 * @throws {ValidationError} INVALID_TERMS when the text is not JSON
 */
export function parseTermsJson(text: string): ContractTerms {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError("INVALID_TERMS", `Terms are not valid JSON: ${reason}`);
  }
  return parseTermsInput(input);
}

/** Render terms back into their JSON input form. */
export function termsToInput(terms: ContractTerms): TermsInput {
  const fee = (terms.feeBasis ?? "A") === "N" ? formatRate : formatUnits;
  const cycleText = (value: Cycle): string => formatCycle(value);

  return {
    contractId: terms.contractId,
    contractType: terms.contractType,
    contractRole: terms.contractRole,
    settlementCurrency: terms.settlementCurrency,
    statusDate: terms.statusDate,
    initialExchangeDate: terms.initialExchangeDate,
    maturityDate: terms.maturityDate,
    notionalPrincipal: optional(terms.notionalPrincipal, formatUnits),
    nominalInterestRate: optional(terms.nominalInterestRate, formatRate),
    dayCountConvention: terms.dayCountConvention,
    premiumDiscountAtIED: optional(terms.premiumDiscountAtIED, formatUnits),
    scheduleConfig: {
      calendar: terms.scheduleConfig.calendar,
      endOfMonthConvention: terms.scheduleConfig.endOfMonthConvention,
      businessDayConvention: terms.scheduleConfig.businessDayConvention,
      holidays: terms.scheduleConfig.holidays === undefined ? undefined : [...terms.scheduleConfig.holidays],
    },
    cycleAnchorDateOfInterestPayment: terms.cycleAnchorDateOfInterestPayment,
    cycleOfInterestPayment: optional(terms.cycleOfInterestPayment, cycleText),
    capitalizationEndDate: terms.capitalizationEndDate,
    cycleAnchorDateOfPrincipalRedemption: terms.cycleAnchorDateOfPrincipalRedemption,
    cycleOfPrincipalRedemption: optional(terms.cycleOfPrincipalRedemption, cycleText),
    nextPrincipalRedemptionPayment: optional(terms.nextPrincipalRedemptionPayment, formatUnits),
    cycleAnchorDateOfFee: terms.cycleAnchorDateOfFee,
    cycleOfFee: optional(terms.cycleOfFee, cycleText),
    feeBasis: terms.feeBasis,
    feeRate: optional(terms.feeRate, fee),
    purchaseDate: terms.purchaseDate,
    priceAtPurchaseDate: optional(terms.priceAtPurchaseDate, formatUnits),
    terminationDate: terms.terminationDate,
    priceAtTerminationDate: optional(terms.priceAtTerminationDate, formatUnits),
  };
}
