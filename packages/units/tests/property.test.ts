/**
 * Property-Based Tests for @actus-sm/units
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Decimal roundtrip (format → parse = identity)
 * 2. Half-even rounding is within half a unit of the exact quotient
 * 3. Checked addition either equals the exact sum or throws MathError
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  addUnits,
  divideRoundHalfEven,
  formatUnits,
  parseUnits,
  MAX_UNITS,
  MIN_UNITS,
} from "../src/units.js";
import { MathError } from "../src/errors.js";

const arbUnits = fc.bigInt({ min: MIN_UNITS, max: MAX_UNITS });

describe("fixed-point properties", () => {
  it("format → parse is the identity", () => {
    fc.assert(
      fc.property(arbUnits, (value) => {
        expect(parseUnits(formatUnits(value))).toBe(value);
      }),
    );
  });

  it("half-even quotient is within half a unit", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -(10n ** 24n), max: 10n ** 24n }),
        fc.bigInt({ min: 1n, max: 10n ** 12n }),
        (numerator, denominator) => {
          const q = divideRoundHalfEven(numerator, denominator);
          const distance = numerator - q * denominator;
          const abs = distance < 0n ? -distance : distance;
          expect(abs * 2n <= denominator).toBe(true);
        },
      ),
    );
  });

  it("checked addition is exact or throws", () => {
    fc.assert(
      fc.property(arbUnits, arbUnits, (a, b) => {
        const exact = a + b;
        if (exact > MAX_UNITS || exact < MIN_UNITS) {
          expect(() => addUnits(a, b)).toThrow(MathError);
        } else {
          expect(addUnits(a, b)).toBe(exact);
        }
      }),
    );
  });
});
