/**
 * @actus-sm/schedule: ACTUS cycle notation.
 *
 * `<count><unit><stub>`: "1M-" is monthly with a short final stub,
 * "3M+" quarterly with a long one. The stub marker is optional and
 * defaults to short.
 */

import { ValidationError } from "@actus-sm/units";
import type { Cycle, CycleUnit, StubConvention } from "@actus-sm/types";
import { CycleUnits } from "@actus-sm/types";

const CYCLE_PATTERN = /^(\d+)([DWMQHY])([+-]?)$/;

export function parseCycle(notation: string): Cycle {
  const match = CYCLE_PATTERN.exec(notation.trim());
  if (match === null) {
    throw new ValidationError(
      "INVALID_CYCLE",
      `Invalid cycle "${notation}". Expected <count><D|W|M|Q|H|Y>[+|-], e.g. "1M-"`,
    );
  }

  const [, rawCount = "", rawUnit = "", rawStub = ""] = match;
  const count = Number(rawCount);
  if (!Number.isSafeInteger(count) || count <= 0) {
    throw new ValidationError("INVALID_CYCLE", `Cycle count must be positive, got "${rawCount}"`);
  }

  if (!CycleUnits.is(rawUnit)) {
    throw new ValidationError("INVALID_CYCLE", `Unknown cycle unit "${rawUnit}"`);
  }
  const unit: CycleUnit = rawUnit;
  const stub: StubConvention = rawStub === "+" ? "LONG" : "SHORT";

  return { count, unit, stub };
}

export function formatCycle(cycle: Cycle): string {
  return `${String(cycle.count)}${cycle.unit}${cycle.stub === "LONG" ? "+" : "-"}`;
}
