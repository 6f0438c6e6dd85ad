import { describe, expect, it } from "vitest";
import type { FixedPattern } from "../../src/config.types.js";
import { fixedAssignment, isFixedPatternWeek } from "../../src/rota/fixed-pattern.js";
import { daySlot, night } from "./helpers.js";

const biweekly: FixedPattern = {
  memberName: "wada",
  referenceDate: "2026-03-09",
  targetIndex: 2,
  cadenceDays: 14,
};

describe("isFixedPatternWeek", () => {
  it("matches every other week from the reference", () => {
    expect(isFixedPatternWeek("2026-03-09", biweekly)).toBe(true);
    expect(isFixedPatternWeek("2026-03-16", biweekly)).toBe(false);
    expect(isFixedPatternWeek("2026-03-23", biweekly)).toBe(true);
    expect(isFixedPatternWeek("2026-03-30", biweekly)).toBe(false);
    expect(isFixedPatternWeek("2026-05-18", biweekly)).toBe(true);
  });

  it("keeps parity for weeks before the reference", () => {
    expect(isFixedPatternWeek("2026-03-02", biweekly)).toBe(false);
    expect(isFixedPatternWeek("2026-02-23", biweekly)).toBe(true);
  });

  it("supports longer cadences", () => {
    const triweekly = { ...biweekly, cadenceDays: 21 };
    expect(isFixedPatternWeek("2026-03-23", triweekly)).toBe(false);
    expect(isFixedPatternWeek("2026-03-30", triweekly)).toBe(true);
  });
});

describe("fixedAssignment", () => {
  it("forces the member on pattern weeks at the target index", () => {
    expect(fixedAssignment(night("2026-03-23", 2), biweekly)).toBe("wada");
  });

  it("forces nobody elsewhere", () => {
    expect(fixedAssignment(night("2026-03-30", 2), biweekly)).toBeUndefined();
    expect(fixedAssignment(night("2026-03-23", 1), biweekly)).toBeUndefined();
    expect(fixedAssignment(daySlot("2026-03-21", 2), biweekly)).toBeUndefined();
    expect(fixedAssignment(night("2026-03-23", 2), undefined)).toBeUndefined();
  });

  it("honours a different target index", () => {
    expect(fixedAssignment(night("2026-03-23", 1), { ...biweekly, targetIndex: 1 })).toBe("wada");
  });
});
