import type { FixedPattern } from "../../config.types.js";
import { isFixedPatternWeek } from "../fixed-pattern.js";
import type { CandidateRule } from "./rules.types.js";

/**
 * Keeps the fixed-pattern member off their target index outside the
 * pattern's weeks, so that index is theirs exactly on cadence.
 */
export function createFixedPatternReservedRule(pattern: FixedPattern | undefined): CandidateRule {
  return {
    name: "fixed-pattern-reserved",
    kind: "eligibility",
    check({ member, slot }) {
      if (!pattern || member.name !== pattern.memberName) return undefined;
      if (slot.shiftType !== "night" || slot.index !== pattern.targetIndex) return undefined;
      if (isFixedPatternWeek(slot.weekStart, pattern)) return undefined;

      return `${member.name} takes night index ${pattern.targetIndex} only on the fixed ${pattern.cadenceDays}-day cadence`;
    },
  };
}
