import { eligibleIndices, type EligibilityTable } from "../eligibility.js";
import type { CandidateRule } from "./rules.types.js";

/**
 * Restricts members to the index positions in the eligibility table.
 */
export function createIndexEligibilityRule(table: EligibilityTable): CandidateRule {
  return {
    name: "index-eligibility",
    kind: "eligibility",
    check({ member, slot }) {
      if (!member.shiftTypes.includes(slot.shiftType)) {
        return `${member.name} does not work ${slot.shiftType} shifts`;
      }
      const allowed = eligibleIndices(table, member.name, slot.shiftType);
      if (allowed.has(slot.index)) return undefined;

      const list = [...allowed].toSorted((a, b) => a - b).join(", ") || "none";
      return `${member.name} is not eligible for ${slot.shiftType} index ${slot.index} (eligible: ${list})`;
    },
  };
}
