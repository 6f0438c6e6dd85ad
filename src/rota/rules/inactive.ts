import type { CandidateRule } from "./rules.types.js";

/**
 * Inactive members are never candidates.
 */
export function createInactiveRule(): CandidateRule {
  return {
    name: "inactive",
    kind: "exclusion",
    check({ member }) {
      return member.active ? undefined : `${member.name} is inactive`;
    },
  };
}
