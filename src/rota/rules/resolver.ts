import type {
  CandidateContext,
  CandidateRule,
  CandidateRuleKind,
  Elimination,
} from "./rules.types.js";

/**
 * Runs every rule (optionally only those of the given kinds) against one
 * member and slot, collecting all eliminations rather than stopping at the
 * first.
 *
 * An empty result means the member may take the slot.
 */
export function evaluateCandidate(
  rules: readonly CandidateRule[],
  context: CandidateContext,
  kinds?: readonly CandidateRuleKind[],
): Elimination[] {
  const eliminations: Elimination[] = [];
  for (const rule of rules) {
    if (kinds && !kinds.includes(rule.kind)) continue;
    const message = rule.check(context);
    if (message !== undefined) {
      eliminations.push({ rule: rule.name, message });
    }
  }
  return eliminations;
}

/**
 * `true` when any exclusion-kind rule eliminates the member.
 */
export function isExcluded(rules: readonly CandidateRule[], context: CandidateContext): boolean {
  return evaluateCandidate(rules, context, ["exclusion"]).length > 0;
}
