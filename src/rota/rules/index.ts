export { createInactiveRule } from "./inactive.js";
export { createNgDateRule, buildNgCalendar, type NgCalendar } from "./ng-date.js";
export { createSameDayOverlapRule } from "./same-day-overlap.js";
export { createNightCooldownRule, type NightCooldownConfig } from "./night-cooldown.js";
export { createIndexEligibilityRule } from "./index-eligibility.js";
export { createFixedPatternReservedRule } from "./fixed-pattern-reserved.js";
export {
  createMinIntervalRule,
  requiredIntervalDays,
  type MinIntervalConfig,
} from "./min-interval.js";
export { createBuiltInRules, type BuiltInRuleDependencies } from "./registry.js";
export { evaluateCandidate, isExcluded } from "./resolver.js";
export type {
  CandidateContext,
  CandidateRule,
  CandidateRuleKind,
  CandidateRuleName,
  Elimination,
} from "./rules.types.js";
