import type { ConstraintSettings, FixedPattern } from "../../config.types.js";
import type { EligibilityTable } from "../eligibility.js";
import { createFixedPatternReservedRule } from "./fixed-pattern-reserved.js";
import { createInactiveRule } from "./inactive.js";
import { createIndexEligibilityRule } from "./index-eligibility.js";
import { createMinIntervalRule } from "./min-interval.js";
import { createNightCooldownRule } from "./night-cooldown.js";
import { createNgDateRule, type NgCalendar } from "./ng-date.js";
import type { CandidateRule } from "./rules.types.js";
import { createSameDayOverlapRule } from "./same-day-overlap.js";

export interface BuiltInRuleDependencies {
  ngCalendar: NgCalendar;
  eligibility: EligibilityTable;
  constraints: ConstraintSettings;
  fixedPattern?: FixedPattern;
}

/**
 * The built-in rules in evaluation order: exclusions, then eligibility,
 * then the interval filter. Diagnostics list eliminations in this order.
 */
export function createBuiltInRules(deps: BuiltInRuleDependencies): CandidateRule[] {
  return [
    createInactiveRule(),
    createNgDateRule(deps.ngCalendar),
    createSameDayOverlapRule(),
    createNightCooldownRule({ days: deps.constraints.nightToDayCooldownDays }),
    createIndexEligibilityRule(deps.eligibility),
    createFixedPatternReservedRule(deps.fixedPattern),
    createMinIntervalRule(deps.constraints),
  ];
}
