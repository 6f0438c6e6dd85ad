import type { FixedPattern } from "../config.types.js";
import { daysBetween } from "../datetime.utils.js";
import type { DutySlot } from "../types.js";

const DAYS_PER_WEEK = 7;

/**
 * Whether `weekStart` falls on the pattern's cadence.
 *
 * Counts whole 7-day periods from the reference date to the week start
 * (flooring, so weeks before the reference count negative) and checks that
 * the count is a multiple of `cadenceDays / 7`. With the default 14-day
 * cadence this is "an even number of weeks".
 */
export function isFixedPatternWeek(weekStart: string, pattern: FixedPattern): boolean {
  const weeks = Math.floor(daysBetween(pattern.referenceDate, weekStart) / DAYS_PER_WEEK);
  const cadenceWeeks = pattern.cadenceDays / DAYS_PER_WEEK;
  return ((weeks % cadenceWeeks) + cadenceWeeks) % cadenceWeeks === 0;
}

/**
 * The member forced into `slot` by the fixed pattern, if any.
 *
 * Only night slots at the pattern's target index can be forced. The caller
 * still applies the exclusion and interval rules to the returned member and
 * falls back to normal selection when one of them fires.
 *
 * @example
 * ```typescript
 * const pattern = { memberName: "mori", referenceDate: "2026-03-09", targetIndex: 2, cadenceDays: 14 };
 * fixedAssignment(nightSlot("2026-03-23", 2), pattern); // "mori"
 * fixedAssignment(nightSlot("2026-03-30", 2), pattern); // undefined
 * ```
 */
export function fixedAssignment(
  slot: DutySlot,
  pattern: FixedPattern | undefined,
): string | undefined {
  if (!pattern) return undefined;
  if (slot.shiftType !== "night" || slot.index !== pattern.targetIndex) return undefined;
  return isFixedPatternWeek(slot.weekStart, pattern) ? pattern.memberName : undefined;
}
