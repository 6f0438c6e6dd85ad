import type { ConstraintSettings, Member } from "../../config.types.js";
import { daysBetween } from "../../datetime.utils.js";
import type { DutySlot } from "../../types.js";
import type { CandidateRule } from "./rules.types.js";

export type MinIntervalConfig = Pick<
  ConstraintSettings,
  "dayMinIntervalDays" | "nightMinIntervalDays" | "dayIndex3MinIntervalDays"
>;

/**
 * Minimum days required between a member's previous assignment of the
 * slot's shift type and this slot.
 *
 * Index-3 day slots use `dayIndex3MinIntervalDays` when it is set; other
 * slots use the member's override, then the default.
 */
export function requiredIntervalDays(
  member: Member,
  slot: DutySlot,
  config: MinIntervalConfig,
): number {
  if (slot.shiftType === "night") {
    return member.minIntervalOverrides.night ?? config.nightMinIntervalDays;
  }
  if (slot.index === 3 && config.dayIndex3MinIntervalDays !== undefined) {
    return config.dayIndex3MinIntervalDays;
  }
  return member.minIntervalOverrides.day ?? config.dayMinIntervalDays;
}

/**
 * Removes members assigned the same shift type too recently. A hard
 * filter, not a score penalty. Night gaps are measured between week starts.
 */
export function createMinIntervalRule(config: MinIntervalConfig): CandidateRule {
  return {
    name: "min-interval",
    kind: "interval",
    check({ member, slot, fairness }) {
      const last = fairness.lastAssigned(member.name, slot.shiftType);
      if (last === undefined) return undefined;

      const required = requiredIntervalDays(member, slot, config);
      const gap = daysBetween(last, slot.date);
      if (gap >= required) return undefined;

      return `${member.name} last worked a ${slot.shiftType} shift on ${last}, ${gap} days before ${slot.date}; minimum is ${required}`;
    },
  };
}
