import { isWithinRange } from "../../datetime.utils.js";
import type { CandidateRule } from "./rules.types.js";

/**
 * One duty per member per date.
 *
 * A day slot is blocked by a held night week covering its date or by
 * another day shift that date. A night slot is blocked by a day shift
 * inside its week or by the other night index of the same week.
 */
export function createSameDayOverlapRule(): CandidateRule {
  return {
    name: "same-day-overlap",
    kind: "exclusion",
    check({ member, slot, ledger }) {
      const name = member.name;

      if (slot.shiftType === "day") {
        const night = ledger
          .nightWeeks(name)
          .find((w) => isWithinRange(slot.date, { start: w.weekStart, end: w.weekEnd }));
        if (night) {
          return `${name} is on night duty for the week ${night.weekStart}..${night.weekEnd}`;
        }
        if (ledger.dayDates(name).has(slot.date)) {
          return `${name} already has a day shift on ${slot.date}`;
        }
        return undefined;
      }

      const span = { start: slot.weekStart, end: slot.weekEnd };
      const dayInWeek = [...ledger.dayDates(name)].toSorted().find((d) => isWithinRange(d, span));
      if (dayInWeek) {
        return `${name} has a day shift on ${dayInWeek} inside the week ${slot.weekStart}..${slot.weekEnd}`;
      }
      const sameWeek = ledger.nightWeeks(name).find((w) => w.weekStart === slot.weekStart);
      if (sameWeek) {
        return `${name} already holds night index ${sameWeek.index} for the week ${slot.weekStart}..${slot.weekEnd}`;
      }
      return undefined;
    },
  };
}
