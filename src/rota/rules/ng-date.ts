import type { NgRules } from "../../config.types.js";
import { isWithinRange } from "../../datetime.utils.js";
import type { DateRange } from "../../types.js";
import type { CandidateRule } from "./rules.types.js";

interface MemberNgEntry {
  range: DateRange;
  label: string;
}

/**
 * NG dates indexed for lookup.
 *
 * @category Rules
 */
export interface NgCalendar {
  readonly globalDates: ReadonlySet<string>;
  /** Describes the member's first NG entry covering `date`, if any. */
  memberConflict(memberName: string, date: string): string | undefined;
}

/**
 * Flattens `byMember` dates and ranges and `byPeriod` ranges into one
 * per-member list; keeps `global` as a set.
 */
export function buildNgCalendar(rules: NgRules): NgCalendar {
  const byMember = new Map<string, MemberNgEntry[]>();
  const push = (memberName: string, entry: MemberNgEntry) => {
    const list = byMember.get(memberName) ?? [];
    list.push(entry);
    byMember.set(memberName, list);
  };

  for (const [memberName, entries] of Object.entries(rules.byMember)) {
    for (const entry of entries) {
      if (typeof entry === "string") {
        push(memberName, { range: { start: entry, end: entry }, label: "NG date" });
      } else {
        push(memberName, { range: entry, label: `NG range ${entry.start}..${entry.end}` });
      }
    }
  }

  for (const [memberName, periods] of Object.entries(rules.byPeriod)) {
    for (const period of periods) {
      const reason = period.reason ?? `${period.start}..${period.end}`;
      push(memberName, { range: period, label: `NG period: ${reason}` });
    }
  }

  const globalDates = new Set(rules.global);

  return {
    globalDates,
    memberConflict(memberName, date) {
      const hit = byMember.get(memberName)?.find((e) => isWithinRange(date, e.range));
      return hit?.label;
    },
  };
}

/**
 * Eliminates a member whose own NG dates cover the slot's date. For night
 * slots the date is the week start.
 *
 * Global NG dates are not checked here: they decide which slots exist
 * (see `generateDutySlots`), and a global Monday inside a working
 * week still has its night slots.
 */
export function createNgDateRule(calendar: NgCalendar): CandidateRule {
  return {
    name: "ng-date",
    kind: "exclusion",
    check({ member, slot }) {
      const conflict = calendar.memberConflict(member.name, slot.date);
      if (conflict) {
        return `${member.name} is unavailable on ${slot.date} (${conflict})`;
      }
      return undefined;
    },
  };
}
