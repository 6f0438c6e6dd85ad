import { addDays } from "../datetime.utils.js";
import type { Assignment, NightIndex } from "../types.js";
import type { HistoryWindow } from "./history.js";

export interface NightWeek {
  weekStart: string;
  weekEnd: string;
  index: NightIndex;
}

/**
 * Read access to what each member already holds: history plus this run's
 * commits. Exclusion rules consult only this, never later slots.
 *
 * @category Ledger
 */
export interface LedgerReader {
  dayDates(memberName: string): ReadonlySet<string>;
  /** Night weeks, oldest first. */
  nightWeeks(memberName: string): readonly NightWeek[];
}

export class CommitLedger implements LedgerReader {
  #days = new Map<string, Set<string>>();
  #nights = new Map<string, NightWeek[]>();
  #committed: Assignment[] = [];

  /** Seeds the ledger with the history window's day dates and night weeks. */
  static fromHistory(history: HistoryWindow): CommitLedger {
    const ledger = new CommitLedger();
    for (const record of history.records) {
      if (record.shiftType === "day") {
        ledger.#addDay(record.memberName, record.date);
      } else {
        ledger.#addNight(record.memberName, {
          weekStart: record.date,
          weekEnd: addDays(record.date, 6),
          index: record.index,
        });
      }
    }
    return ledger;
  }

  get committed(): readonly Assignment[] {
    return this.#committed;
  }

  dayDates(memberName: string): ReadonlySet<string> {
    return this.#days.get(memberName) ?? new Set();
  }

  nightWeeks(memberName: string): readonly NightWeek[] {
    return this.#nights.get(memberName) ?? [];
  }

  commit(assignment: Assignment): void {
    const { slot, memberName } = assignment;
    if (slot.shiftType === "day") {
      this.#addDay(memberName, slot.date);
    } else {
      this.#addNight(memberName, {
        weekStart: slot.weekStart,
        weekEnd: slot.weekEnd,
        index: slot.index,
      });
    }
    this.#committed.push(assignment);
  }

  #addDay(memberName: string, date: string): void {
    const set = this.#days.get(memberName) ?? new Set<string>();
    set.add(date);
    this.#days.set(memberName, set);
  }

  #addNight(memberName: string, week: NightWeek): void {
    const list = this.#nights.get(memberName) ?? [];
    list.push(week);
    list.sort((a, b) => (a.weekStart < b.weekStart ? -1 : a.weekStart > b.weekStart ? 1 : 0));
    this.#nights.set(memberName, list);
  }
}
