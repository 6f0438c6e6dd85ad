import type { HistoryRecord } from "../config.types.js";
import { addDays, addMonths, compareDays, isWithinRange } from "../datetime.utils.js";
import type { DateRange, DayIndex, NightIndex, ShiftType } from "../types.js";

/**
 * Read-only view over the assignments made in the months before a
 * rotation. Seeds eligibility, fairness counts, and the overlap and
 * cooldown checks; never mutated during a run.
 *
 * @category History
 */
export interface HistoryWindow {
  readonly range: DateRange;
  /** Records inside the window, oldest first. */
  readonly records: readonly HistoryRecord[];
  forMember(memberName: string): readonly HistoryRecord[];
  count(memberName: string, shiftType: ShiftType): number;
  lastDate(memberName: string, shiftType: ShiftType): string | undefined;
  /** Index of the member's most recent day-shift record, if any. */
  latestDayIndex(memberName: string): DayIndex | undefined;
}

/**
 * Trailing window of `months` calendar months ending the day before
 * `rotationStart`.
 *
 * @example
 * ```typescript
 * historyWindowFor("2026-03-21", 2);
 * // { start: "2026-01-21", end: "2026-03-20" }
 * ```
 */
export function historyWindowFor(rotationStart: string, months: number): DateRange {
  return {
    start: addMonths(rotationStart, -months),
    end: addDays(rotationStart, -1),
  };
}

function compareRecords(a: HistoryRecord, b: HistoryRecord): number {
  const byDate = compareDays(a.date, b.date);
  if (byDate !== 0) return byDate;
  if (a.shiftType !== b.shiftType) return a.shiftType === "day" ? -1 : 1;
  return a.index - b.index;
}

class HistoryWindowImpl implements HistoryWindow {
  readonly range: DateRange;
  readonly records: readonly HistoryRecord[];
  #byMember = new Map<string, HistoryRecord[]>();

  constructor(range: DateRange, records: readonly HistoryRecord[]) {
    this.range = range;
    this.records = records;
    for (const record of records) {
      const list = this.#byMember.get(record.memberName) ?? [];
      list.push(record);
      this.#byMember.set(record.memberName, list);
    }
  }

  forMember(memberName: string): readonly HistoryRecord[] {
    return this.#byMember.get(memberName) ?? [];
  }

  count(memberName: string, shiftType: ShiftType): number {
    return this.forMember(memberName).filter((r) => r.shiftType === shiftType).length;
  }

  lastDate(memberName: string, shiftType: ShiftType): string | undefined {
    return this.forMember(memberName).findLast((r) => r.shiftType === shiftType)?.date;
  }

  latestDayIndex(memberName: string): DayIndex | undefined {
    const latest = this.forMember(memberName).findLast((r) => r.shiftType === "day");
    return latest?.shiftType === "day" ? latest.index : undefined;
  }
}

/**
 * Builds the history window for a rotation.
 *
 * Records dated outside `range`, and records of people not in
 * `memberNames`, are dropped.
 */
export function buildHistoryWindow(
  records: readonly HistoryRecord[],
  range: DateRange,
  memberNames: ReadonlySet<string>,
): HistoryWindow {
  const kept = records
    .filter((r) => memberNames.has(r.memberName) && isWithinRange(r.date, range))
    .toSorted(compareRecords);
  return new HistoryWindowImpl(range, kept);
}

/**
 * Per-member statistics over a history window.
 *
 * @category History
 */
export interface MemberHistorySummary {
  memberName: string;
  dayCount: number;
  nightCount: number;
  dayIndices: DayIndex[];
  nightIndices: NightIndex[];
  lastDate: string;
}

/**
 * Summarises who worked what in the window, sorted by member name.
 * Members with no records are omitted.
 */
export function summarizeHistory(window: HistoryWindow): MemberHistorySummary[] {
  const names = [...new Set(window.records.map((r) => r.memberName))].toSorted();

  return names.map((memberName) => {
    const records = window.forMember(memberName);
    const dayIndices = new Set<DayIndex>();
    const nightIndices = new Set<NightIndex>();
    let lastDate = "";
    for (const record of records) {
      if (record.shiftType === "day") dayIndices.add(record.index);
      else nightIndices.add(record.index);
      if (record.date > lastDate) lastDate = record.date;
    }
    return {
      memberName,
      dayCount: window.count(memberName, "day"),
      nightCount: window.count(memberName, "night"),
      dayIndices: [...dayIndices].toSorted((a, b) => a - b),
      nightIndices: [...nightIndices].toSorted((a, b) => a - b),
      lastDate,
    };
  });
}
