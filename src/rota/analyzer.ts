import { daysBetween, isWithinRange } from "../datetime.utils.js";
import type { Assignment, ShiftType } from "../types.js";
import type { HistoryWindow } from "./history.js";

/** Default threshold for {@link analyzeSchedule}'s close-interval check. */
export const CLOSE_INTERVAL_DAYS = 7;

/**
 * A member holding a day shift inside one of their own night weeks.
 */
export interface OverlapFinding {
  memberName: string;
  date: string;
  nightWeekStart: string;
  message: string;
}

/**
 * Two consecutive assignments of one member, of any shift types, with the
 * second starting within the threshold after the first ends.
 */
export interface CloseIntervalFinding {
  memberName: string;
  gapDays: number;
  from: { shiftType: ShiftType; start: string; end: string };
  to: { shiftType: ShiftType; start: string; end: string };
  message: string;
}

export interface MemberCount {
  memberName: string;
  pastDay: number;
  pastNight: number;
  newDay: number;
  newNight: number;
  totalDay: number;
  totalNight: number;
}

/**
 * @category Analysis
 */
export interface ScheduleAnalysis {
  overlaps: OverlapFinding[];
  closeIntervals: CloseIntervalFinding[];
  /** Sorted by member name; members with no assignments at all are omitted. */
  memberCounts: MemberCount[];
}

export interface AnalyzeOptions {
  /** Supplies past counts. */
  history?: HistoryWindow;
  closeIntervalDays?: number;
}

interface Span {
  shiftType: ShiftType;
  start: string;
  end: string;
}

function spanOf(assignment: Assignment): Span {
  const { slot } = assignment;
  if (slot.shiftType === "night") {
    return { shiftType: "night", start: slot.weekStart, end: slot.weekEnd };
  }
  return { shiftType: "day", start: slot.date, end: slot.date };
}

function groupByMember(assignments: readonly Assignment[]): Map<string, Assignment[]> {
  const byMember = new Map<string, Assignment[]>();
  for (const a of assignments) {
    const list = byMember.get(a.memberName) ?? [];
    list.push(a);
    byMember.set(a.memberName, list);
  }
  return byMember;
}

function findOverlaps(byMember: Map<string, Assignment[]>): OverlapFinding[] {
  const findings: OverlapFinding[] = [];
  for (const [memberName, list] of byMember) {
    const nights = list.map(spanOf).filter((s) => s.shiftType === "night");
    const days = list.map(spanOf).filter((s) => s.shiftType === "day");
    for (const night of nights) {
      for (const day of days) {
        if (!isWithinRange(day.start, night)) continue;
        findings.push({
          memberName,
          date: day.start,
          nightWeekStart: night.start,
          message: `${memberName} has a day shift on ${day.start} during night week ${night.start}..${night.end}`,
        });
      }
    }
  }
  return findings;
}

function findCloseIntervals(
  byMember: Map<string, Assignment[]>,
  threshold: number,
): CloseIntervalFinding[] {
  const findings: CloseIntervalFinding[] = [];
  for (const [memberName, list] of byMember) {
    const spans = list.map(spanOf).toSorted((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
    for (let i = 0; i + 1 < spans.length; i++) {
      const from = spans[i];
      const to = spans[i + 1];
      if (!from || !to) continue;

      const gapDays = daysBetween(from.end, to.start);
      if (gapDays > 0 && gapDays <= threshold) {
        findings.push({
          memberName,
          gapDays,
          from,
          to,
          message: `${memberName}: ${from.shiftType} ${from.start} → ${to.shiftType} ${to.start} (${gapDays} ${gapDays === 1 ? "day" : "days"})`,
        });
      }
    }
  }
  return findings;
}

function countMembers(
  byMember: Map<string, Assignment[]>,
  history: HistoryWindow | undefined,
): MemberCount[] {
  const names = new Set<string>(byMember.keys());
  for (const record of history?.records ?? []) names.add(record.memberName);

  const counts: MemberCount[] = [];
  for (const memberName of [...names].toSorted()) {
    const list = byMember.get(memberName) ?? [];
    const pastDay = history?.count(memberName, "day") ?? 0;
    const pastNight = history?.count(memberName, "night") ?? 0;
    const newDay = list.filter((a) => a.slot.shiftType === "day").length;
    const newNight = list.length - newDay;
    if (pastDay + newDay + pastNight + newNight === 0) continue;
    counts.push({
      memberName,
      pastDay,
      pastNight,
      newDay,
      newNight,
      totalDay: pastDay + newDay,
      totalNight: pastNight + newNight,
    });
  }
  return counts;
}

/**
 * Post-run report over a set of assignments: day/night overlaps, close
 * intervals between consecutive duties, and per-member counts.
 *
 * Pure; does not modify its input. Works on partial results too.
 *
 * @example
 * ```typescript
 * const result = builder.build();
 * const report = analyzeSchedule(result.assignments, { history: builder.history });
 * for (const finding of report.closeIntervals) console.log(finding.message);
 * ```
 */
export function analyzeSchedule(
  assignments: readonly Assignment[],
  options: AnalyzeOptions = {},
): ScheduleAnalysis {
  const byMember = groupByMember(assignments);
  return {
    overlaps: findOverlaps(byMember),
    closeIntervals: findCloseIntervals(byMember, options.closeIntervalDays ?? CLOSE_INTERVAL_DAYS),
    memberCounts: countMembers(byMember, options.history),
  };
}

