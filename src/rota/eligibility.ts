import type { Member } from "../config.types.js";
import type { DayIndex, DutySlot, NightIndex, ShiftType } from "../types.js";
import type { HistoryWindow } from "./history.js";

/**
 * Where a member's day-shift eligibility came from.
 *
 * - `history`: their most recent day shift in the history window
 * - `group`: their configured day index group (no recent day shift)
 * - `none`: neither; they cannot take day shifts this rotation
 */
export type DayEligibilitySource = "history" | "group" | "none";

export interface MemberEligibility {
  day: ReadonlySet<DayIndex>;
  daySource: DayEligibilitySource;
  night: ReadonlySet<NightIndex>;
}

/**
 * Precomputed `member → eligible indices` lookup, built once per run.
 *
 * @category Eligibility
 */
export type EligibilityTable = ReadonlyMap<string, MemberEligibility>;

const DAY_PAIR: ReadonlySet<DayIndex> = new Set<DayIndex>([1, 2]);
const DAY_THIRD: ReadonlySet<DayIndex> = new Set<DayIndex>([3]);
const NO_DAY: ReadonlySet<DayIndex> = new Set<DayIndex>();
const NIGHT_FIRST: ReadonlySet<NightIndex> = new Set<NightIndex>([1]);
const NIGHT_SECOND: ReadonlySet<NightIndex> = new Set<NightIndex>([2]);
const NO_NIGHT: ReadonlySet<NightIndex> = new Set<NightIndex>();

function dayEligibility(
  member: Member,
  history: HistoryWindow,
): Pick<MemberEligibility, "day" | "daySource"> {
  if (!member.shiftTypes.includes("day")) return { day: NO_DAY, daySource: "none" };

  // Recent history outranks the configured group: day positions rotate.
  const latest = history.latestDayIndex(member.name);
  if (latest !== undefined) {
    return { day: latest === 3 ? DAY_THIRD : DAY_PAIR, daySource: "history" };
  }

  if (member.indexGroups.includes("day-index-1-2")) return { day: DAY_PAIR, daySource: "group" };
  if (member.indexGroups.includes("day-index-3")) return { day: DAY_THIRD, daySource: "group" };
  return { day: NO_DAY, daySource: "none" };
}

function nightEligibility(member: Member): ReadonlySet<NightIndex> {
  if (!member.shiftTypes.includes("night")) return NO_NIGHT;
  // Static: night positions are fixed per member, history never moves them.
  if (member.indexGroups.includes("night-index-1")) return NIGHT_FIRST;
  if (member.indexGroups.includes("night-index-2")) return NIGHT_SECOND;
  return NO_NIGHT;
}

/**
 * Derives each member's eligible index positions.
 *
 * Day shift: a member whose latest day shift in the history window was
 * index 1 or 2 may hold only 1 or 2; one whose latest was index 3 may hold
 * only 3; with no recent day shift, the configured day group decides.
 *
 * Night shift: the configured night group alone decides.
 */
export function buildEligibilityTable(
  members: readonly Member[],
  history: HistoryWindow,
): EligibilityTable {
  const table = new Map<string, MemberEligibility>();
  for (const member of members) {
    table.set(member.name, {
      ...dayEligibility(member, history),
      night: nightEligibility(member),
    });
  }
  return table;
}

export function eligibleIndices(
  table: EligibilityTable,
  memberName: string,
  shiftType: ShiftType,
): ReadonlySet<number> {
  const entry = table.get(memberName);
  if (!entry) return NO_DAY;
  return shiftType === "day" ? entry.day : entry.night;
}

export function isEligibleFor(table: EligibilityTable, memberName: string, slot: DutySlot): boolean {
  return eligibleIndices(table, memberName, slot.shiftType).has(slot.index);
}
