import { MemberSchema } from "../../src/config.schemas.js";
import type { HistoryRecord, Member, MemberInput, RotaInput } from "../../src/config.types.js";
import type { DaySlot, NightIndex, NightSlot, DayIndex } from "../../src/types.js";
import { FairnessState } from "../../src/rota/fairness.js";
import { buildHistoryWindow, type HistoryWindow } from "../../src/rota/history.js";
import { CommitLedger } from "../../src/rota/ledger.js";
import type { CandidateContext } from "../../src/rota/rules/rules.types.js";
import { nightSlot } from "../../src/rota/slots.js";

export const member = (input: MemberInput): Member => MemberSchema.parse(input);

export const daySlot = (date: string, index: DayIndex): DaySlot => ({
  shiftType: "day",
  date,
  index,
});

export const night = (weekStart: string, index: NightIndex): NightSlot => nightSlot(weekStart, index);

export const dayRecord = (memberName: string, date: string, index: DayIndex): HistoryRecord => ({
  date,
  shiftType: "day",
  index,
  memberName,
});

export const nightRecord = (
  memberName: string,
  weekStart: string,
  index: NightIndex,
): HistoryRecord => ({
  date: weekStart,
  shiftType: "night",
  index,
  memberName,
});

/** History window over Jan 21 .. Mar 20, 2026, for the given members. */
export function windowOf(records: HistoryRecord[], members: readonly Member[]): HistoryWindow {
  return buildHistoryWindow(
    records,
    { start: "2026-01-21", end: "2026-03-20" },
    new Set(members.map((m) => m.name)),
  );
}

/**
 * Rule context seeded from history only, for evaluating one member against
 * one slot.
 */
export function contextFor(
  subject: Member,
  slot: CandidateContext["slot"],
  records: HistoryRecord[] = [],
): CandidateContext {
  const history = windowOf(records, [subject]);
  return {
    member: subject,
    slot,
    fairness: FairnessState.fromHistory([subject], history),
    ledger: CommitLedger.fromHistory(history),
  };
}

// ============================================================================
// Two-month department roster
// ============================================================================

const dayPair = ["aoki", "baba", "chiba", "doi", "endo", "fujii", "goto", "hara", "ito"];
const dayThird = ["kato", "kondo", "maeda", "mori", "noda"];

/**
 * 22 members: nine day-index-1-2, five day-index-3, four per night index.
 * Two night-index-1 members and one night-index-2 member also work days.
 * `wada` is the fixed-pattern member.
 */
export const departmentMembers: MemberInput[] = [
  ...dayPair.map((name): MemberInput => ({ name, shiftTypes: ["day"], indexGroups: ["day-index-1-2"] })),
  ...dayThird.map((name): MemberInput => ({ name, shiftTypes: ["day"], indexGroups: ["day-index-3"] })),
  { name: "ogawa", shiftTypes: ["day", "night"], indexGroups: ["day-index-1-2", "night-index-1"] },
  { name: "ono", shiftTypes: ["day", "night"], indexGroups: ["day-index-1-2", "night-index-1"] },
  { name: "saito", shiftTypes: ["night"], indexGroups: ["night-index-1"] },
  { name: "sato", shiftTypes: ["night"], indexGroups: ["night-index-1"] },
  { name: "sugiyama", shiftTypes: ["day", "night"], indexGroups: ["day-index-3", "night-index-2"] },
  { name: "takeda", shiftTypes: ["night"], indexGroups: ["night-index-2"] },
  { name: "ueda", shiftTypes: ["night"], indexGroups: ["night-index-2"] },
  {
    name: "wada",
    shiftTypes: ["night"],
    indexGroups: ["night-index-2"],
    minIntervalOverrides: { night: 14 },
  },
];

/**
 * Rotation 2026-03-21 .. 2026-05-20 with recent history, member and
 * period NG dates, one global NG Sunday, and `wada` on a biweekly
 * night-index-2 cadence anchored at 2026-03-09.
 */
export function departmentInput(): RotaInput {
  return {
    period: { start: "2026-03-21" },
    members: departmentMembers,
    history: [
      dayRecord("aoki", "2026-03-14", 3),
      dayRecord("kato", "2026-03-15", 1),
      nightRecord("wada", "2026-03-09", 2),
      nightRecord("ogawa", "2026-03-16", 1),
      nightRecord("takeda", "2026-03-16", 2),
      nightRecord("saito", "2026-03-09", 1),
      dayRecord("baba", "2026-03-15", 2),
      // Outside the two-month window.
      dayRecord("doi", "2026-01-10", 1),
      // No longer on the roster.
      dayRecord("retired", "2026-03-07", 1),
    ],
    ngRules: {
      byMember: { chiba: ["2026-03-21", { start: "2026-04-04", end: "2026-04-12" }] },
      global: ["2026-05-03"],
      byPeriod: { ueda: [{ start: "2026-04-27", end: "2026-05-03", reason: "training" }] },
    },
    fixedPattern: { memberName: "wada", referenceDate: "2026-03-09" },
  };
}
