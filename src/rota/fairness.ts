import type { Member } from "../config.types.js";
import type { Assignment, ShiftType } from "../types.js";
import type { HistoryWindow } from "./history.js";

interface ShiftTally {
  count: number;
  lastDate: string | undefined;
}

type MemberTally = Record<ShiftType, ShiftTally>;

/**
 * Read access to running fairness counters.
 *
 * @category Fairness
 */
export interface FairnessReader {
  /** History-seeded count plus assignments committed this run. */
  count(memberName: string, shiftType: ShiftType): number;
  /** Most recent assignment date; for night shifts, the week start. */
  lastAssigned(memberName: string, shiftType: ShiftType): string | undefined;
}

/**
 * Per-member assignment counts and last-assigned dates.
 *
 * Owned by a single build; updated only after a slot's assignment is
 * committed.
 *
 * @category Fairness
 */
export class FairnessState implements FairnessReader {
  #tallies = new Map<string, MemberTally>();

  static fromHistory(members: readonly Member[], history: HistoryWindow): FairnessState {
    const state = new FairnessState();
    for (const member of members) {
      state.#tallies.set(member.name, {
        day: {
          count: history.count(member.name, "day"),
          lastDate: history.lastDate(member.name, "day"),
        },
        night: {
          count: history.count(member.name, "night"),
          lastDate: history.lastDate(member.name, "night"),
        },
      });
    }
    return state;
  }

  count(memberName: string, shiftType: ShiftType): number {
    return this.#tallies.get(memberName)?.[shiftType].count ?? 0;
  }

  lastAssigned(memberName: string, shiftType: ShiftType): string | undefined {
    return this.#tallies.get(memberName)?.[shiftType].lastDate;
  }

  record(assignment: Assignment): void {
    const { memberName, slot } = assignment;
    const tally = this.#tallies.get(memberName) ?? {
      day: { count: 0, lastDate: undefined },
      night: { count: 0, lastDate: undefined },
    };
    const shift = tally[slot.shiftType];
    shift.count++;
    if (shift.lastDate === undefined || slot.date > shift.lastDate) {
      shift.lastDate = slot.date;
    }
    this.#tallies.set(memberName, tally);
  }
}
