import { daysBetween } from "../datetime.utils.js";
import type { DutySlot } from "../types.js";
import type { FairnessReader } from "./fairness.js";

/**
 * Ordering key for one candidate at one slot. Lower sorts first.
 *
 * @category Selection
 */
export interface PriorityKey {
  memberName: string;
  /** Assignments of the slot's shift type so far, history included. */
  count: number;
  /** Days since the last assignment of that shift type; `null` if never. */
  daysSinceLast: number | null;
}

export function priorityKey(
  memberName: string,
  slot: DutySlot,
  fairness: FairnessReader,
): PriorityKey {
  const last = fairness.lastAssigned(memberName, slot.shiftType);
  return {
    memberName,
    count: fairness.count(memberName, slot.shiftType),
    daysSinceLast: last === undefined ? null : daysBetween(last, slot.date),
  };
}

/**
 * Fairness ordering:
 * 1. fewer assignments of the shift type first
 * 2. longer gap since the last one first (never assigned beats any gap)
 * 3. member name, by UTF-16 code unit
 */
export function comparePriority(a: PriorityKey, b: PriorityKey): number {
  if (a.count !== b.count) return a.count - b.count;

  const gapA = a.daysSinceLast ?? Number.POSITIVE_INFINITY;
  const gapB = b.daysSinceLast ?? Number.POSITIVE_INFINITY;
  if (gapA !== gapB) return gapA > gapB ? -1 : 1;

  if (a.memberName < b.memberName) return -1;
  if (a.memberName > b.memberName) return 1;
  return 0;
}

/**
 * Picks one member from a non-empty candidate pool.
 *
 * The builder's sequencing does not depend on the strategy, so an
 * alternative (for instance an exhaustive search over a window of slots)
 * can be swapped in without touching it.
 *
 * @category Selection
 */
export interface SelectionStrategy {
  readonly name: string;
  select(slot: DutySlot, candidates: readonly [PriorityKey, ...PriorityKey[]]): string;
}

/** Minimum by {@link comparePriority}. */
export const fairnessSelection: SelectionStrategy = {
  name: "fairness",
  select(_slot, candidates) {
    return candidates.reduce((best, c) => (comparePriority(c, best) < 0 ? c : best)).memberName;
  },
};
