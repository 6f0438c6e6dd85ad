import {
  addDays,
  addMonths,
  generateDays,
  isMonday,
  isWeekend,
} from "../datetime.utils.js";
import { InvalidPeriodError } from "../errors.js";
import {
  DAY_INDICES,
  NIGHT_INDICES,
  type DutySlot,
  type NightSlot,
  type RotationPeriod,
} from "../types.js";

/** Number of calendar months a rotation spans when no end is given. */
export const ROTATION_MONTHS = 2;

/**
 * A slot position that was not generated because the company is closed.
 *
 * @category Slots
 */
export type SlotClosure =
  | { type: "closed-day"; date: string }
  | { type: "closed-week"; weekStart: string };

export interface GeneratedSlots {
  slots: DutySlot[];
  closures: SlotClosure[];
}

/**
 * Resolves a rotation period, defaulting the end to the day before the same
 * day-of-month two months later (21st → 20th).
 *
 * @throws InvalidPeriodError when the end precedes the start, or when the
 *   span holds no Monday and so cannot anchor a night-shift week.
 *
 * @example
 * ```typescript
 * resolveRotationPeriod({ start: "2026-03-21" });
 * // { start: "2026-03-21", end: "2026-05-20" }
 * ```
 */
export function resolveRotationPeriod(input: { start: string; end?: string }): RotationPeriod {
  const { start } = input;
  const end = input.end ?? addDays(addMonths(start, ROTATION_MONTHS), -1);

  if (end < start) {
    throw new InvalidPeriodError(`Rotation end ${end} precedes its start ${start}`, start, end);
  }

  const days = generateDays({ start, end });
  if (!days.some(isMonday)) {
    throw new InvalidPeriodError(
      `Rotation ${start}..${end} contains no Monday, so no night-shift week can start in it`,
      start,
      end,
    );
  }

  return { start, end };
}

/**
 * Expands a rotation period into its ordered duty slots.
 *
 * - Every Saturday and Sunday yields day-shift indices 1, 2, 3.
 * - Every Monday yields night-shift indices 1, 2 for the week it starts,
 *   even when that week runs past the period end.
 *
 * Slots come out in strictly increasing date order. `closedDates` remove
 * whole day-shift dates, and a night week whose five weekdays are all
 * closed; both are reported in `closures`.
 *
 * @category Slots
 */
export function generateDutySlots(
  period: RotationPeriod,
  closedDates: ReadonlySet<string> = new Set(),
): GeneratedSlots {
  const slots: DutySlot[] = [];
  const closures: SlotClosure[] = [];

  for (const date of generateDays(period)) {
    if (isWeekend(date)) {
      if (closedDates.has(date)) {
        closures.push({ type: "closed-day", date });
        continue;
      }
      for (const index of DAY_INDICES) {
        slots.push({ shiftType: "day", date, index });
      }
    } else if (isMonday(date)) {
      const weekdays = generateDays({ start: date, end: addDays(date, 4) });
      if (weekdays.every((d) => closedDates.has(d))) {
        closures.push({ type: "closed-week", weekStart: date });
        continue;
      }
      for (const index of NIGHT_INDICES) {
        slots.push(nightSlot(date, index));
      }
    }
  }

  return { slots, closures };
}

export function nightSlot(weekStart: string, index: NightSlot["index"]): NightSlot {
  return {
    shiftType: "night",
    date: weekStart,
    index,
    weekStart,
    weekEnd: addDays(weekStart, 6),
  };
}

/**
 * Stable identifier for a slot, e.g. `day:2026-03-21:3`.
 */
export function slotKey(slot: DutySlot): string {
  return `${slot.shiftType}:${slot.date}:${slot.index}`;
}

/**
 * Human-readable slot label for logs and messages.
 */
export function describeSlot(slot: DutySlot): string {
  if (slot.shiftType === "night") {
    return `night index ${slot.index} for the week ${slot.weekStart}..${slot.weekEnd}`;
  }
  return `day index ${slot.index} on ${slot.date}`;
}
