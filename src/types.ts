/**
 * Core rota types shared by the engine and its callers.
 *
 * All dates are calendar days in `YYYY-MM-DD` form. They carry no time of
 * day and no timezone; arithmetic on them is done in UTC.
 *
 * @packageDocumentation
 */

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Day of the week identifier.
 */
export type DayOfWeek =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Inclusive range of calendar days.
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * The window over which a rota is generated (both ends inclusive).
 *
 * Conventionally runs from the 21st of one month through the 20th two
 * months later.
 */
export type RotationPeriod = DateRange;

// ============================================================================
// Shifts and slots
// ============================================================================

export type ShiftType = "day" | "night";

/** Day-shift positions: 1 and 2 are interchangeable, 3 is a distinct role. */
export type DayIndex = 1 | 2 | 3;

/** Night-shift positions. Each member belongs to exactly one. */
export type NightIndex = 1 | 2;

export const DAY_INDICES = [1, 2, 3] as const satisfies readonly DayIndex[];
export const NIGHT_INDICES = [1, 2] as const satisfies readonly NightIndex[];

/**
 * A weekend day-shift position on a single Saturday or Sunday.
 */
export interface DaySlot {
  shiftType: "day";
  date: string;
  index: DayIndex;
}

/**
 * A night-shift position covering a Monday-to-Sunday week.
 *
 * `date` is always the week start; `weekEnd` is six days later.
 */
export interface NightSlot {
  shiftType: "night";
  date: string;
  index: NightIndex;
  weekStart: string;
  weekEnd: string;
}

/**
 * A single fillable position in the rota.
 *
 * @example
 * ```typescript
 * const saturday: DutySlot = { shiftType: "day", date: "2026-03-21", index: 3 };
 * const week: DutySlot = {
 *   shiftType: "night",
 *   date: "2026-03-23",
 *   index: 1,
 *   weekStart: "2026-03-23",
 *   weekEnd: "2026-03-29",
 * };
 * ```
 */
export type DutySlot = DaySlot | NightSlot;

/**
 * A slot bound to a member. Once committed it is never revised.
 */
export interface Assignment {
  slot: DutySlot;
  memberName: string;
  /** True when the fixed-pattern override placed this member. */
  forced: boolean;
}
