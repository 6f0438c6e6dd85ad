import type { DateRange, DayOfWeek } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DAY_OF_WEEK_MAP = {
  sunday: 0, // JavaScript Date week starts on Sunday
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
} as const satisfies Record<DayOfWeek, number>;

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Formats a date as YYYY-MM-DD string (UTC)
 */
export function formatDayString(date: Date): string {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function isWeekend(day: string): boolean {
  const dow = parseDayString(day).getUTCDay();
  return dow === DAY_OF_WEEK_MAP.saturday || dow === DAY_OF_WEEK_MAP.sunday;
}

export function isMonday(day: string): boolean {
  return parseDayString(day).getUTCDay() === DAY_OF_WEEK_MAP.monday;
}

export function addDays(day: string, days: number): string {
  const date = parseDayString(day);
  date.setUTCDate(date.getUTCDate() + days);
  return formatDayString(date);
}

/**
 * Adds calendar months, clamping to the last day of shorter months.
 *
 * @example
 * ```typescript
 * addMonths("2026-03-21", 2); // "2026-05-21"
 * addMonths("2025-12-31", 2); // "2026-02-28"
 * addMonths("2026-03-21", -2); // "2026-01-21"
 * ```
 */
export function addMonths(day: string, months: number): string {
  const date = parseDayString(day);
  const targetMonthIndex = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(targetMonthIndex / 12);
  const month = targetMonthIndex - year * 12;
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const dayOfMonth = Math.min(date.getUTCDate(), lastDayOfMonth);
  return formatDayString(new Date(Date.UTC(year, month, dayOfMonth)));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDayString(to).getTime() - parseDayString(from).getTime()) / MS_PER_DAY);
}

export function compareDays(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isWithinRange(day: string, range: DateRange): boolean {
  return range.start <= day && day <= range.end;
}

/**
 * Generates an array of day strings (YYYY-MM-DD) from a range.
 *
 * @param range - start (inclusive) and end (inclusive)
 *
 * @example
 * ```typescript
 * generateDays({ start: "2026-03-20", end: "2026-03-22" });
 * // ["2026-03-20", "2026-03-21", "2026-03-22"]
 * ```
 */
export function generateDays(range: DateRange): string[] {
  const days: string[] = [];
  for (let day = range.start; day <= range.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}
