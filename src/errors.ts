import type { DutySlot } from "./types.js";
import type { Elimination } from "./rota/rules/rules.types.js";

/**
 * Thrown when a rotation period's bounds are malformed or cannot carry the
 * weekly night-shift cadence.
 *
 * Raised before any slot is generated; no partial work exists.
 *
 * @category Errors
 */
export class InvalidPeriodError extends Error {
  public readonly start: string;
  public readonly end: string;

  constructor(message: string, start: string, end: string) {
    super(message);
    this.name = "InvalidPeriodError";
    this.start = start;
    this.end = end;
  }
}

/**
 * Thrown when the configuration references something the roster does not
 * contain (an NG rule or fixed pattern naming an unknown member, a duplicate
 * member name, ...).
 *
 * All issues found are collected in `issues`, not only the first.
 *
 * @category Errors
 */
export class ConfigInconsistencyError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Inconsistent rota configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigInconsistencyError";
    this.issues = issues;
  }
}

/**
 * A slot for which every member was eliminated.
 *
 * Carries, for every member of the roster, each rule that eliminated them.
 * The run stops at this slot; assignments committed before it are returned
 * alongside the error in a failed {@link ScheduleResult}.
 *
 * @category Errors
 */
export class NoCandidateError extends Error {
  public readonly slot: DutySlot;
  public readonly eliminationReasons: Readonly<Record<string, readonly Elimination[]>>;

  constructor(slot: DutySlot, eliminationReasons: Record<string, readonly Elimination[]>) {
    super(formatNoCandidateMessage(slot, eliminationReasons));
    this.name = "NoCandidateError";
    this.slot = slot;
    this.eliminationReasons = eliminationReasons;
  }
}

function formatNoCandidateMessage(
  slot: DutySlot,
  eliminationReasons: Record<string, readonly Elimination[]>,
): string {
  const lines = [`No candidate for ${slot.shiftType} shift index ${slot.index} on ${slot.date}`];
  for (const [memberName, reasons] of Object.entries(eliminationReasons)) {
    lines.push(`  ${memberName}: ${reasons.map((r) => r.message).join("; ")}`);
  }
  return lines.join("\n");
}
