/**
 * Duty rota engine for weekend day shifts and weekly night shifts.
 *
 * Give it a roster, the recent assignment history, and unavailability, and
 * it fills every slot of a rotation period in one deterministic greedy pass.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Slots**: Each Saturday and Sunday has three day slots (index 1, 2, 3).
 * Each week starting on a Monday has two night slots (index 1, 2) covering
 * Monday through Sunday. A rotation period defaults to two months.
 *
 * **Index groups**: Members belong to at most one day group
 * (`day-index-1-2` or `day-index-3`) and at most one night group
 * (`night-index-1` or `night-index-2`). For day shifts the most recent day
 * assignment in the history window overrides the static group.
 *
 * **Rules**: Candidates are filtered by composable rules: exclusions
 * (inactive, NG dates, overlap with own duties, night-to-day cooldown),
 * index eligibility, the fixed-pattern reservation, and the minimum
 * interval between same-type shifts. Every elimination carries a message,
 * so a slot nobody can take reports exactly why.
 *
 * **Fairness**: Among eligible candidates the member with the fewest
 * same-type assignments wins; ties go to whoever has waited longest, then
 * to name order.
 *
 * **Fixed pattern**: One member can be pinned to a night index on a fixed
 * biweekly cadence. Their pinned weeks bypass fairness; if an exclusion
 * blocks them the slot falls back to normal selection with a note.
 *
 * @example Build a rota
 * ```typescript
 * import { buildSchedule, analyzeSchedule } from "duty-rota";
 *
 * const result = buildSchedule({
 *   period: { start: "2026-03-21" },
 *   members: [
 *     { name: "abe", shiftTypes: ["day"], indexGroups: ["day-index-1-2"] },
 *     { name: "bea", shiftTypes: ["day", "night"], indexGroups: ["day-index-3", "night-index-1"] },
 *     // ...
 *   ],
 *   ngRules: { byMember: { abe: ["2026-03-28"] } },
 * });
 *
 * if (result.status === "complete") {
 *   const report = analyzeSchedule(result.assignments);
 * } else if (result.status === "failed") {
 *   console.error(result.error.message);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Domain primitives
// ============================================================================

export type {
  DayOfWeek,
  DateRange,
  RotationPeriod,
  ShiftType,
  DayIndex,
  NightIndex,
  DaySlot,
  NightSlot,
  DutySlot,
  Assignment,
} from "./types.js";

export { DAY_INDICES, NIGHT_INDICES } from "./types.js";

export { addDays, addMonths, daysBetween, isWithinRange } from "./datetime.utils.js";

// ============================================================================
// Errors
// ============================================================================

export { InvalidPeriodError, ConfigInconsistencyError, NoCandidateError } from "./errors.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  RotaInputSchema,
  MemberSchema,
  HistoryRecordSchema,
  NgRulesSchema,
  FixedPatternSchema,
  ConstraintSettingsSchema,
  IndexGroupSchema,
} from "./config.schemas.js";

export type {
  RotaInput,
  RotaConfig,
  IndexGroup,
  MemberInput,
  Member,
  HistoryRecord,
  NgRulesInput,
  NgRules,
  NgPeriod,
  FixedPatternInput,
  FixedPattern,
  ConstraintSettingsInput,
  ConstraintSettings,
} from "./config.types.js";

// ============================================================================
// Logging
// ============================================================================

export type { Logger } from "./logger.js";

export { silentLogger } from "./logger.js";

// ============================================================================
// Slots and history
// ============================================================================

export {
  ROTATION_MONTHS,
  resolveRotationPeriod,
  generateDutySlots,
  describeSlot,
  slotKey,
} from "./rota/slots.js";

export type { SlotClosure, GeneratedSlots } from "./rota/slots.js";

export { historyWindowFor, buildHistoryWindow, summarizeHistory } from "./rota/history.js";

export type { HistoryWindow, MemberHistorySummary } from "./rota/history.js";

export { buildEligibilityTable, eligibleIndices, isEligibleFor } from "./rota/eligibility.js";

export type {
  DayEligibilitySource,
  MemberEligibility,
  EligibilityTable,
} from "./rota/eligibility.js";

// ============================================================================
// Rules
// ============================================================================

export * from "./rota/rules/index.js";

export { isFixedPatternWeek, fixedAssignment } from "./rota/fixed-pattern.js";

// ============================================================================
// Selection
// ============================================================================

export { FairnessState } from "./rota/fairness.js";

export type { FairnessReader } from "./rota/fairness.js";

export { CommitLedger } from "./rota/ledger.js";

export type { LedgerReader, NightWeek } from "./rota/ledger.js";

export { priorityKey, comparePriority, fairnessSelection } from "./rota/scorer.js";

export type { PriorityKey, SelectionStrategy } from "./rota/scorer.js";

// ============================================================================
// Builder
// ============================================================================

export { ScheduleBuilder, buildSchedule, unwrapSchedule } from "./rota/schedule-builder.js";

export type {
  ScheduleNote,
  ScheduleResult,
  CompleteSchedule,
  FailedSchedule,
  AbortedSchedule,
  ScheduleBuilderOptions,
  BuildOptions,
} from "./rota/schedule-builder.js";

// ============================================================================
// Analysis
// ============================================================================

export { analyzeSchedule, CLOSE_INTERVAL_DAYS } from "./rota/analyzer.js";

export type {
  ScheduleAnalysis,
  OverlapFinding,
  CloseIntervalFinding,
  MemberCount,
  AnalyzeOptions,
} from "./rota/analyzer.js";
