import { RotaInputSchema } from "../config.schemas.js";
import type { IndexGroup, Member, RotaConfig, RotaInput } from "../config.types.js";
import { ConfigInconsistencyError, NoCandidateError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Assignment, DutySlot, NightSlot, RotationPeriod } from "../types.js";
import { buildEligibilityTable, type EligibilityTable } from "./eligibility.js";
import { FairnessState } from "./fairness.js";
import { fixedAssignment } from "./fixed-pattern.js";
import { buildHistoryWindow, historyWindowFor, type HistoryWindow } from "./history.js";
import { CommitLedger } from "./ledger.js";
import { buildNgCalendar } from "./rules/ng-date.js";
import { createBuiltInRules } from "./rules/registry.js";
import { evaluateCandidate } from "./rules/resolver.js";
import type { CandidateRule, Elimination } from "./rules/rules.types.js";
import { fairnessSelection, priorityKey, type PriorityKey, type SelectionStrategy } from "./scorer.js";
import {
  describeSlot,
  generateDutySlots,
  resolveRotationPeriod,
  type SlotClosure,
} from "./slots.js";

// ============================================================================
// Result types
// ============================================================================

/**
 * Something the caller should know about that did not stop the run.
 *
 * @category Builder
 */
export type ScheduleNote =
  | { type: "closed-day"; date: string; message: string }
  | { type: "closed-week"; weekStart: string; message: string }
  | {
      type: "fixed-pattern-fallback";
      slot: NightSlot;
      memberName: string;
      reasons: readonly Elimination[];
      message: string;
    };

interface ScheduleResultBase {
  period: RotationPeriod;
  /** Committed assignments in slot order. */
  assignments: readonly Assignment[];
  notes: readonly ScheduleNote[];
}

/** Every slot was filled. */
export interface CompleteSchedule extends ScheduleResultBase {
  status: "complete";
}

/** A slot had no candidate; `assignments` holds everything before it. */
export interface FailedSchedule extends ScheduleResultBase {
  status: "failed";
  error: NoCandidateError;
}

/** The caller aborted between slots; `nextSlot` was not processed. */
export interface AbortedSchedule extends ScheduleResultBase {
  status: "aborted";
  nextSlot: DutySlot;
}

/**
 * Outcome of one build.
 *
 * @category Builder
 */
export type ScheduleResult = CompleteSchedule | FailedSchedule | AbortedSchedule;

export interface ScheduleBuilderOptions {
  logger?: Logger;
  /** Defaults to {@link fairnessSelection}. */
  strategy?: SelectionStrategy;
}

export interface BuildOptions {
  /** Checked before each slot; never interrupts a slot mid-selection. */
  signal?: AbortSignal;
}

interface SlotEvaluation {
  pool: PriorityKey[];
  eliminationReasons: Record<string, readonly Elimination[]>;
}

// ============================================================================
// Configuration checks
// ============================================================================

function findInconsistencies(config: RotaConfig): string[] {
  const issues: string[] = [];
  const names = new Set<string>();

  for (const member of config.members) {
    if (names.has(member.name)) issues.push(`Member "${member.name}" is listed more than once`);
    names.add(member.name);
  }

  for (const name of Object.keys(config.ngRules.byMember)) {
    if (!names.has(name)) issues.push(`NG dates reference unknown member "${name}"`);
  }
  for (const name of Object.keys(config.ngRules.byPeriod)) {
    if (!names.has(name)) issues.push(`NG periods reference unknown member "${name}"`);
  }

  const pattern = config.fixedPattern;
  if (pattern) {
    const member = config.members.find((m) => m.name === pattern.memberName);
    const targetGroup: IndexGroup = pattern.targetIndex === 1 ? "night-index-1" : "night-index-2";
    if (!member) {
      issues.push(`Fixed pattern references unknown member "${pattern.memberName}"`);
    } else {
      if (!member.shiftTypes.includes("night")) {
        issues.push(`Fixed pattern member "${pattern.memberName}" does not work night shifts`);
      }
      if (!member.indexGroups.includes(targetGroup)) {
        issues.push(
          `Fixed pattern member "${pattern.memberName}" is not in night index group ${pattern.targetIndex}`,
        );
      }
    }
  }

  return issues;
}

function closureNote(closure: SlotClosure): ScheduleNote {
  if (closure.type === "closed-day") {
    return {
      ...closure,
      message: `No day shifts on ${closure.date}: global NG date`,
    };
  }
  return {
    ...closure,
    message: `No night shifts for the week of ${closure.weekStart}: every weekday is a global NG date`,
  };
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Greedy single-pass rota engine.
 *
 * Construction validates the configuration and precomputes everything that
 * does not change during a run: the period, its slots, the history window,
 * the eligibility table, and the rule set. {@link ScheduleBuilder.build}
 * then walks the slots in date order. For each slot it:
 *
 * 1. commits the fixed-pattern member if the pattern forces one and no
 *    exclusion rule blocks them (otherwise records a note and continues);
 * 2. evaluates every rule for every member to form the candidate pool;
 * 3. stops with a {@link NoCandidateError} if the pool is empty;
 * 4. otherwise selects by the strategy and commits.
 *
 * Each `build()` starts from fresh fairness state, so one builder can be
 * run repeatedly and always yields the same result for the same input.
 *
 * @category Builder
 *
 * @example
 * ```typescript
 * const builder = new ScheduleBuilder({
 *   period: { start: "2026-03-21" },
 *   members: [
 *     { name: "abe", shiftTypes: ["day"], indexGroups: ["day-index-1-2"] },
 *     // ...
 *   ],
 * });
 * const result = builder.build();
 * if (result.status === "failed") {
 *   console.error(result.error.eliminationReasons);
 * }
 * ```
 */
export class ScheduleBuilder {
  readonly config: RotaConfig;
  readonly period: RotationPeriod;
  readonly slots: readonly DutySlot[];
  readonly closures: readonly SlotClosure[];
  readonly history: HistoryWindow;
  readonly eligibility: EligibilityTable;
  readonly rules: readonly CandidateRule[];

  #members: ReadonlyMap<string, Member>;
  #logger: Logger;
  #strategy: SelectionStrategy;

  constructor(input: RotaInput, options: ScheduleBuilderOptions = {}) {
    this.#logger = options.logger ?? silentLogger;
    this.#strategy = options.strategy ?? fairnessSelection;

    this.config = RotaInputSchema.parse(input);
    const issues = findInconsistencies(this.config);
    if (issues.length > 0) throw new ConfigInconsistencyError(issues);

    this.period = resolveRotationPeriod(this.config.period);
    this.#members = new Map(this.config.members.map((m) => [m.name, m]));

    const ngCalendar = buildNgCalendar(this.config.ngRules);
    const generated = generateDutySlots(this.period, ngCalendar.globalDates);
    this.slots = generated.slots;
    this.closures = generated.closures;

    this.history = buildHistoryWindow(
      this.config.history,
      historyWindowFor(this.period.start, this.config.constraints.historyMonths),
      new Set(this.#members.keys()),
    );
    this.eligibility = buildEligibilityTable(this.config.members, this.history);

    this.rules = createBuiltInRules({
      ngCalendar,
      eligibility: this.eligibility,
      constraints: this.config.constraints,
      fixedPattern: this.config.fixedPattern,
    });

    this.#logger.info("Rota builder initialised", {
      period: this.period,
      slots: this.slots.length,
      historyRecords: this.history.records.length,
      groups: this.#groupSizes(),
    });
  }

  build(options: BuildOptions = {}): ScheduleResult {
    const fairness = FairnessState.fromHistory(this.config.members, this.history);
    const ledger = CommitLedger.fromHistory(this.history);
    const notes: ScheduleNote[] = this.closures.map(closureNote);
    for (const note of notes) this.#logger.info(note.message);

    const commit = (slot: DutySlot, memberName: string, forced: boolean) => {
      const assignment: Assignment = { slot, memberName, forced };
      ledger.commit(assignment);
      fairness.record(assignment);
      this.#logger.debug(`${describeSlot(slot)} → ${memberName}`, { forced });
    };

    const snapshot = () => ({
      period: this.period,
      assignments: [...ledger.committed],
      notes: [...notes],
    });

    for (const slot of this.slots) {
      if (options.signal?.aborted) {
        this.#logger.warn(`Build aborted before ${describeSlot(slot)}`);
        return { status: "aborted", ...snapshot(), nextSlot: slot };
      }

      const forced = this.#forcedMember(slot, fairness, ledger, notes);
      if (forced !== undefined) {
        commit(slot, forced, true);
        continue;
      }

      const { pool, eliminationReasons } = this.#evaluateSlot(slot, fairness, ledger);
      const [first, ...rest] = pool;
      if (!first) {
        const error = new NoCandidateError(slot, eliminationReasons);
        this.#logger.error(error.message);
        return { status: "failed", ...snapshot(), error };
      }

      const chosen = this.#strategy.select(slot, [first, ...rest]);
      if (!pool.some((c) => c.memberName === chosen)) {
        throw new Error(
          `Selection strategy "${this.#strategy.name}" chose "${chosen}", who is not a candidate for ${describeSlot(slot)}`,
        );
      }
      commit(slot, chosen, false);
    }

    return { status: "complete", ...snapshot() };
  }

  /**
   * The fixed-pattern member for `slot` if the pattern forces one and the
   * exclusion and interval rules allow it. Records a fallback note when
   * they do not.
   */
  #forcedMember(
    slot: DutySlot,
    fairness: FairnessState,
    ledger: CommitLedger,
    notes: ScheduleNote[],
  ): string | undefined {
    if (slot.shiftType !== "night") return undefined;
    const memberName = fixedAssignment(slot, this.config.fixedPattern);
    if (memberName === undefined) return undefined;

    const member = this.#members.get(memberName);
    if (!member) return undefined;

    const reasons = evaluateCandidate(this.rules, { member, slot, fairness, ledger }, [
      "exclusion",
      "interval",
    ]);
    if (reasons.length === 0) return memberName;

    const message = `Fixed-pattern member ${memberName} cannot take ${describeSlot(slot)}: ${reasons
      .map((r) => r.message)
      .join("; ")}. Falling back to normal selection.`;
    this.#logger.warn(message);
    notes.push({ type: "fixed-pattern-fallback", slot, memberName, reasons, message });
    return undefined;
  }

  #evaluateSlot(slot: DutySlot, fairness: FairnessState, ledger: CommitLedger): SlotEvaluation {
    const pool: PriorityKey[] = [];
    const eliminationReasons: Record<string, readonly Elimination[]> = {};

    for (const member of this.config.members) {
      const eliminations = evaluateCandidate(this.rules, { member, slot, fairness, ledger });
      if (eliminations.length === 0) {
        pool.push(priorityKey(member.name, slot, fairness));
      } else {
        eliminationReasons[member.name] = eliminations;
      }
    }

    return { pool, eliminationReasons };
  }

  #groupSizes(): Record<string, number> {
    const sizes: Record<string, number> = {};
    for (const member of this.config.members) {
      if (!member.active) continue;
      for (const group of member.indexGroups) {
        sizes[group] = (sizes[group] ?? 0) + 1;
      }
    }
    return sizes;
  }
}

/**
 * Builds a rota in one call.
 *
 * @throws ZodError for malformed input
 * @throws ConfigInconsistencyError for unknown member references
 * @throws InvalidPeriodError for unusable period bounds
 */
export function buildSchedule(
  input: RotaInput,
  options: ScheduleBuilderOptions & BuildOptions = {},
): ScheduleResult {
  return new ScheduleBuilder(input, options).build(options);
}

/**
 * Returns the assignments of a complete result; throws the carried
 * {@link NoCandidateError} for a failed one.
 */
export function unwrapSchedule(result: ScheduleResult): readonly Assignment[] {
  switch (result.status) {
    case "complete":
      return result.assignments;
    case "failed":
      throw result.error;
    case "aborted":
      throw new Error(`Schedule build was aborted before ${describeSlot(result.nextSlot)}`);
  }
}
