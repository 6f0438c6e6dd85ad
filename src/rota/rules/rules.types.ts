import type { Member } from "../../config.types.js";
import type { DutySlot } from "../../types.js";
import type { FairnessReader } from "../fairness.js";
import type { LedgerReader } from "../ledger.js";

/**
 * Which stage of candidate filtering a rule belongs to.
 *
 * - `exclusion`: hard availability (inactive, NG dates, overlap, cooldown).
 *   Applied to fixed-pattern picks as well as to the normal pool.
 * - `eligibility`: index positions a member may hold.
 * - `interval`: minimum spacing between assignments of one shift type.
 */
export type CandidateRuleKind = "exclusion" | "eligibility" | "interval";

export type CandidateRuleName =
  | "inactive"
  | "ng-date"
  | "same-day-overlap"
  | "night-cooldown"
  | "index-eligibility"
  | "fixed-pattern-reserved"
  | "min-interval";

/**
 * Why one member cannot take one slot.
 *
 * @category Rules
 */
export interface Elimination {
  readonly rule: CandidateRuleName;
  readonly message: string;
}

/**
 * Everything a rule may look at. Only committed state is visible; no rule
 * sees slots later than the one being evaluated.
 */
export interface CandidateContext {
  readonly member: Member;
  readonly slot: DutySlot;
  readonly fairness: FairnessReader;
  readonly ledger: LedgerReader;
}

/**
 * A hard filter on the candidate pool.
 *
 * `check` returns a message when the member is eliminated, `undefined`
 * otherwise. Rules are pure: they never mutate the context.
 *
 * @category Rules
 */
export interface CandidateRule {
  readonly name: CandidateRuleName;
  readonly kind: CandidateRuleKind;
  check(context: CandidateContext): string | undefined;
}
