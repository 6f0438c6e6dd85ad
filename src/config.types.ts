/**
 * Rota configuration types.
 *
 * These types are derived from Zod schemas to ensure they stay in sync.
 * `*Input` types describe what callers may pass (defaults optional); the
 * plain names describe the parsed values the engine works with.
 *
 * @see config.schemas.ts for the schema definitions
 */

import type * as z from "zod";
import type {
  ConstraintSettingsSchema,
  FixedPatternSchema,
  HistoryRecordSchema,
  IndexGroupSchema,
  MemberSchema,
  NgPeriodSchema,
  NgRulesSchema,
  RotaInputSchema,
} from "./config.schemas.js";

/** @category Config */
export type RotaInput = z.input<typeof RotaInputSchema>;

/** @category Config */
export type RotaConfig = z.output<typeof RotaInputSchema>;

export type IndexGroup = z.infer<typeof IndexGroupSchema>;

/** @category Config */
export type MemberInput = z.input<typeof MemberSchema>;

/** @category Config */
export type Member = z.output<typeof MemberSchema>;

/** @category Config */
export type HistoryRecord = z.output<typeof HistoryRecordSchema>;

/** @category Config */
export type NgRulesInput = z.input<typeof NgRulesSchema>;

export type NgRules = z.output<typeof NgRulesSchema>;

export type NgPeriod = z.output<typeof NgPeriodSchema>;

/** @category Config */
export type FixedPatternInput = z.input<typeof FixedPatternSchema>;

export type FixedPattern = z.output<typeof FixedPatternSchema>;

/** @category Config */
export type ConstraintSettingsInput = z.input<typeof ConstraintSettingsSchema>;

export type ConstraintSettings = z.output<typeof ConstraintSettingsSchema>;
