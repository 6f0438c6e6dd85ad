/**
 * Zod schemas for rota configuration.
 *
 * The engine accepts one immutable configuration value per run. These
 * schemas define that contract; TypeScript types are derived from them in
 * `config.types.ts` so the two never drift apart.
 *
 * @see config.types.ts for the derived TypeScript types
 */

import * as z from "zod";
import { isMonday } from "./datetime.utils.js";

// --------------------------------------------------------------------------
// Primitives
// --------------------------------------------------------------------------

export const ShiftTypeSchema = z.enum(["day", "night"]);

export const IndexGroupSchema = z.enum([
  "day-index-1-2",
  "day-index-3",
  "night-index-1",
  "night-index-2",
]);

export const DateRangeSchema = z
  .object({
    start: z.iso.date(),
    end: z.iso.date(),
  })
  .refine((range) => range.start <= range.end, {
    message: "Range start must not be after its end",
  });

// --------------------------------------------------------------------------
// Rotation period
// --------------------------------------------------------------------------

/**
 * `end` may be omitted; it then defaults to the day before `start` plus
 * two calendar months (21st through the 20th).
 */
export const RotationPeriodInputSchema = z.object({
  start: z.iso.date(),
  end: z.iso.date().optional(),
});

// --------------------------------------------------------------------------
// Members
// --------------------------------------------------------------------------

export const MinIntervalOverridesSchema = z.object({
  day: z.number().int().min(0).optional(),
  night: z.number().int().min(0).optional(),
});

export const MemberSchema = z
  .object({
    name: z.string().trim().min(1),
    active: z.boolean().default(true),
    shiftTypes: z.array(ShiftTypeSchema).nonempty(),
    indexGroups: z.array(IndexGroupSchema).default([]),
    minIntervalOverrides: MinIntervalOverridesSchema.default({}),
  })
  .superRefine((member, ctx) => {
    if (new Set(member.shiftTypes).size !== member.shiftTypes.length) {
      ctx.addIssue({
        code: "custom",
        message: `Member "${member.name}" lists a shift type more than once`,
        path: ["shiftTypes"],
      });
    }

    const dayGroups = member.indexGroups.filter((g) => g.startsWith("day-"));
    const nightGroups = member.indexGroups.filter((g) => g.startsWith("night-"));

    if (dayGroups.length > 1) {
      ctx.addIssue({
        code: "custom",
        message: `Member "${member.name}" belongs to more than one day index group`,
        path: ["indexGroups"],
      });
    }
    if (nightGroups.length > 1) {
      ctx.addIssue({
        code: "custom",
        message: `Member "${member.name}" belongs to more than one night index group`,
        path: ["indexGroups"],
      });
    }
    if (member.shiftTypes.includes("night") && nightGroups.length === 0) {
      ctx.addIssue({
        code: "custom",
        message: `Member "${member.name}" works night shifts but has no night index group`,
        path: ["indexGroups"],
      });
    }
  });

// --------------------------------------------------------------------------
// History
// --------------------------------------------------------------------------

const DayHistoryRecordSchema = z.object({
  date: z.iso.date(),
  shiftType: z.literal("day"),
  index: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  memberName: z.string().min(1),
});

/** Night records are dated by the Monday their week starts on. */
const NightHistoryRecordSchema = z
  .object({
    date: z.iso.date(),
    shiftType: z.literal("night"),
    index: z.union([z.literal(1), z.literal(2)]),
    memberName: z.string().min(1),
  })
  .refine((record) => isMonday(record.date), {
    message: "Night history records must be dated by their week's Monday",
    path: ["date"],
  });

export const HistoryRecordSchema = z.discriminatedUnion("shiftType", [
  DayHistoryRecordSchema,
  NightHistoryRecordSchema,
]);

// --------------------------------------------------------------------------
// NG rules
// --------------------------------------------------------------------------

export const NgPeriodSchema = z
  .object({
    start: z.iso.date(),
    end: z.iso.date(),
    reason: z.string().optional(),
  })
  .refine((period) => period.start <= period.end, {
    message: "NG period start must not be after its end",
  });

export const NgRulesSchema = z.object({
  /** Per-member single dates or inclusive ranges. */
  byMember: z.record(z.string(), z.array(z.union([z.iso.date(), DateRangeSchema]))).default({}),
  /** Dates on which nobody may be assigned. */
  global: z.array(z.iso.date()).default([]),
  /** Per-member inclusive ranges with an optional reason (leave, training, ...). */
  byPeriod: z.record(z.string(), z.array(NgPeriodSchema)).default({}),
});

// --------------------------------------------------------------------------
// Fixed pattern
// --------------------------------------------------------------------------

export const FixedPatternSchema = z.object({
  memberName: z.string().min(1),
  /** Last historically observed week of the pattern. */
  referenceDate: z.iso.date(),
  targetIndex: z.union([z.literal(1), z.literal(2)]).default(2),
  cadenceDays: z.number().int().positive().multipleOf(7).default(14),
});

// --------------------------------------------------------------------------
// Constraint settings
// --------------------------------------------------------------------------

export const ConstraintSettingsSchema = z.object({
  dayMinIntervalDays: z.number().int().min(0).default(14),
  nightMinIntervalDays: z.number().int().min(0).default(21),
  /** When set, replaces the day minimum for index-3 slots. */
  dayIndex3MinIntervalDays: z.number().int().min(0).optional(),
  nightToDayCooldownDays: z.number().int().min(0).default(7),
  historyMonths: z.number().int().min(0).default(2),
});

// --------------------------------------------------------------------------
// Complete input
// --------------------------------------------------------------------------

export const RotaInputSchema = z.object({
  period: RotationPeriodInputSchema,
  members: z.array(MemberSchema),
  history: z.array(HistoryRecordSchema).default([]),
  ngRules: NgRulesSchema.prefault({}),
  fixedPattern: FixedPatternSchema.optional(),
  constraints: ConstraintSettingsSchema.prefault({}),
});
