import * as z from "zod";
import { addDays, daysBetween } from "../../datetime.utils.js";
import type { CandidateRule } from "./rules.types.js";

const NightCooldownSchema = z.object({
  days: z.number().int().min(0),
});

/**
 * Configuration for {@link createNightCooldownRule}.
 *
 * - `days` (required): days after a night week's end during which no day
 *   shift may be taken
 */
export type NightCooldownConfig = z.infer<typeof NightCooldownSchema>;

/**
 * Rest after night duty: a day slot is blocked when it falls strictly
 * after the end of one of the member's night weeks and fewer than `days`
 * days later.
 *
 * @example
 * ```ts
 * // Night week ends Sunday 2026-03-29: day shifts on 2026-03-30..2026-04-04 are blocked.
 * createNightCooldownRule({ days: 7 });
 * ```
 */
export function createNightCooldownRule(config: NightCooldownConfig): CandidateRule {
  const { days } = NightCooldownSchema.parse(config);

  return {
    name: "night-cooldown",
    kind: "exclusion",
    check({ member, slot, ledger }) {
      if (slot.shiftType !== "day") return undefined;

      for (const week of ledger.nightWeeks(member.name)) {
        const since = daysBetween(week.weekEnd, slot.date);
        if (since > 0 && since < days) {
          return `${member.name} finished night duty on ${week.weekEnd}; no day shift before ${addDays(week.weekEnd, days)}`;
        }
      }
      return undefined;
    },
  };
}
