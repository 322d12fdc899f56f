import { z } from "zod";
import type { ChallengeDefinition, CommunityChallengeSelection } from "../../../shared/schema.js";

const roleIdSchema = z.string().regex(/^\d{1,32}$/, "rewardRoleId must be a role snowflake");

export const selectionOverridesSchema = z
  .object({
    customTarget: z.number().int().positive().nullable().optional(),
    rewardRoleId: roleIdSchema.nullable().optional(),
  })
  .strict();

export type SelectionOverridesInput = z.infer<typeof selectionOverridesSchema>;

export interface SelectionView {
  selectionId: number;
  communityId: string;
  definition: ChallengeDefinition;
  /** customTarget when the community set one, otherwise the definition's target. */
  effectiveTarget: number;
  customTarget: number | null;
  rewardRoleId: string | null;
  metricLabel: string;
  selectedAt: Date;
}

export interface SeedResult {
  created: number;
  skipped: number;
}

export function effectiveTarget(
  definition: Pick<ChallengeDefinition, "target">,
  selection: Pick<CommunityChallengeSelection, "customTarget">,
): number {
  return selection.customTarget ?? definition.target;
}
