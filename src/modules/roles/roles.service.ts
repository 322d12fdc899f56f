import { z } from "zod";
import type { IStorage } from "../../../server/storage/types.js";
import type { ChallengeDefinition, CommunityChallengeSelection, RoleConfig } from "../../../shared/schema.js";
import { ErrorKind, LedgerError, invalidInput } from "../../errors/ledgerError.js";
import type { AdminScopeToken } from "../scope/scope.service.js";

const roleEntrySchema = z.object({
  tierKey: z.string().trim().min(1, "tierKey must not be empty").max(64),
  roleId: z.string().regex(/^\d{1,32}$/, "roleId must be a role snowflake"),
});

/** tierKey -> external role id, for one community. */
export type RoleMapping = Record<string, string>;

export class RoleConfigService {
  constructor(private readonly storage: IStorage) {}

  /** tierKey is a tier code (RARE) or a challenge key (read-50-manga). */
  async setRole(token: AdminScopeToken, tierKey: string, roleId: string): Promise<RoleConfig> {
    const parsed = roleEntrySchema.safeParse({ tierKey, roleId });
    if (!parsed.success) throw invalidInput(parsed.error);

    const role = await this.storage.upsertRole(token.communityId, parsed.data.tierKey, parsed.data.roleId);
    console.log(`[RoleConfig] Community ${token.communityId}: ${role.tierKey} -> role ${role.roleId}`);
    return role;
  }

  async listRoles(communityId: string): Promise<RoleMapping> {
    const roles = await this.storage.listRoles(communityId);
    const mapping: RoleMapping = {};
    for (const role of roles) {
      mapping[role.tierKey] = role.roleId;
    }
    return mapping;
  }

  async removeRole(token: AdminScopeToken, tierKey: string): Promise<void> {
    const removed = await this.storage.deleteRole(token.communityId, tierKey.trim());
    if (!removed) {
      throw new LedgerError(ErrorKind.NotFound, `No role is configured for ${tierKey} in this community`);
    }
    console.log(`[RoleConfig] Community ${token.communityId}: removed ${tierKey.trim()}`);
  }

  /**
   * Role granted for completing a selection: the selection's own reward role,
   * else the role mapped to the challenge key, else the one mapped to its tier.
   */
  async resolveRewardRole(
    communityId: string,
    definition: Pick<ChallengeDefinition, "key" | "tier">,
    selection: Pick<CommunityChallengeSelection, "rewardRoleId">,
  ): Promise<string | null> {
    if (selection.rewardRoleId) return selection.rewardRoleId;
    const roles = await this.listRoles(communityId);
    return roles[definition.key] ?? roles[definition.tier] ?? null;
  }
}
