import { REST, Routes } from "discord.js";

export interface RoleGranter {
  grantRole(discordUserId: string, communityId: string, roleId: string): Promise<void>;
}

/** Adds guild member roles through the Discord REST API. */
export class DiscordRoleGranter implements RoleGranter {
  private readonly rest: REST;

  constructor(token: string, rest: REST = new REST({ version: "10" })) {
    this.rest = rest.setToken(token);
  }

  async grantRole(discordUserId: string, communityId: string, roleId: string): Promise<void> {
    await this.rest.put(Routes.guildMemberRole(communityId, discordUserId, roleId), {
      reason: "Challenge completed",
    });
    console.log(`[RoleGranter] Granted role ${roleId} to ${discordUserId} in guild ${communityId}`);
  }
}

/** Used when no bot token is configured: completions are logged and left undelivered. */
export class LoggingRoleGranter implements RoleGranter {
  async grantRole(discordUserId: string, communityId: string, roleId: string): Promise<void> {
    console.warn(
      `[RoleGranter] DISCORD_TOKEN not set; would grant role ${roleId} to ${discordUserId} in guild ${communityId}`,
    );
  }
}

export function createRoleGranter(token: string | undefined): RoleGranter {
  return token ? new DiscordRoleGranter(token) : new LoggingRoleGranter();
}
