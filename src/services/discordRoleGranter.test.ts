import { describe, it, expect, vi } from "vitest";
import { REST } from "discord.js";
import { DiscordRoleGranter, LoggingRoleGranter, createRoleGranter } from "./discordRoleGranter.js";

describe("DiscordRoleGranter", () => {
  it("puts the guild member role with a reason", async () => {
    const rest = new REST({ version: "10" });
    const put = vi.spyOn(rest, "put").mockResolvedValue(undefined);
    const granter = new DiscordRoleGranter("test-secret", rest);

    await granter.grantRole("200", "10", "777");

    expect(put).toHaveBeenCalledWith("/guilds/10/members/200/roles/777", { reason: "Challenge completed" });
  });

  it("propagates REST failures", async () => {
    const rest = new REST({ version: "10" });
    vi.spyOn(rest, "put").mockRejectedValue(new Error("Missing Permissions"));
    const granter = new DiscordRoleGranter("test-secret", rest);

    await expect(granter.grantRole("200", "10", "777")).rejects.toThrow("Missing Permissions");
  });
});

describe("createRoleGranter", () => {
  it("falls back to logging without a bot token", () => {
    expect(createRoleGranter(undefined)).toBeInstanceOf(LoggingRoleGranter);
    expect(createRoleGranter("test-secret")).toBeInstanceOf(DiscordRoleGranter);
  });
});
