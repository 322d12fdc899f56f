import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { loadConfig } from "./config.js";
import { createApp } from "./routes.js";
import { createServices } from "./services.js";
import { MemStorage } from "./storage/memStorage.js";
import type { CatalogSnapshot } from "../shared/catalog.js";
import type { ExternalProfile } from "../src/services/anilistClient.js";
import type { RoleGranter } from "../src/services/discordRoleGranter.js";
import { READ_50_MANGA, mangaCompleted } from "../src/testing/fixtures.js";

const PUBLIC_KEY = "test-secret";
const ADMIN_KEY = "test-admin-secret";

describe("HTTP routes", () => {
  let app: Express;
  let fetchProfile: Mock<(handle: string) => Promise<ExternalProfile | null>>;
  let fetchCatalogSnapshot: Mock<(handle: string) => Promise<CatalogSnapshot>>;
  let grantRole: Mock<RoleGranter["grantRole"]>;

  beforeEach(() => {
    const config = loadConfig({
      NODE_ENV: "test",
      STORAGE_DRIVER: "memory",
      PRIMARY_GUILD_ID: "10",
      LEDGER_PUBLIC_API_KEY: PUBLIC_KEY,
      LEDGER_ADMIN_API_KEY: ADMIN_KEY,
    });
    fetchProfile = vi.fn(async (handle: string) => (handle.toLowerCase() === "kstorm" ? { id: 501, name: "KStorm" } : null));
    fetchCatalogSnapshot = vi.fn(async (_handle: string) => mangaCompleted(50));
    grantRole = vi.fn<RoleGranter["grantRole"]>(async () => {});
    const clock = () => new Date("2026-06-01T00:00:00.000Z");

    const services = createServices(new MemStorage(), config, {
      profiles: { fetchProfile, fetchCatalogSnapshot },
      granter: { grantRole },
      clock,
    });
    app = createApp(services, config);
  });

  const asPublic = (req: request.Test) => req.set("x-ledger-api-key", PUBLIC_KEY);
  const asAdmin = (req: request.Test) => req.set("Authorization", `Bearer ${ADMIN_KEY}`);

  it("answers the health check without a key", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
  });

  it("rejects missing and wrong API keys", async () => {
    const missing = await request(app).get("/api/challenges");
    expect(missing.status).toBe(401);
    expect(missing.body.error.code).toBe("UNAUTHORIZED");

    const wrong = await request(app).get("/api/challenges").set("x-ledger-api-key", "not-the-key");
    expect(wrong.status).toBe(403);
    expect(wrong.body.error.code).toBe("FORBIDDEN");

    const publicOnAdmin = await asPublic(request(app).post("/api/challenges")).send(READ_50_MANGA);
    expect(publicOnAdmin.status).toBe(403);
  });

  it("runs select, link, sync, leaderboard and role grant end to end", async () => {
    const created = await asAdmin(request(app).post("/api/challenges")).send(READ_50_MANGA);
    expect(created.status).toBe(201);
    const definitionId: number = created.body.definition.id;

    const selected = await asAdmin(request(app).post("/api/guilds/10/challenges")).send({ actorDiscordId: "900", definitionId });
    expect(selected.status).toBe(201);
    expect(selected.body.selection).toMatchObject({ communityId: "10", effectiveTarget: 50, customTarget: null });

    const again = await asAdmin(request(app).post("/api/guilds/10/challenges")).send({ actorDiscordId: "900", definitionId });
    expect(again.status).toBe(409);
    expect(again.body).toEqual({
      success: false,
      error: { code: "ALREADY_SELECTED", message: "Read 50 Manga is already selected in this community" },
    });

    const role = await asAdmin(request(app).put("/api/guilds/10/roles/UNCOMMON")).send({ actorDiscordId: "900", roleId: "777" });
    expect(role.status).toBe(200);

    const linked = await asPublic(request(app).put("/api/persons/200/profile")).send({ username: "kstorm" });
    expect(linked.status).toBe(200);
    expect(linked.body.profile).toMatchObject({ discordId: "200", anilistUsername: "KStorm", anilistId: 501 });

    const synced = await asPublic(request(app).post("/api/guilds/10/sync")).send({ discordId: "200" });
    expect(synced.status).toBe(200);
    expect(fetchCatalogSnapshot).toHaveBeenCalledWith("KStorm");
    expect(synced.body.records).toEqual([
      {
        definitionId,
        value: 50,
        target: 50,
        completedAt: "2026-06-01T00:00:00.000Z",
        outcome: "created",
        completedNow: true,
      },
    ]);
    expect(grantRole).toHaveBeenCalledWith("200", "10", "777");

    const board = await asPublic(request(app).get(`/api/guilds/10/leaderboard?metric=challenge:${definitionId}`));
    expect(board.status).toBe(200);
    expect(board.body.entries).toEqual([
      expect.objectContaining({ rank: 1, discordId: "200", value: 50, completedAt: "2026-06-01T00:00:00.000Z" }),
    ]);

    const progress = await asPublic(request(app).get("/api/guilds/primary/progress/200"));
    expect(progress.status).toBe(200);
    expect(progress.body.progress).toEqual([expect.objectContaining({ key: "read-50-manga", value: 50, target: 50 })]);
  });

  it("maps ledger errors to status codes", async () => {
    const unknownGuild = await asPublic(request(app).get("/api/guilds/99/leaderboard"));
    expect(unknownGuild.status).toBe(404);
    expect(unknownGuild.body.error.code).toBe("NOT_CONFIGURED");

    const badMetric = await asPublic(request(app).get("/api/guilds/10/leaderboard?metric=speed"));
    expect(badMetric.status).toBe(400);
    expect(badMetric.body.error.code).toBe("INVALID_INPUT");

    const noActor = await asAdmin(request(app).put("/api/guilds/10/roles/RARE")).send({ roleId: "778" });
    expect(noActor.status).toBe(400);
    expect(noActor.body.error.message).toBe("actorDiscordId is required and must be a Discord snowflake");

    const unknownHandle = await asPublic(request(app).put("/api/persons/200/profile")).send({ username: "nobody" });
    expect(unknownHandle.status).toBe(404);
    expect(unknownHandle.body.error.code).toBe("HANDLE_NOT_FOUND");

    const unconfigured = await asPublic(request(app).post("/api/guilds/10/sync")).send({ discordId: "200" });
    expect(unconfigured.status).toBe(404);
    expect(unconfigured.body.error.code).toBe("NOT_CONFIGURED");

    const guild = await asAdmin(request(app).post("/api/guilds")).send({ guildId: "10", name: "Test Guild" });
    expect(guild.status).toBe(201);

    const notLinked = await asPublic(request(app).post("/api/guilds/10/sync")).send({ discordId: "200" });
    expect(notLinked.status).toBe(409);
    expect(notLinked.body.error.code).toBe("NOT_LINKED");
  });

  it("reports a missing server API key as a server misconfiguration", async () => {
    const config = loadConfig({ NODE_ENV: "test", STORAGE_DRIVER: "memory", LEDGER_PUBLIC_API_KEY: PUBLIC_KEY });
    const unkeyed = createApp(createServices(new MemStorage(), config, { profiles: { fetchProfile, fetchCatalogSnapshot } }), config);

    const res = await asAdmin(request(unkeyed).post("/api/challenges")).send(READ_50_MANGA);

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe("SERVER_MISCONFIGURED");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await asPublic(request(app).post("/api/persons"))
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_INPUT");
  });
});
