import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../../../server/storage/memStorage.js";
import { loadChallengeSeeds } from "../../data/challengeDefinitions.js";
import { ErrorKind } from "../../errors/ledgerError.js";
import { GENRE_EXPLORER_5, READ_50_MANGA, WATCH_10_ANIME, steppingClock } from "../../testing/fixtures.js";
import { GuildScopeResolver, type AdminScopeToken } from "../scope/scope.service.js";
import { ChallengeCatalogService } from "./challenges.service.js";

describe("ChallengeCatalogService", () => {
  let storage: MemStorage;
  let catalog: ChallengeCatalogService;
  let resolver: GuildScopeResolver;
  let admin10: AdminScopeToken;
  let admin20: AdminScopeToken;

  beforeEach(async () => {
    storage = new MemStorage(steppingClock());
    catalog = new ChallengeCatalogService(storage);
    resolver = new GuildScopeResolver(storage);
    const person = await storage.createPerson("111");
    await resolver.registerCommunity("10", "Alpha");
    await resolver.registerCommunity("20", "Beta");
    admin10 = await resolver.adminScope(person.id, "10", { isAdministrator: true });
    admin20 = await resolver.adminScope(person.id, "20", { isAdministrator: true });
  });

  describe("definitions", () => {
    it("creates a definition and rejects a duplicate key", async () => {
      const created = await catalog.createDefinition(READ_50_MANGA);

      expect(created).toMatchObject({ key: "read-50-manga", target: 50, tier: "UNCOMMON", isActive: true });
      await expect(catalog.createDefinition(READ_50_MANGA)).rejects.toMatchObject({ kind: ErrorKind.InvalidInput });
    });

    it("validates the metric", async () => {
      await expect(
        catalog.createDefinition({ ...READ_50_MANGA, key: "bad-metric", metric: { kind: "completed", media: "BOOKS" } }),
      ).rejects.toMatchObject({ kind: ErrorKind.InvalidInput });
    });

    it("corrects a definition without touching its key", async () => {
      const created = await catalog.createDefinition(READ_50_MANGA);

      const corrected = await catalog.correctDefinition(created.id, { name: "Read Fifty Manga", target: 55 });

      expect(corrected).toMatchObject({ key: "read-50-manga", name: "Read Fifty Manga", target: 55 });
      await expect(catalog.correctDefinition(created.id, { key: "renamed" })).rejects.toMatchObject({
        kind: ErrorKind.InvalidInput,
      });
      await expect(catalog.correctDefinition(999, { target: 5 })).rejects.toMatchObject({ kind: ErrorKind.NotFound });
    });

    it("seeds the bundled milestones once", async () => {
      const seeds = loadChallengeSeeds();

      const first = await catalog.seedDefinitions(seeds);
      const second = await catalog.seedDefinitions(seeds);

      expect(first).toEqual({ created: seeds.length, skipped: 0 });
      expect(second).toEqual({ created: 0, skipped: seeds.length });
      expect(await storage.getDefinitionByKey("read-50-manga")).toMatchObject({ target: 50, tier: "UNCOMMON" });
    });
  });

  describe("selections", () => {
    it("selects a definition once per community", async () => {
      const definition = await catalog.createDefinition(READ_50_MANGA);

      const view = await catalog.selectChallenge(admin10, definition.id, { customTarget: 40 });

      expect(view).toMatchObject({ communityId: "10", customTarget: 40, effectiveTarget: 40, rewardRoleId: null });
      await expect(catalog.selectChallenge(admin10, definition.id)).rejects.toMatchObject({
        kind: ErrorKind.AlreadySelected,
      });
      await expect(catalog.selectChallenge(admin20, definition.id)).resolves.toMatchObject({
        communityId: "20",
        effectiveTarget: 50,
      });
    });

    it("refuses unknown and inactive definitions", async () => {
      const definition = await catalog.createDefinition({ ...WATCH_10_ANIME, isActive: false });

      await expect(catalog.selectChallenge(admin10, definition.id)).rejects.toMatchObject({ kind: ErrorKind.NotFound });
      await expect(catalog.selectChallenge(admin10, 999)).rejects.toMatchObject({ kind: ErrorKind.NotFound });
    });

    it("lists selections in insertion order", async () => {
      const genre = await catalog.createDefinition(GENRE_EXPLORER_5);
      const manga = await catalog.createDefinition(READ_50_MANGA);
      const anime = await catalog.createDefinition(WATCH_10_ANIME);
      await catalog.selectChallenge(admin10, anime.id);
      await catalog.selectChallenge(admin10, genre.id);
      await catalog.selectChallenge(admin10, manga.id);

      const keys = (await catalog.listSelections("10")).map((view) => view.definition.key);

      expect(keys).toEqual(["watch-10-anime", "genre-explorer-5", "read-50-manga"]);
      expect(await catalog.listSelections("20")).toEqual([]);
    });

    it("updates overrides of an existing selection", async () => {
      const definition = await catalog.createDefinition(READ_50_MANGA);
      await catalog.selectChallenge(admin10, definition.id, { customTarget: 40 });

      const view = await catalog.updateOverrides(admin10, definition.id, { customTarget: null, rewardRoleId: "7001" });

      expect(view).toMatchObject({ customTarget: null, effectiveTarget: 50, rewardRoleId: "7001" });
      await expect(catalog.updateOverrides(admin20, definition.id, { customTarget: 5 })).rejects.toMatchObject({
        kind: ErrorKind.NotFound,
      });
    });

    it("removing a selection deletes progress of that community only", async () => {
      const definition = await catalog.createDefinition(READ_50_MANGA);
      await catalog.selectChallenge(admin10, definition.id);
      await catalog.selectChallenge(admin20, definition.id);
      const personId = admin10.personId;
      const observedAt = new Date("2026-03-02T00:00:00Z");
      await storage.applyProgress({ personId, communityId: "10", definitionId: definition.id, value: 50, target: 50, observedAt });
      await storage.applyProgress({ personId, communityId: "20", definitionId: definition.id, value: 30, target: 50, observedAt });

      const result = await catalog.removeSelection(admin10, definition.id);

      expect(result).toEqual({ removedRecords: 1 });
      expect(await storage.listProgress({ communityIds: ["10"] })).toEqual([]);
      expect(await storage.listProgress({ communityIds: ["20"] })).toMatchObject([{ communityId: "20", value: 30 }]);
      await expect(catalog.removeSelection(admin10, definition.id)).rejects.toMatchObject({ kind: ErrorKind.NotFound });
    });
  });
});
