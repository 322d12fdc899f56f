import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../../../server/storage/memStorage.js";
import type { ChallengeDefinition } from "../../../shared/schema.js";
import { ErrorKind } from "../../errors/ledgerError.js";
import {
  GENRE_EXPLORER_5,
  READ_50_MANGA,
  WATCH_10_ANIME,
  animeCompleted,
  mangaCompleted,
  snapshot,
  steppingClock,
} from "../../testing/fixtures.js";
import { ChallengeCatalogService } from "../challenges/challenges.service.js";
import { ProgressLedgerService } from "../progress/progress.service.js";
import { GuildScopeResolver, type AdminScopeToken, type ScopeToken } from "../scope/scope.service.js";
import { LeaderboardService, clampLimit, compareStandings, parseLeaderboardMetric } from "./leaderboard.service.js";

describe("LeaderboardService", () => {
  let storage: MemStorage;
  let resolver: GuildScopeResolver;
  let catalog: ChallengeCatalogService;
  let ledger: ProgressLedgerService;
  let leaderboard: LeaderboardService;
  let adminId: string;
  let readManga: ChallengeDefinition;

  const at = (second: number) => new Date(Date.UTC(2026, 3, 1, 0, 0, second));

  async function adminOf(communityId: string): Promise<AdminScopeToken> {
    return resolver.adminScope(adminId, communityId, { isAdministrator: true, autoRegister: true });
  }

  async function member(discordId: string, communityId: string): Promise<ScopeToken> {
    const person = (await storage.getPersonByDiscordId(discordId)) ?? (await storage.createPerson(discordId));
    return resolver.scope(person.id, communityId);
  }

  beforeEach(async () => {
    storage = new MemStorage(steppingClock("2026-03-01T00:00:00.000Z"));
    resolver = new GuildScopeResolver(storage);
    catalog = new ChallengeCatalogService(storage);
    // First observation is stamped at(0), the next at(1), and so on
    ledger = new ProgressLedgerService(storage, steppingClock("2026-04-01T00:00:00.000Z"));
    leaderboard = new LeaderboardService(storage);
    adminId = (await storage.createPerson("100")).id;
    readManga = await catalog.createDefinition(READ_50_MANGA);
  });

  describe("rank", () => {
    it("returns an empty ranking for an empty ledger", async () => {
      await adminOf("10");
      expect(await leaderboard.rank("10", { kind: "completions" })).toEqual([]);
    });

    it("fails with UnknownCommunity for an unregistered community", async () => {
      await expect(leaderboard.rank("99", { kind: "points" })).rejects.toMatchObject({
        kind: ErrorKind.UnknownCommunity,
      });
    });

    it("orders by value, then earliest completion, then person id", async () => {
      await catalog.selectChallenge(await adminOf("10"), readManga.id);
      const a = await member("301", "10");
      const b = await member("302", "10");
      const c = await member("303", "10");
      const d = await member("304", "10");

      await ledger.recordObservation(a, readManga.id, mangaCompleted(30)); // at(0)
      await ledger.recordObservation(c, readManga.id, mangaCompleted(50)); // at(1), completes
      await ledger.recordObservation(b, readManga.id, mangaCompleted(50)); // at(2), completes
      await ledger.recordObservation(d, readManga.id, mangaCompleted(30)); // at(3)

      const ranking = await leaderboard.rank("10", { kind: "challenge", definitionId: readManga.id });
      const tiedAtThirty = [a.personId, d.personId].sort();

      expect(ranking.map((e) => e.personId)).toEqual([c.personId, b.personId, ...tiedAtThirty]);
      expect(ranking.map((e) => e.rank)).toEqual([1, 2, 3, 4]);
      expect(ranking[0]).toEqual({ rank: 1, personId: c.personId, discordId: "303", value: 50, completedAt: at(1) });
      expect(await leaderboard.rank("10", { kind: "challenge", definitionId: readManga.id })).toEqual(ranking);
    });

    it("clamps the limit", async () => {
      await catalog.selectChallenge(await adminOf("10"), readManga.id);
      for (const discordId of ["301", "302", "303"]) {
        await ledger.recordObservation(await member(discordId, "10"), readManga.id, mangaCompleted(10));
      }

      expect(await leaderboard.rank("10", { kind: "challenge", definitionId: readManga.id }, 2)).toHaveLength(2);
      expect(await leaderboard.rank("10", { kind: "challenge", definitionId: readManga.id }, 0)).toHaveLength(1);
    });

    it("sums completions and tier points", async () => {
      const admin10 = await adminOf("10");
      const watchAnime = await catalog.createDefinition(WATCH_10_ANIME);
      const genres = await catalog.createDefinition(GENRE_EXPLORER_5);
      for (const definition of [readManga, watchAnime, genres]) {
        await catalog.selectChallenge(admin10, definition.id);
      }
      const x = await member("301", "10");
      const y = await member("302", "10");
      const fiveGenres = ["Action", "Comedy", "Drama", "Horror", "Romance"].map((genre) => ({ genre, count: 12 }));

      // x: read-50-manga (UNCOMMON) and genre-explorer-5 (RARE); stamped at(0) and at(2)
      await ledger.recordSnapshot(x, snapshot({ manga: { ...mangaCompleted(50).manga, genres: fiveGenres } }));
      // y: watch-10-anime (COMMON); stamped at(4)
      await ledger.recordSnapshot(y, animeCompleted(10));

      expect(await leaderboard.rank("10", { kind: "points" })).toEqual([
        { rank: 1, personId: x.personId, discordId: "301", value: 5, completedAt: at(2) },
        { rank: 2, personId: y.personId, discordId: "302", value: 1, completedAt: at(4) },
      ]);
      expect((await leaderboard.rank("10", { kind: "completions" })).map((e) => e.value)).toEqual([2, 1]);
    });
  });

  describe("community isolation", () => {
    it("the same definition completes independently per community", async () => {
      await catalog.selectChallenge(await adminOf("10"), readManga.id);
      await catalog.selectChallenge(await adminOf("20"), readManga.id);
      const x20 = await member("301", "20");
      const x10 = await member("301", "10");

      await ledger.recordObservation(x20, readManga.id, mangaCompleted(0)); // at(0)
      await ledger.recordObservation(x10, readManga.id, mangaCompleted(50)); // at(1)

      const metric = { kind: "challenge" as const, definitionId: readManga.id };
      expect(await leaderboard.rank("10", metric)).toEqual([
        { rank: 1, personId: x10.personId, discordId: "301", value: 50, completedAt: at(1) },
      ]);
      expect(await leaderboard.rank("20", metric)).toEqual([
        { rank: 1, personId: x10.personId, discordId: "301", value: 0, completedAt: null },
      ]);
    });

    it("removing a selection in one community leaves the other's ranking intact", async () => {
      const admin10 = await adminOf("10");
      await catalog.selectChallenge(admin10, readManga.id);
      await catalog.selectChallenge(await adminOf("20"), readManga.id);
      await ledger.recordObservation(await member("301", "10"), readManga.id, mangaCompleted(50));
      await ledger.recordObservation(await member("301", "20"), readManga.id, mangaCompleted(20));
      const metric = { kind: "challenge" as const, definitionId: readManga.id };
      const before = await leaderboard.rank("20", metric);

      await catalog.removeSelection(admin10, readManga.id);

      expect(await leaderboard.rank("20", metric)).toEqual(before);
      expect(before).toMatchObject([{ discordId: "301", value: 20 }]);
      await expect(leaderboard.rank("10", metric)).rejects.toMatchObject({ kind: ErrorKind.NotFound });
    });
  });

  describe("rankCrossCommunity", () => {
    let requester: ScopeToken;
    let x10: ScopeToken;
    let y20: ScopeToken;

    beforeEach(async () => {
      for (const communityId of ["10", "20", "30"]) {
        await catalog.selectChallenge(await adminOf(communityId), readManga.id);
      }
      requester = await member("900", "10");
      await member("900", "20");
      x10 = await member("301", "10");
      const x20 = await member("301", "20");
      y20 = await member("302", "20");
      const y30 = await member("302", "30");

      await ledger.recordObservation(x10, readManga.id, mangaCompleted(50)); // at(0)
      await ledger.recordObservation(x20, readManga.id, mangaCompleted(52)); // at(1)
      await ledger.recordObservation(y20, readManga.id, mangaCompleted(10)); // at(2)
      await ledger.recordObservation(y30, readManga.id, mangaCompleted(60)); // at(3), community 30 is not shared
    });

    it("counts only communities the requester belongs to", async () => {
      const ranking = await leaderboard.rankCrossCommunity(requester.personId, {
        kind: "challenge",
        definitionId: readManga.id,
      });

      expect(ranking).toEqual([
        { rank: 1, personId: x10.personId, discordId: "301", value: 52, completedAt: at(0) },
        { rank: 2, personId: y20.personId, discordId: "302", value: 10, completedAt: null },
      ]);
    });

    it("counts a definition completed in several communities once", async () => {
      const ranking = await leaderboard.rankCrossCommunity(requester.personId, { kind: "completions" });

      expect(ranking).toEqual([
        { rank: 1, personId: x10.personId, discordId: "301", value: 1, completedAt: at(0) },
        { rank: 2, personId: y20.personId, discordId: "302", value: 0, completedAt: null },
      ]);
    });

    it("is empty for a person without communities", async () => {
      const loner = await storage.createPerson("555");
      expect(await leaderboard.rankCrossCommunity(loner.id, { kind: "points" })).toEqual([]);
    });

    it("fails with NotFound for an unknown person", async () => {
      await expect(leaderboard.rankCrossCommunity("missing", { kind: "points" })).rejects.toMatchObject({
        kind: ErrorKind.NotFound,
      });
    });
  });
});

describe("leaderboard helpers", () => {
  it("clamps limits to 1..100 with a default of 10", () => {
    expect(clampLimit(undefined)).toBe(10);
    expect(clampLimit(Number.NaN)).toBe(10);
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(2.7)).toBe(2);
    expect(clampLimit(500)).toBe(100);
  });

  it("parses metric names", () => {
    expect(parseLeaderboardMetric(undefined)).toEqual({ kind: "completions" });
    expect(parseLeaderboardMetric("points")).toEqual({ kind: "points" });
    expect(parseLeaderboardMetric("challenge:12")).toEqual({ kind: "challenge", definitionId: 12 });
    expect(parseLeaderboardMetric("challenge:abc")).toBeNull();
    expect(parseLeaderboardMetric("xp")).toBeNull();
  });

  it("places completed standings before uncompleted ones at equal value", () => {
    const done = { personId: "b", value: 5, completedAt: new Date("2026-01-01T00:00:00Z") };
    const open = { personId: "a", value: 5, completedAt: null };
    expect([open, done].sort(compareStandings)).toEqual([done, open]);
  });
});
