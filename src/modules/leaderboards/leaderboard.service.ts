import type { IStorage } from "../../../server/storage/types.js";
import { TIER_POINTS, type ChallengeTier, type ProgressRecord } from "../../../shared/schema.js";
import { ErrorKind, LedgerError } from "../../errors/ledgerError.js";
import {
  DEFAULT_LEADERBOARD_LIMIT,
  MAX_LEADERBOARD_LIMIT,
  type LeaderboardEntry,
  type LeaderboardMetric,
} from "./leaderboard.types.js";

interface Standing {
  personId: string;
  value: number;
  completedAt: Date | null;
}

/** One person's best result for one definition across the counted communities. */
interface DefinitionResult {
  personId: string;
  definitionId: number;
  value: number;
  completedAt: Date | null;
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LEADERBOARD_LIMIT;
  return Math.min(MAX_LEADERBOARD_LIMIT, Math.max(1, Math.floor(limit)));
}

/**
 * Parses `completions`, `points` or `challenge:<definitionId>`.
 * Returns null for anything else.
 */
export function parseLeaderboardMetric(raw: string | undefined): LeaderboardMetric | null {
  if (raw === undefined || raw === "" || raw === "completions") return { kind: "completions" };
  if (raw === "points") return { kind: "points" };
  const match = /^challenge:(\d+)$/.exec(raw);
  if (match) return { kind: "challenge", definitionId: Number(match[1]) };
  return null;
}

function earlier(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() <= b.getTime() ? a : b;
}

function later(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

/** Value descending, then earliest completion (none last), then person id. */
export function compareStandings(a: Standing, b: Standing): number {
  if (a.value !== b.value) return b.value - a.value;
  if (a.completedAt && b.completedAt) {
    const diff = a.completedAt.getTime() - b.completedAt.getTime();
    if (diff !== 0) return diff;
  } else if (a.completedAt) {
    return -1;
  } else if (b.completedAt) {
    return 1;
  }
  if (a.personId === b.personId) return 0;
  return a.personId < b.personId ? -1 : 1;
}

/**
 * Collapses records of the same (person, definition) from several communities:
 * the highest value wins and a completion counts once, at its earliest time.
 */
function collapse(records: ProgressRecord[]): DefinitionResult[] {
  const results = new Map<string, DefinitionResult>();
  for (const record of records) {
    const key = `${record.personId}:${record.definitionId}`;
    const current = results.get(key);
    if (!current) {
      results.set(key, {
        personId: record.personId,
        definitionId: record.definitionId,
        value: record.value,
        completedAt: record.completedAt,
      });
      continue;
    }
    current.value = Math.max(current.value, record.value);
    current.completedAt = earlier(current.completedAt, record.completedAt);
  }
  return Array.from(results.values());
}

export class LeaderboardService {
  constructor(private readonly storage: IStorage) {}

  /** Ranking over one community's records. Read-only. */
  async rank(communityId: string, metric: LeaderboardMetric, limit?: number): Promise<LeaderboardEntry[]> {
    const community = await this.storage.getCommunity(communityId);
    if (!community) {
      throw new LedgerError(ErrorKind.UnknownCommunity, `Community ${communityId} is not configured`, { communityId });
    }
    if (metric.kind === "challenge" && !(await this.storage.getSelection(communityId, metric.definitionId))) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${metric.definitionId} is not selected in this community`);
    }
    return this.rankOver([communityId], metric, clampLimit(limit));
  }

  /**
   * Ranking over every community the requester belongs to. Rows from
   * communities the requester is not a member of never contribute.
   */
  async rankCrossCommunity(personId: string, metric: LeaderboardMetric, limit?: number): Promise<LeaderboardEntry[]> {
    const requester = await this.storage.getPerson(personId);
    if (!requester) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${personId} is not registered`);
    }
    if (metric.kind === "challenge" && !(await this.storage.getDefinition(metric.definitionId))) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge definition ${metric.definitionId} not found`);
    }
    const communityIds = await this.storage.listMemberCommunityIds(personId);
    if (communityIds.length === 0) return [];
    return this.rankOver(communityIds, metric, clampLimit(limit));
  }

  private async rankOver(communityIds: string[], metric: LeaderboardMetric, limit: number): Promise<LeaderboardEntry[]> {
    const records = await this.storage.listProgress({
      communityIds,
      definitionId: metric.kind === "challenge" ? metric.definitionId : undefined,
    });
    if (records.length === 0) return [];

    const results = collapse(records);
    const standings =
      metric.kind === "challenge"
        ? results.map(({ personId, value, completedAt }) => ({ personId, value, completedAt }))
        : await this.aggregate(results, metric.kind);

    const top = standings.sort(compareStandings).slice(0, limit);
    const persons = await this.storage.getPersonsByIds(top.map((s) => s.personId));
    const discordIds = new Map(persons.map((p) => [p.id, p.discordId]));

    return top.map((standing, index) => ({
      rank: index + 1,
      personId: standing.personId,
      discordId: discordIds.get(standing.personId) ?? "",
      value: standing.value,
      completedAt: standing.completedAt,
    }));
  }

  private async aggregate(results: DefinitionResult[], kind: "completions" | "points"): Promise<Standing[]> {
    const tiers = kind === "points" ? await this.tiersOf(results) : new Map<number, ChallengeTier>();
    const standings = new Map<string, Standing>();

    for (const result of results) {
      let standing = standings.get(result.personId);
      if (!standing) {
        standing = { personId: result.personId, value: 0, completedAt: null };
        standings.set(result.personId, standing);
      }
      if (!result.completedAt) continue;

      const tier = tiers.get(result.definitionId);
      standing.value += kind === "completions" ? 1 : tier ? TIER_POINTS[tier] : 0;
      standing.completedAt = later(standing.completedAt, result.completedAt);
    }
    return Array.from(standings.values());
  }

  private async tiersOf(results: DefinitionResult[]): Promise<Map<number, ChallengeTier>> {
    const tiers = new Map<number, ChallengeTier>();
    for (const definitionId of new Set(results.map((r) => r.definitionId))) {
      const definition = await this.storage.getDefinition(definitionId);
      if (definition) tiers.set(definitionId, definition.tier);
    }
    return tiers;
  }
}
