import type { CatalogSnapshot, MediaStatistics } from "../../shared/catalog.js";
import type { InsertChallengeDefinition } from "../../shared/schema.js";

export function mediaStats(overrides: Partial<MediaStatistics> = {}): MediaStatistics {
  return { count: 0, meanScore: 0, statuses: [], scores: [], genres: [], formats: [], countries: [], ...overrides };
}

export function snapshot(parts: { anime?: Partial<MediaStatistics>; manga?: Partial<MediaStatistics> } = {}): CatalogSnapshot {
  return { anime: mediaStats(parts.anime), manga: mediaStats(parts.manga) };
}

/** Snapshot whose manga list holds `completed` finished titles. */
export function mangaCompleted(completed: number): CatalogSnapshot {
  return snapshot({ manga: { count: completed, statuses: [{ status: "COMPLETED", count: completed }] } });
}

export function animeCompleted(completed: number): CatalogSnapshot {
  return snapshot({ anime: { count: completed, statuses: [{ status: "COMPLETED", count: completed }] } });
}

export const READ_50_MANGA: InsertChallengeDefinition = {
  key: "read-50-manga",
  name: "Read 50 Manga",
  description: "Complete 50 manga on your list.",
  category: "manga",
  tier: "UNCOMMON",
  metric: { kind: "completed", media: "MANGA" },
  target: 50,
  isActive: true,
  sortOrder: 30,
};

export const WATCH_10_ANIME: InsertChallengeDefinition = {
  key: "watch-10-anime",
  name: "Watch 10 Anime",
  description: "Complete 10 anime on your list.",
  category: "anime",
  tier: "COMMON",
  metric: { kind: "completed", media: "ANIME" },
  target: 10,
  isActive: true,
  sortOrder: 90,
};

export const GENRE_EXPLORER_5: InsertChallengeDefinition = {
  key: "genre-explorer-5",
  name: "Genre Explorer 5",
  description: "Have entries in 5 different genres.",
  category: "variety",
  tier: "RARE",
  metric: { kind: "genre_variety" },
  target: 5,
  isActive: true,
  sortOrder: 200,
};

/** Clock that starts at `start` and moves one second per call. */
export function steppingClock(start = "2026-03-01T12:00:00.000Z"): () => Date {
  let tick = new Date(start).getTime();
  return () => {
    const now = new Date(tick);
    tick += 1000;
    return now;
  };
}
