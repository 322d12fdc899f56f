import type { CatalogSnapshot, ChallengeMetric, ListStatus, MediaScope, MediaStatistics } from "../../../shared/catalog.js";

export const DEFAULT_MEAN_SCORE_MIN_COMPLETED = 10;

function statsFor(snapshot: CatalogSnapshot, media: MediaScope): MediaStatistics[] {
  switch (media) {
    case "ANIME":
      return [snapshot.anime];
    case "MANGA":
      return [snapshot.manga];
    case "ALL":
      return [snapshot.anime, snapshot.manga];
  }
}

function statusCount(stats: MediaStatistics, status: ListStatus): number {
  return stats.statuses
    .filter((bucket) => bucket.status.toUpperCase() === status)
    .reduce((sum, bucket) => sum + bucket.count, 0);
}

function sumOver(stats: MediaStatistics[], pick: (s: MediaStatistics) => number): number {
  return stats.reduce((sum, s) => sum + pick(s), 0);
}

/**
 * Mean of the score distribution in tenths of a point (8.5 -> 85).
 * Distributions on the 100-point scale are detected by any bucket above 10.
 */
export function meanScoreTenths(stats: MediaStatistics): number {
  let weighted = 0;
  let entries = 0;
  let hundredPointScale = false;
  for (const bucket of stats.scores) {
    weighted += bucket.score * bucket.count;
    entries += bucket.count;
    if (bucket.score > 10) hundredPointScale = true;
  }
  if (entries === 0) return 0;
  return Math.floor(hundredPointScale ? weighted / entries : (weighted * 10) / entries);
}

function genreTotals(snapshot: CatalogSnapshot): Map<string, number> {
  const totals = new Map<string, number>();
  for (const stats of [snapshot.anime, snapshot.manga]) {
    for (const bucket of stats.genres) {
      if (bucket.count <= 0) continue;
      const genre = bucket.genre.toLowerCase();
      totals.set(genre, (totals.get(genre) ?? 0) + bucket.count);
    }
  }
  return totals;
}

/** Derives the progress value a metric reports for a catalog snapshot. Always a non-negative integer. */
export function evaluateMetric(metric: ChallengeMetric, snapshot: CatalogSnapshot): number {
  switch (metric.kind) {
    case "completed":
      return sumOver(statsFor(snapshot, metric.media), (s) => statusCount(s, "COMPLETED"));

    case "entries":
      return sumOver(statsFor(snapshot, metric.media), (s) => s.count);

    case "status": {
      const status = metric.status;
      return sumOver(statsFor(snapshot, metric.media), (s) => statusCount(s, status));
    }

    case "mean_score": {
      const stats = metric.media === "ANIME" ? snapshot.anime : snapshot.manga;
      const minCompleted = metric.minCompleted ?? DEFAULT_MEAN_SCORE_MIN_COMPLETED;
      if (statusCount(stats, "COMPLETED") < minCompleted) return 0;
      return meanScoreTenths(stats);
    }

    case "genre_variety":
      return genreTotals(snapshot).size;

    case "genre_depth": {
      const totals = genreTotals(snapshot);
      if (metric.genre) return totals.get(metric.genre.toLowerCase()) ?? 0;
      return Math.max(0, ...totals.values());
    }

    case "format": {
      const wanted = metric.format.toUpperCase();
      return sumOver(statsFor(snapshot, metric.media), (s) =>
        s.formats.filter((bucket) => bucket.format.toUpperCase() === wanted).reduce((sum, bucket) => sum + bucket.count, 0),
      );
    }

    case "country": {
      const wanted = metric.country.toUpperCase();
      return snapshot.manga.countries
        .filter((bucket) => bucket.country.toUpperCase() === wanted)
        .reduce((sum, bucket) => sum + bucket.count, 0);
    }

    case "completion_rate": {
      const all = statsFor(snapshot, "ALL");
      const completed = sumOver(all, (s) => statusCount(s, "COMPLETED"));
      const started =
        completed +
        sumOver(all, (s) => statusCount(s, "CURRENT") + statusCount(s, "PAUSED") + statusCount(s, "DROPPED"));
      if (started === 0) return 0;
      return Math.floor((completed * 100) / started);
    }
  }
}

export function describeMetric(metric: ChallengeMetric): string {
  switch (metric.kind) {
    case "completed":
      return `completed ${metric.media.toLowerCase()} entries`;
    case "entries":
      return `${metric.media.toLowerCase()} list entries`;
    case "status":
      return `${metric.media.toLowerCase()} entries marked ${metric.status.toLowerCase()}`;
    case "mean_score":
      return `mean ${metric.media.toLowerCase()} score (tenths)`;
    case "genre_variety":
      return "distinct genres";
    case "genre_depth":
      return metric.genre ? `${metric.genre} entries` : "entries in a single genre";
    case "format":
      return `${metric.format} entries`;
    case "country":
      return `manga from ${metric.country}`;
    case "completion_rate":
      return "completion rate (%)";
  }
}
