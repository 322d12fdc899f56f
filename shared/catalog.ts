import { z } from "zod";

// ============================================================================
// CATALOG SNAPSHOT
// A person's list statistics as reported by the external catalog (AniList).
// ============================================================================

export const MEDIA_TYPES = ["ANIME", "MANGA"] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export const MEDIA_SCOPES = ["ANIME", "MANGA", "ALL"] as const;
export type MediaScope = (typeof MEDIA_SCOPES)[number];

export const LIST_STATUSES = ["CURRENT", "PLANNING", "COMPLETED", "DROPPED", "PAUSED", "REPEATING"] as const;
export type ListStatus = (typeof LIST_STATUSES)[number];

export const statusBucketSchema = z.object({
  status: z.string(),
  count: z.number().int().nonnegative(),
});

export const scoreBucketSchema = z.object({
  score: z.number().nonnegative(),
  count: z.number().int().nonnegative(),
});

export const genreBucketSchema = z.object({
  genre: z.string(),
  count: z.number().int().nonnegative(),
});

export const formatBucketSchema = z.object({
  format: z.string(),
  count: z.number().int().nonnegative(),
});

export const countryBucketSchema = z.object({
  country: z.string(),
  count: z.number().int().nonnegative(),
});

export const mediaStatisticsSchema = z.object({
  count: z.number().int().nonnegative(),
  meanScore: z.number().nonnegative().default(0),
  statuses: z.array(statusBucketSchema).default([]),
  scores: z.array(scoreBucketSchema).default([]),
  genres: z.array(genreBucketSchema).default([]),
  formats: z.array(formatBucketSchema).default([]),
  countries: z.array(countryBucketSchema).default([]),
});

export const catalogSnapshotSchema = z.object({
  anime: mediaStatisticsSchema,
  manga: mediaStatisticsSchema,
});

export type MediaStatistics = z.infer<typeof mediaStatisticsSchema>;
export type CatalogSnapshot = z.infer<typeof catalogSnapshotSchema>;

export function emptyMediaStatistics(): MediaStatistics {
  return { count: 0, meanScore: 0, statuses: [], scores: [], genres: [], formats: [], countries: [] };
}

// ============================================================================
// CHALLENGE METRICS
// What a challenge definition measures from a catalog snapshot.
// ============================================================================

const mediaScope = z.enum(MEDIA_SCOPES);

export const challengeMetricSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("completed"), media: mediaScope }),
  z.object({ kind: z.literal("entries"), media: mediaScope }),
  z.object({ kind: z.literal("status"), media: mediaScope, status: z.enum(LIST_STATUSES) }),
  z.object({
    kind: z.literal("mean_score"),
    media: z.enum(MEDIA_TYPES),
    minCompleted: z.number().int().nonnegative().optional(),
  }),
  z.object({ kind: z.literal("genre_variety") }),
  z.object({ kind: z.literal("genre_depth"), genre: z.string().min(1).optional() }),
  z.object({ kind: z.literal("format"), media: mediaScope, format: z.string().min(1) }),
  z.object({ kind: z.literal("country"), country: z.string().length(2) }),
  z.object({ kind: z.literal("completion_rate") }),
]);

export type ChallengeMetric = z.infer<typeof challengeMetricSchema>;
export type ChallengeMetricKind = ChallengeMetric["kind"];
