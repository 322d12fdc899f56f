export type LeaderboardMetric =
  | { kind: "challenge"; definitionId: number }
  | { kind: "completions" }
  | { kind: "points" };

export interface LeaderboardEntry {
  rank: number;
  personId: string;
  discordId: string;
  value: number;
  /** For aggregate metrics: when the person reached their current total. */
  completedAt: Date | null;
}

export const DEFAULT_LEADERBOARD_LIMIT = 10;
export const MAX_LEADERBOARD_LIMIT = 100;
