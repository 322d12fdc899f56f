import { describe, it, expect } from "vitest";
import { mangaCompleted, mediaStats, snapshot } from "../../testing/fixtures.js";
import { evaluateMetric, meanScoreTenths } from "./challenges.metrics.js";

const sample = snapshot({
  anime: {
    count: 40,
    statuses: [
      { status: "COMPLETED", count: 24 },
      { status: "CURRENT", count: 6 },
      { status: "PLANNING", count: 8 },
      { status: "DROPPED", count: 2 },
    ],
    scores: [
      { score: 9, count: 10 },
      { score: 8, count: 10 },
      { score: 7, count: 4 },
    ],
    genres: [
      { genre: "Action", count: 20 },
      { genre: "Comedy", count: 12 },
      { genre: "Drama", count: 0 },
    ],
    formats: [
      { format: "TV", count: 30 },
      { format: "MOVIE", count: 10 },
    ],
  },
  manga: {
    count: 15,
    statuses: [
      { status: "COMPLETED", count: 9 },
      { status: "PAUSED", count: 3 },
      { status: "PLANNING", count: 3 },
    ],
    genres: [
      { genre: "action", count: 7 },
      { genre: "Romance", count: 5 },
    ],
    formats: [{ format: "MANGA", count: 15 }],
    countries: [
      { country: "JP", count: 10 },
      { country: "KR", count: 5 },
    ],
  },
});

describe("evaluateMetric", () => {
  it("counts completed entries per media scope", () => {
    expect(evaluateMetric({ kind: "completed", media: "ANIME" }, sample)).toBe(24);
    expect(evaluateMetric({ kind: "completed", media: "MANGA" }, sample)).toBe(9);
    expect(evaluateMetric({ kind: "completed", media: "ALL" }, sample)).toBe(33);
  });

  it("counts list entries and status buckets", () => {
    expect(evaluateMetric({ kind: "entries", media: "ALL" }, sample)).toBe(55);
    expect(evaluateMetric({ kind: "status", media: "ALL", status: "PLANNING" }, sample)).toBe(11);
    expect(evaluateMetric({ kind: "status", media: "ANIME", status: "CURRENT" }, sample)).toBe(6);
  });

  it("reports the mean score in tenths once enough titles are completed", () => {
    // (9*10 + 8*10 + 7*4) / 24 = 8.25
    expect(evaluateMetric({ kind: "mean_score", media: "ANIME" }, sample)).toBe(82);
    expect(evaluateMetric({ kind: "mean_score", media: "ANIME", minCompleted: 25 }, sample)).toBe(0);
  });

  it("counts distinct genres across both lists, ignoring empty buckets", () => {
    // action, comedy, romance
    expect(evaluateMetric({ kind: "genre_variety" }, sample)).toBe(3);
  });

  it("measures the deepest genre or a named one", () => {
    expect(evaluateMetric({ kind: "genre_depth" }, sample)).toBe(27);
    expect(evaluateMetric({ kind: "genre_depth", genre: "Romance" }, sample)).toBe(5);
    expect(evaluateMetric({ kind: "genre_depth", genre: "Horror" }, sample)).toBe(0);
    expect(evaluateMetric({ kind: "genre_depth" }, snapshot())).toBe(0);
  });

  it("counts formats and countries of origin", () => {
    expect(evaluateMetric({ kind: "format", media: "ANIME", format: "movie" }, sample)).toBe(10);
    expect(evaluateMetric({ kind: "country", country: "KR" }, sample)).toBe(5);
  });

  it("floors the completion rate", () => {
    // 33 / (33 + 6 + 3 + 2) = 75.0
    expect(evaluateMetric({ kind: "completion_rate" }, sample)).toBe(75);
    expect(evaluateMetric({ kind: "completion_rate" }, mangaCompleted(0))).toBe(0);
  });
});

describe("meanScoreTenths", () => {
  it("handles distributions on the 100-point scale", () => {
    const stats = mediaStats({
      scores: [
        { score: 85, count: 2 },
        { score: 70, count: 1 },
      ],
    });
    // (170 + 70) / 3 = 80
    expect(meanScoreTenths(stats)).toBe(80);
  });

  it("returns 0 for an empty distribution", () => {
    expect(meanScoreTenths(mediaStats())).toBe(0);
  });
});
