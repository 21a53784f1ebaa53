import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TrendAnalyzer } from "../../src/analysis/index.js";
import type { TrendingRecord } from "../../src/digest/types.js";
import { TrendingStore } from "../../src/store/trending-store.js";

const FIXTURE: readonly TrendingRecord[] = [
  entry("2020-01-01", "python", "a/x", "x one"),
  entry("2020-01-02", "python", "a/x", "x two"),
  entry("2020-01-03", "python", "a/x", "x three"),
  entry("2020-01-01", "python", "b/y", "y one"),
  entry("2020-01-03", "python", "b/y", "y three"),
  entry("2020-01-02", "javascript", "a/x", "x js"),
  entry("2020-01-03", "javascript", "c/z", "z js"),
];

let store: TrendingStore;
let analyzer: TrendAnalyzer;

beforeEach(() => {
  store = TrendingStore.open(":memory:");
  store.upsert(FIXTURE);
  analyzer = new TrendAnalyzer(store);
});

afterEach(() => {
  store.close();
});

describe("trend analyzer", () => {
  it("summarises the table", () => {
    expect(analyzer.statistics()).toEqual({
      totalRecords: 7,
      uniqueRepositories: 3,
      languages: 2,
      firstDate: "2020-01-01",
      lastDate: "2020-01-03",
    });
  });

  it("reports empty statistics for an empty table", () => {
    const empty = TrendingStore.open(":memory:");
    try {
      expect(new TrendAnalyzer(empty).statistics()).toEqual({
        totalRecords: 0,
        uniqueRepositories: 0,
        languages: 0,
        firstDate: null,
        lastDate: null,
      });
    } finally {
      empty.close();
    }
  });

  it("ranks repositories of one language by days trending", () => {
    expect(
      analyzer.topRepositories({ language: "python", limit: 10 }),
    ).toEqual([
      {
        repoSlug: "a/x",
        daysTrending: 3,
        firstSeen: "2020-01-01",
        lastSeen: "2020-01-03",
        languages: ["python"],
      },
      {
        repoSlug: "b/y",
        daysTrending: 2,
        firstSeen: "2020-01-01",
        lastSeen: "2020-01-03",
        languages: ["python"],
      },
    ]);
  });

  it("ranks repositories across languages", () => {
    const top = analyzer.topRepositories({ limit: 2 });

    expect(top.map((repo) => [repo.repoSlug, repo.daysTrending])).toEqual([
      ["a/x", 3],
      ["b/y", 2],
    ]);
    expect(top[0]?.languages).toEqual(["javascript", "python"]);
  });

  it("finds repositories trending in several languages", () => {
    expect(analyzer.multiLanguageRepositories(10)).toEqual([
      {
        repoSlug: "a/x",
        languageCount: 2,
        totalDays: 3,
        languages: ["javascript", "python"],
      },
    ]);
  });

  it("keeps language labels that contain commas whole", () => {
    store.upsert([entry("2020-01-04", "c, c++", "c/z", "z native")]);

    expect(analyzer.multiLanguageRepositories(10)).toEqual([
      {
        repoSlug: "a/x",
        languageCount: 2,
        totalDays: 3,
        languages: ["javascript", "python"],
      },
      {
        repoSlug: "c/z",
        languageCount: 2,
        totalDays: 2,
        languages: ["c, c++", "javascript"],
      },
    ]);
  });

  it("orders languages by entry count", () => {
    expect(analyzer.languagePopularity()).toEqual([
      {
        language: "python",
        totalEntries: 5,
        uniqueRepositories: 2,
        activeDays: 3,
      },
      {
        language: "javascript",
        totalEntries: 2,
        uniqueRepositories: 2,
        activeDays: 2,
      },
    ]);
  });

  it("scores consistency over each repository's active span", () => {
    const consistent = analyzer.consistentRepositories({
      language: "python",
      minDays: 2,
      limit: 10,
    });

    expect(
      consistent.map((repo) => [repo.repoSlug, repo.consistencyPct]),
    ).toEqual([
      ["a/x", 100],
      ["b/y", 66.67],
    ]);
    expect(
      analyzer
        .consistentRepositories({ language: "python", minDays: 3, limit: 10 })
        .map((repo) => repo.repoSlug),
    ).toEqual(["a/x"]);
  });

  it("limits recent activity to the window ending on the given date", () => {
    expect(
      analyzer.recentRepositories({
        language: "python",
        asOf: "2020-01-03",
        windowDays: 1,
        limit: 10,
      }),
    ).toEqual([
      { repoSlug: "a/x", daysInWindow: 2, lastSeen: "2020-01-03" },
      { repoSlug: "b/y", daysInWindow: 1, lastSeen: "2020-01-03" },
    ]);
  });

  it("excludes dates after the window end", () => {
    expect(
      analyzer.recentRepositories({
        language: "python",
        asOf: "2020-01-01",
        limit: 10,
      }),
    ).toEqual([
      { repoSlug: "a/x", daysInWindow: 1, lastSeen: "2020-01-01" },
      { repoSlug: "b/y", daysInWindow: 1, lastSeen: "2020-01-01" },
    ]);
  });

  it("exports the latest description per repository", () => {
    expect(analyzer.exportRows({ language: "python", limit: 1 })).toEqual([
      {
        repoSlug: "a/x",
        daysTrending: 3,
        firstSeen: "2020-01-01",
        lastSeen: "2020-01-03",
        latestDescription: "x three",
      },
    ]);
  });
});

function entry(
  date: string,
  language: string,
  repoSlug: string,
  description: string,
): TrendingRecord {
  return { date, language, repoSlug, description };
}
