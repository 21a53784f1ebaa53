import type { TrendingStore } from "../store/trending-store.js";
import {
  CONSISTENT_REPOSITORIES,
  EXPORT_ROWS,
  LANGUAGE_POPULARITY,
  MULTI_LANGUAGE_REPOSITORIES,
  RECENT_REPOSITORIES,
  STATISTICS,
  TOP_REPOSITORIES,
} from "./queries.js";
import type {
  ConsistencyQuery,
  ConsistentRepository,
  ExportQuery,
  ExportRow,
  LanguagePopularity,
  MultiLanguageRepository,
  RecentQuery,
  RecentRepository,
  RepositoryTrend,
  TopRepositoriesQuery,
  TrendStatistics,
} from "./types.js";

const DEFAULT_RECENT_WINDOW_DAYS = 30;

interface StatisticsRow {
  total_records: number;
  unique_repositories: number;
  languages: number;
  first_date: string | null;
  last_date: string | null;
}

interface RepositoryTrendRow {
  repo_slug: string;
  days_trending: number;
  first_seen: string;
  last_seen: string;
  languages: string;
}

interface MultiLanguageRow {
  repo_slug: string;
  language_count: number;
  total_days: number;
  languages: string;
}

interface LanguagePopularityRow {
  language: string;
  total_entries: number;
  unique_repositories: number;
  active_days: number;
}

interface ConsistencyRow {
  repo_slug: string;
  language: string;
  days_trending: number;
  first_seen: string;
  last_seen: string;
  consistency_pct: number;
}

interface RecentRow {
  repo_slug: string;
  days_in_window: number;
  last_seen: string;
}

interface ExportQueryRow {
  repo_slug: string;
  days_trending: number;
  first_seen: string;
  last_seen: string;
  latest_description: string | null;
}

export class TrendAnalyzer {
  constructor(private readonly store: TrendingStore) {}

  statistics(): TrendStatistics {
    const [row] = this.store.query<StatisticsRow>(STATISTICS);
    return {
      totalRecords: row?.total_records ?? 0,
      uniqueRepositories: row?.unique_repositories ?? 0,
      languages: row?.languages ?? 0,
      firstDate: row?.first_date ?? null,
      lastDate: row?.last_date ?? null,
    };
  }

  topRepositories(query: TopRepositoriesQuery): RepositoryTrend[] {
    const rows = this.store.query<RepositoryTrendRow>(TOP_REPOSITORIES, {
      language: query.language ?? null,
      limit: query.limit,
    });
    return rows.map((row) => ({
      repoSlug: row.repo_slug,
      daysTrending: row.days_trending,
      firstSeen: row.first_seen,
      lastSeen: row.last_seen,
      languages: parseLanguages(row.languages),
    }));
  }

  multiLanguageRepositories(limit: number): MultiLanguageRepository[] {
    const rows = this.store.query<MultiLanguageRow>(
      MULTI_LANGUAGE_REPOSITORIES,
      { limit },
    );
    return rows.map((row) => ({
      repoSlug: row.repo_slug,
      languageCount: row.language_count,
      totalDays: row.total_days,
      languages: parseLanguages(row.languages),
    }));
  }

  languagePopularity(): LanguagePopularity[] {
    return this.store
      .query<LanguagePopularityRow>(LANGUAGE_POPULARITY)
      .map((row) => ({
        language: row.language,
        totalEntries: row.total_entries,
        uniqueRepositories: row.unique_repositories,
        activeDays: row.active_days,
      }));
  }

  consistentRepositories(query: ConsistencyQuery): ConsistentRepository[] {
    const rows = this.store.query<ConsistencyRow>(CONSISTENT_REPOSITORIES, {
      language: query.language,
      minDays: query.minDays,
      limit: query.limit,
    });
    return rows.map((row) => ({
      repoSlug: row.repo_slug,
      language: row.language,
      daysTrending: row.days_trending,
      firstSeen: row.first_seen,
      lastSeen: row.last_seen,
      consistencyPct: row.consistency_pct,
    }));
  }

  recentRepositories(query: RecentQuery): RecentRepository[] {
    const rows = this.store.query<RecentRow>(RECENT_REPOSITORIES, {
      language: query.language,
      asOf: query.asOf,
      windowDays: query.windowDays ?? DEFAULT_RECENT_WINDOW_DAYS,
      limit: query.limit,
    });
    return rows.map((row) => ({
      repoSlug: row.repo_slug,
      daysInWindow: row.days_in_window,
      lastSeen: row.last_seen,
    }));
  }

  exportRows(query: ExportQuery): ExportRow[] {
    const rows = this.store.query<ExportQueryRow>(EXPORT_ROWS, {
      language: query.language,
      limit: query.limit,
    });
    return rows.map((row) => ({
      repoSlug: row.repo_slug,
      daysTrending: row.days_trending,
      firstSeen: row.first_seen,
      lastSeen: row.last_seen,
      latestDescription: row.latest_description ?? "",
    }));
  }
}

// json_group_array keeps labels containing commas intact but not in order.
function parseLanguages(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed
    .filter((item): item is string => typeof item === "string")
    .sort();
}
