export interface TrendStatistics {
  readonly totalRecords: number;
  readonly uniqueRepositories: number;
  readonly languages: number;
  readonly firstDate: string | null;
  readonly lastDate: string | null;
}

export interface RepositoryTrend {
  readonly repoSlug: string;
  readonly daysTrending: number;
  readonly firstSeen: string;
  readonly lastSeen: string;
  readonly languages: readonly string[];
}

export interface MultiLanguageRepository {
  readonly repoSlug: string;
  readonly languageCount: number;
  readonly totalDays: number;
  readonly languages: readonly string[];
}

export interface LanguagePopularity {
  readonly language: string;
  readonly totalEntries: number;
  readonly uniqueRepositories: number;
  readonly activeDays: number;
}

export interface ConsistentRepository {
  readonly repoSlug: string;
  readonly language: string;
  readonly daysTrending: number;
  readonly firstSeen: string;
  readonly lastSeen: string;
  /** Share of days in the first..last span the repository trended, 0-100. */
  readonly consistencyPct: number;
}

export interface RecentRepository {
  readonly repoSlug: string;
  readonly daysInWindow: number;
  readonly lastSeen: string;
}

export interface ExportRow {
  readonly repoSlug: string;
  readonly daysTrending: number;
  readonly firstSeen: string;
  readonly lastSeen: string;
  readonly latestDescription: string;
}

export interface TopRepositoriesQuery {
  readonly language?: string;
  readonly limit: number;
}

export interface ConsistencyQuery {
  readonly language: string;
  readonly minDays: number;
  readonly limit: number;
}

export interface RecentQuery {
  readonly language: string;
  /** `YYYY-MM-DD` the window ends on. */
  readonly asOf: string;
  readonly windowDays?: number;
  readonly limit: number;
}

export interface ExportQuery {
  readonly language: string;
  readonly limit: number;
}
