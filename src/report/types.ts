import type {
  ConsistentRepository,
  LanguagePopularity,
  MultiLanguageRepository,
  RecentRepository,
  RepositoryTrend,
  TrendStatistics,
} from "../analysis/types.js";

export interface ToolInfo {
  readonly name: "trending-digest";
  readonly version: string;
}

export interface ReportOptions {
  readonly toolVersion: string;
  readonly database: string;
  /** Language the per-language sections focus on. */
  readonly language: string;
  readonly limit: number;
  readonly minDays: number;
  /** `YYYY-MM-DD` the recent-activity window ends on. */
  readonly asOf: string;
  readonly windowDays?: number;
}

export interface TrendReport {
  readonly tool: ToolInfo;
  readonly database: string;
  readonly language: string;
  readonly as_of: string;
  readonly statistics: TrendStatistics;
  readonly top_for_language: readonly RepositoryTrend[];
  readonly top_overall: readonly RepositoryTrend[];
  readonly multi_language: readonly MultiLanguageRepository[];
  readonly language_popularity: readonly LanguagePopularity[];
  readonly most_consistent: readonly ConsistentRepository[];
  readonly recent: readonly RecentRepository[];
}
