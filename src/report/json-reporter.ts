import type { TrendAnalyzer } from "../analysis/trend-analyzer.js";
import type { ReportOptions, TrendReport } from "./types.js";

export function buildTrendReport(
  analyzer: TrendAnalyzer,
  options: ReportOptions,
): TrendReport {
  const { language, limit } = options;
  return {
    tool: { name: "trending-digest", version: options.toolVersion },
    database: options.database,
    language,
    as_of: options.asOf,
    statistics: analyzer.statistics(),
    top_for_language: analyzer.topRepositories({ language, limit }),
    top_overall: analyzer.topRepositories({ limit }),
    multi_language: analyzer.multiLanguageRepositories(limit),
    language_popularity: analyzer.languagePopularity(),
    most_consistent: analyzer.consistentRepositories({
      language,
      minDays: options.minDays,
      limit,
    }),
    recent: analyzer.recentRepositories({
      language,
      asOf: options.asOf,
      windowDays: options.windowDays,
      limit,
    }),
  };
}

export function renderJsonReport(report: TrendReport): string {
  return JSON.stringify(report, null, 2);
}
