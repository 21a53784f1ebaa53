export { TrendAnalyzer } from "./trend-analyzer.js";
export type {
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
