import fs from "node:fs/promises";
import { TrendAnalyzer } from "../analysis/trend-analyzer.js";
import {
  buildTrendReport,
  renderJsonReport,
} from "../report/json-reporter.js";
import { renderMarkdownTrendReport } from "../report/markdown-reporter.js";
import type { TrendReport } from "../report/types.js";
import { withTrendingStore } from "../store/trending-store.js";
import {
  DEFAULT_DATABASE_PATH,
  resolveDatabasePath,
  todayIsoDate,
} from "./runtime-paths.js";

export type ReportFormat = "md" | "json";

export interface ReportCommandOptions {
  readonly db?: string;
  readonly language?: string;
  readonly limit?: number;
  readonly minDays?: number;
  readonly asOf?: string;
  readonly windowDays?: number;
  readonly format?: ReportFormat;
  readonly out?: string;
}

export interface ReportCommandResult {
  readonly report: TrendReport;
  readonly output: string;
}

export const DEFAULT_LANGUAGE = "python";
const DEFAULT_LIMIT = 10;
const DEFAULT_MIN_DAYS = 30;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export async function runReportCommand(
  options: ReportCommandOptions,
  toolVersion: string,
): Promise<ReportCommandResult> {
  const database = options.db ?? DEFAULT_DATABASE_PATH;
  const asOf = options.asOf ?? todayIsoDate();
  if (!ISO_DATE.test(asOf)) {
    throw new Error(`Invalid --as-of date: ${asOf}. Expected YYYY-MM-DD.`);
  }

  const report = await withTrendingStore(
    resolveDatabasePath(database),
    (store) =>
      buildTrendReport(new TrendAnalyzer(store), {
        toolVersion,
        database,
        language: (options.language ?? DEFAULT_LANGUAGE).toLowerCase(),
        limit: options.limit ?? DEFAULT_LIMIT,
        minDays: options.minDays ?? DEFAULT_MIN_DAYS,
        asOf,
        windowDays: options.windowDays,
      }),
    { mustExist: true },
  );

  const output =
    options.format === "json"
      ? renderJsonReport(report)
      : renderMarkdownTrendReport(report);

  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return { report, output };
}

export function parseReportFormat(value: string): ReportFormat {
  if (value === "md" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

export function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}
