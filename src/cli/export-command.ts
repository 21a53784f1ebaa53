import fs from "node:fs/promises";
import { TrendAnalyzer } from "../analysis/trend-analyzer.js";
import type { ExportRow } from "../analysis/types.js";
import { renderCsv } from "../report/csv-reporter.js";
import { withTrendingStore } from "../store/trending-store.js";
import { DEFAULT_LANGUAGE } from "./report-command.js";
import {
  DEFAULT_DATABASE_PATH,
  resolveDatabasePath,
} from "./runtime-paths.js";

export interface ExportCommandOptions {
  readonly db?: string;
  readonly language?: string;
  readonly limit?: number;
  readonly out?: string;
}

export interface ExportCommandResult {
  readonly path: string;
  readonly rows: readonly ExportRow[];
}

const DEFAULT_EXPORT_LIMIT = 100;

export async function runExportCommand(
  options: ExportCommandOptions,
): Promise<ExportCommandResult> {
  const language = (options.language ?? DEFAULT_LANGUAGE).toLowerCase();
  const limit = options.limit ?? DEFAULT_EXPORT_LIMIT;
  const outPath = options.out ?? `top_${limit}_${language}.csv`;

  const rows = await withTrendingStore(
    resolveDatabasePath(options.db ?? DEFAULT_DATABASE_PATH),
    (store) => new TrendAnalyzer(store).exportRows({ language, limit }),
    { mustExist: true },
  );

  await fs.writeFile(outPath, renderCsv(rows), "utf8");
  return { path: outPath, rows };
}
