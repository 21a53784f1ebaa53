import path from "node:path";
import { formatWarning, parseDigestFile } from "../digest/digest-parser.js";
import type { ParseResult } from "../digest/types.js";
import { discoverDigestFiles } from "../ingest/file-discovery.js";
import type { DigestFile } from "../ingest/types.js";
import {
  withTrendingStore,
  type TrendingStore,
} from "../store/trending-store.js";
import {
  DEFAULT_DATABASE_PATH,
  DEFAULT_INPUT_PATH,
  resolveDatabasePath,
} from "./runtime-paths.js";
import { processConsole, type CommandConsole } from "./terminal.js";

export interface ExtractOptions {
  readonly input?: string;
  readonly output?: string;
}

export interface FileOutcome {
  readonly file: string;
  readonly date: string;
  readonly records: number;
  readonly warnings: number;
  readonly error?: string;
}

export interface ExtractSummary {
  readonly database: string;
  readonly filesFound: number;
  readonly totalRecords: number;
  readonly totalWarnings: number;
  readonly files: readonly FileOutcome[];
}

export async function runExtractCommand(
  options: ExtractOptions = {},
  output: CommandConsole = processConsole,
): Promise<ExtractSummary> {
  const input = options.input ?? DEFAULT_INPUT_PATH;
  const database = options.output ?? DEFAULT_DATABASE_PATH;

  await output.info(`Scanning for markdown files in: ${input}`);
  const discovery = await discoverDigestFiles(input);
  if (discovery.files.length === 0) {
    throw new Error(
      "No valid markdown files found matching YYYY-MM-DD.md pattern",
    );
  }
  await output.info(`Found ${discovery.files.length} markdown files`);

  await output.info(`Connecting to database: ${database}`);
  const outcomes = await withTrendingStore(
    resolveDatabasePath(database),
    async (store) => {
      const results: FileOutcome[] = [];
      for (const file of discovery.files) {
        results.push(await extractFile(file, store, output));
      }
      return results;
    },
  );

  const totalRecords = outcomes.reduce((sum, item) => sum + item.records, 0);
  const totalWarnings = outcomes.reduce((sum, item) => sum + item.warnings, 0);

  await output.info("");
  await output.info(`Completed! Total repositories processed: ${totalRecords}`);
  await output.info(`Database saved to: ${database}`);

  return {
    database,
    filesFound: discovery.files.length,
    totalRecords,
    totalWarnings,
    files: outcomes,
  };
}

async function extractFile(
  file: DigestFile,
  store: TrendingStore,
  output: CommandConsole,
): Promise<FileOutcome> {
  let parsed: ParseResult;
  try {
    parsed = await parseDigestFile(file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    await output.warn(`Error reading ${file.displayPath}: ${message}`);
    await output.info(processedLine(file, 0));
    return {
      file: file.displayPath,
      date: file.date,
      records: 0,
      warnings: 0,
      error: message,
    };
  }

  for (const warning of parsed.warnings) {
    await output.warn(formatWarning(warning));
  }

  const records = store.upsert(parsed.records);
  await output.info(processedLine(file, records));
  return {
    file: file.displayPath,
    date: file.date,
    records,
    warnings: parsed.warnings.length,
  };
}

function processedLine(file: DigestFile, records: number): string {
  const name = path.basename(file.absolutePath);
  return `Processed ${name}: ${records} repositories`;
}
