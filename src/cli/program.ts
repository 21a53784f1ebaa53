import { Command } from "commander";
import { runExportCommand } from "./export-command.js";
import { runExtractCommand } from "./extract-command.js";
import {
  DEFAULT_LANGUAGE,
  parsePositiveInteger,
  parseReportFormat,
  runReportCommand,
} from "./report-command.js";
import { DEFAULT_DATABASE_PATH, DEFAULT_INPUT_PATH } from "./runtime-paths.js";
import {
  describeError,
  processConsole,
  type CommandConsole,
} from "./terminal.js";

interface ExtractCliOptions {
  input: string;
  output: string;
}

interface ReportCliOptions {
  db: string;
  language: string;
  limit: string;
  minDays: string;
  windowDays: string;
  asOf?: string;
  format: string;
  out?: string;
}

interface ExportCliOptions {
  db: string;
  language: string;
  limit: string;
  out?: string;
}

/** Builds the CLI; every command reports through `io`. */
export function buildProgram(
  toolVersion: string,
  io: CommandConsole = processConsole,
): Command {
  const program = new Command();

  program
    .name("trending-digest")
    .version(toolVersion)
    .description(
      "Load dated trending-repository digests into SQLite and analyse them",
    );

  program
    .command("extract", { isDefault: true })
    .description("Parse YYYY-MM-DD.md digest files into the database")
    .option("--input <path>", "File or directory to scan", DEFAULT_INPUT_PATH)
    .option(
      "--output <path>",
      "Destination SQLite database file",
      DEFAULT_DATABASE_PATH,
    )
    .action(async (options: ExtractCliOptions) => {
      try {
        await runExtractCommand(
          { input: options.input, output: options.output },
          io,
        );
      } catch (error) {
        await io.warn(describeError(error));
        process.exitCode = 1;
      }
    });

  program
    .command("report")
    .description("Summarise a populated database")
    .option("--db <path>", "SQLite database to read", DEFAULT_DATABASE_PATH)
    .option(
      "--language <name>",
      "Language for per-language sections",
      DEFAULT_LANGUAGE,
    )
    .option("--limit <number>", "Rows per section", "10")
    .option(
      "--min-days <number>",
      "Minimum days for consistency ranking",
      "30",
    )
    .option("--window-days <number>", "Recent activity window in days", "30")
    .option(
      "--as-of <date>",
      "End of the recent activity window (YYYY-MM-DD)",
    )
    .option("--format <format>", "Output format (md|json)", "md")
    .option("--out <file>", "Write report to file")
    .action(async (options: ReportCliOptions) => {
      try {
        const result = await runReportCommand(
          {
            db: options.db,
            language: options.language,
            limit: parsePositiveInteger(options.limit, "--limit"),
            minDays: parsePositiveInteger(options.minDays, "--min-days"),
            windowDays: parsePositiveInteger(
              options.windowDays,
              "--window-days",
            ),
            asOf: options.asOf,
            format: parseReportFormat(options.format),
            out: options.out,
          },
          toolVersion,
        );
        if (!options.out) {
          await io.info(result.output);
        }
      } catch (error) {
        await io.warn(describeError(error));
        process.exitCode = 1;
      }
    });

  program
    .command("export")
    .description("Export the top repositories of a language to CSV")
    .option("--db <path>", "SQLite database to read", DEFAULT_DATABASE_PATH)
    .option("--language <name>", "Language to export", DEFAULT_LANGUAGE)
    .option("--limit <number>", "Number of repositories", "100")
    .option(
      "--out <file>",
      "CSV destination (default: top_<limit>_<lang>.csv)",
    )
    .action(async (options: ExportCliOptions) => {
      try {
        const result = await runExportCommand({
          db: options.db,
          language: options.language,
          limit: parsePositiveInteger(options.limit, "--limit"),
          out: options.out,
        });
        await io.info(
          `Exported ${result.rows.length} repositories to: ${result.path}`,
        );
      } catch (error) {
        await io.warn(describeError(error));
        process.exitCode = 1;
      }
    });

  return program;
}
