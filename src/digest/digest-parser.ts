import fs from "node:fs/promises";
import type { DigestFile } from "../ingest/types.js";
import { classifyLine, endsContinuation } from "./line-classifier.js";
import { isValidRepoSlug, normalizeRepoSlug } from "./slug.js";
import type {
  ParseOptions,
  ParseResult,
  ParseWarning,
  TrendingRecord,
  WarningKind,
} from "./types.js";

// Invalid UTF-8 is a read error, not replacement characters.
const UTF8_DECODER = new TextDecoder("utf-8", { fatal: true });

interface ParseState {
  currentLanguage: string | null;
  readonly records: TrendingRecord[];
  readonly warnings: ParseWarning[];
}

interface Continuation {
  readonly description: string;
  readonly nextCursor: number;
}

export function parseDigest(
  content: string,
  options: ParseOptions,
): ParseResult {
  const lines = content.split(/\r\n|\r|\n/);
  const state: ParseState = {
    currentLanguage: null,
    records: [],
    warnings: [],
  };

  let cursor = 0;
  while (cursor < lines.length) {
    const lineNumber = cursor + 1;
    const classified = classifyLine(lines[cursor] ?? "");

    switch (classified.kind) {
      case "language":
        state.currentLanguage = classified.language;
        cursor += 1;
        break;

      case "entry": {
        const language = state.currentLanguage;
        if (language === null) {
          warn(
            state,
            options,
            lineNumber,
            "missing-language",
            "Repository entry without language section, skipping",
          );
          cursor += 1;
          break;
        }

        const continuation = collectContinuation(
          lines,
          cursor + 1,
          classified.description,
        );
        cursor = continuation.nextCursor;

        const repoSlug = normalizeRepoSlug(classified.rawSlug);
        if (!isValidRepoSlug(repoSlug)) {
          warn(
            state,
            options,
            lineNumber,
            "invalid-slug",
            `Invalid repo slug '${classified.rawSlug}', skipping`,
          );
          break;
        }

        state.records.push({
          date: options.date,
          language,
          repoSlug,
          description: continuation.description.trim(),
        });
        break;
      }

      case "malformed":
        warn(
          state,
          options,
          lineNumber,
          "malformed-entry",
          `Malformed repository entry, skipping: ${classified.preview}...`,
        );
        cursor += 1;
        break;

      case "blank":
      case "other":
        cursor += 1;
        break;
    }
  }

  return { records: state.records, warnings: state.warnings };
}

export async function parseDigestFile(file: DigestFile): Promise<ParseResult> {
  const bytes = await fs.readFile(file.absolutePath);
  const content = UTF8_DECODER.decode(bytes);
  return parseDigest(content, { date: file.date, file: file.displayPath });
}

export function formatWarning(warning: ParseWarning): string {
  return `Warning: ${warning.file}:${warning.line} - ${warning.message}`;
}

function collectContinuation(
  lines: readonly string[],
  start: number,
  initial: string,
): Continuation {
  let description = initial;
  let cursor = start;
  while (cursor < lines.length) {
    const next = lines[cursor] ?? "";
    if (endsContinuation(next)) {
      break;
    }
    description += ` ${next.trim()}`;
    cursor += 1;
  }
  return { description, nextCursor: cursor };
}

function warn(
  state: ParseState,
  options: ParseOptions,
  line: number,
  kind: WarningKind,
  message: string,
): void {
  state.warnings.push({ file: options.file, line, kind, message });
}
