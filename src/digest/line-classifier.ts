import type { ClassifiedLine } from "./types.js";

const LANGUAGE_HEADER = /^####\s+(.+)$/s;
const REPOSITORY_ENTRY =
  /^[*-]\s+\[([^\]]+)\]\(https?:\/\/github\.com\/[^)]+\):(.*)$/s;
const REPOSITORY_ENTRY_START = /^[*-]\s+\[[^\]]+\]\(https?:\/\/github\.com\//;

const PREVIEW_LENGTH = 50;

export function classifyLine(rawLine: string): ClassifiedLine {
  const line = rawLine.trim();

  if (!line || line.startsWith("## ")) {
    return { kind: "blank" };
  }

  const language = LANGUAGE_HEADER.exec(line);
  if (language) {
    return {
      kind: "language",
      language: (language[1] ?? "").trim().toLowerCase(),
    };
  }

  const entry = REPOSITORY_ENTRY.exec(line);
  if (entry) {
    return {
      kind: "entry",
      rawSlug: entry[1] ?? "",
      description: (entry[2] ?? "").trim(),
    };
  }

  if (line.startsWith("*") || line.startsWith("-")) {
    return { kind: "malformed", preview: line.slice(0, PREVIEW_LENGTH) };
  }

  return { kind: "other" };
}

/**
 * Whether a line following an entry terminates its wrapped description.
 * The entry test here only looks at the prefix, so a new bullet with a
 * broken tail still ends the previous description.
 */
export function endsContinuation(rawLine: string): boolean {
  const line = rawLine.trim();
  if (!line || line.startsWith("####")) {
    return true;
  }
  return REPOSITORY_ENTRY_START.test(line);
}
