import type { ExportRow } from "../analysis/types.js";

const CSV_HEADERS = [
  "repo_slug",
  "days_trending",
  "first_trending",
  "last_trending",
  "latest_description",
] as const;

export function renderCsv(rows: readonly ExportRow[]): string {
  const lines = [CSV_HEADERS.join(",")];
  for (const row of rows) {
    lines.push(
      [
        row.repoSlug,
        String(row.daysTrending),
        row.firstSeen,
        row.lastSeen,
        row.latestDescription,
      ]
        .map(escapeCsvField)
        .join(","),
    );
  }
  return `${lines.join("\n")}\n`;
}

export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
