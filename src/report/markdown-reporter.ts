import type { TrendReport } from "./types.js";
import {
  formatLanguageName,
  renderAsciiBox,
  renderAsciiTable,
  truncateText,
} from "./report-utils.js";

const EMPTY_SECTION = "No data.";
const LANGUAGE_LIST_WIDTH = 40;

export function renderMarkdownTrendReport(report: TrendReport): string {
  const language = formatLanguageName(report.language);
  const lines: string[] = [renderHeaderBlock(report)];

  pushSection(
    lines,
    `Top ${language} Repositories by Days Trending`,
    renderAsciiTable(
      report.top_for_language.map((repo) => [
        repo.repoSlug,
        String(repo.daysTrending),
        repo.firstSeen,
        repo.lastSeen,
      ]),
      ["Repository", "Days", "First Seen", "Last Seen"],
    ),
    report.top_for_language.length,
  );

  pushSection(
    lines,
    "Repositories Trending in Multiple Languages",
    renderAsciiTable(
      report.multi_language.map((repo) => [
        repo.repoSlug,
        String(repo.languageCount),
        String(repo.totalDays),
        truncateText(repo.languages.join(", "), LANGUAGE_LIST_WIDTH),
      ]),
      ["Repository", "Languages", "Days", "Language List"],
    ),
    report.multi_language.length,
  );

  pushSection(
    lines,
    "Language Popularity",
    renderAsciiTable(
      report.language_popularity.map((entry) => [
        entry.language,
        String(entry.totalEntries),
        String(entry.uniqueRepositories),
        String(entry.activeDays),
      ]),
      ["Language", "Entries", "Repositories", "Active Days"],
    ),
    report.language_popularity.length,
  );

  pushSection(
    lines,
    "Top Repositories Overall",
    renderAsciiTable(
      report.top_overall.map((repo) => [
        repo.repoSlug,
        String(repo.daysTrending),
        String(repo.languages.length),
        truncateText(repo.languages.join(", "), LANGUAGE_LIST_WIDTH),
      ]),
      ["Repository", "Days", "Languages", "Language List"],
    ),
    report.top_overall.length,
  );

  pushSection(
    lines,
    `Most Consistent ${language} Repositories`,
    renderAsciiTable(
      report.most_consistent.map((repo) => [
        repo.repoSlug,
        String(repo.daysTrending),
        repo.firstSeen,
        repo.lastSeen,
        repo.consistencyPct.toFixed(2),
      ]),
      ["Repository", "Days", "First", "Last", "Consistency %"],
    ),
    report.most_consistent.length,
  );

  pushSection(
    lines,
    `Recently Trending ${language} Repositories`,
    renderAsciiTable(
      report.recent.map((repo) => [
        repo.repoSlug,
        String(repo.daysInWindow),
        repo.lastSeen,
      ]),
      ["Repository", "Days in Window", "Last Seen"],
    ),
    report.recent.length,
  );

  return lines.join("\n");
}

function renderHeaderBlock(report: TrendReport): string {
  const stats = report.statistics;
  const range =
    stats.firstDate && stats.lastDate
      ? `${stats.firstDate} to ${stats.lastDate}`
      : "n/a";
  return renderAsciiBox([
    "Trending Repository Analysis",
    `Database: ${report.database}`,
    `Total Records: ${stats.totalRecords}`,
    `Unique Repositories: ${stats.uniqueRepositories}`,
    `Languages: ${stats.languages}`,
    `Date Range: ${range}`,
  ]);
}

function pushSection(
  lines: string[],
  title: string,
  table: string,
  rowCount: number,
): void {
  lines.push("");
  lines.push(`### ${title}`);
  lines.push("");
  lines.push(rowCount > 0 ? table : EMPTY_SECTION);
}
