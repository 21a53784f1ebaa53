export const TRENDING_TABLE = "trending_repos";

export const CREATE_TRENDING_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TRENDING_TABLE} (
    date TEXT NOT NULL,
    language TEXT NOT NULL,
    repo_slug TEXT NOT NULL,
    description TEXT NOT NULL,
    UNIQUE(date, language, repo_slug)
  )
`;

export const FIND_TRENDING_TABLE = `
  SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?
`;

export const UPSERT_TRENDING_RECORD = `
  INSERT INTO ${TRENDING_TABLE} (date, language, repo_slug, description)
  VALUES (?, ?, ?, ?)
  ON CONFLICT(date, language, repo_slug) DO UPDATE SET
    description = excluded.description
`;

export const SELECT_ALL_RECORDS = `
  SELECT date, language, repo_slug, description
  FROM ${TRENDING_TABLE}
  ORDER BY date, language, repo_slug
`;

export const COUNT_RECORDS = `SELECT COUNT(*) AS total FROM ${TRENDING_TABLE}`;

export interface TrendingRow {
  readonly date: string;
  readonly language: string;
  readonly repo_slug: string;
  readonly description: string;
}
