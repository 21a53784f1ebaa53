import { TRENDING_TABLE } from "../store/schema.js";

export const STATISTICS = `
  SELECT
    COUNT(*) AS total_records,
    COUNT(DISTINCT repo_slug) AS unique_repositories,
    COUNT(DISTINCT language) AS languages,
    MIN(date) AS first_date,
    MAX(date) AS last_date
  FROM ${TRENDING_TABLE}
`;

export const TOP_REPOSITORIES = `
  SELECT
    repo_slug,
    COUNT(DISTINCT date) AS days_trending,
    MIN(date) AS first_seen,
    MAX(date) AS last_seen,
    json_group_array(DISTINCT language) AS languages
  FROM ${TRENDING_TABLE}
  WHERE (@language IS NULL OR language = @language)
  GROUP BY repo_slug
  ORDER BY days_trending DESC, repo_slug ASC
  LIMIT @limit
`;

export const MULTI_LANGUAGE_REPOSITORIES = `
  SELECT
    repo_slug,
    COUNT(DISTINCT language) AS language_count,
    COUNT(DISTINCT date) AS total_days,
    json_group_array(DISTINCT language) AS languages
  FROM ${TRENDING_TABLE}
  GROUP BY repo_slug
  HAVING language_count > 1
  ORDER BY language_count DESC, total_days DESC, repo_slug ASC
  LIMIT @limit
`;

export const LANGUAGE_POPULARITY = `
  SELECT
    language,
    COUNT(*) AS total_entries,
    COUNT(DISTINCT repo_slug) AS unique_repositories,
    COUNT(DISTINCT date) AS active_days
  FROM ${TRENDING_TABLE}
  GROUP BY language
  ORDER BY total_entries DESC, language ASC
`;

export const CONSISTENT_REPOSITORIES = `
  SELECT
    repo_slug,
    language,
    COUNT(DISTINCT date) AS days_trending,
    MIN(date) AS first_seen,
    MAX(date) AS last_seen,
    ROUND(
      CAST(COUNT(DISTINCT date) AS REAL) /
      (julianday(MAX(date)) - julianday(MIN(date)) + 1) * 100,
      2
    ) AS consistency_pct
  FROM ${TRENDING_TABLE}
  WHERE language = @language
  GROUP BY repo_slug, language
  HAVING days_trending >= @minDays
  ORDER BY consistency_pct DESC, days_trending DESC, repo_slug ASC
  LIMIT @limit
`;

export const RECENT_REPOSITORIES = `
  SELECT
    repo_slug,
    COUNT(DISTINCT date) AS days_in_window,
    MAX(date) AS last_seen
  FROM ${TRENDING_TABLE}
  WHERE language = @language
    AND date >= date(@asOf, '-' || CAST(@windowDays AS INTEGER) || ' days')
    AND date <= @asOf
  GROUP BY repo_slug
  ORDER BY days_in_window DESC, last_seen DESC, repo_slug ASC
  LIMIT @limit
`;

export const EXPORT_ROWS = `
  SELECT
    t1.repo_slug AS repo_slug,
    COUNT(DISTINCT t1.date) AS days_trending,
    MIN(t1.date) AS first_seen,
    MAX(t1.date) AS last_seen,
    (
      SELECT t2.description FROM ${TRENDING_TABLE} t2
      WHERE t2.repo_slug = t1.repo_slug AND t2.language = @language
      ORDER BY t2.date DESC
      LIMIT 1
    ) AS latest_description
  FROM ${TRENDING_TABLE} t1
  WHERE t1.language = @language
  GROUP BY t1.repo_slug
  ORDER BY days_trending DESC, repo_slug ASC
  LIMIT @limit
`;
