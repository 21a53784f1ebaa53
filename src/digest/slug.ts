const SLASH_WITH_SPACING = /\s*\/\s*/g;

export function normalizeRepoSlug(raw: string): string {
  return raw.trim().replace(SLASH_WITH_SPACING, "/");
}

export function isValidRepoSlug(slug: string): boolean {
  return slug.includes("/");
}
