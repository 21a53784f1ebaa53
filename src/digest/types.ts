export interface TrendingRecord {
  readonly date: string;
  readonly language: string;
  readonly repoSlug: string;
  readonly description: string;
}

export type WarningKind = "missing-language" | "invalid-slug" | "malformed-entry";

export interface ParseWarning {
  readonly file: string;
  /** 1-based line number of the offending entry. */
  readonly line: number;
  readonly kind: WarningKind;
  readonly message: string;
}

export interface ParseResult {
  readonly records: readonly TrendingRecord[];
  readonly warnings: readonly ParseWarning[];
}

export interface ParseOptions {
  readonly date: string;
  /** Label used in warnings, usually the file path. */
  readonly file: string;
}

export type ClassifiedLine =
  | { readonly kind: "blank" }
  | { readonly kind: "language"; readonly language: string }
  | {
      readonly kind: "entry";
      readonly rawSlug: string;
      readonly description: string;
    }
  | { readonly kind: "malformed"; readonly preview: string }
  | { readonly kind: "other" };
