export { parseDigest, parseDigestFile, formatWarning } from "./digest-parser.js";
export { classifyLine, endsContinuation } from "./line-classifier.js";
export { normalizeRepoSlug, isValidRepoSlug } from "./slug.js";
export type {
  ClassifiedLine,
  ParseOptions,
  ParseResult,
  ParseWarning,
  TrendingRecord,
  WarningKind,
} from "./types.js";
