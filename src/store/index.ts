export { TrendingStore, withTrendingStore } from "./trending-store.js";
export type {
  NamedParams,
  SqlValue,
  StoreOpenOptions,
} from "./trending-store.js";
export { TRENDING_TABLE } from "./schema.js";
export type { TrendingRow } from "./schema.js";
