import fs from "node:fs";
import Database from "better-sqlite3";
import type { TrendingRecord } from "../digest/types.js";
import {
  COUNT_RECORDS,
  CREATE_TRENDING_TABLE,
  FIND_TRENDING_TABLE,
  SELECT_ALL_RECORDS,
  TRENDING_TABLE,
  UPSERT_TRENDING_RECORD,
  type TrendingRow,
} from "./schema.js";

type UpsertParams = [string, string, string, string];

export type SqlValue = string | number | null;
export type NamedParams = Readonly<Record<string, SqlValue>>;

export interface StoreOpenOptions {
  /** Fail when the file or its table is missing; no schema is written. */
  readonly mustExist?: boolean;
}

export class TrendingStore {
  private readonly upsertStatement: Database.Statement<UpsertParams>;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly db: Database.Database,
  ) {
    this.upsertStatement = this.db.prepare<UpsertParams>(
      UPSERT_TRENDING_RECORD,
    );
  }

  static open(dbPath: string, options: StoreOpenOptions = {}): TrendingStore {
    if (
      options.mustExist &&
      dbPath !== ":memory:" &&
      !fs.existsSync(dbPath)
    ) {
      throw new Error(`Database not found: ${dbPath}`);
    }
    const db = new Database(dbPath);
    try {
      if (options.mustExist) {
        assertTrendingTable(db, dbPath);
      } else {
        db.exec(CREATE_TRENDING_TABLE);
      }
      return new TrendingStore(dbPath, db);
    } catch (error) {
      db.close();
      throw error;
    }
  }

  /** Later records win over earlier ones sharing (date, language, repo_slug). */
  upsert(records: readonly TrendingRecord[]): number {
    if (records.length === 0) {
      return 0;
    }
    const writeBatch = this.db.transaction(
      (batch: readonly TrendingRecord[]) => {
        for (const record of batch) {
          this.upsertStatement.run(
            record.date,
            record.language,
            record.repoSlug,
            record.description,
          );
        }
      },
    );
    writeBatch(records);
    return records.length;
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>(COUNT_RECORDS).get();
    return row?.total ?? 0;
  }

  all(): TrendingRecord[] {
    return this.db
      .prepare<[], TrendingRow>(SELECT_ALL_RECORDS)
      .all()
      .map(toRecord);
  }

  query<Row>(sql: string, params?: NamedParams): Row[] {
    if (!params) {
      return this.db.prepare<[], Row>(sql).all();
    }
    return this.db.prepare<NamedParams, Row>(sql).all(params);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }
}

export async function withTrendingStore<T>(
  dbPath: string,
  fn: (store: TrendingStore) => Promise<T> | T,
  options: StoreOpenOptions = {},
): Promise<T> {
  const store = TrendingStore.open(dbPath, options);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

function assertTrendingTable(db: Database.Database, dbPath: string): void {
  const table = db
    .prepare<[string], { name: string }>(FIND_TRENDING_TABLE)
    .get(TRENDING_TABLE);
  if (!table) {
    throw new Error(`Database ${dbPath} has no ${TRENDING_TABLE} table`);
  }
}

function toRecord(row: TrendingRow): TrendingRecord {
  return {
    date: row.date,
    language: row.language,
    repoSlug: row.repo_slug,
    description: row.description,
  };
}
