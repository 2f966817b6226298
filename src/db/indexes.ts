import type Database from "better-sqlite3";
import type { Logger } from "pino";

/** Composite indexes tuned to CardIndex query shapes. Created after bulk load. */
export const COMPOSITE_INDEXES: ReadonlyArray<{ name: string; sql: string }> = [
  { name: "idx_prints_set_lang", sql: "ON prints(set_code, lang)" },
  { name: "idx_prints_name_slug", sql: "ON prints(name_slug)" },
  { name: "idx_prints_token_lang", sql: "ON prints(is_token, lang)" },
  { name: "idx_prints_basic_lang_set", sql: "ON prints(is_basic_land, lang, set_code)" },
  { name: "idx_prints_oracle_lang", sql: "ON prints(oracle_id, lang)" },
  { name: "idx_prints_illustration", sql: "ON prints(illustration_id)" },
  { name: "idx_prints_set_number_lang", sql: "ON prints(set_code, collector_number, lang)" },
  { name: "idx_prints_released", sql: "ON prints(released_at DESC, set_code, collector_number)" },
];

export const createCompositeIndexes = (db: Database.Database, logger: Logger): void => {
  for (const index of COMPOSITE_INDEXES) {
    db.exec(`CREATE INDEX IF NOT EXISTS ${index.name} ${index.sql}`);
  }
  logger.debug({ count: COMPOSITE_INDEXES.length }, "Composite indexes created");
};

export const rebuildFullText = (db: Database.Database): void => {
  db.exec("INSERT INTO prints_fts(prints_fts) VALUES('rebuild')");
  db.exec("INSERT INTO prints_fts(prints_fts) VALUES('optimize')");
};

export const compact = (db: Database.Database): void => {
  db.exec("ANALYZE");
  db.exec("VACUUM");
};
