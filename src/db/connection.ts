import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Read handle on a built index. Read-only, so any number of processes can
 * hold one while a builder prepares the next file.
 */
export const openReadDatabase = (dbPath: string): Database.Database => {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  db.pragma("busy_timeout = 5000");
  db.pragma("query_only = ON");
  return db;
};

/**
 * Write handle used only by the index builder on its private temp file.
 * Bulk-load pragmas: the file is discarded if the build fails.
 */
export const openBuildDatabase = (dbPath: string): Database.Database => {
  ensureDir(dbPath);
  const db = new Database(dbPath);
  db.pragma("journal_mode = DELETE");
  db.pragma("synchronous = OFF");
  db.pragma("temp_store = MEMORY");
  db.pragma("cache_size = -100000");
  db.pragma("foreign_keys = ON");
  return db;
};
