import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import type { Logger } from "pino";

const MIGRATIONS_TABLE = "schema_migrations";
const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const MIGRATIONS_DIR = path.join(__dirname, "migrations");

export interface Migration {
  id: string;
  sql: string;
  checksum: string;
}

const computeChecksum = (contents: string): string =>
  createHash("sha256").update(contents).digest("hex");

export const loadMigrations = (dir: string = MIGRATIONS_DIR): Migration[] =>
  fs
    .readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort()
    .map((file) => {
      const sql = fs.readFileSync(path.join(dir, file), "utf8");
      return { id: path.basename(file, ".sql"), sql, checksum: computeChecksum(sql) };
    });

/** The schema version of an index is the id of the last migration applied to it. */
export const currentSchemaVersion = (migrations: Migration[] = loadMigrations()): string =>
  migrations.length === 0 ? "0" : migrations[migrations.length - 1].id;

const ensureMigrationsTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
};

export const runMigrations = (
  db: Database.Database,
  logger: Logger,
  migrations: Migration[] = loadMigrations(),
): string[] => {
  ensureMigrationsTable(db);
  const isApplied = db.prepare<[string], { checksum: string }>(
    `SELECT checksum FROM ${MIGRATIONS_TABLE} WHERE id = ?`,
  );
  const markApplied = db.prepare<[{ id: string; checksum: string; applied_at: number }]>(
    `INSERT INTO ${MIGRATIONS_TABLE} (id, checksum, applied_at)
     VALUES (@id, @checksum, @applied_at)
     ON CONFLICT(id) DO UPDATE SET checksum = excluded.checksum, applied_at = excluded.applied_at`,
  );

  const applied: string[] = [];
  for (const migration of migrations) {
    const existing = isApplied.get(migration.id);
    if (existing) {
      if (existing.checksum !== migration.checksum) {
        logger.warn({ migration: migration.id }, "Applied migration changed on disk; not re-running");
      }
      continue;
    }
    db.transaction(() => {
      db.exec(migration.sql);
      markApplied.run({ id: migration.id, checksum: migration.checksum, applied_at: Date.now() });
    })();
    applied.push(migration.id);
    logger.debug({ migration: migration.id }, "Applied migration");
  }
  return applied;
};
