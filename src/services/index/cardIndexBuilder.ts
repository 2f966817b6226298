import fs from "node:fs";
import path from "node:path";
import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { openBuildDatabase } from "../../db/connection";
import { compact, createCompositeIndexes, rebuildFullText } from "../../db/indexes";
import { currentSchemaVersion, loadMigrations, runMigrations } from "../../db/migrate";
import { IndexLockedError, describeError } from "../../errors";
import { moduleLogger } from "../../utils/logger";
import { openCatalogStream } from "../ingest/catalogReader";
import { normalizeCard, type NormalizedCard } from "../ingest/printNormalizer";
import { PRINT_COLUMNS, toPrintRow, type PrintRow } from "./printRows";

export interface CardIndexBuilderOptions {
  indexPath: string;
  logger: Logger;
  batchSize?: number;
}

export interface BuildStats {
  indexPath: string;
  schemaVersion: string;
  records: number;
  prints: number;
  relationships: number;
  skipped: number;
  undecodableLines: number;
  durationMs: number;
}

const upsertSql = `
  INSERT INTO prints (${PRINT_COLUMNS.join(", ")})
  VALUES (${PRINT_COLUMNS.map((column) => `@${column}`).join(", ")})
  ON CONFLICT(id) DO UPDATE SET
    ${PRINT_COLUMNS.filter((column) => column !== "id")
      .map((column) => `${column} = excluded.${column}`)
      .join(",\n    ")}
`;

/**
 * Single writer for the card index. Builds into a private sibling file and
 * renames it over the live index only once every step has succeeded, so
 * readers see either the previous index or the complete new one.
 */
export class CardIndexBuilder {
  private readonly indexPath: string;
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(options: CardIndexBuilderOptions) {
    this.indexPath = path.resolve(options.indexPath);
    this.batchSize = Math.max(1, options.batchSize ?? 1000);
    this.logger = moduleLogger(options.logger, "index-builder");
  }

  get lockPath(): string {
    return `${this.indexPath}.lock`;
  }

  async buildFromFile(catalogPath: string): Promise<BuildStats> {
    const reader = await openCatalogStream(catalogPath, this.logger);
    const stats = await this.build(reader.records(), { source: path.basename(catalogPath) });
    stats.undecodableLines = reader.stats.undecodableLines;
    return stats;
  }

  async build(records: AsyncIterable<unknown>, meta: { source?: string } = {}): Promise<BuildStats> {
    const started = Date.now();
    fs.mkdirSync(path.dirname(this.indexPath), { recursive: true });
    const releaseLock = this.acquireLock();
    const tempPath = `${this.indexPath}.building-${process.pid}`;
    fs.rmSync(tempPath, { force: true });

    let db: Database.Database | null = null;
    try {
      db = openBuildDatabase(tempPath);
      const migrations = loadMigrations();
      runMigrations(db, this.logger, migrations);
      const schemaVersion = currentSchemaVersion(migrations);

      const writeBatch = this.prepareBatchWriter(db);
      const stats: BuildStats = {
        indexPath: this.indexPath,
        schemaVersion,
        records: 0,
        prints: 0,
        relationships: 0,
        skipped: 0,
        undecodableLines: 0,
        durationMs: 0,
      };

      let batch: NormalizedCard[] = [];
      for await (const record of records) {
        stats.records++;
        const outcome = normalizeCard(record);
        if (!outcome.ok) {
          stats.skipped++;
          this.logger.debug({ record: stats.records, reason: outcome.error }, "Skipping catalog record");
          continue;
        }
        batch.push(outcome.value);
        if (batch.length >= this.batchSize) {
          stats.relationships += writeBatch(batch);
          stats.prints += batch.length;
          batch = [];
          if (stats.prints % (this.batchSize * 50) === 0) {
            this.logger.info({ prints: stats.prints }, "Ingest progress");
          }
        }
      }
      if (batch.length > 0) {
        stats.relationships += writeBatch(batch);
        stats.prints += batch.length;
      }

      this.finalize(db, stats, meta.source ?? null);
      db.close();
      db = null;

      fs.renameSync(tempPath, this.indexPath);
      stats.durationMs = Date.now() - started;
      if (stats.skipped > 0) {
        this.logger.warn({ skipped: stats.skipped }, "Catalog records skipped during ingest");
      }
      this.logger.info(
        { prints: stats.prints, relationships: stats.relationships, durationMs: stats.durationMs },
        "Card index built",
      );
      return stats;
    } catch (error) {
      this.logger.error({ err: error }, "Card index build failed; live index left untouched");
      throw error;
    } finally {
      db?.close();
      fs.rmSync(tempPath, { force: true });
      releaseLock();
    }
  }

  private acquireLock(): () => void {
    let fd: number;
    try {
      fd = fs.openSync(this.lockPath, "wx");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") {
        throw new IndexLockedError(this.lockPath);
      }
      throw error;
    }
    fs.writeSync(fd, `${process.pid}\n`);
    fs.closeSync(fd);
    return () => {
      try {
        fs.unlinkSync(this.lockPath);
      } catch (error) {
        this.logger.warn({ lockPath: this.lockPath, error: describeError(error) }, "Failed to remove index lock");
      }
    };
  }

  /** Returns a transactional writer; each call writes one batch and reports edges inserted. */
  private prepareBatchWriter(db: Database.Database): (batch: NormalizedCard[]) => number {
    const upsertPrint = db.prepare<[PrintRow]>(upsertSql);
    const clearEdges = db.prepare<[string]>("DELETE FROM card_relationships WHERE source_print_id = ?");
    const insertEdge = db.prepare<[string, string, string, string]>(
      `INSERT OR IGNORE INTO card_relationships
         (source_print_id, related_print_id, relationship_kind, related_card_name)
       VALUES (?, ?, ?, ?)`,
    );

    return db.transaction((batch: NormalizedCard[]) => {
      let inserted = 0;
      for (const { print, edges } of batch) {
        upsertPrint.run(toPrintRow(print));
        clearEdges.run(print.id);
        for (const edge of edges) {
          inserted += insertEdge.run(edge.sourcePrintId, edge.relatedPrintId, edge.kind, edge.relatedCardName).changes;
        }
      }
      return inserted;
    });
  }

  private finalize(db: Database.Database, stats: BuildStats, source: string | null): void {
    createCompositeIndexes(db, this.logger);

    const counted = db.prepare<[], { prints: number; edges: number }>(
      "SELECT (SELECT COUNT(*) FROM prints) AS prints, (SELECT COUNT(*) FROM card_relationships) AS edges",
    ).get();
    // Duplicate ids in the catalog collapse into one row; report what is stored.
    if (counted) {
      stats.prints = counted.prints;
      stats.relationships = counted.edges;
    }

    const setMeta = db.prepare<[string, string]>(
      "INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
    );
    db.transaction(() => {
      setMeta.run("schema_version", stats.schemaVersion);
      setMeta.run("built_at", new Date().toISOString());
      setMeta.run("print_count", String(stats.prints));
      setMeta.run("relationship_count", String(stats.relationships));
      if (source) setMeta.run("source", source);
    })();

    this.logger.info("Running ANALYZE and VACUUM");
    compact(db);

    // VACUUM may renumber prints.rowid, which the full-text index keys on.
    this.logger.info("Rebuilding full-text index");
    rebuildFullText(db);
  }
}
