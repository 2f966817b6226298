import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Logger } from "pino";
import { openReadDatabase } from "../../db/connection";
import { currentSchemaVersion } from "../../db/migrate";
import type { Print, RelationshipEdge, RelationshipKind } from "../../domain/print";
import { isRelationshipKind } from "../../domain/print";
import { DatabaseUnavailableError } from "../../errors";
import { moduleLogger } from "../../utils/logger";
import { slugify } from "../../utils/slug";
import {
  DETERMINISTIC_ORDER,
  buildWhere,
  containsPattern,
  ftsExpression,
  normalizeFilter,
  type NormalizedPrintFilter,
  type PrintFilter,
  type TextMode,
} from "./printFilter";
import { fromEdgeRow, fromPrintRow, type EdgeRow, type PrintRow } from "./printRows";
import { QueryCache, cacheKeyFor, type QueryCacheStats } from "./queryCache";

export interface CardIndexOptions {
  logger: Logger;
  cacheTtlMs?: number;
  cacheCapacity?: number;
  now?: () => number;
  expectedSchemaVersion?: string;
}

export interface IndexVerification {
  ok: boolean;
  schemaVersion: string | null;
  expectedSchemaVersion: string;
  prints: number;
  builtAt: string | null;
  problems: string[];
}

export interface IndexStats {
  prints: number;
  tokens: number;
  basicLands: number;
  languages: number;
  sets: number;
  relationships: Record<RelationshipKind, number>;
  builtAt: string | null;
  source: string | null;
}

/** Candidates for a card name, from the narrowest match tier that has any. */
export interface NameCandidates {
  tier: "exact" | "prefix" | "substring" | "none";
  prints: readonly Print[];
}

const CANDIDATE_LIMIT = 5000;
const CORRUPTION_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_NOTADB", "SQLITE_CANTOPEN", "SQLITE_IOERR"]);

const REBUILD_HINT = "Run `build-index <catalog>` to rebuild the card index.";

/**
 * Read side of the card index. One instance owns one read-only connection;
 * callers receive it explicitly rather than through a shared global.
 */
export class CardIndex {
  private db: Database.Database;
  private readonly cache: QueryCache<readonly Print[]>;
  private readonly logger: Logger;

  private constructor(
    readonly indexPath: string,
    db: Database.Database,
    private readonly options: CardIndexOptions,
  ) {
    this.db = db;
    this.logger = moduleLogger(options.logger, "card-index");
    this.cache = new QueryCache({
      capacity: options.cacheCapacity ?? 1000,
      ttlMs: options.cacheTtlMs ?? 5 * 60 * 1000,
      now: options.now,
    });
  }

  static open(indexPath: string, options: CardIndexOptions): CardIndex {
    const resolved = path.resolve(indexPath);
    const db = CardIndex.connect(resolved, options.expectedSchemaVersion ?? currentSchemaVersion());
    return new CardIndex(resolved, db, options);
  }

  private static connect(indexPath: string, expectedSchemaVersion: string): Database.Database {
    if (!fs.existsSync(indexPath)) {
      throw new DatabaseUnavailableError(`Card index not found at ${indexPath}`);
    }
    let db: Database.Database;
    try {
      db = openReadDatabase(indexPath);
    } catch (error) {
      throw new DatabaseUnavailableError(`Card index at ${indexPath} cannot be opened`, REBUILD_HINT, {
        cause: error,
      });
    }
    try {
      const version = readSchemaVersion(db);
      if (version !== expectedSchemaVersion) {
        throw new DatabaseUnavailableError(
          `Card index schema ${version ?? "unknown"} does not match ${expectedSchemaVersion}`,
          REBUILD_HINT,
        );
      }
      return db;
    } catch (error) {
      db.close();
      if (error instanceof DatabaseUnavailableError) throw error;
      throw new DatabaseUnavailableError(`Card index at ${indexPath} is corrupt`, REBUILD_HINT, { cause: error });
    }
  }

  /** Swaps to the file currently at `indexPath`, e.g. after a rebuild. */
  reload(): void {
    const next = CardIndex.connect(this.indexPath, this.options.expectedSchemaVersion ?? currentSchemaVersion());
    const previous = this.db;
    this.db = next;
    previous.close();
    this.cache.clear();
    this.logger.info({ indexPath: this.indexPath }, "Card index reloaded");
  }

  close(): void {
    if (this.db.open) this.db.close();
    this.cache.clear();
  }

  query(filter: PrintFilter): readonly Print[] {
    const normalized = normalizeFilter(filter);
    return this.cache.getOrCompute(cacheKeyFor(normalized), () => this.runQuery(normalized));
  }

  /** Oracle-text search through the full-text index, with a substring fallback. */
  searchText(text: string, limit = 50): readonly Print[] {
    return this.query({ text, limit });
  }

  getPrint(id: string): Print | null {
    return this.guard(() => {
      const row = this.db.prepare<[string], PrintRow>("SELECT * FROM prints WHERE id = ?").get(id);
      return row ? fromPrintRow(row) : null;
    });
  }

  getPrints(ids: readonly string[]): Map<string, Print> {
    const found = new Map<string, Print>();
    const unique = [...new Set(ids)];
    for (let offset = 0; offset < unique.length; offset += 500) {
      const chunk = unique.slice(offset, offset + 500);
      const rows = this.guard(() =>
        this.db
          .prepare<string[], PrintRow>(`SELECT * FROM prints WHERE id IN (${chunk.map(() => "?").join(", ")})`)
          .all(...chunk),
      );
      for (const row of rows) found.set(row.id, fromPrintRow(row));
    }
    return found;
  }

  /** Outgoing edges in the order the catalog listed them. */
  getEdges(printId: string): RelationshipEdge[] {
    const rows = this.guard(() =>
      this.db
        .prepare<[string], EdgeRow>(
          `SELECT source_print_id, related_print_id, relationship_kind, related_card_name
           FROM card_relationships WHERE source_print_id = ? ORDER BY rowid`,
        )
        .all(printId),
    );
    return rows.map(fromEdgeRow).filter((edge): edge is RelationshipEdge => edge !== null);
  }

  findByCollectorNumber(setCode: string, collectorNumber: string, lang?: string): readonly Print[] {
    const rows = this.guard(() =>
      this.db
        .prepare<[string, string, string | null, string | null], PrintRow>(
          `SELECT p.* FROM prints p
           WHERE p.set_code = ? AND p.collector_number = ? AND (? IS NULL OR p.lang = ?)
           ORDER BY ${DETERMINISTIC_ORDER}`,
        )
        .all(setCode.toLowerCase(), collectorNumber, lang ?? null, lang ?? null),
    );
    return rows.map(fromPrintRow);
  }

  /**
   * Candidate prints for a requested card name. Exact slug matches first;
   * otherwise slug prefixes (which also catches the front face of a
   * multi-faced card); otherwise slugs containing the requested slug.
   */
  findPrintsByName(name: string, options: { lang?: string; limit?: number } = {}): NameCandidates {
    const slug = slugify(name);
    if (!slug) return { tier: "none", prints: [] };
    const limit = Math.min(options.limit ?? CANDIDATE_LIMIT, CANDIDATE_LIMIT);
    const lang = options.lang?.toLowerCase();
    const langClause = lang ? " AND p.lang = ?" : "";
    const langParams = lang ? [lang] : [];

    const exact = this.selectPrints(`p.name_slug = ?${langClause}`, [slug, ...langParams], limit);
    if (exact.length > 0) return { tier: "exact", prints: exact };

    // "{" sorts after every slug character, so this is an indexed range scan.
    const prefix = this.selectPrints(
      `p.name_slug > ? AND p.name_slug < ?${langClause}`,
      [slug, `${slug}{`, ...langParams],
      limit,
    );
    if (prefix.length > 0) return { tier: "prefix", prints: prefix };

    const substring = this.selectPrints(
      `p.name_slug LIKE ? ESCAPE '\\'${langClause}`,
      [containsPattern(slug), ...langParams],
      limit,
    );
    if (substring.length > 0) return { tier: "substring", prints: substring };

    return { tier: "none", prints: [] };
  }

  /**
   * One print per distinct artwork among the prints matching `filter`: the
   * first in result order for each illustration id. Prints without an
   * illustration id are left out.
   */
  uniqueArtworks(filter: PrintFilter = {}): readonly Print[] {
    const normalized = normalizeFilter(filter);
    return this.cache.getOrCompute(cacheKeyFor({ artworks: normalized }), () => {
      const { where, params } = buildWhere(normalized, "like");
      const rows = this.guard(() =>
        this.db
          .prepare<Array<string | number>, PrintRow>(
            `SELECT p.* FROM (
               SELECT p.*, ROW_NUMBER() OVER (PARTITION BY p.illustration_id ORDER BY ${DETERMINISTIC_ORDER}) AS art_rank
               FROM prints p
               WHERE p.illustration_id IS NOT NULL AND ${where}
             ) p
             WHERE p.art_rank = 1
             ORDER BY ${DETERMINISTIC_ORDER} LIMIT ?`,
          )
          .all(...params, normalized.limit),
      );
      return Object.freeze(rows.map(fromPrintRow));
    });
  }

  /** Number of distinct artworks matching `filter`; `limit` does not apply. */
  countUniqueArtworks(filter: PrintFilter = {}): number {
    const { where, params } = buildWhere(normalizeFilter(filter), "like");
    return this.guard(
      () =>
        this.db
          .prepare<Array<string | number>, { total: number }>(
            `SELECT COUNT(DISTINCT p.illustration_id) AS total FROM prints p WHERE ${where}`,
          )
          .get(...params)?.total ?? 0,
    );
  }

  /** Token prints whose rules text or keywords mention `keyword`. */
  findTokensByKeyword(keyword: string, options: { setCode?: string; limit?: number } = {}): readonly Print[] {
    const wanted = keyword.trim();
    if (!wanted) return [];
    const limit = Math.min(options.limit ?? CANDIDATE_LIMIT, CANDIDATE_LIMIT);
    const pattern = containsPattern(wanted);
    const setClause = options.setCode ? " AND p.set_code = ?" : "";
    const setParams = options.setCode ? [options.setCode.toLowerCase()] : [];
    return this.selectPrints(
      `p.is_token = 1
       AND (lower(coalesce(p.oracle_text, '')) LIKE ? ESCAPE '\\' OR lower(p.keywords) LIKE ? ESCAPE '\\')${setClause}`,
      [pattern, pattern, ...setParams],
      limit,
    );
  }

  stats(): IndexStats {
    return this.guard(() => {
      const counts = this.db
        .prepare<[], { prints: number; tokens: number; basics: number; languages: number; sets: number }>(
          `SELECT COUNT(*) AS prints,
                  COALESCE(SUM(is_token), 0) AS tokens,
                  COALESCE(SUM(is_basic_land), 0) AS basics,
                  COUNT(DISTINCT lang) AS languages,
                  COUNT(DISTINCT set_code) AS sets
           FROM prints`,
        )
        .get();
      const relationships: Record<RelationshipKind, number> = {
        combo_piece: 0,
        meld_part: 0,
        meld_result: 0,
        token: 0,
      };
      const kindRows = this.db
        .prepare<[], { kind: string; total: number }>(
          "SELECT relationship_kind AS kind, COUNT(*) AS total FROM card_relationships GROUP BY relationship_kind",
        )
        .all();
      for (const row of kindRows) {
        if (isRelationshipKind(row.kind)) relationships[row.kind] = row.total;
      }
      return {
        prints: counts?.prints ?? 0,
        tokens: counts?.tokens ?? 0,
        basicLands: counts?.basics ?? 0,
        languages: counts?.languages ?? 0,
        sets: counts?.sets ?? 0,
        relationships,
        builtAt: readMeta(this.db, "built_at"),
        source: readMeta(this.db, "source"),
      };
    });
  }

  verify(): IndexVerification {
    const expected = this.options.expectedSchemaVersion ?? currentSchemaVersion();
    return this.guard(() => {
      const schemaVersion = readSchemaVersion(this.db);
      const prints = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM prints").get()?.total ?? 0;
      const integrity = this.db.pragma("quick_check", { simple: true });
      const problems: string[] = [];
      if (schemaVersion !== expected) problems.push(`schema version ${schemaVersion ?? "missing"}, expected ${expected}`);
      if (prints === 0) problems.push("index contains no prints");
      if (integrity !== "ok") problems.push(`integrity check: ${String(integrity)}`);
      return {
        ok: problems.length === 0,
        schemaVersion,
        expectedSchemaVersion: expected,
        prints,
        builtAt: readMeta(this.db, "built_at"),
        problems,
      };
    });
  }

  cacheStats(): QueryCacheStats {
    return this.cache.stats();
  }

  private runQuery(filter: NormalizedPrintFilter): readonly Print[] {
    const usesFullText = Boolean(
      (filter.name && ftsExpression("name", filter.name)) || (filter.text && ftsExpression("oracle_text", filter.text)),
    );
    if (!usesFullText) return this.select(filter, "like");

    const viaFullText = this.select(filter, "fts");
    if (viaFullText.length > 0) return viaFullText;
    this.logger.debug({ name: filter.name, text: filter.text }, "Full-text query empty; falling back to substring scan");
    return this.select(filter, "like");
  }

  private select(filter: NormalizedPrintFilter, mode: TextMode): readonly Print[] {
    const { where, params } = buildWhere(filter, mode);
    return this.selectPrints(where, params, filter.limit);
  }

  private selectPrints(where: string, params: Array<string | number>, limit: number): readonly Print[] {
    const rows = this.guard(() =>
      this.db
        .prepare<Array<string | number>, PrintRow>(
          `SELECT p.* FROM prints p WHERE ${where} ORDER BY ${DETERMINISTIC_ORDER} LIMIT ?`,
        )
        .all(...params, limit),
    );
    return Object.freeze(rows.map(fromPrintRow));
  }

  /** Maps storage-level corruption to DatabaseUnavailableError; everything else propagates. */
  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof Database.SqliteError && CORRUPTION_CODES.has(error.code)) {
        throw new DatabaseUnavailableError(`Card index at ${this.indexPath} is unreadable`, REBUILD_HINT, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

const readMeta = (db: Database.Database, key: string): string | null =>
  db.prepare<[string], { value: string }>("SELECT value FROM metadata WHERE key = ?").get(key)?.value ?? null;

const readSchemaVersion = (db: Database.Database): string | null => readMeta(db, "schema_version");
