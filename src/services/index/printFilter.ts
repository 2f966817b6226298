import { z } from "zod";
import { ValidationError } from "../../errors";
import { slugify } from "../../utils/slug";

export const MAX_QUERY_LIMIT = 5000;
export const DEFAULT_QUERY_LIMIT = 100;

const COLOR_SYMBOLS = ["W", "U", "B", "R", "G"] as const;

const lowerList = z
  .array(z.string().trim().min(1))
  .max(MAX_QUERY_LIMIT)
  .transform((values) => [...new Set(values.map((value) => value.toLowerCase()))].sort());

export const printFilterSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    nameExact: z.string().trim().min(1).optional(),
    text: z.string().trim().min(1).optional(),
    setCodes: lowerList.optional(),
    langs: lowerList.optional(),
    rarities: lowerList.optional(),
    typeLine: z.string().trim().min(1).optional(),
    colorIdentity: z
      .array(z.string().trim().toUpperCase().pipe(z.enum(COLOR_SYMBOLS)))
      .transform((values) => [...new Set(values)].sort())
      .optional(),
    isToken: z.boolean().optional(),
    isBasicLand: z.boolean().optional(),
    oracleId: z.string().trim().min(1).optional(),
    illustrationId: z.string().trim().min(1).optional(),
    artist: z.string().trim().min(1).optional(),
    frame: z.string().trim().min(1).optional(),
    frameEffect: z.string().trim().min(1).toLowerCase().optional(),
    fullArt: z.boolean().optional(),
    ids: z
      .array(z.string().trim().min(1))
      .max(MAX_QUERY_LIMIT)
      .transform((values) => [...new Set(values)].sort())
      .optional(),
    limit: z.number().int().min(1).max(MAX_QUERY_LIMIT).default(DEFAULT_QUERY_LIMIT),
  })
  .strict();

export type PrintFilter = z.input<typeof printFilterSchema>;
export type NormalizedPrintFilter = z.output<typeof printFilterSchema>;

export const normalizeFilter = (filter: PrintFilter): NormalizedPrintFilter => {
  const parsed = printFilterSchema.safeParse(filter);
  if (!parsed.success) {
    throw new ValidationError(
      "Malformed print filter",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "filter"}: ${issue.message}`),
    );
  }
  return parsed.data;
};

export type TextMode = "fts" | "like";

export interface SqlFragment {
  where: string;
  params: Array<string | number>;
}

const escapeLike = (value: string): string => value.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`);

export const containsPattern = (value: string): string => `%${escapeLike(value)}%`;

/** Word tokens of free text, as FTS5 prefix terms restricted to one column. */
export const ftsExpression = (column: string, value: string): string | null => {
  const tokens = value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
  if (tokens.length === 0) return null;
  return tokens.map((token) => `${column} : "${token}"*`).join(" AND ");
};

const placeholders = (count: number): string => new Array(count).fill("?").join(", ");

/**
 * WHERE clause for a normalized filter. With `fts`, name and text filters go
 * through the full-text index; with `like` they become substring scans.
 */
export const buildWhere = (filter: NormalizedPrintFilter, mode: TextMode): SqlFragment => {
  const clauses: string[] = [];
  const params: Array<string | number> = [];

  const textClause = (column: "name" | "oracle_text", value: string) => {
    const expression = mode === "fts" ? ftsExpression(column, value) : null;
    if (expression) {
      clauses.push("p.rowid IN (SELECT rowid FROM prints_fts WHERE prints_fts MATCH ?)");
      params.push(expression);
    } else {
      clauses.push(`lower(coalesce(p.${column}, '')) LIKE ? ESCAPE '\\'`);
      params.push(containsPattern(value));
    }
  };

  if (filter.nameExact) {
    clauses.push("p.name_slug = ?");
    params.push(slugify(filter.nameExact));
  }
  if (filter.name) textClause("name", filter.name);
  if (filter.text) textClause("oracle_text", filter.text);

  const inClause = (column: string, values: string[] | undefined) => {
    if (!values) return;
    if (values.length === 0) {
      clauses.push("0");
      return;
    }
    clauses.push(`p.${column} IN (${placeholders(values.length)})`);
    params.push(...values);
  };
  inClause("set_code", filter.setCodes);
  inClause("lang", filter.langs);
  inClause("rarity", filter.rarities);
  inClause("id", filter.ids);

  if (filter.typeLine) {
    clauses.push("lower(coalesce(p.type_line, '')) LIKE ? ESCAPE '\\'");
    params.push(containsPattern(filter.typeLine));
  }
  if (filter.colorIdentity) {
    if (filter.colorIdentity.length === 0) {
      clauses.push("json_array_length(p.color_identity) = 0");
    } else {
      clauses.push(
        `NOT EXISTS (SELECT 1 FROM json_each(p.color_identity) WHERE value NOT IN (${placeholders(
          filter.colorIdentity.length,
        )}))`,
      );
      params.push(...filter.colorIdentity);
    }
  }
  if (filter.isToken !== undefined) {
    clauses.push("p.is_token = ?");
    params.push(filter.isToken ? 1 : 0);
  }
  if (filter.isBasicLand !== undefined) {
    clauses.push("p.is_basic_land = ?");
    params.push(filter.isBasicLand ? 1 : 0);
  }
  if (filter.oracleId) {
    clauses.push("p.oracle_id = ?");
    params.push(filter.oracleId);
  }
  if (filter.illustrationId) {
    clauses.push("p.illustration_id = ?");
    params.push(filter.illustrationId);
  }
  if (filter.artist) {
    clauses.push("lower(coalesce(p.artist, '')) LIKE ? ESCAPE '\\'");
    params.push(containsPattern(filter.artist));
  }
  if (filter.frame) {
    clauses.push("p.frame = ?");
    params.push(filter.frame);
  }
  if (filter.frameEffect) {
    clauses.push("EXISTS (SELECT 1 FROM json_each(p.frame_effects) WHERE lower(value) = ?)");
    params.push(filter.frameEffect);
  }
  if (filter.fullArt !== undefined) {
    clauses.push("p.full_art = ?");
    params.push(filter.fullArt ? 1 : 0);
  }

  return { where: clauses.length > 0 ? clauses.join(" AND ") : "1", params };
};

/** Newest release first; undated prints last. */
export const DETERMINISTIC_ORDER =
  "p.released_at IS NULL, p.released_at DESC, p.set_code ASC, CAST(p.collector_number AS INTEGER) ASC, p.collector_number ASC, p.id ASC";
