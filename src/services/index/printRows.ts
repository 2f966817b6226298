import type { Print, RelationshipEdge } from "../../domain/print";
import { isRelationshipKind } from "../../domain/print";

export interface PrintRow {
  id: string;
  name: string;
  name_slug: string;
  oracle_id: string | null;
  illustration_id: string | null;
  set_code: string;
  set_name: string | null;
  collector_number: string;
  type_line: string | null;
  oracle_text: string | null;
  layout: string | null;
  lang: string;
  rarity: string | null;
  colors: string;
  color_identity: string;
  produced_mana: string;
  keywords: string;
  mana_cost: string | null;
  cmc: number | null;
  power: string | null;
  toughness: string | null;
  artist: string | null;
  border_color: string | null;
  frame: string | null;
  frame_effects: string;
  image_url: string | null;
  released_at: string | null;
  is_token: number;
  is_basic_land: number;
  full_art: number;
  textless: number;
  promo: number;
}

export interface EdgeRow {
  source_print_id: string;
  related_print_id: string;
  relationship_kind: string;
  related_card_name: string;
}

export const PRINT_COLUMNS = [
  "id",
  "name",
  "name_slug",
  "oracle_id",
  "illustration_id",
  "set_code",
  "set_name",
  "collector_number",
  "type_line",
  "oracle_text",
  "layout",
  "lang",
  "rarity",
  "colors",
  "color_identity",
  "produced_mana",
  "keywords",
  "mana_cost",
  "cmc",
  "power",
  "toughness",
  "artist",
  "border_color",
  "frame",
  "frame_effects",
  "image_url",
  "released_at",
  "is_token",
  "is_basic_land",
  "full_art",
  "textless",
  "promo",
] as const satisfies ReadonlyArray<keyof PrintRow>;

const parseStringArray = (value: string | null): string[] => {
  if (!value) return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
  } catch {
    return [];
  }
};

export const toPrintRow = (print: Print): PrintRow => ({
  id: print.id,
  name: print.name,
  name_slug: print.nameSlug,
  oracle_id: print.oracleId,
  illustration_id: print.illustrationId,
  set_code: print.setCode,
  set_name: print.setName,
  collector_number: print.collectorNumber,
  type_line: print.typeLine,
  oracle_text: print.oracleText,
  layout: print.layout,
  lang: print.lang,
  rarity: print.rarity,
  colors: JSON.stringify(print.colors),
  color_identity: JSON.stringify(print.colorIdentity),
  produced_mana: JSON.stringify(print.producedMana),
  keywords: JSON.stringify(print.keywords),
  mana_cost: print.manaCost,
  cmc: print.cmc,
  power: print.power,
  toughness: print.toughness,
  artist: print.artist,
  border_color: print.borderColor,
  frame: print.frame,
  frame_effects: JSON.stringify(print.frameEffects),
  image_url: print.imageUrl,
  released_at: print.releasedAt,
  is_token: print.isToken ? 1 : 0,
  is_basic_land: print.isBasicLand ? 1 : 0,
  full_art: print.fullArt ? 1 : 0,
  textless: print.textless ? 1 : 0,
  promo: print.promo ? 1 : 0,
});

export const fromPrintRow = (row: PrintRow): Print =>
  Object.freeze({
    id: row.id,
    name: row.name,
    nameSlug: row.name_slug,
    oracleId: row.oracle_id,
    illustrationId: row.illustration_id,
    setCode: row.set_code,
    setName: row.set_name,
    collectorNumber: row.collector_number,
    typeLine: row.type_line,
    oracleText: row.oracle_text,
    layout: row.layout,
    lang: row.lang,
    rarity: row.rarity,
    colors: parseStringArray(row.colors),
    colorIdentity: parseStringArray(row.color_identity),
    producedMana: parseStringArray(row.produced_mana),
    keywords: parseStringArray(row.keywords),
    manaCost: row.mana_cost,
    cmc: row.cmc,
    power: row.power,
    toughness: row.toughness,
    artist: row.artist,
    borderColor: row.border_color,
    frame: row.frame,
    frameEffects: parseStringArray(row.frame_effects),
    imageUrl: row.image_url,
    releasedAt: row.released_at,
    isToken: row.is_token === 1,
    isBasicLand: row.is_basic_land === 1,
    fullArt: row.full_art === 1,
    textless: row.textless === 1,
    promo: row.promo === 1,
  });

/** Rows whose kind is outside the known set are dropped rather than guessed at. */
export const fromEdgeRow = (row: EdgeRow): RelationshipEdge | null =>
  isRelationshipKind(row.relationship_kind)
    ? {
        sourcePrintId: row.source_print_id,
        relatedPrintId: row.related_print_id,
        kind: row.relationship_kind,
        relatedCardName: row.related_card_name,
      }
    : null;
