import { z } from "zod";
import type { Print, RelationshipEdge } from "../../domain/print";
import { isRelationshipKind } from "../../domain/print";
import { failure, success, type Outcome } from "../../domain/outcome";
import { slugify } from "../../utils/slug";
import { hasType } from "../../utils/typeLine";

const stringList = z
  .array(z.unknown())
  .nullish()
  .transform((values) => (values ?? []).filter((value): value is string => typeof value === "string"));

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const imageUrisSchema = z.record(z.string(), z.unknown()).nullish();

const faceSchema = z.object({
  name: z.string().nullish(),
  type_line: z.string().nullish(),
  oracle_text: z.string().nullish(),
  power: optionalText,
  toughness: optionalText,
  mana_cost: z.string().nullish(),
  colors: stringList,
  illustration_id: z.string().nullish(),
  image_uris: imageUrisSchema,
});

type RawFace = z.infer<typeof faceSchema>;

const relatedPartSchema = z.object({
  id: z.string().min(1),
  component: z.string(),
  name: z.string().default(""),
});

export const rawCardSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  oracle_id: z.string().nullish(),
  illustration_id: z.string().nullish(),
  set: z.string().nullish(),
  set_name: z.string().nullish(),
  collector_number: optionalText,
  type_line: z.string().nullish(),
  oracle_text: z.string().nullish(),
  layout: z.string().nullish(),
  lang: z.string().nullish(),
  rarity: z.string().nullish(),
  colors: stringList,
  color_identity: stringList,
  produced_mana: stringList,
  keywords: stringList,
  mana_cost: z.string().nullish(),
  cmc: z.number().nullish(),
  power: optionalText,
  toughness: optionalText,
  artist: z.string().nullish(),
  border_color: z.string().nullish(),
  frame: optionalText,
  frame_effects: stringList,
  released_at: z.string().nullish(),
  full_art: z.boolean().nullish(),
  textless: z.boolean().nullish(),
  promo: z.boolean().nullish(),
  image_uris: imageUrisSchema,
  card_faces: z.array(z.unknown()).nullish(),
  all_parts: z.array(z.unknown()).nullish(),
});

export type RawCard = z.infer<typeof rawCardSchema>;

export interface NormalizedCard {
  print: Print;
  edges: RelationshipEdge[];
}

export const IMAGE_PRIORITY = ["png", "large", "normal", "small"] as const;

const TOKEN_LAYOUTS = new Set(["token", "double_faced_token", "emblem"]);

const pickImage = (uris: Record<string, unknown> | null | undefined): string | null => {
  if (!uris) return null;
  for (const key of IMAGE_PRIORITY) {
    const value = uris[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return null;
};

const parseFaces = (faces: unknown[] | null | undefined): RawFace[] => {
  if (!faces) return [];
  const parsed: RawFace[] = [];
  for (const face of faces) {
    const result = faceSchema.safeParse(face);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
};

/**
 * Best image for a print: top-level variants in priority order, else a face.
 * A modal card whose back is a land is filed under its land face.
 */
export const extractImageUrl = (card: RawCard, faces: RawFace[] = parseFaces(card.card_faces)): string | null => {
  const direct = pickImage(card.image_uris);
  if (direct) return direct;
  if (faces.length === 0) return null;

  const front = faces[0];
  if (!hasType(front.type_line, "land")) {
    const landFace = faces.find((face) => hasType(face.type_line, "land") && pickImage(face.image_uris));
    if (landFace) return pickImage(landFace.image_uris);
  }
  for (const face of faces) {
    const image = pickImage(face.image_uris);
    if (image) return image;
  }
  return null;
};

export const isTokenCard = (layout: string | null | undefined, typeLine: string | null | undefined): boolean =>
  (layout !== null && layout !== undefined && TOKEN_LAYOUTS.has(layout)) || hasType(typeLine, "token");

export const isBasicLandCard = (typeLine: string | null | undefined): boolean =>
  hasType(typeLine, "basic") && hasType(typeLine, "land");

export const extractEdges = (card: RawCard): RelationshipEdge[] => {
  const edges: RelationshipEdge[] = [];
  const seen = new Set<string>();
  for (const part of card.all_parts ?? []) {
    const parsed = relatedPartSchema.safeParse(part);
    if (!parsed.success) continue;
    const { id, component, name } = parsed.data;
    if (id === card.id || !isRelationshipKind(component)) continue;
    const key = `${id}\u0000${component}`;
    if (seen.has(key)) continue;
    seen.add(key);
    edges.push({ sourcePrintId: card.id, relatedPrintId: id, kind: component, relatedCardName: name });
  }
  return edges;
};

const joinFaces = (
  faces: RawFace[],
  pick: (face: RawFace) => string | null | undefined,
  separator: string,
): string | null => {
  const parts = faces.map(pick).filter((value): value is string => typeof value === "string" && value.length > 0);
  return parts.length > 0 ? parts.join(separator) : null;
};

/** Turns one raw catalog record into a Print and its outgoing edges. */
export const normalizeCard = (raw: unknown): Outcome<NormalizedCard, string> => {
  const parsed = rawCardSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return failure(issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : "invalid record");
  }
  const card = parsed.data;
  const faces = parseFaces(card.card_faces);
  const front = faces[0];

  const typeLine = card.type_line ?? joinFaces(faces, (face) => face.type_line, " // ");
  const colors = card.colors.length > 0 ? card.colors : [...new Set(faces.flatMap((face) => face.colors))].sort();

  const print: Print = {
    id: card.id,
    name: card.name,
    nameSlug: slugify(card.name),
    oracleId: card.oracle_id ?? null,
    illustrationId: card.illustration_id ?? front?.illustration_id ?? null,
    setCode: (card.set ?? "").toLowerCase(),
    setName: card.set_name ?? null,
    collectorNumber: card.collector_number ?? "",
    typeLine,
    oracleText: card.oracle_text ?? joinFaces(faces, (face) => face.oracle_text, "\n//\n"),
    layout: card.layout ?? null,
    lang: (card.lang ?? "en").toLowerCase(),
    rarity: card.rarity ?? null,
    colors,
    colorIdentity: card.color_identity,
    producedMana: card.produced_mana,
    keywords: card.keywords,
    manaCost: card.mana_cost ?? front?.mana_cost ?? null,
    cmc: card.cmc ?? null,
    power: card.power ?? front?.power ?? null,
    toughness: card.toughness ?? front?.toughness ?? null,
    artist: card.artist ?? null,
    borderColor: card.border_color ?? null,
    frame: card.frame ?? null,
    frameEffects: card.frame_effects,
    imageUrl: extractImageUrl(card, faces),
    releasedAt: card.released_at ?? null,
    isToken: isTokenCard(card.layout, typeLine),
    isBasicLand: isBasicLandCard(typeLine),
    fullArt: card.full_art ?? false,
    textless: card.textless ?? false,
    promo: card.promo ?? false,
  };

  return success({ print, edges: extractEdges(card) });
};
