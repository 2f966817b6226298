export const RELATIONSHIP_KINDS = ["combo_piece", "meld_part", "meld_result", "token"] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

export const isRelationshipKind = (value: unknown): value is RelationshipKind =>
  RELATIONSHIP_KINDS.some((kind) => kind === value);

/** One printing of a card: set + collector number + language. */
export interface Print {
  id: string;
  name: string;
  nameSlug: string;
  oracleId: string | null;
  /** Shared by every print of the same artwork. */
  illustrationId: string | null;
  setCode: string;
  setName: string | null;
  collectorNumber: string;
  typeLine: string | null;
  oracleText: string | null;
  layout: string | null;
  lang: string;
  rarity: string | null;
  colors: string[];
  colorIdentity: string[];
  producedMana: string[];
  keywords: string[];
  manaCost: string | null;
  cmc: number | null;
  power: string | null;
  toughness: string | null;
  artist: string | null;
  borderColor: string | null;
  frame: string | null;
  frameEffects: string[];
  imageUrl: string | null;
  releasedAt: string | null;
  isToken: boolean;
  isBasicLand: boolean;
  fullArt: boolean;
  textless: boolean;
  promo: boolean;
}

export interface RelationshipEdge {
  sourcePrintId: string;
  relatedPrintId: string;
  kind: RelationshipKind;
  relatedCardName: string;
}

/** A card-name request as produced by deck parsers or the command line. */
export interface CardRequest {
  name: string;
  setCode?: string;
  collectorNumber?: string;
  lang?: string;
  quantity: number;
}
