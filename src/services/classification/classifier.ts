import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Print } from "../../domain/print";
import { fileSlug } from "../../utils/slug";
import { parseTypeLine } from "../../utils/typeLine";

export const LAND_BUCKETS = ["basic", "nonbasic/dual", "nonbasic/special"] as const;
export type LandBucket = (typeof LAND_BUCKETS)[number];

export const ART_TYPES = ["textless", "borderless", "showcase", "extended", "retro", "fullart", "standard"] as const;
export type ArtType = (typeof ART_TYPES)[number];

export const PRIMARY_TYPES = [
  "land",
  "creature",
  "planeswalker",
  "battle",
  "instant",
  "sorcery",
  "artifact",
  "enchantment",
] as const;
export type PrimaryType = (typeof PRIMARY_TYPES)[number] | "other";

/** Checked in order against a token's subtypes and name. */
export const TOKEN_KINDS = [
  "treasure",
  "food",
  "clue",
  "blood",
  "map",
  "powerstone",
  "gold",
  "incubator",
  "junk",
  "shard",
  "role",
] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number] | "emblem" | "misc";

export type TokenBucket =
  | { family: "creature"; subtype: string; stats: string }
  | { family: "noncreature"; kind: TokenKind };

export type CardCategory =
  | { kind: "token"; token: TokenBucket }
  | { kind: "land"; bucket: LandBucket }
  | { kind: "card"; primaryType: PrimaryType };

export interface Classification {
  category: CardCategory;
  artType: ArtType;
  /** Directory segments below the output root. */
  segments: string[];
}

export type LandOverrides = Readonly<Record<string, LandBucket>>;

const BASIC_LAND_TYPES = new Set(["plains", "island", "swamp", "mountain", "forest"]);
const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);

const landOverridesSchema = z.record(z.string(), z.enum(LAND_BUCKETS));

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const LAND_OVERRIDES_PATH = path.resolve(__dirname, "../../../data/land-set-overrides.json");

export const loadLandOverrides = (filePath: string = LAND_OVERRIDES_PATH): LandOverrides => {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const entries = Object.entries(landOverridesSchema.parse(parsed)).map(
    ([setCode, bucket]): [string, LandBucket] => [setCode.toLowerCase(), bucket],
  );
  return Object.freeze(Object.fromEntries(entries));
};

export const DEFAULT_LAND_OVERRIDES: LandOverrides = loadLandOverrides();

export const classifyLand = (print: Print, overrides: LandOverrides = DEFAULT_LAND_OVERRIDES): LandBucket => {
  const { types, subtypes } = parseTypeLine(print.typeLine);
  if (print.isBasicLand || types.includes("basic")) return "basic";

  const override = overrides[print.setCode.toLowerCase()];
  if (override) return override;

  const basicTypes = new Set(subtypes.map((subtype) => subtype.toLowerCase()).filter((s) => BASIC_LAND_TYPES.has(s)));
  const colors = new Set(print.producedMana.filter((symbol) => symbol !== "C"));
  if (basicTypes.size >= 2 || (basicTypes.size === 0 && colors.size === 2)) return "nonbasic/dual";
  return "nonbasic/special";
};

const statValue = (value: string | null): string => {
  if (value === null) return "x";
  const cleaned = value.trim().toLowerCase().replace(/\*/g, "x").replace(/[^0-9a-z+.]/g, "");
  return cleaned.length > 0 ? cleaned : "x";
};

export const classifyToken = (print: Print): TokenBucket => {
  const { types, subtypes } = parseTypeLine(print.typeLine);

  if (types.includes("creature")) {
    const subtype = fileSlug(subtypes.join(" ")) || "unknown";
    const stats =
      print.power === null && print.toughness === null
        ? "unknown"
        : `${statValue(print.power)}-${statValue(print.toughness)}`;
    return { family: "creature", subtype, stats };
  }

  if (types.includes("emblem") || print.layout === "emblem") {
    return { family: "noncreature", kind: "emblem" };
  }

  const lowered = new Set([...subtypes.map((subtype) => subtype.toLowerCase()), print.name.toLowerCase()]);
  const kind = TOKEN_KINDS.find((candidate) => lowered.has(candidate));
  return { family: "noncreature", kind: kind ?? "misc" };
};

export const deriveArtType = (print: Print): ArtType => {
  if (print.textless) return "textless";
  if (print.borderColor === "borderless") return "borderless";
  if (print.frameEffects.includes("showcase")) return "showcase";
  if (print.frameEffects.includes("extendedart")) return "extended";
  if (print.frame === "1993" || print.frame === "1997") return "retro";
  if (print.fullArt) return "fullart";
  return "standard";
};

export const primaryType = (print: Print): PrimaryType => {
  const { types } = parseTypeLine(print.typeLine);
  return PRIMARY_TYPES.find((type) => types.includes(type)) ?? "other";
};

export const categorize = (print: Print, overrides: LandOverrides = DEFAULT_LAND_OVERRIDES): CardCategory => {
  if (print.isToken) return { kind: "token", token: classifyToken(print) };
  const type = primaryType(print);
  if (type === "land") return { kind: "land", bucket: classifyLand(print, overrides) };
  return { kind: "card", primaryType: type };
};

const segmentsFor = (print: Print, category: CardCategory): string[] => {
  switch (category.kind) {
    case "token":
      return category.token.family === "creature"
        ? ["tokens", "creature", category.token.subtype, category.token.stats]
        : ["tokens", "noncreature", category.token.kind];
    case "land":
      return category.bucket === "basic"
        ? ["lands", "basic", fileSlug(print.name) || "unknown"]
        : ["lands", ...category.bucket.split("/")];
    case "card":
      return ["cards", category.primaryType];
  }
};

export const classify = (print: Print, overrides: LandOverrides = DEFAULT_LAND_OVERRIDES): Classification => {
  const category = categorize(print, overrides);
  return { category, artType: deriveArtType(print), segments: segmentsFor(print, category) };
};

export const imageExtension = (imageUrl: string | null): string => {
  if (!imageUrl) return ".png";
  try {
    const ext = path.posix.extname(new URL(imageUrl).pathname).toLowerCase();
    return IMAGE_EXTENSIONS.has(ext) ? ext : ".png";
  } catch {
    return ".png";
  }
};

/**
 * Lowercase letters and digits pass through; any other character becomes
 * `_<hex code point>_`. `_` never passes through, so distinct collector
 * numbers always give distinct segments.
 */
export const collectorSegment = (collectorNumber: string): string => {
  let out = "";
  for (const char of collectorNumber) {
    out += /[a-z0-9]/.test(char) ? char : `_${(char.codePointAt(0) ?? 0).toString(16)}_`;
  }
  return out || "0";
};

export const fileNameFor = (print: Print, artType: ArtType = deriveArtType(print)): string =>
  [
    fileSlug(print.name) || "card",
    artType,
    fileSlug(print.lang) || "xx",
    fileSlug(print.setCode) || "unknown",
    collectorSegment(print.collectorNumber),
  ].join("-") + imageExtension(print.imageUrl);

export const destinationFor = (
  print: Print,
  outputRoot: string,
  overrides: LandOverrides = DEFAULT_LAND_OVERRIDES,
): string => {
  const { segments, artType } = classify(print, overrides);
  return path.join(outputRoot, ...segments, fileNameFor(print, artType));
};
