import { z } from "zod";
import type { CardRequest } from "../../domain/print";
import { ValidationError } from "../../errors";

export const DECK_FORMAT_IDS = ["scryfall_json", "deckstats", "archidekt", "mtga", "moxfield", "mtgo", "simple"] as const;
export type DeckFormatId = (typeof DECK_FORMAT_IDS)[number];

export interface DeckFormat {
  id: DeckFormatId;
  label: string;
  detect(text: string): boolean;
  parse(text: string): CardRequest[];
}

export interface ParsedDeck {
  format: DeckFormatId;
  requests: CardRequest[];
}

const SECTION_HEADERS = /^(deck|sideboard|commander|companion|maybeboard|about|mainboard)\b:?$/i;

const meaningfulLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("//") && !line.startsWith("#"))
    .filter((line) => !SECTION_HEADERS.test(line) && !/^name\s/i.test(line));

const request = (
  quantity: string | undefined,
  name: string,
  setCode?: string,
  collectorNumber?: string,
): CardRequest | null => {
  const cleaned = name.trim();
  if (!cleaned) return null;
  const count = quantity ? Number.parseInt(quantity, 10) : 1;
  return {
    name: cleaned,
    quantity: Number.isFinite(count) && count > 0 ? count : 1,
    ...(setCode ? { setCode: setCode.toLowerCase() } : {}),
    ...(collectorNumber ? { collectorNumber } : {}),
  };
};

/** Applies the first matching pattern to every line; lines no pattern matches are dropped. */
const lineParser =
  (patterns: Array<{ regex: RegExp; build: (match: RegExpMatchArray) => CardRequest | null }>) =>
  (text: string): CardRequest[] => {
    const requests: CardRequest[] = [];
    for (const line of meaningfulLines(text)) {
      for (const { regex, build } of patterns) {
        const match = line.match(regex);
        if (!match) continue;
        const built = build(match);
        if (built) requests.push(built);
        break;
      }
    }
    return requests;
  };

const someLine = (text: string, regex: RegExp): boolean => meaningfulLines(text).some((line) => regex.test(line));

const countFirst = { regex: /^(\d+)x?\s+(.+)$/i, build: (m: RegExpMatchArray) => request(m[1], m[2]) };

const scryfallDeckSchema = z.object({
  entries: z.record(
    z.string(),
    z
      .array(
        z.object({
          count: z.number().int().nonnegative().default(1),
          card_digest: z
            .object({
              name: z.string(),
              set: z.string().optional(),
              collector_number: z.string().optional(),
            })
            .nullish(),
        }),
      )
      .nullish(),
  ),
});

const SCRYFALL_SECTIONS = ["mainboard", "sideboard", "maybeboard", "commanders"];

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

const scryfallJson: DeckFormat = {
  id: "scryfall_json",
  label: "Scryfall deck export (JSON)",
  detect: (text) => text.trimStart().startsWith("{") && scryfallDeckSchema.safeParse(parseJson(text)).success,
  parse: (text) => {
    const parsed = scryfallDeckSchema.safeParse(parseJson(text));
    if (!parsed.success) throw new ValidationError("Not a Scryfall deck export", [parsed.error.message]);
    const requests: CardRequest[] = [];
    for (const section of SCRYFALL_SECTIONS) {
      for (const entry of parsed.data.entries[section] ?? []) {
        if (!entry.card_digest || entry.count === 0) continue;
        const built = request(
          String(entry.count),
          entry.card_digest.name,
          entry.card_digest.set,
          entry.card_digest.collector_number,
        );
        if (built) requests.push(built);
      }
    }
    return requests;
  },
};

const deckstats: DeckFormat = {
  id: "deckstats",
  label: "deckstats.net",
  detect: (text) => someLine(text, /^\d+\s+\[\w*#\w+\]/),
  parse: lineParser([
    {
      regex: /^(\d+)\s+(?:\[(\w*)#(\w+)\]\s+)?(.+)$/,
      build: (m) => request(m[1], m[4].replace(/\s+#.*$/, ""), m[2] || undefined, m[3]),
    },
  ]),
};

const archidekt: DeckFormat = {
  id: "archidekt",
  label: "Archidekt",
  detect: (text) => someLine(text, /^\d+x\s+.+?\s+\(\w+\)/i),
  parse: lineParser([
    { regex: /^(\d+)x?\s+(.+?)\s+\((\w+)\)\s+(\S+).*$/i, build: (m) => request(m[1], m[2], m[3], m[4]) },
    countFirst,
  ]),
};

const mtga: DeckFormat = {
  id: "mtga",
  label: "MTG Arena",
  detect: (text) => someLine(text, /^\d+\s+.+?\s+\([A-Z0-9]{2,6}\)\s+\d+$/),
  parse: lineParser([
    { regex: /^(\d+)x?\s+(.+?)\s+\((\w+)\)\s+(\d+)\s*$/, build: (m) => request(m[1], m[2], m[3], m[4]) },
    countFirst,
  ]),
};

const moxfield: DeckFormat = {
  id: "moxfield",
  label: "Moxfield",
  detect: (text) => someLine(text, /^\d+\s+.+?\s+\(\w+\)\s+[\w-]+/),
  parse: lineParser([
    {
      regex: /^(\d+)\s+(.+?)\s+\((\w+)\)\s+([\w-]+)/,
      build: (m) => request(m[1], m[2], m[3], m[4]),
    },
    { regex: /^(\d+)\s+(.+?)(?:\s+\*[A-Z]\*)?$/, build: (m) => request(m[1], m[2]) },
  ]),
};

const mtgo: DeckFormat = {
  id: "mtgo",
  label: "MTGO",
  detect: (text) => {
    const lines = meaningfulLines(text);
    return lines.length > 0 && lines.every((line) => /^\d+\s+\S/.test(line));
  },
  parse: lineParser([{ regex: /^(\d+)\s+(.+)$/, build: (m) => request(m[1], m[2]) }]),
};

const simple: DeckFormat = {
  id: "simple",
  label: "One card per line",
  detect: (text) => meaningfulLines(text).length > 0,
  parse: lineParser([countFirst, { regex: /^(.+)$/, build: (m) => request(undefined, m[1]) }]),
};

/** Detection order matters: the more specific formats come first. */
export const DECK_FORMATS: ReadonlyMap<DeckFormatId, DeckFormat> = new Map(
  [scryfallJson, deckstats, archidekt, mtga, moxfield, mtgo, simple].map((format): [DeckFormatId, DeckFormat] => [
    format.id,
    format,
  ]),
);

export const isDeckFormatId = (value: string): value is DeckFormatId =>
  DECK_FORMAT_IDS.some((id) => id === value);

export const detectDeckFormat = (text: string): DeckFormatId | null => {
  for (const format of DECK_FORMATS.values()) {
    if (format.detect(text)) return format.id;
  }
  return null;
};

export const parseDeck = (text: string, formatId?: string): ParsedDeck => {
  let id: DeckFormatId | null;
  if (formatId === undefined) {
    id = detectDeckFormat(text);
    if (!id) return { format: "simple", requests: [] };
  } else if (isDeckFormatId(formatId)) {
    id = formatId;
  } else {
    throw new ValidationError(`Unknown deck format: ${formatId}`, [`known formats: ${DECK_FORMAT_IDS.join(", ")}`]);
  }
  const format = DECK_FORMATS.get(id);
  if (!format) throw new ValidationError(`Deck format not registered: ${id}`);
  return { format: id, requests: format.parse(text) };
};
