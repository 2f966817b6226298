import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Print } from "../../domain/print";
import { silentLogger } from "../../utils/logger";
import { CardIndex } from "../index/cardIndex";
import { CardIndexBuilder } from "../index/cardIndexBuilder";

export const makeTempDir = (prefix = "card-atlas-"): string => fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

/** A catalog record in the shape of a bulk card dump. */
export const rawCard = (id: string, name: string, overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id,
  name,
  set: "tst",
  set_name: "Test Set",
  collector_number: "1",
  lang: "en",
  type_line: "Creature — Elf",
  layout: "normal",
  released_at: "2020-01-01",
  image_uris: { normal: `https://img.example.test/${id}.jpg` },
  ...overrides,
});

export const makePrint = (overrides: Partial<Print> = {}): Print => ({
  id: "print-1",
  name: "Llanowar Elves",
  nameSlug: "llanowar_elves",
  oracleId: null,
  illustrationId: null,
  setCode: "tst",
  setName: "Test Set",
  collectorNumber: "1",
  typeLine: "Creature — Elf Druid",
  oracleText: null,
  layout: "normal",
  lang: "en",
  rarity: "common",
  colors: ["G"],
  colorIdentity: ["G"],
  producedMana: ["G"],
  keywords: [],
  manaCost: "{G}",
  cmc: 1,
  power: "1",
  toughness: "1",
  artist: null,
  borderColor: "black",
  frame: "2015",
  frameEffects: [],
  imageUrl: "https://img.example.test/print-1.jpg",
  releasedAt: "2020-01-01",
  isToken: false,
  isBasicLand: false,
  fullArt: false,
  textless: false,
  promo: false,
  ...overrides,
});

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

export interface BuiltIndex {
  dir: string;
  indexPath: string;
  index: CardIndex;
}

export const buildTestIndex = async (records: readonly unknown[]): Promise<BuiltIndex> => {
  const dir = makeTempDir();
  const indexPath = path.join(dir, "index.db");
  const builder = new CardIndexBuilder({ indexPath, logger: silentLogger(), batchSize: 2 });
  await builder.build(fromArray(records), { source: "fixture" });
  const index = CardIndex.open(indexPath, { logger: silentLogger() });
  return { dir, indexPath, index };
};
