import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { envSchema, toRuntimeConfig } from "../../config";
import { DatabaseUnavailableError } from "../../errors";
import { silentLogger } from "../../utils/logger";
import type { ImageSource } from "../../services/fetch/imageSource";
import { makeTempDir, rawCard, removeDir } from "../../services/__tests__/fixtures";
import { createContext, type AppContext } from "../context";

const imageSource: ImageSource = {
  open: async (uri) => ({ body: Readable.from([Buffer.from(uri)]), contentLength: uri.length }),
};

describe("createContext", () => {
  let dir: string;
  let context: AppContext;

  beforeEach(() => {
    dir = makeTempDir("card-atlas-context-");
    const config = toRuntimeConfig(
      envSchema.parse({
        INDEX_DB_PATH: path.join(dir, "index.db"),
        OUTPUT_DIR: path.join(dir, "images"),
        LOG_LEVEL: "silent",
        FETCH_MAX_RETRIES: "0",
      }),
    );
    context = createContext(config, { logger: silentLogger(), imageSource });
  });

  afterEach(() => {
    context.close();
    removeDir(dir);
  });

  it("reports a missing index until one is built", () => {
    expect(() => context.index()).toThrow(DatabaseUnavailableError);
  });

  it("builds, resolves and fetches a deck end to end", async () => {
    const catalogPath = path.join(dir, "catalog.json");
    fs.writeFileSync(
      catalogPath,
      JSON.stringify([
        rawCard("maker", "Goblin Maker", {
          type_line: "Creature — Goblin Shaman",
          all_parts: [{ id: "gob", component: "token", name: "Goblin" }],
        }),
        rawCard("gob", "Goblin", {
          layout: "token",
          type_line: "Token Creature — Goblin",
          power: "1",
          toughness: "1",
        }),
      ]),
    );

    const stats = await context.buildIndex(catalogPath);
    expect(stats).toMatchObject({ prints: 2, relationships: 1 });

    const resolution = context.resolveDeck([{ name: "goblin maker", quantity: 4 }]);
    const prints = resolution.prints.map((entry) => entry.print);
    expect(prints.map((print) => print.id)).toEqual(["maker", "gob"]);

    const dryRun = await context.fetchPrints(prints, { dryRun: true });
    expect(dryRun.summary).toMatchObject({ successful: 2, dryRun: true });
    expect(dryRun.estimate).toEqual({ jobCount: 2, estimatedBytes: 1_700_000, estimatedSeconds: 0.85, concurrency: 8 });

    const { summary, unplannable } = await context.fetchPrints(prints);
    expect(unplannable).toEqual([]);
    expect(summary.successful).toBe(2);
    expect(
      fs.existsSync(
        path.join(dir, "images", "tokens", "creature", "goblin", "1-1", "goblin-standard-en-tst-1.jpg"),
      ),
    ).toBe(true);
    expect(
      fs.existsSync(path.join(dir, "images", "cards", "creature", "goblin-maker-standard-en-tst-1.jpg")),
    ).toBe(true);
  });
});
