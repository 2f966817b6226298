#!/usr/bin/env node

import fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { runtimeConfig } from "./config";
import { createContext, type AppContext } from "./app/context";
import type { CardRequest, Print } from "./domain/print";
import { materializedPaths, successRate } from "./domain/fetch";
import { CardAtlasError, DatabaseUnavailableError, ValidationError, describeError } from "./errors";
import type { PrintFilter } from "./services/index/printFilter";
import { DECK_FORMAT_IDS, parseDeck } from "./services/decks/deckFormats";

const context: AppContext = createContext(runtimeConfig);
const logger = context.logger;

const printJson = (value: unknown) => {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const positiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return parsed;
};

const list = (value: string, previous: string[] = []): string[] => [
  ...previous,
  ...value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean),
];

/** A single existing path is read as a deck file; anything else is a list of card names. */
const readRequests = (inputs: string[], format?: string): CardRequest[] => {
  if (inputs.length === 1 && fs.existsSync(inputs[0])) {
    const deck = parseDeck(fs.readFileSync(inputs[0], "utf8"), format);
    logger.info({ file: inputs[0], format: deck.format, entries: deck.requests.length }, "Deck parsed");
    return deck.requests;
  }
  return inputs.map((name) => ({ name, quantity: 1 }));
};

interface ResolveFlags {
  format?: string;
  set?: string;
  lang?: string;
  tokens: boolean;
}

const resolveInputs = (inputs: string[], flags: ResolveFlags) => {
  const requests = readRequests(inputs, flags.format);
  if (requests.length === 0) throw new ValidationError("No card requests found in input");
  return context.resolveDeck(requests, {
    preferredSet: flags.set,
    ...(flags.lang ? { preferredLang: flags.lang } : {}),
    includeTokens: flags.tokens,
  });
};

const printSummary = (print: Print) => ({
  id: print.id,
  name: print.name,
  set: print.setCode,
  collectorNumber: print.collectorNumber,
  lang: print.lang,
  typeLine: print.typeLine,
  artist: print.artist,
  illustrationId: print.illustrationId,
  releasedAt: print.releasedAt,
});

const program = new Command();

program
  .name("card-atlas")
  .description("Index a card catalog, resolve deck lists with related cards and fetch their images")
  .version("0.1.0");

program
  .command("build-index")
  .description("Build (or rebuild) the card index from a catalog dump")
  .argument("<catalog>", "catalog file: JSON array, wrapper object or NDJSON, optionally gzipped")
  .action(async (catalog: string) => {
    const stats = await context.buildIndex(catalog);
    printJson(stats);
  });

program
  .command("verify")
  .description("Check that the card index exists, matches the schema and is intact")
  .action(() => {
    const index = context.index();
    const verification = index.verify();
    printJson({ ...verification, stats: index.stats() });
    if (!verification.ok) process.exitCode = 1;
  });

program
  .command("query")
  .description("Query prints by name, text and attributes")
  .option("-n, --name <text>", "name contains")
  .option("--exact <name>", "exact card name")
  .option("-t, --text <text>", "oracle text contains")
  .option("-s, --set <codes>", "set codes, comma separated", list)
  .option("-l, --lang <langs>", "languages, comma separated", list)
  .option("-r, --rarity <rarities>", "rarities, comma separated", list)
  .option("--type <text>", "type line contains")
  .option("--colors <symbols>", "color identity within, e.g. W,U", list)
  .option("--tokens", "only tokens")
  .option("--basic-lands", "only basic lands")
  .option("--artist <text>", "artist contains")
  .option("--frame <frame>", "frame, e.g. 1997 or 2015")
  .option("--frame-effect <effect>", "has this frame effect, e.g. showcase")
  .option("--full-art", "only full-art prints")
  .option("--unique-art", "one print per distinct artwork, with the artwork count")
  .option("--limit <n>", "maximum rows", positiveInt, 20)
  .action(
    (options: {
      name?: string;
      exact?: string;
      text?: string;
      set?: string[];
      lang?: string[];
      rarity?: string[];
      type?: string;
      colors?: string[];
      tokens?: boolean;
      basicLands?: boolean;
      artist?: string;
      frame?: string;
      frameEffect?: string;
      fullArt?: boolean;
      uniqueArt?: boolean;
      limit: number;
    }) => {
      const filter: PrintFilter = {
        name: options.name,
        nameExact: options.exact,
        text: options.text,
        setCodes: options.set,
        langs: options.lang,
        rarities: options.rarity,
        typeLine: options.type,
        colorIdentity: options.colors,
        isToken: options.tokens,
        isBasicLand: options.basicLands,
        artist: options.artist,
        frame: options.frame,
        frameEffect: options.frameEffect,
        fullArt: options.fullArt,
        limit: options.limit,
      };
      const index = context.index();
      if (options.uniqueArt) {
        printJson({
          artworks: index.countUniqueArtworks(filter),
          prints: index.uniqueArtworks(filter).map(printSummary),
        });
        return;
      }
      printJson(index.query(filter).map(printSummary));
    },
  );

program
  .command("tokens")
  .description("Find token prints whose rules text or keywords mention a keyword")
  .argument("<keyword>", "keyword, e.g. flying")
  .option("-s, --set <code>", "set code")
  .option("--limit <n>", "maximum rows", positiveInt, 20)
  .action((keyword: string, options: { set?: string; limit: number }) => {
    printJson(
      context
        .index()
        .findTokensByKeyword(keyword, { setCode: options.set, limit: options.limit })
        .map(printSummary),
    );
  });

program
  .command("resolve")
  .description("Resolve a deck file or card names into prints, including related cards")
  .argument("<inputs...>", "deck file, or one or more card names")
  .option("-f, --format <id>", `deck format (${DECK_FORMAT_IDS.join(", ")}); detected when omitted`)
  .option("--set <code>", "preferred set code")
  .option("--lang <code>", "preferred language")
  .option("--no-tokens", "do not follow token relationships")
  .action((inputs: string[], flags: ResolveFlags) => {
    const result = resolveInputs(inputs, flags);
    printJson({
      stats: result.stats,
      prints: result.prints.map((entry) => ({
        id: entry.print.id,
        name: entry.print.name,
        set: entry.print.setCode,
        collectorNumber: entry.print.collectorNumber,
        origin: entry.origin,
        via: entry.viaPrintId,
        quantity: entry.quantity,
      })),
      missing: result.missing.map((item) => ({ query: item.query, reason: item.reason, via: item.viaPrintId })),
    });
  });

program
  .command("fetch")
  .description("Resolve a deck and download every print's image into the classified folder tree")
  .argument("<deckfile>", "deck list")
  .option("-f, --format <id>", `deck format (${DECK_FORMAT_IDS.join(", ")}); detected when omitted`)
  .option("--set <code>", "preferred set code")
  .option("--lang <code>", "preferred language")
  .option("--no-tokens", "do not follow token relationships")
  .option("-c, --concurrency <n>", "parallel downloads", positiveInt)
  .option("--dry-run", "plan the batch without downloading")
  .option("--no-skip-existing", "download even when the destination already exists")
  .action(
    async (
      deckfile: string,
      flags: ResolveFlags & { concurrency?: number; dryRun?: boolean; skipExisting: boolean },
    ) => {
      if (!fs.existsSync(deckfile)) throw new ValidationError(`Deck file not found: ${deckfile}`);
      const resolution = resolveInputs([deckfile], flags);

      const controller = new AbortController();
      const onSigint = () => {
        logger.warn("Interrupt received; finishing in-flight downloads");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const { summary, unplannable, estimate } = await context.fetchPrints(
          resolution.prints.map((entry) => entry.print),
          {
            concurrency: flags.concurrency,
            dryRun: flags.dryRun ?? false,
            skipExisting: flags.skipExisting,
            signal: controller.signal,
          },
        );
        printJson({
          totalRequested: summary.totalRequested,
          successful: summary.successful,
          failed: summary.failed,
          skipped: summary.skipped,
          totalBytes: summary.totalBytes,
          elapsedMs: summary.elapsedMs,
          successRate: Number(successRate(summary).toFixed(4)),
          cancelled: summary.cancelled,
          dryRun: summary.dryRun,
          estimate: {
            jobs: estimate.jobCount,
            megabytes: Number((estimate.estimatedBytes / 1_000_000).toFixed(1)),
            minutes: Number((estimate.estimatedSeconds / 60).toFixed(1)),
          },
          files: materializedPaths(summary).length,
          failedJobs: summary.failedJobs.map((job) => ({ printId: job.printId, uri: job.sourceUri })),
          withoutImage: unplannable.map((print) => print.id),
          missing: resolution.missing.map((item) => item.query),
        });
        if (summary.cancelled) process.exitCode = 130;
        else if (summary.failed > 0) process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    },
  );

const main = async () => {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof DatabaseUnavailableError) {
      logger.error({ code: error.code }, error.message);
      process.stderr.write(`${error.message}\n${error.hint}\n`);
      process.exitCode = 2;
    } else if (error instanceof ValidationError) {
      logger.error({ issues: error.issues }, error.message);
      process.exitCode = 1;
    } else if (error instanceof CardAtlasError) {
      logger.error({ code: error.code }, error.message);
      process.exitCode = 1;
    } else {
      logger.error({ err: error }, `Unexpected failure: ${describeError(error)}`);
      process.exitCode = 1;
    }
  } finally {
    context.close();
  }
};

void main();
