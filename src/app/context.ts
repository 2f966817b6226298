/**
 * AppContext: composition root for card-atlas.
 *
 * Builds the logger and every service from one RuntimeConfig, so the CLI
 * stays a thin adapter that parses arguments and calls into the context.
 * The card index is opened lazily: `build-index` must work before any
 * index exists.
 */

import type { Logger } from "pino";
import type { RuntimeConfig } from "../config";
import type { CardRequest, Print } from "../domain/print";
import type { FetchSummary } from "../domain/fetch";
import { createLogger } from "../utils/logger";
import { CardIndex } from "../services/index/cardIndex";
import { CardIndexBuilder, type BuildStats } from "../services/index/cardIndexBuilder";
import {
  RelationshipResolver,
  type ResolutionResult,
  type ResolveOptions,
} from "../services/resolution/relationshipResolver";
import { HttpImageSource, type ImageSource } from "../services/fetch/imageSource";
import { FetchOrchestrator, type FetchRunOptions } from "../services/fetch/fetchOrchestrator";
import { estimateBatch, planFetchJobs, type BatchEstimate } from "../services/fetch/jobPlanner";

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  /** Opens the index on first use; throws DatabaseUnavailableError if it is missing or stale. */
  index(): CardIndex;
  resolver(): RelationshipResolver;
  orchestrator: FetchOrchestrator;
  buildIndex(catalogPath: string): Promise<BuildStats>;
  resolveDeck(requests: readonly CardRequest[], options?: ResolveOptions): ResolutionResult;
  fetchPrints(prints: readonly Print[], options?: FetchRunOptions): Promise<FetchBatchReport>;
  close(): void;
}

export interface FetchBatchReport {
  summary: FetchSummary;
  /** Prints with no image in the catalog; never turned into jobs. */
  unplannable: Print[];
  estimate: BatchEstimate;
}

export interface ContextOverrides {
  logger?: Logger;
  imageSource?: ImageSource;
}

export function createContext(config: RuntimeConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, pretty: config.logPretty });

  let index: CardIndex | null = null;
  let resolver: RelationshipResolver | null = null;

  const openIndex = (): CardIndex => {
    if (!index) {
      index = CardIndex.open(config.indexDbPath, {
        logger,
        cacheTtlMs: config.queryCacheTtlMs,
        cacheCapacity: config.queryCacheCapacity,
      });
    }
    return index;
  };

  const getResolver = (): RelationshipResolver => {
    if (!resolver) resolver = new RelationshipResolver(openIndex(), logger);
    return resolver;
  };

  const orchestrator = new FetchOrchestrator({
    source: overrides.imageSource ?? new HttpImageSource({ userAgent: config.fetchUserAgent }),
    logger,
    defaults: {
      concurrency: config.fetchConcurrency,
      timeoutMs: config.fetchTimeoutMs,
      maxRetries: config.fetchMaxRetries,
      baseDelayMs: config.fetchBaseDelayMs,
      maxDelayMs: config.fetchMaxDelayMs,
      skipExisting: config.fetchSkipExisting,
    },
  });

  return {
    config,
    logger,
    index: openIndex,
    resolver: getResolver,
    orchestrator,

    async buildIndex(catalogPath) {
      const builder = new CardIndexBuilder({
        indexPath: config.indexDbPath,
        logger,
        batchSize: config.ingestBatchSize,
      });
      const stats = await builder.buildFromFile(catalogPath);
      // An open reader still points at the replaced file.
      index?.reload();
      return stats;
    },

    resolveDeck(requests, options = {}) {
      return getResolver().resolve(requests, {
        preferredLang: config.defaultLang,
        ...options,
      });
    },

    async fetchPrints(prints, options = {}) {
      const { jobs, unplannable } = planFetchJobs(prints, { outputDir: config.outputDir });
      if (unplannable.length > 0) {
        logger.warn({ count: unplannable.length, ids: unplannable.map((print) => print.id) }, "Prints without images");
      }
      const estimate = estimateBatch(jobs, { concurrency: options.concurrency ?? config.fetchConcurrency });
      logger.info(estimate, "Fetch batch planned");
      const summary = await orchestrator.run(jobs, options);
      return { summary, unplannable, estimate };
    },

    close() {
      index?.close();
      index = null;
      resolver = null;
    },
  };
}
