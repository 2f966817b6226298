import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from the project root, regardless of process.cwd()
const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = path.resolve(__dirname, "..");
loadEnv({ path: path.join(PROJECT_ROOT, ".env") });

export const envSchema = z.object({
  INDEX_DB_PATH: z.string().default("data/card-index.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: boolFromEnv(false),
  OUTPUT_DIR: z.string().default("output/images"),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  FETCH_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  FETCH_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
  FETCH_SKIP_EXISTING: boolFromEnv(true),
  FETCH_USER_AGENT: z.string().default("card-atlas/0.1 (+image fetcher)"),
  QUERY_CACHE_TTL_MS: z.coerce.number().int().min(0).default(300000),
  QUERY_CACHE_CAPACITY: z.coerce.number().int().min(1).default(1000),
  INGEST_BATCH_SIZE: z.coerce.number().int().min(1).max(50000).default(1000),
  DEFAULT_LANG: z.string().min(2).default("en"),
});

export type Env = z.infer<typeof envSchema>;

export const toRuntimeConfig = (parsed: Env) => ({
  indexDbPath: path.resolve(process.cwd(), parsed.INDEX_DB_PATH),
  logLevel: parsed.LOG_LEVEL,
  logPretty: parsed.LOG_PRETTY,
  outputDir: path.resolve(process.cwd(), parsed.OUTPUT_DIR),
  fetchConcurrency: parsed.FETCH_CONCURRENCY,
  fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
  fetchMaxRetries: parsed.FETCH_MAX_RETRIES,
  fetchBaseDelayMs: parsed.FETCH_BASE_DELAY_MS,
  fetchMaxDelayMs: parsed.FETCH_MAX_DELAY_MS,
  fetchSkipExisting: parsed.FETCH_SKIP_EXISTING,
  fetchUserAgent: parsed.FETCH_USER_AGENT,
  queryCacheTtlMs: parsed.QUERY_CACHE_TTL_MS,
  queryCacheCapacity: parsed.QUERY_CACHE_CAPACITY,
  ingestBatchSize: parsed.INGEST_BATCH_SIZE,
  defaultLang: parsed.DEFAULT_LANG.toLowerCase(),
});

export type RuntimeConfig = ReturnType<typeof toRuntimeConfig>;

export const runtimeConfig: RuntimeConfig = toRuntimeConfig(envSchema.parse(process.env));
