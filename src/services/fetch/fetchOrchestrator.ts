import { randomUUID } from "node:crypto";
import { createWriteStream, promises as fs } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";
import type { FetchErrorKind, FetchJob, FetchResult, FetchSummary } from "../../domain/fetch";
import { NetworkError, ValidationError, describeError } from "../../errors";
import { moduleLogger } from "../../utils/logger";
import { RetryPolicy } from "../../utils/retryPolicy";
import type { ImageSource } from "./imageSource";
import { validateFetchJobs } from "./jobPlanner";

export interface FetchDefaults {
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  skipExisting: boolean;
}

export interface FetchOrchestratorOptions {
  source: ImageSource;
  logger: Logger;
  defaults?: Partial<FetchDefaults>;
}

export interface FetchRunOptions {
  concurrency?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  skipExisting?: boolean;
  /** Plan only: nothing is downloaded or written. */
  dryRun?: boolean;
  /** Stops scheduling new jobs; attempts already in flight run to completion or timeout. */
  signal?: AbortSignal;
  onResult?: (result: FetchResult) => void;
}

const DEFAULTS: FetchDefaults = {
  concurrency: 8,
  timeoutMs: 30000,
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 30000,
  skipExisting: true,
};

/** Errors that make every further write pointless; they abort the batch. */
const FATAL_FS_CODES = new Set(["ENOSPC", "EDQUOT", "EROFS"]);

const errnoCode = (error: unknown): string | null =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;

const isFilesystemError = (error: unknown): boolean =>
  error instanceof Error && "syscall" in error && errnoCode(error) !== null;

const isFatalFilesystemError = (error: unknown): boolean => {
  const code = errnoCode(error);
  return code !== null && FATAL_FS_CODES.has(code);
};

export const errorKindOf = (error: unknown): FetchErrorKind => {
  if (error instanceof ValidationError) return "invalid_uri";
  if (error instanceof NetworkError) {
    switch (error.kind) {
      case "timeout":
        return "timeout";
      case "connection":
        return "connection";
      case "http":
        return "http";
      case "aborted":
        return "cancelled";
    }
  }
  if (isFilesystemError(error)) return "filesystem";
  return "unknown";
};

const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Runs a batch of fetch jobs on a fixed pool of async workers. Each job
 * streams into a temporary sibling of its destination and is renamed into
 * place only when complete, so a destination is either absent or whole.
 */
export class FetchOrchestrator {
  private readonly source: ImageSource;
  private readonly logger: Logger;
  private readonly defaults: FetchDefaults;

  constructor(options: FetchOrchestratorOptions) {
    this.source = options.source;
    this.logger = moduleLogger(options.logger, "fetch-orchestrator");
    this.defaults = { ...DEFAULTS, ...options.defaults };
  }

  async run(jobs: readonly FetchJob[], options: FetchRunOptions = {}): Promise<FetchSummary> {
    validateFetchJobs(jobs);

    const started = Date.now();
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? this.defaults.concurrency));
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const skipExisting = options.skipExisting ?? this.defaults.skipExisting;
    const dryRun = options.dryRun ?? false;
    const policy =
      options.retryPolicy ??
      RetryPolicy.fromRetries(this.defaults.maxRetries, {
        initialDelay: this.defaults.baseDelayMs,
        maxDelay: this.defaults.maxDelayMs,
        logger: this.logger,
      });

    const results: FetchResult[] = [];
    const record = (result: FetchResult) => {
      results.push(result);
      options.onResult?.(result);
    };

    let pending: FetchJob[] = [...jobs];
    if (skipExisting) {
      const present = await Promise.all(pending.map((job) => pathExists(job.destinationPath)));
      pending = pending.filter((job, i) => {
        if (!present[i]) return true;
        record({ job, status: "skipped", bytes: 0, elapsedMs: 0, attempts: 0 });
        return false;
      });
    }

    this.logger.info(
      { total: jobs.length, pending: pending.length, skipped: jobs.length - pending.length, concurrency, dryRun },
      "Starting fetch batch",
    );

    // Internal stop flag: set by the caller's signal or by a fatal filesystem error.
    const stop = new AbortController();
    const onCallerAbort = () => stop.abort();
    if (options.signal?.aborted) stop.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    let next = 0;
    let fatal: unknown = null;

    const worker = async () => {
      for (;;) {
        if (stop.signal.aborted) return;
        const index = next++;
        if (index >= pending.length) return;
        const job = pending[index];
        if (dryRun) {
          record({ job, status: "downloaded", bytes: 0, elapsedMs: 0, attempts: 0 });
          continue;
        }
        try {
          record(await this.runJob(job, policy, timeoutMs, stop.signal));
        } catch (error) {
          fatal = error;
          this.logger.error({ err: error, printId: job.printId }, "Fatal filesystem error; stopping batch");
          record(this.failedResult(job, error, 1, 0));
          stop.abort();
          return;
        }
      }
    };

    try {
      await Promise.all(Array.from({ length: Math.min(concurrency, pending.length) }, () => worker()));
    } finally {
      options.signal?.removeEventListener("abort", onCallerAbort);
    }

    if (fatal !== null) throw fatal;

    // Jobs the pool never reached because the batch was cancelled.
    for (let index = next; index < pending.length; index++) {
      record({
        job: pending[index],
        status: "failed",
        bytes: 0,
        elapsedMs: 0,
        attempts: 0,
        errorKind: "cancelled",
        errorMessage: "Batch cancelled before this job started",
      });
    }

    const summary = this.summarize(jobs.length, results, Date.now() - started, stop.signal.aborted, dryRun);
    this.logger.info(
      {
        total: summary.totalRequested,
        successful: summary.successful,
        failed: summary.failed,
        skipped: summary.skipped,
        totalBytes: summary.totalBytes,
        elapsedMs: summary.elapsedMs,
        cancelled: summary.cancelled,
      },
      "Fetch batch complete",
    );
    return summary;
  }

  private async runJob(job: FetchJob, policy: RetryPolicy, timeoutMs: number, stop: AbortSignal): Promise<FetchResult> {
    const started = Date.now();
    let attempts = 0;
    try {
      const bytes = await policy.execute(
        (attempt) => {
          attempts = attempt;
          return this.download(job, timeoutMs);
        },
        { context: job.printId, signal: stop },
      );
      const result: FetchResult = {
        job: { ...job, retryCount: attempts - 1 },
        status: "downloaded",
        bytes,
        elapsedMs: Date.now() - started,
        attempts,
      };
      this.logger.debug({ printId: job.printId, bytes, attempts }, "Fetched image");
      return result;
    } catch (error) {
      if (isFatalFilesystemError(error)) throw error;
      const result = this.failedResult(job, error, attempts, Date.now() - started);
      this.logger.warn(
        { printId: job.printId, uri: job.sourceUri, attempts, errorKind: result.errorKind, error: result.errorMessage },
        "Fetch job failed",
      );
      return result;
    }
  }

  /** One attempt: bounded-time GET streamed to a temp sibling, then renamed into place. */
  private async download(job: FetchJob, timeoutMs: number): Promise<number> {
    const destination = job.destinationPath;
    await fs.mkdir(path.dirname(destination), { recursive: true });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const tempPath = `${destination}.${randomUUID().slice(0, 8)}.part`;
    try {
      const response = await this.source.open(job.sourceUri, controller.signal);
      const out = createWriteStream(tempPath);
      await pipeline(response.body, out, { signal: controller.signal });
      await fs.rename(tempPath, destination);
      return out.bytesWritten;
    } catch (error) {
      await this.removeTemp(tempPath);
      if (timedOut) {
        throw new NetworkError(`Timed out after ${timeoutMs}ms`, { kind: "timeout", uri: job.sourceUri }, { cause: error });
      }
      if (error instanceof NetworkError || error instanceof ValidationError) throw error;
      if (isFilesystemError(error)) throw error;
      throw new NetworkError(`Transfer interrupted: ${describeError(error)}`, { kind: "connection", uri: job.sourceUri }, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      this.logger.warn({ tempPath, error: describeError(error) }, "Could not remove partial download");
    }
  }

  private failedResult(job: FetchJob, error: unknown, attempts: number, elapsedMs: number): FetchResult {
    return {
      job: { ...job, retryCount: Math.max(0, attempts - 1) },
      status: "failed",
      bytes: 0,
      elapsedMs,
      attempts,
      errorKind: errorKindOf(error),
      errorMessage: describeError(error),
    };
  }

  private summarize(
    totalRequested: number,
    results: FetchResult[],
    elapsedMs: number,
    cancelled: boolean,
    dryRun: boolean,
  ): FetchSummary {
    let successful = 0;
    let failed = 0;
    let skipped = 0;
    let totalBytes = 0;
    const failedJobs: FetchJob[] = [];
    for (const result of results) {
      totalBytes += result.bytes;
      if (result.status === "downloaded") successful++;
      else if (result.status === "skipped") skipped++;
      else {
        failed++;
        failedJobs.push(result.job);
      }
    }
    failedJobs.sort((a, b) => (a.destinationPath < b.destinationPath ? -1 : a.destinationPath > b.destinationPath ? 1 : 0));
    return Object.freeze({
      totalRequested,
      successful,
      failed,
      skipped,
      totalBytes,
      elapsedMs,
      cancelled,
      dryRun,
      failedJobs,
      results,
    });
  }
}
