import fs, { promises as fsp } from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { FetchJob, FetchResult } from "../../domain/fetch";
import { materializedPaths, successRate } from "../../domain/fetch";
import { NetworkError, ValidationError } from "../../errors";
import { silentLogger } from "../../utils/logger";
import { RetryPolicy } from "../../utils/retryPolicy";
import { FetchOrchestrator, errorKindOf } from "../fetch/fetchOrchestrator";
import { parseImageUri, type ImageResponse, type ImageSource } from "../fetch/imageSource";
import { makeTempDir, removeDir } from "./fixtures";

type Behavior = (uri: string, attempt: number, signal: AbortSignal) => Promise<ImageResponse>;

class FakeImageSource implements ImageSource {
  readonly calls = new Map<string, number>();

  constructor(private readonly behavior: Behavior) {}

  async open(uri: string, signal: AbortSignal): Promise<ImageResponse> {
    parseImageUri(uri);
    const attempt = (this.calls.get(uri) ?? 0) + 1;
    this.calls.set(uri, attempt);
    return this.behavior(uri, attempt, signal);
  }

  get totalCalls(): number {
    return [...this.calls.values()].reduce((sum, count) => sum + count, 0);
  }
}

const body = (text: string): ImageResponse => ({ body: Readable.from([Buffer.from(text)]), contentLength: text.length });

const serveUriName: Behavior = async (uri) => body(`image:${path.basename(uri)}`);

const noWait = (maxRetries: number) => RetryPolicy.fromRetries(maxRetries, { sleep: async () => {}, jitter: false });

const fsError = (code: string, syscall: string) => Object.assign(new Error(`${code}: ${syscall} failed`), { code, syscall });

describe("FetchOrchestrator", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("card-atlas-fetch-");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  const job = (name: string, uri = `https://img.example.test/${name}.jpg`): FetchJob => ({
    printId: name,
    displayName: name,
    sourceUri: uri,
    destinationPath: path.join(dir, "cards", "instant", `${name}.jpg`),
    retryCount: 0,
  });

  const orchestrator = (behavior: Behavior) => {
    const source = new FakeImageSource(behavior);
    return { source, orchestrator: new FetchOrchestrator({ source, logger: silentLogger() }) };
  };

  it("downloads every job into its destination", async () => {
    const { orchestrator: fetcher } = orchestrator(serveUriName);
    const jobs = [job("a"), job("b"), job("c")];
    const seen: FetchResult[] = [];

    const summary = await fetcher.run(jobs, { concurrency: 2, retryPolicy: noWait(0), onResult: (r) => seen.push(r) });

    expect(summary).toMatchObject({ totalRequested: 3, successful: 3, failed: 0, skipped: 0, totalBytes: 33 });
    expect(fs.readFileSync(jobs[1].destinationPath, "utf8")).toBe("image:b.jpg");
    expect(seen).toHaveLength(3);
    expect(materializedPaths(summary).sort()).toEqual(jobs.map((j) => j.destinationPath));
    expect(Object.isFrozen(summary)).toBe(true);
  });

  it("makes exactly one attempt plus the retry budget against a failing server", async () => {
    const { source, orchestrator: fetcher } = orchestrator(async (uri) => {
      throw new NetworkError("HTTP 500", { kind: "http", status: 500, uri });
    });

    const summary = await fetcher.run([job("a")], { retryPolicy: noWait(3) });

    expect(source.totalCalls).toBe(4);
    expect(summary.failed).toBe(1);
    expect(summary.results[0]).toMatchObject({ status: "failed", attempts: 4, errorKind: "http" });
    expect(summary.failedJobs).toEqual([{ ...job("a"), retryCount: 3 }]);
  });

  it("does not retry a missing image", async () => {
    const { source, orchestrator: fetcher } = orchestrator(async (uri) => {
      throw new NetworkError("HTTP 404", { kind: "http", status: 404, uri });
    });

    const summary = await fetcher.run([job("a")], { retryPolicy: noWait(3) });
    expect(source.totalCalls).toBe(1);
    expect(summary.results[0].errorKind).toBe("http");
  });

  it("recovers when a retry succeeds", async () => {
    const { orchestrator: fetcher } = orchestrator(async (uri, attempt) => {
      if (attempt === 1) throw new NetworkError("reset", { kind: "connection", uri });
      return body("ok");
    });

    const summary = await fetcher.run([job("a")], { retryPolicy: noWait(2) });
    expect(summary.results[0]).toMatchObject({ status: "downloaded", attempts: 2, bytes: 2 });
    expect(summary.results[0].job.retryCount).toBe(1);
  });

  it("skips destinations that already exist, so a re-run is a no-op", async () => {
    const { source, orchestrator: fetcher } = orchestrator(serveUriName);
    const jobs = [job("a"), job("b")];

    await fetcher.run(jobs, { retryPolicy: noWait(0) });
    const second = await fetcher.run(jobs, { retryPolicy: noWait(0) });

    expect(source.totalCalls).toBe(2);
    expect(second).toMatchObject({ totalRequested: 2, successful: 0, skipped: 2, failed: 0 });
    expect(successRate(second)).toBe(1);

    const forced = await fetcher.run(jobs, { retryPolicy: noWait(0), skipExisting: false });
    expect(forced.successful).toBe(2);
    expect(source.totalCalls).toBe(4);
  });

  it("leaves no partial file when the transfer breaks mid-stream", async () => {
    const { orchestrator: fetcher } = orchestrator(async () => ({
      body: new Readable({
        read() {
          this.push(Buffer.from("partial"));
          this.destroy(new Error("socket hang up"));
        },
      }),
      contentLength: null,
    }));
    const target = job("a");

    const summary = await fetcher.run([target], { retryPolicy: noWait(0) });

    expect(summary.results[0]).toMatchObject({ status: "failed", errorKind: "connection" });
    expect(fs.existsSync(target.destinationPath)).toBe(false);
    expect(fs.readdirSync(path.dirname(target.destinationPath))).toEqual([]);
  });

  it("leaves no partial file when the final rename fails", async () => {
    vi.spyOn(fsp, "rename").mockRejectedValueOnce(fsError("EACCES", "rename"));
    const { orchestrator: fetcher } = orchestrator(serveUriName);
    const target = job("a");

    const summary = await fetcher.run([target], { retryPolicy: noWait(2) });

    expect(summary.results[0]).toMatchObject({ status: "failed", errorKind: "filesystem", attempts: 1 });
    expect(fs.readdirSync(path.dirname(target.destinationPath))).toEqual([]);
  });

  it("aborts the batch on a full disk", async () => {
    vi.spyOn(fsp, "rename").mockRejectedValueOnce(fsError("ENOSPC", "rename"));
    const { orchestrator: fetcher } = orchestrator(serveUriName);

    await expect(fetcher.run([job("a"), job("b")], { concurrency: 1, retryPolicy: noWait(0) })).rejects.toMatchObject({
      code: "ENOSPC",
    });
  });

  it("fails a malformed URI without holding up the rest of the batch", async () => {
    const { orchestrator: fetcher } = orchestrator(serveUriName);
    const bad = job("bad", "not a uri");

    const summary = await fetcher.run([bad, job("good")], { concurrency: 1, retryPolicy: noWait(3) });

    expect(summary).toMatchObject({ totalRequested: 2, successful: 1, failed: 1, skipped: 0 });
    expect(summary.successful + summary.failed + summary.skipped).toBe(summary.totalRequested);
    expect(summary.results.find((r) => r.job.printId === "bad")).toMatchObject({ errorKind: "invalid_uri", attempts: 1 });
  });

  it("times out a stalled request and retries it", async () => {
    const { source, orchestrator: fetcher } = orchestrator(
      (_uri, _attempt, signal) =>
        new Promise<ImageResponse>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
    );

    const summary = await fetcher.run([job("slow")], { timeoutMs: 20, retryPolicy: noWait(1) });

    expect(source.totalCalls).toBe(2);
    expect(summary.results[0]).toMatchObject({ status: "failed", errorKind: "timeout", attempts: 2 });
  });

  it("rejects a batch with duplicate destinations before fetching anything", async () => {
    const { source, orchestrator: fetcher } = orchestrator(serveUriName);
    const twin = { ...job("a"), printId: "a-prime" };

    await expect(fetcher.run([job("a"), twin])).rejects.toBeInstanceOf(ValidationError);
    expect(source.totalCalls).toBe(0);
  });

  it("plans without downloading in a dry run", async () => {
    const { source, orchestrator: fetcher } = orchestrator(serveUriName);
    const jobs = [job("a"), job("b")];

    const summary = await fetcher.run(jobs, { dryRun: true });

    expect(summary).toMatchObject({ successful: 2, totalBytes: 0, dryRun: true });
    expect(source.totalCalls).toBe(0);
    expect(fs.existsSync(jobs[0].destinationPath)).toBe(false);
  });

  it("stops scheduling on cancellation and reports unstarted jobs as failed", async () => {
    const controller = new AbortController();
    const { source, orchestrator: fetcher } = orchestrator(async (uri) => {
      controller.abort();
      return body(`image:${path.basename(uri)}`);
    });
    const jobs = [job("a"), job("c"), job("b")];

    const summary = await fetcher.run(jobs, { concurrency: 1, retryPolicy: noWait(0), signal: controller.signal });

    expect(source.totalCalls).toBe(1);
    expect(summary).toMatchObject({ totalRequested: 3, successful: 1, failed: 2, cancelled: true });
    expect(fs.existsSync(jobs[0].destinationPath)).toBe(true);
    expect(summary.failedJobs.map((j) => j.printId)).toEqual(["b", "c"]);
    expect(summary.results.filter((r) => r.status === "failed").map((r) => r.errorKind)).toEqual([
      "cancelled",
      "cancelled",
    ]);
  });

  it("does nothing when cancelled before it starts", async () => {
    const controller = new AbortController();
    controller.abort();
    const { source, orchestrator: fetcher } = orchestrator(serveUriName);

    const summary = await fetcher.run([job("a")], { signal: controller.signal });

    expect(source.totalCalls).toBe(0);
    expect(summary).toMatchObject({ failed: 1, cancelled: true });
  });
});

describe("errorKindOf", () => {
  it("maps errors to fetch error kinds", () => {
    expect(errorKindOf(new NetworkError("t", { kind: "timeout" }))).toBe("timeout");
    expect(errorKindOf(new NetworkError("a", { kind: "aborted" }))).toBe("cancelled");
    expect(errorKindOf(new ValidationError("bad uri"))).toBe("invalid_uri");
    expect(errorKindOf(fsError("EACCES", "open"))).toBe("filesystem");
    expect(errorKindOf(new Error("mystery"))).toBe("unknown");
  });
});
