import type { FetchJob } from "../../domain/fetch";
import type { Print } from "../../domain/print";
import { ValidationError } from "../../errors";
import { DEFAULT_LAND_OVERRIDES, destinationFor, type LandOverrides } from "../classification/classifier";

export interface PlanOptions {
  outputDir: string;
  landOverrides?: LandOverrides;
}

export interface FetchPlan {
  jobs: FetchJob[];
  /** Prints the catalog has no image for. */
  unplannable: Print[];
}

export const planFetchJobs = (prints: readonly Print[], options: PlanOptions): FetchPlan => {
  const jobs: FetchJob[] = [];
  const unplannable: Print[] = [];
  const seen = new Set<string>();
  for (const print of prints) {
    if (seen.has(print.id)) continue;
    seen.add(print.id);
    if (!print.imageUrl) {
      unplannable.push(print);
      continue;
    }
    jobs.push({
      printId: print.id,
      displayName: `${print.name} (${print.setCode.toUpperCase()} ${print.collectorNumber}, ${print.lang})`,
      sourceUri: print.imageUrl,
      destinationPath: destinationFor(print, options.outputDir, options.landOverrides ?? DEFAULT_LAND_OVERRIDES),
      retryCount: 0,
    });
  }
  return { jobs, unplannable };
};

/** Every destination must be unique within a batch; collisions are rejected before any work starts. */
export const validateFetchJobs = (jobs: readonly FetchJob[]): void => {
  const owners = new Map<string, string>();
  const issues: string[] = [];
  for (const job of jobs) {
    const owner = owners.get(job.destinationPath);
    if (owner !== undefined) {
      issues.push(`${job.destinationPath} (${owner}, ${job.printId})`);
    } else {
      owners.set(job.destinationPath, job.printId);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(`Duplicate destination paths in fetch batch (${issues.length})`, issues);
  }
};

/** Rough per-image size of a large card scan, and aggregate download throughput. */
export const ESTIMATE_DEFAULTS = { averageBytes: 850_000, bytesPerSecond: 2_000_000 } as const;

export interface BatchEstimate {
  jobCount: number;
  estimatedBytes: number;
  estimatedSeconds: number;
  concurrency: number;
}

export const estimateBatch = (
  jobs: readonly FetchJob[],
  options: { concurrency: number; averageBytes?: number; bytesPerSecond?: number },
): BatchEstimate => {
  const estimatedBytes = jobs.length * (options.averageBytes ?? ESTIMATE_DEFAULTS.averageBytes);
  return {
    jobCount: jobs.length,
    estimatedBytes,
    estimatedSeconds: estimatedBytes / (options.bytesPerSecond ?? ESTIMATE_DEFAULTS.bytesPerSecond),
    concurrency: options.concurrency,
  };
};
