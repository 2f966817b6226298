export interface FetchJob {
  printId: string;
  displayName: string;
  sourceUri: string;
  destinationPath: string;
  retryCount: number;
}

export type FetchStatus = "downloaded" | "skipped" | "failed";

export type FetchErrorKind =
  | "timeout"
  | "connection"
  | "http"
  | "invalid_uri"
  | "filesystem"
  | "cancelled"
  | "unknown";

export interface FetchResult {
  job: FetchJob;
  status: FetchStatus;
  bytes: number;
  elapsedMs: number;
  attempts: number;
  errorKind?: FetchErrorKind;
  errorMessage?: string;
}

export interface FetchSummary {
  totalRequested: number;
  successful: number;
  failed: number;
  skipped: number;
  totalBytes: number;
  elapsedMs: number;
  cancelled: boolean;
  dryRun: boolean;
  failedJobs: FetchJob[];
  results: FetchResult[];
}

export const successRate = (summary: FetchSummary): number => {
  const attempted = summary.totalRequested - summary.skipped;
  return attempted === 0 ? 1 : summary.successful / attempted;
};

/** Paths a downstream consumer can read after the batch: written or already present. */
export const materializedPaths = (summary: FetchSummary): string[] =>
  summary.results
    .filter((result) => result.status !== "failed")
    .map((result) => result.job.destinationPath);
