import type { Logger } from "pino";
import { NetworkError, describeError } from "../errors";

export type RetryCondition = (error: unknown, attempt: number) => boolean;
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  jitter?: boolean;
  retryCondition?: RetryCondition;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
}

export interface ExecuteOptions {
  context?: string;
  signal?: AbortSignal;
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

export const retryTransientNetworkErrors: RetryCondition = (error) =>
  error instanceof NetworkError && error.retryable;

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly initialDelay: number;
  private readonly maxDelay: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly retryCondition: RetryCondition;
  private readonly onRetry?: (error: unknown, attempt: number, delay: number) => void;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger?: Logger;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));
    this.initialDelay = options.initialDelay ?? 500;
    this.maxDelay = options.maxDelay ?? 30000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter !== false;
    this.retryCondition = options.retryCondition ?? retryTransientNetworkErrors;
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  /** Builds a policy from a retry count: one first try plus `maxRetries` retries. */
  static fromRetries(maxRetries: number, options: Omit<RetryOptions, "maxAttempts"> = {}): RetryPolicy {
    return new RetryPolicy({ ...options, maxAttempts: 1 + Math.max(0, maxRetries) });
  }

  delayFor(attempt: number): number {
    let delay = this.initialDelay * Math.pow(this.factor, attempt - 1);
    delay = Math.min(delay, this.maxDelay);

    if (this.jitter) {
      // ±20%
      const jitterAmount = delay * 0.2;
      delay = delay + (this.random() * jitterAmount * 2 - jitterAmount);
    }

    return Math.max(0, Math.round(delay));
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const { context, signal } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await fn(attempt);
        if (attempt > 1) {
          this.logger?.debug({ context, attempt }, "Retry succeeded");
        }
        return result;
      } catch (error) {
        lastError = error;

        if (!this.retryCondition(error, attempt)) {
          throw error;
        }

        if (attempt < this.maxAttempts) {
          if (signal?.aborted) break;
          const delay = this.delayFor(attempt);
          this.logger?.debug(
            { context, attempt, nextAttempt: attempt + 1, delay, error: describeError(error) },
            "Operation failed, retrying",
          );
          this.onRetry?.(error, attempt, delay);
          await this.sleep(delay, signal);
          if (signal?.aborted) break;
        }
      }
    }

    this.logger?.debug(
      { context, maxAttempts: this.maxAttempts, error: describeError(lastError) },
      "Retry attempts exhausted",
    );
    throw lastError;
  }
}

export const retryPolicies = {
  fast: new RetryPolicy({ maxAttempts: 3, initialDelay: 100, maxDelay: 1000 }),
  standard: new RetryPolicy({ maxAttempts: 4, initialDelay: 500, maxDelay: 30000 }),
  none: new RetryPolicy({ maxAttempts: 1 }),
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions | RetryPolicy,
  context?: string,
): Promise<T> {
  const policy = options instanceof RetryPolicy ? options : new RetryPolicy(options);
  return policy.execute(fn, { context });
}
