export type ErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "NETWORK"
  | "DATABASE_UNAVAILABLE"
  | "INDEX_LOCKED";

export class CardAtlasError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CardAtlasError";
    this.code = code;
  }
}

export class ValidationError extends CardAtlasError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super("VALIDATION", message, options);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends CardAtlasError {
  readonly query: string;

  constructor(query: string, message = `No card matches "${query}"`) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
    this.query = query;
  }
}

export type NetworkErrorKind = "timeout" | "connection" | "http" | "aborted";

export interface NetworkErrorDetails {
  kind: NetworkErrorKind;
  status?: number;
  uri?: string;
}

/** 429 and 5xx are transient; every other HTTP status is final. */
export const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

export class NetworkError extends CardAtlasError {
  readonly kind: NetworkErrorKind;
  readonly status?: number;
  readonly uri?: string;
  readonly retryable: boolean;

  constructor(message: string, details: NetworkErrorDetails, options?: ErrorOptions) {
    super("NETWORK", message, options);
    this.name = "NetworkError";
    this.kind = details.kind;
    this.status = details.status;
    this.uri = details.uri;
    this.retryable =
      details.kind === "http"
        ? details.status !== undefined && isRetryableStatus(details.status)
        : details.kind !== "aborted";
  }
}

export class DatabaseUnavailableError extends CardAtlasError {
  readonly hint: string;

  constructor(
    message: string,
    hint = "Run `build-index <catalog>` to create the card index.",
    options?: ErrorOptions,
    code: ErrorCode = "DATABASE_UNAVAILABLE",
  ) {
    super(code, message, options);
    this.name = "DatabaseUnavailableError";
    this.hint = hint;
  }
}

export class IndexLockedError extends DatabaseUnavailableError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super(
      `Another index build holds ${lockPath}`,
      "Wait for the running build to finish, or remove the stale lock file.",
      undefined,
      "INDEX_LOCKED",
    );
    this.name = "IndexLockedError";
    this.lockPath = lockPath;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};
