export type ErrorCode =
  | "SourceUnavailable"
  | "RateLimited"
  | "TransientSource"
  | "AuthError"
  | "MalformedRecord"
  | "EmbeddingUnavailable"
  | "ProviderError"
  | "InvalidMetric"
  | "NotFound"
  | "CollectionLocked"
  | "ValidationError";

export class IssuedexError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class RateLimitedError extends IssuedexError {
  readonly resetAt?: Date;

  constructor(message: string, resetAt?: Date, options?: { cause?: unknown }) {
    super("RateLimited", message, options);
    this.resetAt = resetAt;
  }
}

export class TransientSourceError extends IssuedexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TransientSource", message, options);
  }
}

export class AuthError extends IssuedexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AuthError", message, options);
  }
}

/** Fetch retries exhausted for a window. Fatal for the run; the checkpoint stays where it was. */
export class SourceUnavailableError extends IssuedexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SourceUnavailable", message, options);
  }
}

export class MalformedRecordError extends IssuedexError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("MalformedRecord", message);
    this.issues = issues;
  }
}

export class EmbeddingUnavailableError extends IssuedexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EmbeddingUnavailable", message, options);
  }
}

export class ProviderError extends IssuedexError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("ProviderError", message, options);
    this.status = status;
  }
}

export class InvalidMetricError extends IssuedexError {
  constructor(metric: string, available: readonly string[]) {
    super("InvalidMetric", `unknown metric "${metric}". available: ${available.join(", ")}`);
  }
}

export class NotFoundError extends IssuedexError {
  constructor(message: string) {
    super("NotFound", message);
  }
}

export class CollectionLockedError extends IssuedexError {
  constructor(collection: string, holder: string, acquiredAt: string, message?: string) {
    super(
      "CollectionLocked",
      message ??
        `collection ${collection} is locked by ${holder} since ${acquiredAt}. wait for it to finish or run \`issuedex clean --locks\`.`,
    );
  }

  /** The run holding `holder` lost the lock (expired and taken over, or cleared). */
  static lost(collection: string, holder: string, current?: { holder: string; acquiredAt: string }): CollectionLockedError {
    const what = current ? `taken over by ${current.holder} at ${current.acquiredAt}` : "released";
    return new CollectionLockedError(
      collection,
      current?.holder ?? "",
      current?.acquiredAt ?? "",
      `lock on ${collection} held by ${holder} was ${what}. the pending write was discarded`,
    );
  }
}

export class ValidationError extends IssuedexError {
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super("ValidationError", message);
    this.errors = errors;
  }
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Rate limits, transient source failures, timeouts and 429/5xx provider responses
 * are worth another attempt. Everything else is final.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof RateLimitedError || err instanceof TransientSourceError) return true;
  if (err instanceof ProviderError) {
    if (err.status === undefined) return true;
    return err.status === 408 || err.status === 429 || err.status >= 500;
  }
  if (err instanceof Error && err.name === "TimeoutError") return true;
  return false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
