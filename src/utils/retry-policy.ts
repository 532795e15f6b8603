/**
 * Retry Policy
 * Bounded retry with exponential backoff and transient/permanent classification
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  FetchFailedError,
  HttpError,
  RequestTimeoutError,
  RetriesExhaustedError,
  TranslationFailedError,
} from "./errors";

export type FailureKind = "transient" | "permanent";

// Request timeout, too early, rate limited
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Decide whether a failure is worth retrying
 *
 * Worker errors are classified by their cause. Timeouts, connection-level
 * errors, 408/425/429 and 5xx are transient; anything else is permanent.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof TranslationFailedError || error instanceof FetchFailedError) {
    return classifyFailure(error.cause);
  }
  if (error instanceof HttpError) {
    return error.status >= 500 || TRANSIENT_STATUSES.has(error.status)
      ? "transient"
      : "permanent";
  }
  if (error instanceof RequestTimeoutError) {
    return "transient";
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return "transient";
  }

  const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
  if (code && TRANSIENT_CODES.has(code)) {
    return "transient";
  }

  // undici reports connection failures as a bare TypeError
  if (error instanceof TypeError && error.message === "fetch failed") {
    return "transient";
  }

  return "permanent";
}

export interface RetryAttempt {
  attempt: number; // The attempt that just failed (1-based)
  delay: number; // Milliseconds before the next attempt
  error: unknown;
}

export interface RetryOptions {
  maxRetries: number; // Additional attempts after the first one
  baseDelay?: number; // In milliseconds (default: 1000)
  maxDelay?: number; // In milliseconds (default: 30000)
  signal?: AbortSignal;
  classify?: (error: unknown) => FailureKind;
  onRetry?: (info: RetryAttempt) => void;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export class RetryPolicy {
  private readonly baseDelay: number;
  private readonly maxDelay: number;
  private readonly classify: (error: unknown) => FailureKind;

  constructor(private readonly options: RetryOptions) {
    this.baseDelay = options.baseDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 30000;
    this.classify = options.classify ?? classifyFailure;
  }

  /**
   * Run an operation until it succeeds, fails permanently, or runs out of attempts
   *
   * @throws the permanent failure as-is, or RetriesExhaustedError wrapping the last transient one
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
  ): Promise<RetryResult<T>> {
    const { maxRetries, signal, onRetry } = this.options;
    const maxAttempts = maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      signal?.throwIfAborted();

      try {
        const value = await operation(attempt);
        return { value, attempts: attempt };
      } catch (error) {
        lastError = error;

        if (signal?.aborted || this.classify(error) === "permanent") {
          throw error;
        }
        if (attempt === maxAttempts) {
          break;
        }

        const delay = this.delayFor(attempt, error);
        onRetry?.({ attempt, delay, error });
        await sleep(delay, undefined, { signal });
      }
    }

    throw new RetriesExhaustedError(maxAttempts, lastError);
  }

  /**
   * Backoff before the attempt following `attempt`: 1x, 2x, 4x... baseDelay,
   * or the server's Retry-After, capped at maxDelay
   */
  delayFor(attempt: number, error: unknown): number {
    const cause =
      error instanceof TranslationFailedError || error instanceof FetchFailedError
        ? error.cause
        : error;

    if (cause instanceof HttpError && cause.retryAfter !== undefined) {
      return Math.min(cause.retryAfter, this.maxDelay);
    }

    return Math.min(this.baseDelay * Math.pow(2, attempt - 1), this.maxDelay);
  }
}

/**
 * One-off retry wrapper
 */
export function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  maxRetries: number,
  options: Omit<RetryOptions, "maxRetries"> = {},
): Promise<RetryResult<T>> {
  return new RetryPolicy({ ...options, maxRetries }).execute(operation);
}
