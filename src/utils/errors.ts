/**
 * Error taxonomy
 *
 * Fatal: CorruptDataError, OutputNotWritableError.
 * Per record: TranslationFailedError, FetchFailedError, RetriesExhaustedError.
 * Causes: HttpError, RequestTimeoutError, InvalidRecordError, InvalidResponseError.
 */

/**
 * Render an error and its cause chain as a single line
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(": ");
}

export class CorruptDataError extends Error {
  override name = "CorruptDataError";

  constructor(
    readonly path: string,
    details: string,
    options?: ErrorOptions,
  ) {
    super(`Corrupt record document ${path} (${details})`, options);
  }
}

export class OutputNotWritableError extends Error {
  override name = "OutputNotWritableError";

  constructor(
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(`Output location is not writable: ${path}`, options);
  }
}

export class HttpError extends Error {
  override name = "HttpError";

  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly retryAfter?: number, // Milliseconds, from the Retry-After header
  ) {
    super(`HTTP ${status}: ${statusText}`);
  }
}

export class RequestTimeoutError extends Error {
  override name = "RequestTimeoutError";

  constructor(
    readonly url: string,
    readonly timeout: number,
  ) {
    super(`Request timed out after ${timeout}ms`);
  }
}

export class InvalidRecordError extends Error {
  override name = "InvalidRecordError";
}

export class InvalidResponseError extends Error {
  override name = "InvalidResponseError";
}

export class TranslationFailedError extends Error {
  override name = "TranslationFailedError";

  constructor(
    readonly field: string,
    cause: unknown,
  ) {
    super(`Translation of ${field} failed`, { cause });
  }
}

export class FetchFailedError extends Error {
  override name = "FetchFailedError";

  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Fetching ${url || "<missing url>"} failed`, { cause });
  }
}

export class RetriesExhaustedError extends Error {
  override name = "RetriesExhaustedError";

  constructor(
    readonly attempts: number,
    readonly lastCause: unknown,
  ) {
    super(`Gave up after ${attempts} attempts`, { cause: lastCause });
  }
}
