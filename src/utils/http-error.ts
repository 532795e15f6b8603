import { HttpError } from "./errors";

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Build an HttpError from a non-success response
 */
export function toHttpError(url: string, response: Response): HttpError {
  return new HttpError(
    url,
    response.status,
    response.statusText,
    parseRetryAfter(response.headers.get("retry-after")),
  );
}
