/**
 * Deterministic image locations derived from a record
 */

import { posix, resolve } from "node:path";
import { InvalidRecordError } from "./errors";
import type { IllustrationRecord } from "../types";

export const DEFAULT_IMAGE_DIRECTORY = "images";

/**
 * Get the filename portion of an image URL
 *
 * @example
 * getFilenameFromUrl("https://example.com/img/s800/taimatsu_olympic.png?x=1") // "taimatsu_olympic.png"
 */
export function getFilenameFromUrl(url: string): string {
  // Relative or malformed URLs are split as-is
  const pathname = URL.canParse(url) ? new URL(url).pathname : url;
  return pathname.split("/").pop() ?? "";
}

/**
 * Get the publication year and month from a timestamp
 * Accepts "YYYY-MM-DD hh:mm:ss" as well as ISO 8601
 */
export function getPublishedYearMonth(publishedAt: string): {
  year: string;
  month: string;
} {
  const match = publishedAt.trim().match(/^(\d{4})-(\d{2})-\d{2}(?:[ T]|$)/);
  if (!match) {
    throw new InvalidRecordError(
      `Unrecognized published_at "${publishedAt}"`,
    );
  }
  return { year: match[1], month: match[2] };
}

/**
 * Compute the record's directory_path: ./<imageDir>/<year>/<month>/<filename>
 *
 * Pure function of (published_at, image_url), always in POSIX form so the
 * persisted document is identical across platforms.
 */
export function resolveDirectoryPath(
  record: Pick<IllustrationRecord, "published_at" | "image_url">,
  imageDirectory: string = DEFAULT_IMAGE_DIRECTORY,
): string {
  if (!record.image_url) {
    throw new InvalidRecordError("Record has no image_url");
  }
  if (!record.published_at) {
    throw new InvalidRecordError("Record has no published_at");
  }

  const filename = getFilenameFromUrl(record.image_url);
  if (!filename || filename === "." || filename === "..") {
    throw new InvalidRecordError(
      `Cannot derive a filename from ${record.image_url}`,
    );
  }

  const { year, month } = getPublishedYearMonth(record.published_at);
  return `./${posix.join(imageDirectory, year, month, filename)}`;
}

/**
 * Resolve a directory_path against the directory holding the output document
 */
export function resolveImageFile(baseDir: string, directoryPath: string): string {
  return resolve(baseDir, directoryPath);
}
