/**
 * Completion predicates and identity for catalogue records
 */

import { isNonEmptyFile } from "./fs";
import { resolveDirectoryPath, resolveImageFile } from "./record-paths";
import type { IllustrationRecord } from "../types";

function isTextComplete(source: string | undefined, translated: string | undefined): boolean {
  if (translated === undefined) return false;
  // An empty source legitimately translates to an empty string
  return translated.trim().length > 0 || !source?.trim();
}

/**
 * A record is translated when all four `_en` fields are present and filled,
 * with `categories_en` index-aligned to `categories`
 */
export function isTranslated(record: IllustrationRecord): boolean {
  if (!isTextComplete(record.title, record.title_en)) return false;
  if (!isTextComplete(record.description, record.description_en)) return false;
  if (!isTextComplete(record.image_alt, record.image_alt_en)) return false;

  const categories = record.categories ?? [];
  const categoriesEn = record.categories_en;
  if (!categoriesEn || categoriesEn.length !== categories.length) return false;

  return categories.every((category, i) =>
    isTextComplete(category, categoriesEn[i]),
  );
}

/**
 * A record is downloaded when a non-empty file sits at its directory_path
 * (records whose path cannot be derived are never downloaded)
 *
 * @param baseDir - Directory the relative directory_path resolves against
 */
export async function isDownloaded(
  record: IllustrationRecord,
  baseDir: string,
  imageDirectory?: string,
): Promise<boolean> {
  let directoryPath: string;
  try {
    directoryPath = resolveDirectoryPath(record, imageDirectory);
  } catch {
    return false;
  }
  return isNonEmptyFile(resolveImageFile(baseDir, directoryPath));
}

/**
 * Stable identifier used in reports and when merging catalogues
 */
export function recordId(record: IllustrationRecord, index: number): string {
  return record.entry_url || record.image_url || `#${index}`;
}
