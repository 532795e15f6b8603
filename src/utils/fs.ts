/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, open, rename, rm, stat } from "fs/promises";
import { constants } from "node:fs";
import { dirname } from "node:path";
import ShortUniqueId from "short-unique-id";

const uid = new ShortUniqueId({ length: 8, dictionary: "alphanum_lower" });

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a regular file exists with at least one byte in it
 */
export async function isNonEmptyFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

/**
 * Create a directory (and parents) and verify the process can write into it
 */
export async function ensureWritableDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
  await access(path, constants.W_OK);
}

/**
 * Write a file so that readers only ever see the old or the complete new content
 *
 * Data goes to a uniquely named sibling (`<path>.<id>.<extension>`), is
 * flushed to disk, and then renamed over the target. The temporary file is
 * removed when any step fails.
 *
 * @param path - Target file
 * @param data - Full file content
 * @param extension - Suffix of the temporary sibling ("tmp" for documents, "part" for downloads)
 */
export async function writeFileAtomic(
  path: string,
  data: string | Uint8Array,
  extension: "tmp" | "part" = "tmp",
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${uid.rnd()}.${extension}`;

  try {
    const handle = await open(tempPath, "wx");
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
