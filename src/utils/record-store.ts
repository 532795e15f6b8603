/**
 * Record Store
 * Loads and atomically rewrites the persisted record document
 */

import { readFile } from "fs/promises";
import { ZodError } from "zod";
import { fileExists, writeFileAtomic } from "./fs";
import { CorruptDataError } from "./errors";
import { RecordsDocumentSchema, type IllustrationRecord } from "../types";

export interface RecordStoreOptions {
  indent?: number; // Spaces per JSON nesting level (default: 4)
}

export class RecordStore {
  private readonly indent: number;

  constructor(options: RecordStoreOptions = {}) {
    this.indent = options.indent ?? 4;
  }

  /**
   * Load the ordered record collection
   * A missing file is an empty collection (first run)
   *
   * @throws CorruptDataError when the file is not JSON or does not match the record schema
   */
  async load(path: string): Promise<IllustrationRecord[]> {
    if (!(await fileExists(path))) {
      return [];
    }

    const content = await readFile(path, "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new CorruptDataError(path, `invalid JSON: ${details}`, { cause: error });
    }

    const result = RecordsDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptDataError(path, formatIssues(result.error), {
        cause: result.error,
      });
    }

    return result.data;
  }

  /**
   * Write the full collection, replacing the target only once the new
   * content is completely on disk. Safe to call repeatedly.
   */
  async save(records: IllustrationRecord[], path: string): Promise<void> {
    // Serialize synchronously: later mutations never leak into this write
    const content = JSON.stringify(records, null, this.indent) + "\n";
    await writeFileAtomic(path, content, "tmp");
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}
