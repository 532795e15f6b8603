/**
 * Loader Module
 * Builds the working collection from the source and enriched catalogues
 */

import glob from "fast-glob";
import { rm } from "fs/promises";
import path from "node:path";
import {
  Checkpointer,
  CorruptDataError,
  OutputNotWritableError,
  RetryPolicy,
  describeError,
  ensureWritableDirectory,
  fetchWithTimeout,
  fileExists,
  recordId,
  resolveDirectoryPath,
  toHttpError,
  writeFileAtomic,
} from "../utils";
import { RecordsDocumentSchema } from "../types";
import type { EnrichContext, IllustrationRecord } from "../types";

/**
 * Merge the enriched catalogue with the source catalogue
 *
 * Enriched records keep their order and content; source records whose
 * identifier is not present yet are appended in source order.
 */
export function mergeCatalogues(
  enriched: IllustrationRecord[],
  source: IllustrationRecord[],
): { records: IllustrationRecord[]; added: number } {
  const known = new Set(enriched.map((record, i) => recordId(record, i)));
  const records = [...enriched];

  for (const [i, record] of source.entries()) {
    if (!known.has(recordId(record, i))) {
      records.push(record);
    }
  }

  return { records, added: records.length - enriched.length };
}

async function ensureOutputLocations(ctx: EnrichContext, baseDir: string): Promise<void> {
  const directories = [baseDir];
  if (ctx.mode !== "translate") {
    directories.push(path.join(baseDir, ctx.config.images.directory));
  }

  for (const directory of directories) {
    try {
      await ensureWritableDirectory(directory);
    } catch (error) {
      throw new OutputNotWritableError(directory, { cause: error });
    }
  }
}

/**
 * Download the source catalogue when the input document is missing
 */
async function fetchSourceCatalogue(ctx: EnrichContext): Promise<void> {
  const { config, inputPath, logger, signal, tracker } = ctx;
  const url = config.source.url;
  if (!url || (await fileExists(inputPath))) {
    return;
  }

  logger.info(`Downloading source catalogue from ${url}`);
  const policy = new RetryPolicy({
    maxRetries: ctx.maxRetries,
    baseDelay: config.retry.baseDelay,
    maxDelay: config.retry.maxDelay,
    signal,
    onRetry: ({ attempt, delay, error }) => {
      tracker.incrementRetries();
      logger.warn(
        `Source catalogue attempt ${attempt} failed (${describeError(error)}), retrying in ${delay}ms`,
      );
    },
  });

  const { value: content } = await policy.execute(() =>
    fetchWithTimeout(
      url,
      {},
      config.source.timeout,
      async (response) => {
        if (!response.ok) {
          throw toHttpError(url, response);
        }
        return response.text();
      },
      signal,
    ),
  );

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new CorruptDataError(url, "source catalogue is not JSON", { cause: error });
  }

  // Never persist a catalogue the next load would reject
  const result = RecordsDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new CorruptDataError(
      url,
      `source catalogue does not match the record schema: ${issue.path.join(".") || "<root>"}: ${issue.message}`,
      { cause: result.error },
    );
  }

  await writeFileAtomic(inputPath, content, "tmp");
}

/**
 * Remove temporary files left behind by interrupted writes
 */
async function sweepStaleFiles(ctx: EnrichContext, baseDir: string): Promise<void> {
  const { config, inputPath, outputPath, logger } = ctx;
  const stale: string[] = [];

  for (const document of new Set([path.resolve(inputPath), path.resolve(outputPath)])) {
    const directory = path.dirname(document);
    if (!(await fileExists(directory))) continue;

    const pattern = `${glob.escapePath(path.basename(document))}.*.tmp`;
    stale.push(...(await glob(pattern, { cwd: directory, absolute: true, onlyFiles: true })));
  }

  const imagesDir = path.join(baseDir, config.images.directory);
  if (await fileExists(imagesDir)) {
    stale.push(
      ...(await glob("**/*.part", { cwd: imagesDir, absolute: true, onlyFiles: true })),
    );
  }

  for (const file of stale) {
    await rm(file, { force: true });
  }
  if (stale.length > 0) {
    logger.info(`Removed ${stale.length} stale temporary file(s)`);
  }
}

/**
 * Loads records and prepares the checkpointer
 *
 * Writes to context:
 * - records: enriched records followed by new source records
 * - baseDir: directory of the output document
 * - checkpointer: single writer for the output document
 *
 * @throws CorruptDataError when either document cannot be parsed
 * @throws OutputNotWritableError when the output or image directory is not writable
 */
export async function load(ctx: EnrichContext): Promise<void> {
  const { config, store, tracker, logger, inputPath, outputPath } = ctx;
  const baseDir = path.dirname(path.resolve(outputPath));

  if (!ctx.dryRun) {
    await ensureOutputLocations(ctx, baseDir);
    await fetchSourceCatalogue(ctx);
    await sweepStaleFiles(ctx, baseDir);
  }

  const enriched = await store.load(outputPath);
  const source =
    path.resolve(inputPath) === path.resolve(outputPath)
      ? []
      : await store.load(inputPath);

  const { records, added } = mergeCatalogues(enriched, source);
  let changes = added;

  // directory_path is a pure function of the record: refresh it everywhere
  for (const [index, record] of records.entries()) {
    try {
      const directoryPath = resolveDirectoryPath(record, config.images.directory);
      if (record.directory_path !== directoryPath) {
        records[index] = { ...record, directory_path: directoryPath };
        changes++;
      }
    } catch (error) {
      logger.debug(
        `No directory_path for ${recordId(record, index)}: ${describeError(error)}`,
      );
    }
  }

  logger.info(
    `Loaded ${records.length} records (${enriched.length} enriched, ${added} new)`,
  );

  const checkpointer = new Checkpointer(store, outputPath, records, {
    interval: config.checkpoint.interval,
    onSaved: (saved) => {
      tracker.incrementCheckpoints();
      logger.debug(`Checkpoint saved (${saved} change(s)) to ${outputPath}`);
    },
  });
  checkpointer.markDirty(changes);

  tracker.setTotalRecords(records.length);
  ctx.records = records;
  ctx.baseDir = baseDir;
  ctx.checkpointer = checkpointer;
}
