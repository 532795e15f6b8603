/**
 * Planner Module
 * Selects, per axis, the records that still need work
 */

import { isDownloaded, isTranslated } from "../utils";
import type { EnrichContext } from "../types";

/**
 * Compares the loaded collection against the completion predicates
 *
 * Reads from context:
 * - records, baseDir (loader)
 *
 * Writes to context:
 * - plan: candidate indexes per axis, in document order
 */
export async function plan(ctx: EnrichContext): Promise<void> {
  const { records, baseDir } = ctx;
  if (!records || baseDir === undefined) {
    throw new Error("Loader must run before planner");
  }

  const { mode, tracker, logger, config } = ctx;
  const translation: number[] = [];
  const download: number[] = [];

  for (const [index, record] of records.entries()) {
    if (mode !== "download") {
      if (isTranslated(record)) {
        tracker.incrementSkipped("translation");
      } else {
        translation.push(index);
        tracker.select(index, "translation");
      }
    }

    if (mode !== "translate") {
      if (await isDownloaded(record, baseDir, config.images.directory)) {
        tracker.incrementSkipped("download");
      } else {
        download.push(index);
        tracker.select(index, "download");
      }
    }
  }

  logger.info(
    `Pending work: ${translation.length} translation(s), ${download.length} download(s)`,
  );
  ctx.plan = { translation, download };
}
