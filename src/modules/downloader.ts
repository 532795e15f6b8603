/**
 * Downloader Module
 * Runs the image download pool
 */

import pLimit from "p-limit";
import { ImageFetcher, RetryPolicy, describeError, recordId } from "../utils";
import type { EnrichContext } from "../types";

/**
 * Downloads the image of every planned record through the retry policy
 *
 * The image file itself is the durable marker of completion, so downloads
 * never touch the collection. Per-record failures are tracked and never stop
 * the pool.
 */
export async function download(ctx: EnrichContext): Promise<void> {
  const { records, plan, baseDir } = ctx;
  if (!records || !plan || baseDir === undefined) {
    throw new Error("Loader and planner must run before downloader");
  }
  if (plan.download.length === 0) {
    return;
  }

  const { config, tracker, logger, signal } = ctx;
  const fetcher = new ImageFetcher(ctx.imageSource, {
    baseDir,
    imageDirectory: config.images.directory,
  });
  const limit = pLimit(config.images.concurrency);
  const total = plan.download.length;

  const downloadRecord = async (index: number): Promise<void> => {
    if (signal.aborted) return;

    const record = records[index];
    const id = recordId(record, index);
    tracker.transition(index, "download", "in-progress");

    const policy = new RetryPolicy({
      maxRetries: ctx.maxRetries,
      baseDelay: config.retry.baseDelay,
      maxDelay: config.retry.maxDelay,
      signal,
      onRetry: ({ attempt, delay, error }) => {
        tracker.incrementRetries();
        logger.info(
          `Downloading ${id}: attempt ${attempt} failed (${describeError(error)}), retrying in ${delay}ms`,
        );
      },
    });

    try {
      const { value: outcome, attempts } = await policy.execute(() =>
        fetcher.fetch(record, signal),
      );
      tracker.complete(index, "download", outcome === "cached");
      logger.debug(`Downloaded ${id} (${outcome}, ${attempts} attempt(s))`);
    } catch (error) {
      if (signal.aborted) {
        tracker.transition(index, "download", "pending");
        return;
      }
      const issue = tracker.fail(index, "download", id, error, record.image_url ?? "");
      logger.warn(`Download failed for ${id}: ${issue.details}`);
    } finally {
      ctx.onProgress?.({
        axis: "download",
        finished: tracker.finished("download"),
        total,
      });
    }
  };

  await Promise.all(
    plan.download.map((index) => limit(() => downloadRecord(index))),
  );
}
