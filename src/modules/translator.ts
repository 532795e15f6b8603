/**
 * Translator Module
 * Runs the translation pool and applies results to the collection
 */

import pLimit from "p-limit";
import {
  RetryPolicy,
  TranslationWorker,
  describeError,
  recordId,
} from "../utils";
import type { EnrichContext } from "../types";

/**
 * Translates every planned record through the retry policy
 *
 * Workers return new records; only this module assigns them into the shared
 * collection. Each applied record counts towards the next checkpoint.
 * Per-record failures are tracked and never stop the pool; a failing
 * checkpoint aborts the run.
 */
export async function translate(ctx: EnrichContext): Promise<void> {
  const { records, plan, checkpointer } = ctx;
  if (!records || !plan || !checkpointer) {
    throw new Error("Loader and planner must run before translator");
  }
  if (plan.translation.length === 0) {
    return;
  }

  const { config, tracker, logger, signal } = ctx;
  const worker = new TranslationWorker(ctx.translator, {
    targetLanguage: config.translation.targetLanguage,
  });
  const limit = pLimit(config.translation.concurrency);
  const total = plan.translation.length;

  const translateRecord = async (index: number): Promise<void> => {
    if (signal.aborted) return;

    const record = records[index];
    const id = recordId(record, index);
    tracker.transition(index, "translation", "in-progress");

    const policy = new RetryPolicy({
      maxRetries: ctx.maxRetries,
      baseDelay: config.retry.baseDelay,
      maxDelay: config.retry.maxDelay,
      signal,
      onRetry: ({ attempt, delay, error }) => {
        tracker.incrementRetries();
        logger.info(
          `Translating ${id}: attempt ${attempt} failed (${describeError(error)}), retrying in ${delay}ms`,
        );
      },
    });

    try {
      const { value, attempts } = await policy.execute(() =>
        worker.translate(record, signal),
      );
      records[index] = value;
      tracker.complete(index, "translation");
      logger.debug(`Translated ${id} (${attempts} attempt(s))`);
    } catch (error) {
      if (signal.aborted) {
        tracker.transition(index, "translation", "pending");
        return;
      }
      const issue = tracker.fail(index, "translation", id, error);
      logger.warn(`Translation failed for ${id}: ${issue.details}`);
      return;
    } finally {
      ctx.onProgress?.({
        axis: "translation",
        finished: tracker.finished("translation"),
        total,
      });
    }

    try {
      await checkpointer.recordChange();
    } catch (error) {
      ctx.abort(error);
      throw error;
    }
  };

  const results = await Promise.allSettled(
    plan.translation.map((index) => limit(() => translateRecord(index))),
  );

  await checkpointer.flush();

  const fatal = results.find(
    (result): result is PromiseRejectedResult => result.status === "rejected",
  );
  if (fatal) {
    throw fatal.reason;
  }
}
