/**
 * Shared CLI option handling
 */

import { z } from "zod";
import type { EnrichConfig, RunMode } from "../../types";

// commander hands numeric options over as strings
const CountSchema = z.coerce.number().int().nonnegative();
const PositiveCountSchema = z.coerce.number().int().positive();

export const RunOptionsSchema = z.object({
  translate: z.boolean().optional(),
  download: z.boolean().optional(),
  retries: CountSchema.optional(),
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  sourceUrl: z.string().url().optional(),
  concurrency: PositiveCountSchema.optional(),
  checkpointInterval: PositiveCountSchema.optional(),
  verbose: z.boolean().optional(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Neither --translate nor --download means both
 */
export function resolveMode(options: Pick<RunOptions, "translate" | "download">): RunMode {
  if (options.translate && !options.download) return "translate";
  if (options.download && !options.translate) return "download";
  return "both";
}

/**
 * Apply CLI overrides on top of the loaded configuration
 */
export function applyOverrides(config: EnrichConfig, options: RunOptions): EnrichConfig {
  return {
    ...config,
    document: {
      ...config.document,
      input: options.input ?? config.document.input,
      output: options.output ?? config.document.output,
    },
    source: { ...config.source, url: options.sourceUrl ?? config.source.url },
    translation: {
      ...config.translation,
      concurrency: options.concurrency ?? config.translation.concurrency,
    },
    images: {
      ...config.images,
      concurrency: options.concurrency ?? config.images.concurrency,
    },
    retry: {
      ...config.retry,
      maxRetries: options.retries ?? config.retry.maxRetries,
    },
    checkpoint: {
      ...config.checkpoint,
      interval: options.checkpointInterval ?? config.checkpoint.interval,
    },
    logging: {
      ...config.logging,
      level: options.verbose ? "debug" : config.logging.level,
    },
  };
}
