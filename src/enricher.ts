/**
 * Enricher - Pipeline orchestrator
 * Coordinates the enrichment pipeline with zero business logic
 */

import path from "node:path";
import * as modules from "./modules";
import {
  GoogleTranslateClient,
  HttpImageSource,
  Logger,
  RecordStore,
  Tracker,
  loadDefaultConfig,
} from "./utils";
import type { Translator, ImageSource } from "./utils";
import type {
  EnrichConfig,
  EnrichContext,
  ProgressListener,
  RunMode,
  RunSummary,
} from "./types";

export interface EnrichOptions {
  mode: RunMode;
  maxRetries: number;
  inputPath: string;
  outputPath: string;
  config: EnrichConfig;
  translator?: Translator; // Default: GoogleTranslateClient
  imageSource?: ImageSource; // Default: HttpImageSource
  tracker?: Tracker;
  logger?: Logger;
  signal?: AbortSignal; // Interrupts the run; the last checkpoint stays valid
  onProgress?: ProgressListener;
  dryRun?: boolean;
}

export class Enricher {
  private readonly controller = new AbortController();
  private readonly ctx: EnrichContext;

  constructor(private readonly options: EnrichOptions) {
    const { config } = options;

    this.ctx = {
      config,
      mode: options.mode,
      maxRetries: options.maxRetries,
      inputPath: options.inputPath,
      outputPath: options.outputPath,
      dryRun: options.dryRun,
      store: new RecordStore({ indent: config.document.indent }),
      translator: options.translator ?? new GoogleTranslateClient(config.translation),
      imageSource: options.imageSource ?? new HttpImageSource(config.images),
      tracker: options.tracker ?? new Tracker(),
      logger: options.logger ?? new Logger(config.logging.level),
      signal: this.controller.signal,
      abort: (reason) => this.controller.abort(reason),
      onProgress: options.onProgress,
    };
  }

  /**
   * Run the pipeline: load → plan → translate ∥ download → final checkpoint
   *
   * Per-record failures end up in the summary. Corrupt documents, an
   * unwritable output location and failed checkpoints reject.
   */
  async run(): Promise<RunSummary> {
    const { ctx, options } = this;
    const external = options.signal;
    const onAbort = () => this.controller.abort(external?.reason);

    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      await modules.load(ctx);
      await modules.plan(ctx);

      if (ctx.dryRun) {
        return ctx.tracker.getSummary(ctx.mode);
      }

      const results = await Promise.allSettled([
        modules.translate(ctx),
        modules.download(ctx),
      ]);

      // Persist whatever was applied, including after an interruption
      await ctx.checkpointer?.flush();

      const fatal = results.find(
        (result): result is PromiseRejectedResult => result.status === "rejected",
      );
      if (fatal) {
        throw fatal.reason;
      }

      ctx.tracker.setInterrupted(external?.aborted ?? false);

      if (ctx.config.stats.export) {
        const statsPath = path.join(
          path.dirname(path.resolve(ctx.outputPath)),
          ctx.config.stats.filename,
        );
        await ctx.tracker.exportStats(statsPath, ctx.mode);
      }

      return ctx.tracker.getSummary(ctx.mode);
    } finally {
      external?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Single entry point: enrich the catalogue at outputPath with new records
 * from inputPath, in the given mode
 */
export async function enrich(
  options: Omit<EnrichOptions, "config"> & { config?: EnrichConfig },
): Promise<RunSummary> {
  const config = options.config ?? (await loadDefaultConfig());
  return new Enricher({ ...options, config }).run();
}
