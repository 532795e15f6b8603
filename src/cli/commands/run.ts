/**
 * Run command - Loads config and runs the enrichment pipeline
 */

import ora from "ora";
import { Enricher } from "../../enricher";
import * as modules from "../../modules";
import { Logger, Tracker, loadConfig } from "../../utils";
import { RunOptionsSchema, applyOverrides, resolveMode } from "./options";
import type { RunOptions } from "./options";
import type { RunProgress, WorkAxis } from "../../types";

const AXIS_LABEL = { translation: "Translating", download: "Downloading" } as const;

export async function runCommand(opts: RunOptions): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  const controller = new AbortController();
  const onInterrupt = () => {
    spinner.text = "Interrupted, finishing in-flight records...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    // Validate CLI options
    const options = RunOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI overrides
    const loaded = await loadConfig(options.config);
    const config = applyOverrides(loaded.config, options);

    const tracker = new Tracker();
    for (const err of loaded.errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const progress = new Map<WorkAxis, RunProgress>();
    const onProgress = (update: RunProgress) => {
      progress.set(update.axis, update);
      spinner.text = [...progress.values()]
        .map((p) => `${AXIS_LABEL[p.axis]} ${p.finished}/${p.total}`)
        .join(" · ");
    };

    spinner.text = "Loading catalogue...";
    const enricher = new Enricher({
      mode: resolveMode(options),
      maxRetries: config.retry.maxRetries,
      inputPath: config.document.input,
      outputPath: config.document.output,
      config,
      tracker,
      logger: new Logger(config.logging.level),
      signal: controller.signal,
      onProgress,
    });
    const summary = await enricher.run();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(summary, options.verbose);
  } catch (error) {
    spinner.fail("Enrichment failed");
    console.error(error);
    process.exit(1);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
