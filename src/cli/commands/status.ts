/**
 * Status command - Plans the run and reports pending work
 */

import { Enricher } from "../../enricher";
import * as modules from "../../modules";
import { Logger, loadConfig } from "../../utils";
import { RunOptionsSchema, applyOverrides } from "./options";
import type { RunOptions } from "./options";

type StatusOptions = Pick<RunOptions, "input" | "output" | "config">;

export async function statusCommand(opts: StatusOptions): Promise<void> {
  try {
    const options = RunOptionsSchema.parse(opts);
    const { config } = await loadConfig(options.config);
    const merged = applyOverrides(config, options);

    const summary = await new Enricher({
      mode: "both",
      maxRetries: merged.retry.maxRetries,
      inputPath: merged.document.input,
      outputPath: merged.document.output,
      config: merged,
      logger: new Logger("error"),
      dryRun: true,
    }).run();

    modules.pending(summary);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
