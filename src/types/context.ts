/**
 * Enrichment context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { EnrichConfig } from "./config";
import type { IllustrationRecord } from "./record";
import type { RunMode, ProgressListener } from "./summary";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { RecordStore } from "../utils/record-store";
import type { Checkpointer } from "../utils/checkpointer";
import type { Translator } from "../utils/translation-worker";
import type { ImageSource } from "../utils/image-fetcher";

export interface WorkPlan {
  translation: number[]; // Record indexes still to translate
  download: number[]; // Record indexes whose image is missing
}

export interface EnrichContext {
  // Input - provided at initialization
  config: EnrichConfig;
  mode: RunMode;
  maxRetries: number;
  inputPath: string;
  outputPath: string;
  dryRun?: boolean; // Plan only: no downloads, no writes

  // Collaborators
  store: RecordStore;
  translator: Translator;
  imageSource: ImageSource;
  tracker: Tracker;
  logger: Logger;

  // Cancellation: aborted by the caller or on a fatal error
  signal: AbortSignal;
  abort: (reason?: unknown) => void;
  onProgress?: ProgressListener;

  records?: IllustrationRecord[]; // Working collection (loader)
  checkpointer?: Checkpointer; // Single writer for the output document (loader)
  baseDir?: string; // Directory that directory_path resolves against (loader)
  plan?: WorkPlan; // Candidates per axis (planner)
}
