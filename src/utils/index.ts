/**
 * Utility exports
 */

// Record utilities
export {
  getFilenameFromUrl,
  getPublishedYearMonth,
  resolveDirectoryPath,
  resolveImageFile,
  DEFAULT_IMAGE_DIRECTORY,
} from "./record-paths";
export { isTranslated, isDownloaded, recordId } from "./record-state";

// Filesystem utilities
export {
  fileExists,
  isNonEmptyFile,
  ensureWritableDirectory,
  writeFileAtomic,
} from "./fs";

// Network utilities
export { fetchWithTimeout } from "./fetch-with-timeout";
export { parseRetryAfter, toHttpError } from "./http-error";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export * from "./errors";

// Retry
export { RetryPolicy, withRetry, classifyFailure } from "./retry-policy";
export type {
  FailureKind,
  RetryAttempt,
  RetryOptions,
  RetryResult,
} from "./retry-policy";

// Workers and collaborators
export { TranslationWorker } from "./translation-worker";
export type { Translator, TranslationWorkerOptions } from "./translation-worker";
export { ImageFetcher } from "./image-fetcher";
export type { ImageSource, FetchOutcome, ImageFetcherOptions } from "./image-fetcher";
export { GoogleTranslateClient, extractTranslation } from "./google-translate";
export { HttpImageSource } from "./http-image-source";

// Classes
export { RecordStore } from "./record-store";
export { Checkpointer } from "./checkpointer";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
