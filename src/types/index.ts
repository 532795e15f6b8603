/**
 * Central type exports
 */

// Configuration
export type {
  EnrichConfig,
  PartialEnrichConfig,
  DocumentConfig,
  SourceConfig,
  TranslationConfig,
  ImagesConfig,
  RetryConfig,
  CheckpointConfig,
  StatsConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { EnrichConfigSchema, PartialEnrichConfigSchema } from "./config";

// Records
export type { IllustrationRecord, TranslatedFields } from "./record";
export { IllustrationRecordSchema, RecordsDocumentSchema } from "./record";

// Summary
export type {
  RunMode,
  WorkAxis,
  WorkState,
  AxisStats,
  RunSummary,
  RunProgress,
  ProgressListener,
  Issue,
  IssueType,
  RecordIssue,
  TranslationIssue,
  DownloadIssue,
  ResourceIssue,
  TranslationIssueReason,
  DownloadIssueReason,
  ResourceIssueReason,
} from "./summary";

// Context
export type { EnrichContext, WorkPlan } from "./context";
