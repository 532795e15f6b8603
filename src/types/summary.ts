/**
 * Run modes, per-record work states and run summary types
 */

export type RunMode = "translate" | "download" | "both";

export type WorkAxis = "translation" | "download";

/**
 * Per-record, per-axis lifecycle
 * pending → in-progress → done | failed
 * in-progress → pending only when the run is interrupted
 */
export type WorkState = "pending" | "in-progress" | "done" | "failed";

// ============================================================================
// Issues
// ============================================================================

export type TranslationIssueReason =
  | "retries-exhausted"
  | "rejected"
  | "timeout"
  | "invalid-response"
  | "failed";
export type DownloadIssueReason =
  | "retries-exhausted"
  | "rejected"
  | "timeout"
  | "invalid-response"
  | "invalid-record"
  | "write-error"
  | "failed";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface TranslationIssue {
  type: "translation";
  record: string; // Record identifier (entry_url, image_url or #index)
  index: number;
  reason: TranslationIssueReason;
  field?: string;
  details: string;
}

export interface DownloadIssue {
  type: "download";
  record: string;
  index: number;
  reason: DownloadIssueReason;
  url: string;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = TranslationIssue | DownloadIssue | ResourceIssue;
export type IssueType = Issue["type"];
export type RecordIssue = TranslationIssue | DownloadIssue;

// ============================================================================
// Summary
// ============================================================================

export interface AxisStats {
  selected: number; // Candidates picked by the planner
  completed: number; // Translated / downloaded during this run
  skipped: number; // Already done before (or discovered done while running)
  failed: number;
  pending: number; // Selected but never finished (interrupted runs)
}

export interface RunSummary {
  mode: RunMode;
  totalRecords: number;
  translated: number;
  downloaded: number;
  skipped: number;
  failed: number;
  retries: number;
  checkpoints: number;
  interrupted: boolean;
  translation: AxisStats;
  download: AxisStats;
  failures: RecordIssue[];
  issues: Issue[];
  duration: number;
}

export interface RunProgress {
  axis: WorkAxis;
  finished: number;
  total: number;
}

export type ProgressListener = (progress: RunProgress) => void;
