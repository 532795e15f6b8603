/**
 * Enrichment Tracker
 * Unified tracking for per-record work states, stats and issues
 */

import { writeFile } from "fs/promises";
import { ZodError } from "zod";
import {
  CorruptDataError,
  FetchFailedError,
  HttpError,
  InvalidRecordError,
  InvalidResponseError,
  RequestTimeoutError,
  RetriesExhaustedError,
  TranslationFailedError,
  describeError,
} from "./errors";
import type {
  AxisStats,
  DownloadIssue,
  DownloadIssueReason,
  Issue,
  IssueType,
  RecordIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunMode,
  RunSummary,
  TranslationIssue,
  TranslationIssueReason,
  WorkAxis,
  WorkState,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function unwrap(error: unknown): unknown {
  const inner = error instanceof RetriesExhaustedError ? error.lastCause : error;
  return inner instanceof TranslationFailedError || inner instanceof FetchFailedError
    ? inner.cause
    : inner;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof CorruptDataError) {
    return { reason: "schema-validation", details: error.message };
  }
  return { reason: "read-error", details: describeError(error) };
}

function mapTranslationError(error: unknown): IssueInfo<TranslationIssueReason> {
  const details = describeError(error);
  if (error instanceof RetriesExhaustedError) {
    return { reason: "retries-exhausted", details };
  }

  const cause = unwrap(error);
  if (cause instanceof HttpError) return { reason: "rejected", details };
  if (cause instanceof RequestTimeoutError) return { reason: "timeout", details };
  if (cause instanceof InvalidResponseError) {
    return { reason: "invalid-response", details };
  }
  return { reason: "failed", details };
}

function mapDownloadError(error: unknown): IssueInfo<DownloadIssueReason> {
  const details = describeError(error);
  if (error instanceof RetriesExhaustedError) {
    return { reason: "retries-exhausted", details };
  }

  const cause = unwrap(error);
  if (cause instanceof HttpError) return { reason: "rejected", details };
  if (cause instanceof RequestTimeoutError) return { reason: "timeout", details };
  if (cause instanceof InvalidResponseError) {
    return { reason: "invalid-response", details };
  }
  if (cause instanceof InvalidRecordError) {
    return { reason: "invalid-record", details };
  }
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    // Filesystem errors (EACCES, ENOSPC, ...) while writing the image
    return { reason: "write-error", details };
  }
  return { reason: "failed", details };
}

function fieldOf(error: unknown): string | undefined {
  const inner = error instanceof RetriesExhaustedError ? error.lastCause : error;
  return inner instanceof TranslationFailedError ? inner.field : undefined;
}

// ============================================================================
// Work state machine
// ============================================================================

const TRANSITIONS: Record<WorkState, WorkState[]> = {
  pending: ["in-progress"],
  "in-progress": ["done", "failed", "pending"],
  done: [],
  failed: [],
};

function emptyAxisStats(): AxisStats {
  return { selected: 0, completed: 0, skipped: 0, failed: 0, pending: 0 };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalRecords = 0;
  private retries = 0;
  private checkpoints = 0;
  private interrupted = false;
  private axes: Record<WorkAxis, AxisStats> = {
    translation: emptyAxisStats(),
    download: emptyAxisStats(),
  };
  private states: Record<WorkAxis, Map<number, WorkState>> = {
    translation: new Map(),
    download: new Map(),
  };
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalRecords(count: number): void {
    this.totalRecords = count;
  }

  incrementSkipped(axis: WorkAxis): void {
    this.axes[axis].skipped++;
  }

  incrementRetries(): void {
    this.retries++;
  }

  incrementCheckpoints(): void {
    this.checkpoints++;
  }

  setInterrupted(interrupted: boolean): void {
    this.interrupted = interrupted;
  }

  // ============================================================================
  // Work states
  // ============================================================================

  /**
   * Register a record as a candidate on one axis
   */
  select(index: number, axis: WorkAxis): void {
    if (!this.states[axis].has(index)) {
      this.states[axis].set(index, "pending");
      this.axes[axis].selected++;
    }
  }

  getState(index: number, axis: WorkAxis): WorkState | undefined {
    return this.states[axis].get(index);
  }

  /**
   * Move a selected record to its next state
   *
   * @throws Error on a transition the lifecycle does not allow
   */
  transition(index: number, axis: WorkAxis, next: WorkState): void {
    const current = this.states[axis].get(index);
    if (!current || !TRANSITIONS[current].includes(next)) {
      throw new Error(
        `Invalid ${axis} transition for record #${index}: ${current ?? "unselected"} -> ${next}`,
      );
    }
    this.states[axis].set(index, next);
  }

  /**
   * Mark a record done; `cached` counts it as skipped instead of completed
   */
  complete(index: number, axis: WorkAxis, cached = false): void {
    this.transition(index, axis, "done");
    if (cached) {
      this.axes[axis].skipped++;
    } else {
      this.axes[axis].completed++;
    }
  }

  finished(axis: WorkAxis): number {
    let count = 0;
    for (const state of this.states[axis].values()) {
      if (state === "done" || state === "failed") count++;
    }
    return count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Mark a record failed on one axis and record why
   */
  fail(
    index: number,
    axis: WorkAxis,
    record: string,
    error: unknown,
    url = "",
  ): RecordIssue {
    this.transition(index, axis, "failed");
    this.axes[axis].failed++;

    let issue: TranslationIssue | DownloadIssue;
    if (axis === "translation") {
      const { reason, details } = mapTranslationError(error);
      issue = { type: "translation", record, index, reason, field: fieldOf(error), details };
    } else {
      const { reason, details } = mapDownloadError(error);
      issue = { type: "download", record, index, reason, url, details };
    }

    this.issues.push(issue);
    return issue;
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    const issue: ResourceIssue = { type: "resource", path, reason, details };
    this.issues.push(issue);
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getFailures(): RecordIssue[] {
    return this.issues.filter(
      (i): i is RecordIssue => i.type === "translation" || i.type === "download",
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  getSummary(mode: RunMode): RunSummary {
    const duration = new Date().getTime() - this.startTime.getTime();
    const translation = this.axisStats("translation");
    const download = this.axisStats("download");

    return {
      mode,
      totalRecords: this.totalRecords,
      translated: translation.completed,
      downloaded: download.completed,
      skipped: translation.skipped + download.skipped,
      failed: translation.failed + download.failed,
      retries: this.retries,
      checkpoints: this.checkpoints,
      interrupted: this.interrupted,
      translation,
      download,
      failures: this.getFailures(),
      issues: this.issues,
      duration,
    };
  }

  private axisStats(axis: WorkAxis): AxisStats {
    let pending = 0;
    for (const state of this.states[axis].values()) {
      if (state === "pending") pending++;
    }
    return { ...this.axes[axis], pending };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputPath: string, mode: RunMode): Promise<void> {
    const summary = this.getSummary(mode);
    const { issues, failures, ...counts } = summary;

    const exported = {
      summary: counts,
      issues: this.groupIssuesByTypeAndReason(issues),
    };

    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(
    issues: Issue[],
  ): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      translation: {},
      download: {},
      resource: {},
    };

    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
