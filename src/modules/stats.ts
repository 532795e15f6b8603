/**
 * Stats Module
 * Displays the run summary and issues with terminal formatting
 */

import chalk from "chalk";
import type { AxisStats, RecordIssue, ResourceIssue, RunSummary } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the run summary to the console
 */
export function stats(summary: RunSummary, verbose?: boolean): void {
  const hasErrors = summary.failed > 0;
  const statusIcon = hasErrors
    ? chalk.red("✖")
    : summary.interrupted
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = summary.interrupted ? "Enrichment Interrupted" : "Enrichment Complete";

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(`${summary.totalRecords} records`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  if (summary.mode !== "download") {
    displayAxisSection("Translation", "Translated", summary.translation);
  }
  if (summary.mode !== "translate") {
    displayAxisSection("Images", "Downloaded", summary.download);
  }

  if (summary.retries > 0 || summary.checkpoints > 0) {
    console.log(sectionHeader("Run"));
    console.log(statRow(chalk.cyan("◉"), "Retries", summary.retries, chalk.cyan));
    console.log(statRow(chalk.cyan("◉"), "Checkpoints", summary.checkpoints, chalk.cyan));
  }

  displayIssuesSection(summary, verbose);
  console.log("");
}

/**
 * Display how much work remains without running anything
 */
export function pending(summary: RunSummary): void {
  console.log("");
  console.log(`  ${chalk.bold("Catalogue Status")} ${chalk.dim("·")} ${chalk.dim(`${summary.totalRecords} records`)}`);

  if (summary.mode !== "download") {
    const { selected, skipped } = summary.translation;
    console.log(sectionHeader("Translation"));
    console.log(`   ${progressBar(skipped, selected + skipped)}`);
    console.log(statRow(chalk.green("◉"), "Translated", skipped, chalk.green));
    console.log(statRow(chalk.yellow("◉"), "Pending", selected, chalk.yellow));
  }
  if (summary.mode !== "translate") {
    const { selected, skipped } = summary.download;
    console.log(sectionHeader("Images"));
    console.log(`   ${progressBar(skipped, selected + skipped)}`);
    console.log(statRow(chalk.green("◉"), "Downloaded", skipped, chalk.green));
    console.log(statRow(chalk.yellow("◉"), "Missing", selected, chalk.yellow));
  }
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayAxisSection(title: string, doneLabel: string, axis: AxisStats): void {
  console.log(sectionHeader(title));

  const total = axis.selected + axis.skipped;
  const done = axis.completed + axis.skipped;
  console.log(`   ${progressBar(done, total)}`);

  console.log(statRow(chalk.green("◉"), doneLabel, axis.completed, chalk.green));
  if (axis.skipped > 0) {
    console.log(statRow(chalk.cyan("◉"), "Already done", axis.skipped, chalk.cyan));
  }
  if (axis.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", axis.failed, chalk.red));
  }
  if (axis.pending > 0) {
    console.log(statRow(chalk.yellow("◉"), "Not attempted", axis.pending, chalk.yellow));
  }
}

function displayIssuesSection(summary: RunSummary, verbose?: boolean): void {
  const failures: RecordIssue[] = summary.failures;
  const resourceIssues = summary.issues.filter(
    (issue): issue is ResourceIssue => issue.type === "resource",
  );

  if (failures.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (failures.length > 0) {
    console.log(statRow(chalk.red("✖"), "Records failed", failures.length, chalk.red));
    const shown = verbose ? failures : failures.slice(0, 5);
    for (const issue of shown) {
      const scope = issue.type === "translation" ? issue.field ?? "translation" : "download";
      console.log(`      ${chalk.dim("·")} ${issue.record} ${chalk.dim(`[${scope}, ${issue.reason}]`)}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (shown.length < failures.length) {
      console.log(`      ${chalk.dim(`  +${failures.length - shown.length} more (use --verbose)`)}`);
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config failed", resourceIssues.length, chalk.yellow),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.details})`)}`);
    }
  }
}
