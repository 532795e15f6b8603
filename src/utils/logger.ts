/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import { describeError } from "./errors";
import type { LogLevel } from "../types";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  constructor(private readonly level: LogLevel = "info") {}

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    if (this.isEnabled("error")) {
      console.error(`${chalk.red("[ERROR]")} ${message}`);
      if (error !== undefined) {
        console.error(chalk.dim(`        ${describeError(error)}`));
      }
    }
  }
}
