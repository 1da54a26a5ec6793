/**
 * Logger Utility
 * Levelled console output, optionally scoped to a job
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private scope?: string,
  ) {}

  /**
   * Derive a logger that prefixes every line with the given scope
   * (typically a job ID)
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${this.prefix()}${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${this.prefix()}${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${this.prefix()}${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.isEnabled("error")) return;

    console.error(`${chalk.red("[ERROR]")} ${this.prefix()}${message}`);
    if (error && this.isEnabled("debug")) {
      console.error(error);
    }
  }

  private prefix(): string {
    return this.scope ? chalk.dim(`[${this.scope}] `) : "";
  }
}
