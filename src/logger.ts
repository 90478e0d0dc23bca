// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for session and merge output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';
import type { FileStatus } from './tree/comparator.js';
import type { ChangeRecord } from './merge/types.js';
import type { SyncReport } from './session/types.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - merge results and problems */
  NORMAL = 0,
  /** Verbose - every applied change and file classification */
  VERBOSE = 1,
  /** Debug - paths, timings, ignored entries */
  DEBUG = 2,
  /** Trace - parse warnings and per-key decisions */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private paused: boolean = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Pause all logging while the wrapped client owns the terminal.
   */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return !this.paused && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log one applied merge change at VERBOSE level.
   */
  change(relativePath: string, record: ChangeRecord, description: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const marker = record.kind === 'new-section' ? chalk.green('+') : chalk.yellow('~');
      console.log(`${marker} ${chalk.cyan(relativePath)} ${description}`);
    }
  }

  /**
   * Log a file classification at DEBUG level.
   */
  fileStatus(relativePath: string, status: FileStatus): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const color = status === 'new' ? chalk.green : status === 'modified' ? chalk.yellow : chalk.dim;
      console.log(chalk.dim('[Tree] ') + color(`${status.padEnd(9)} ${relativePath}`));
    }
  }

  /**
   * Print the summary of a merge pass (always shown unless paused).
   */
  syncSummary(report: SyncReport, durationMs: number): void {
    if (this.paused) return;
    const changeCount = report.merged.reduce((sum, file) => sum + file.changes.length, 0);
    const parts = [
      `${changeCount} change${changeCount === 1 ? '' : 's'} in ${report.merged.length} file${report.merged.length === 1 ? '' : 's'}`,
      `${report.copied.length} copied`,
    ];
    if (report.failed.length > 0) {
      parts.push(chalk.red(`${report.failed.length} failed`));
    }
    const prefix = report.dryRun ? chalk.magenta('[dry run] ') : '';
    console.log(prefix + chalk.green('✓ ') + parts.join(', ') + chalk.dim(` (${(durationMs / 1000).toFixed(2)}s)`));
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.paused) return;
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
