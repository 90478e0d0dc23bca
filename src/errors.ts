// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types for dotkeep sessions.
 * Each error carries a category, recovery suggestions and the exit code
 * the CLI reports for it.
 */

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Session finished and the merge pass ran */
  OK: 0,
  /** Unexpected failure (I/O, configuration) */
  FAILURE: 1,
  /** Client exited before the early snapshot was taken; nothing merged */
  TOO_FAST: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Error categories for better classification
 */
export enum ErrorCategory {
  TIMING = 'timing',
  FORMAT = 'format',
  FILE_IO = 'file_io',
  CONFIG = 'config',
  PROCESS = 'process',
  UNKNOWN = 'unknown',
}

/**
 * Base error with context and recovery suggestions.
 */
export class DotkeepError extends Error {
  constructor(
    message: string,
    public category: ErrorCategory = ErrorCategory.UNKNOWN,
    public suggestions: string[] = [],
    public exitCode: ExitCode = EXIT_CODES.FAILURE
  ) {
    super(message);
    this.name = 'DotkeepError';
  }

  /**
   * Format the full error with suggestions
   */
  getFullMessage(): string {
    let output = `✗ ${this.message}\n`;
    output += `\n  Category: ${this.category}\n`;

    if (this.suggestions.length > 0) {
      output += `\n  Suggestions:\n`;
      this.suggestions.forEach((suggestion, index) => {
        output += `   ${index + 1}. ${suggestion}\n`;
      });
    }

    return output;
  }
}

/**
 * The client terminated before the early snapshot could be captured.
 * No merge is performed and the durable store is left untouched.
 */
export class TooFastExitError extends DotkeepError {
  constructor(
    public readonly elapsedMs: number,
    public readonly snapshotDelayMs: number
  ) {
    super(
      `Client exited after ${elapsedMs}ms, before the start-up snapshot (${snapshotDelayMs}ms); nothing was merged`,
      ErrorCategory.TIMING,
      [
        'Keep the client open for a few seconds so its defaults can be captured',
        'Lower snapshotDelayMs in the config if the client starts quickly',
      ],
      EXIT_CODES.TOO_FAST
    );
    this.name = 'TooFastExitError';
  }
}

/**
 * A configuration file line could not be parsed.
 * Scoped to one file: the merge pass skips that file and continues.
 */
export class FormatError extends DotkeepError {
  constructor(
    message: string,
    public readonly file: string | undefined,
    public readonly line: number,
    public readonly content: string
  ) {
    super(
      `${file ?? '<input>'}:${line}: ${message}`,
      ErrorCategory.FORMAT,
      ['Fix or remove the line', 'Set format.malformedLines to "skip" to drop unparsable lines'],
      EXIT_CODES.FAILURE
    );
    this.name = 'FormatError';
  }
}

/**
 * A required directory or file operation failed. Fatal to the session.
 */
export class WorkTreeError extends DotkeepError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(
      `${message}: ${path}${cause instanceof Error ? ` (${cause.message})` : ''}`,
      ErrorCategory.FILE_IO,
      ['Check that the directory exists and is writable', 'Check free disk space'],
      EXIT_CODES.FAILURE
    );
    this.name = 'WorkTreeError';
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * The client process could not be started.
 */
export class LaunchError extends DotkeepError {
  constructor(command: string, cause?: unknown) {
    super(
      `Failed to start "${command}"${cause instanceof Error ? `: ${cause.message}` : ''}`,
      ErrorCategory.PROCESS,
      ['Check that the client is installed and on PATH', 'Set app.command in the config file'],
      EXIT_CODES.FAILURE
    );
    this.name = 'LaunchError';
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * Format any thrown value for the terminal.
 */
export function describeError(error: unknown): string {
  if (error instanceof DotkeepError) {
    return error.getFullMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a thrown value to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof DotkeepError ? error.exitCode : EXIT_CODES.FAILURE;
}
