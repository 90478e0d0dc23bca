// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Progress feedback for the steps around a session, using ora.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * A running spinner is stopped first.
   */
  start(text: string): void {
    if (!this.enabled) return;
    this.stop();
    this.spinner = ora({ text, color: 'cyan', spinner: 'dots' }).start();
  }

  /**
   * Stop the spinner with a success message.
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for session steps
  // ============================================

  preparing(durableRoot: string): void {
    this.start(chalk.cyan(`Preparing work tree from ${durableRoot}...`));
  }

  merging(): void {
    this.start(chalk.yellow('Merging settings...'));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
