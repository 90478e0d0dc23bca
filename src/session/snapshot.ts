// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Snapshot Task
 *
 * Copies the live config tree once, a fixed delay after the client starts,
 * to capture the defaults the client writes on start-up. The copy races the
 * client's own writes and is best-effort.
 */

import { copyTree, removeTree } from '../fs-utils.js';
import { logger } from '../logger.js';

export type SnapshotState = 'idle' | 'pending' | 'copying' | 'captured' | 'cancelled' | 'failed';

export type SnapshotOutcome =
  | { state: 'captured'; capturedAt: number }
  | { state: 'cancelled' }
  | { state: 'failed'; error: unknown };

export interface SnapshotTaskOptions {
  source: string;
  destination: string;
  delayMs: number;
  /** Called once the copy has completed */
  onCaptured?: (destination: string) => void;
}

export class SnapshotTask {
  private state: SnapshotState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private readonly resolveDone: (outcome: SnapshotOutcome) => void;

  /** Settles once the task is captured, cancelled or failed */
  readonly done: Promise<SnapshotOutcome>;

  constructor(private readonly options: SnapshotTaskOptions) {
    let resolve: (outcome: SnapshotOutcome) => void = () => {};
    this.done = new Promise<SnapshotOutcome>((r) => {
      resolve = r;
    });
    this.resolveDone = resolve;
  }

  getState(): SnapshotState {
    return this.state;
  }

  /**
   * Arm the timer. Calling start twice has no effect.
   */
  start(): void {
    if (this.state !== 'idle') return;
    this.state = 'pending';
    logger.debug(`Snapshot scheduled in ${this.options.delayMs}ms`);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.capture().then(this.resolveDone, (error: unknown) => {
        this.state = 'failed';
        this.resolveDone({ state: 'failed', error });
      });
    }, this.options.delayMs);
  }

  /**
   * Cancel the snapshot if the copy has not begun.
   * Returns false once copying has started or finished.
   */
  cancel(): boolean {
    if (this.state !== 'idle' && this.state !== 'pending') {
      return false;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.state = 'cancelled';
    this.resolveDone({ state: 'cancelled' });
    return true;
  }

  private async capture(): Promise<SnapshotOutcome> {
    this.state = 'copying';
    const { source, destination } = this.options;
    await removeTree(destination);
    await copyTree(source, destination);
    this.state = 'captured';
    logger.debug(`Snapshot captured: ${destination}`);
    this.options.onCaptured?.(destination);
    return { state: 'captured', capturedAt: Date.now() };
  }
}
