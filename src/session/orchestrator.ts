// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Session Orchestrator
 *
 * Runs one client session against a throw-away copy of the durable store:
 *
 *   durable ──copy──▶ work/baseline
 *           └─copy──▶ work/live ──(client runs)──▶ final state
 *                          │
 *                          └─(after delay)─▶ work/snapshot
 *
 * Once the client exits, files absent from the baseline are copied to the
 * durable store and files that differ from it are merged, with the snapshot
 * as the pre-edit state. If the client exits
 * before the snapshot is taken the session fails with TooFastExitError and
 * the durable store is not touched. The work tree is removed either way.
 *
 * Events:
 * - 'launching' (command, args)
 * - 'snapshot' (dir)     early snapshot captured
 * - 'exited' (code)      client exited
 * - 'merged' (report)    merge pass finished
 */

import { EventEmitter } from 'events';
import { DEFAULT_FORMAT, type ConfigFormat } from '../document/codec.js';
import { TooFastExitError, WorkTreeError } from '../errors.js';
import { copyTree, ensureDir, pathsOverlap, removeTree } from '../fs-utils.js';
import { logger } from '../logger.js';
import { MergeEngine } from '../merge/engine.js';
import { DotkeepPaths } from '../paths.js';
import { DEFAULT_FILE_PATTERN } from '../tree/comparator.js';
import { expandAppArgs } from '../config/utils.js';
import { ProcessLauncher } from './launcher.js';
import { SnapshotTask } from './snapshot.js';
import { syncTrees } from './sync.js';
import type { AppLauncher, SyncReport } from './types.js';

export interface SessionOptions {
  command: string;
  /** Client arguments; "{dir}" is replaced by the live directory */
  args: string[];
  durableRoot: string;
  workRoot: string;
  snapshotDelayMs: number;
  engine?: MergeEngine;
  format?: ConfigFormat;
  pattern?: string;
  dryRun?: boolean;
  logIgnored?: boolean;
  /** Leave the work tree in place after the session (for inspection) */
  keepWorkTree?: boolean;
  launcher?: AppLauncher;
}

export interface SessionResult {
  report: SyncReport;
  /** Exit code of the client itself */
  clientExitCode: number;
  /** Time from launch to client exit */
  elapsedMs: number;
}

export class SessionOrchestrator extends EventEmitter {
  private readonly options: SessionOptions;
  private readonly launcher: AppLauncher;

  constructor(options: SessionOptions) {
    super();
    this.options = options;
    this.launcher = options.launcher ?? new ProcessLauncher();
  }

  async run(): Promise<SessionResult> {
    const { durableRoot, workRoot, snapshotDelayMs } = this.options;
    const liveDir = DotkeepPaths.liveDir(workRoot);
    const baselineDir = DotkeepPaths.baselineDir(workRoot);
    const snapshotDir = DotkeepPaths.snapshotDir(workRoot);

    // Checked before anything under the work root is removed
    if (pathsOverlap(durableRoot, workRoot)) {
      throw new WorkTreeError('Work tree and durable store overlap', workRoot);
    }

    try {
      await this.prepareWorkTree(durableRoot, workRoot, [baselineDir, liveDir]);

      const snapshot = new SnapshotTask({
        source: liveDir,
        destination: snapshotDir,
        delayMs: snapshotDelayMs,
        onCaptured: (dir) => this.emit('snapshot', dir),
      });

      const args = expandAppArgs(this.options.args, liveDir);
      logger.debug(`Launching ${this.options.command} ${args.join(' ')}`);
      this.emit('launching', this.options.command, args);
      const startedAt = Date.now();

      let clientExitCode: number;
      logger.pause();
      try {
        const handle = this.launcher.launch(this.options.command, args);
        snapshot.start();
        clientExitCode = await handle.exited;
      } finally {
        logger.resume();
        // No-op unless the snapshot is still waiting for its timer
        snapshot.cancel();
      }

      const elapsedMs = Date.now() - startedAt;
      this.emit('exited', clientExitCode);
      logger.debug(`Client exited with code ${clientExitCode} after ${elapsedMs}ms`);

      const outcome = await snapshot.done;
      if (outcome.state === 'cancelled') {
        throw new TooFastExitError(elapsedMs, snapshotDelayMs);
      }
      if (outcome.state === 'failed') {
        throw new WorkTreeError('Failed to capture start-up snapshot', snapshotDir, outcome.error);
      }

      const report = await syncTrees({
        snapshotRoot: snapshotDir,
        baselineRoot: baselineDir,
        finalRoot: liveDir,
        durableRoot,
        engine: this.options.engine,
        format: this.options.format ?? DEFAULT_FORMAT,
        pattern: this.options.pattern ?? DEFAULT_FILE_PATTERN,
        dryRun: this.options.dryRun,
        logIgnored: this.options.logIgnored,
      });
      this.emit('merged', report);

      return { report, clientExitCode, elapsedMs };
    } finally {
      if (this.options.keepWorkTree) {
        logger.info(`Work tree kept at ${workRoot}`);
      } else {
        await removeTree(workRoot);
      }
    }
  }

  /**
   * Recreate the work tree with fresh copies of the durable store.
   */
  private async prepareWorkTree(durableRoot: string, workRoot: string, copies: string[]): Promise<void> {
    try {
      await ensureDir(durableRoot);
    } catch (error) {
      throw new WorkTreeError('Cannot create durable store', durableRoot, error);
    }
    try {
      await removeTree(workRoot);
      for (const copy of copies) {
        await copyTree(durableRoot, copy);
      }
    } catch (error) {
      throw new WorkTreeError('Cannot prepare work tree', workRoot, error);
    }
  }
}
