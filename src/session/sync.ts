// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Merge Pass
 *
 * Applies a finished session to the durable store:
 * - new files (absent from the baseline) are copied verbatim
 * - modified files go through the merge engine
 * - unchanged files are left alone
 *
 * A file that cannot be parsed is skipped and reported; other errors abort
 * the pass.
 */

import * as path from 'node:path';
import { DEFAULT_FORMAT, loadConfigFile, saveConfigFile, type ConfigFormat } from '../document/codec.js';
import { FormatError } from '../errors.js';
import { copyFileAtomic } from '../fs-utils.js';
import { logger } from '../logger.js';
import { MergeEngine, formatChange } from '../merge/engine.js';
import { classifyTrees, DEFAULT_FILE_PATTERN } from '../tree/comparator.js';
import type { FileWarning, SyncReport } from './types.js';

export interface SyncOptions {
  /** Early snapshot: `before` for the merge of modified files */
  snapshotRoot: string;
  /**
   * Pristine tree the session started from, used to classify files.
   * Defaults to the snapshot.
   */
  baselineRoot?: string;
  /** Live tree after the client exited */
  finalRoot: string;
  durableRoot: string;
  engine?: MergeEngine;
  format?: ConfigFormat;
  pattern?: string;
  /** Compute the report without writing to the durable store */
  dryRun?: boolean;
  /** Log ignored entries at debug level */
  logIgnored?: boolean;
}

export async function syncTrees(options: SyncOptions): Promise<SyncReport> {
  const {
    snapshotRoot,
    baselineRoot = snapshotRoot,
    finalRoot,
    durableRoot,
    engine = new MergeEngine(),
    format = DEFAULT_FORMAT,
    pattern = DEFAULT_FILE_PATTERN,
    dryRun = false,
    logIgnored = false,
  } = options;

  const comparisons = await classifyTrees(baselineRoot, finalRoot, { pattern });
  const report: SyncReport = {
    dryRun,
    comparisons,
    merged: [],
    upToDate: [],
    copied: [],
    unchanged: [],
    failed: [],
    warnings: [],
  };

  for (const { relativePath, status } of comparisons) {
    logger.fileStatus(relativePath, status);
    const finalPath = path.join(finalRoot, relativePath);
    const durablePath = path.join(durableRoot, relativePath);

    if (status === 'unchanged') {
      report.unchanged.push(relativePath);
      continue;
    }

    if (status === 'new') {
      if (!dryRun) {
        await copyFileAtomic(finalPath, durablePath);
      }
      logger.verbose(`+ ${relativePath} (new file)`);
      report.copied.push(relativePath);
      continue;
    }

    try {
      const [before, after, durable] = await Promise.all([
        loadConfigFile(path.join(snapshotRoot, relativePath), format),
        loadConfigFile(finalPath, format),
        loadConfigFile(durablePath, format),
      ]);

      const trees = [['snapshot', before], ['final', after], ['durable', durable]] as const;
      for (const [tree, parsed] of trees) {
        for (const warning of parsed.warnings) {
          const fileWarning: FileWarning = { ...warning, relativePath, tree };
          report.warnings.push(fileWarning);
          logger.trace(`${tree}/${relativePath}:${warning.line}: ${warning.message}, line skipped`);
        }
      }

      const result = engine.merge({
        relativePath,
        before: before.document,
        after: after.document,
        durable: durable.document,
      });

      if (logIgnored) {
        for (const { section, key } of result.ignored) {
          logger.debug(`ignored ${relativePath} [${section}] ${key}`);
        }
      }

      if (result.changes.length === 0) {
        report.upToDate.push(relativePath);
        continue;
      }

      for (const change of result.changes) {
        logger.change(relativePath, change, formatChange(change));
      }
      if (!dryRun) {
        await saveConfigFile(durable.document, durablePath, format);
      }
      report.merged.push(result);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      logger.warn(`Skipping ${relativePath}: ${error.message}`);
      report.failed.push({ relativePath, error });
    }
  }

  return report;
}
