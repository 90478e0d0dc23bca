// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Session Types
 */

import type { FormatError } from '../errors.js';
import type { ParseWarning } from '../document/codec.js';
import type { MergeResult } from '../merge/types.js';
import type { FileComparison } from '../tree/comparator.js';

export interface FileFailure {
  relativePath: string;
  error: FormatError;
}

export interface FileWarning extends ParseWarning {
  relativePath: string;
  /** Which tree the file was read from */
  tree: 'snapshot' | 'final' | 'durable';
}

/**
 * Outcome of one merge pass over the trees.
 */
export interface SyncReport {
  dryRun: boolean;
  comparisons: FileComparison[];
  /** Modified files with at least one applied change */
  merged: MergeResult[];
  /** Modified files where every difference was ignored, regenerated or already recorded */
  upToDate: string[];
  /** New files copied verbatim */
  copied: string[];
  unchanged: string[];
  /** Files left untouched because they could not be parsed */
  failed: FileFailure[];
  warnings: FileWarning[];
}

/**
 * A running client process.
 */
export interface AppHandle {
  /** Resolves with the client's exit code */
  exited: Promise<number>;
}

/**
 * Starts the client. Swapped for a fake in tests.
 */
export interface AppLauncher {
  launch(command: string, args: string[]): AppHandle;
}
