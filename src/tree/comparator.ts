// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tree Comparator
 *
 * Classifies every config file under an after-state root against the same
 * relative path under a baseline root.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { pathExists } from '../fs-utils.js';

/** Files considered configuration by default */
export const DEFAULT_FILE_PATTERN = '**/*.conf';

export type FileStatus = 'unchanged' | 'new' | 'modified';

export interface FileComparison {
  /** Path relative to both roots, always with forward slashes */
  relativePath: string;
  status: FileStatus;
}

export interface ClassifyOptions {
  pattern?: string;
}

/**
 * List config files under a root, relative and sorted.
 * A missing root has no files.
 */
export async function listConfigFiles(root: string, pattern: string = DEFAULT_FILE_PATTERN): Promise<string[]> {
  if (!(await pathExists(root))) {
    return [];
  }
  const files = await glob(pattern, { cwd: root, nodir: true, dot: true, posix: true });
  return files.sort();
}

/**
 * Classify each config file under afterRoot as new, modified or unchanged
 * relative to baselineRoot. A missing baselineRoot makes every file new.
 */
export async function classifyTrees(
  baselineRoot: string,
  afterRoot: string,
  options: ClassifyOptions = {}
): Promise<FileComparison[]> {
  const files = await listConfigFiles(afterRoot, options.pattern);
  const results: FileComparison[] = [];

  for (const relativePath of files) {
    const baselineFile = path.join(baselineRoot, relativePath);
    if (!(await isFile(baselineFile))) {
      results.push({ relativePath, status: 'new' });
      continue;
    }
    const [before, after] = await Promise.all([
      fs.readFile(baselineFile),
      fs.readFile(path.join(afterRoot, relativePath)),
    ]);
    results.push({ relativePath, status: before.equals(after) ? 'unchanged' : 'modified' });
  }

  return results;
}

/**
 * Group a classification by status.
 */
export function summarizeComparison(comparisons: FileComparison[]): Record<FileStatus, string[]> {
  const summary: Record<FileStatus, string[]> = { unchanged: [], new: [], modified: [] };
  for (const { relativePath, status } of comparisons) {
    summary[status].push(relativePath);
  }
  return summary;
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}
