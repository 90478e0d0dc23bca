// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Filesystem helpers for work trees and the durable store.
 */

import * as fs from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

/**
 * Check whether a path exists.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating parents as needed.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Copy a directory tree. The destination is created if missing and
 * existing files in it are overwritten.
 */
export async function copyTree(source: string, destination: string): Promise<void> {
  await ensureDir(dirname(destination));
  await fs.cp(source, destination, { recursive: true, force: true, errorOnExist: false });
}

/**
 * Remove a directory tree. Missing paths are not an error.
 */
export async function removeTree(target: string): Promise<void> {
  await fs.rm(target, { recursive: true, force: true });
}

/**
 * True when one path is the other or lies inside it.
 */
export function pathsOverlap(a: string, b: string): boolean {
  return isWithin(resolve(a), resolve(b)) || isWithin(resolve(b), resolve(a));
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function tempSibling(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);
}

/**
 * Fill a temporary sibling of `filePath` and rename it into place, so a
 * reader never sees a half-written file.
 */
async function replaceAtomic(filePath: string, fill: (tempPath: string) => Promise<void>): Promise<void> {
  await ensureDir(dirname(filePath));
  const tempPath = tempSibling(filePath);
  try {
    await fill(tempPath);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Write a file atomically, creating parent directories.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await replaceAtomic(filePath, (tempPath) => fs.writeFile(tempPath, content, 'utf-8'));
}

/**
 * Copy one file atomically, creating parent directories.
 */
export async function copyFileAtomic(source: string, destination: string): Promise<void> {
  await replaceAtomic(destination, (tempPath) => fs.copyFile(source, tempPath));
}
