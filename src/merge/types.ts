// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Merge Types
 */

import type { ConfigDocument } from '../document/document.js';

/**
 * One (file, section, key) triple whose changes are never kept.
 */
export interface IgnoreRule {
  /** Config file path relative to the store root, e.g. "weechat.conf" */
  file: string;
  section: string;
  key: string;
}

export type ChangeRecord =
  | {
      kind: 'new-section';
      section: string;
      /** Entries copied wholesale */
      entries: number;
    }
  | {
      kind: 'new-key' | 'new-value';
      section: string;
      key: string;
      value: string;
      /** Value before the session, for new-value changes */
      previous?: string;
    };

export interface IgnoredEntry {
  section: string;
  key: string;
}

export interface MergeInput {
  relativePath: string;
  /** Early snapshot */
  before: ConfigDocument;
  /** State after the session */
  after: ConfigDocument;
  /** Durable copy, mutated in place */
  durable: ConfigDocument;
}

export interface MergeResult {
  relativePath: string;
  changes: ChangeRecord[];
  ignored: IgnoredEntry[];
}
