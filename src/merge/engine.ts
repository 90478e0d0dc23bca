// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Merge Engine
 *
 * Decides which entries of a session's final config were changed by the
 * user, as opposed to rewritten by the client, and applies them to the
 * durable document.
 *
 * For each named section of `after`:
 * - absent from `before`: the client or user created it during the session,
 *   so it replaces the durable section wholesale
 * - otherwise each key is kept when it is new or its value differs from
 *   `before`, unless ignored or already recorded in `durable`
 *
 * Entries are never removed from `durable`, and the NO_SECTION bucket is
 * never merged.
 */

import { NO_SECTION, type ConfigDocument, type SectionEntries } from '../document/document.js';
import { IgnoreRuleSet } from './ignore.js';
import type { ChangeRecord, IgnoredEntry, MergeInput, MergeResult } from './types.js';

export interface MergeEngineOptions {
  ignoreRules?: IgnoreRuleSet;
}

export class MergeEngine {
  private readonly ignoreRules: IgnoreRuleSet;

  constructor(options: MergeEngineOptions = {}) {
    this.ignoreRules = options.ignoreRules ?? new IgnoreRuleSet();
  }

  /**
   * Merge one file. `input.durable` is updated in place.
   */
  merge(input: MergeInput): MergeResult {
    const { relativePath, before, after, durable } = input;
    const changes: ChangeRecord[] = [];
    const ignored: IgnoredEntry[] = [];

    for (const [section, afterEntries] of after.sections()) {
      // Unsectioned entries are never merged
      if (section === NO_SECTION) continue;

      const beforeEntries = before.getSection(section);
      if (beforeEntries === undefined) {
        const record = this.copySection(relativePath, section, afterEntries, durable, ignored);
        if (record) changes.push(record);
        continue;
      }

      for (const [key, value] of afterEntries) {
        if (this.ignoreRules.matches(relativePath, section, key)) {
          ignored.push({ section, key });
          continue;
        }
        if (durable.get(section, key) === value) {
          continue;
        }

        const previous = beforeEntries.get(key);
        if (previous === undefined) {
          durable.set(section, key, value);
          changes.push({ kind: 'new-key', section, key, value });
        } else if (previous !== value) {
          durable.set(section, key, value);
          changes.push({ kind: 'new-value', section, key, value, previous });
        }
        // Same value as before the session: a default the client rewrote
      }
    }

    return { relativePath, changes, ignored };
  }

  /**
   * Replace a durable section with the session's copy. Ignored keys keep
   * whatever the durable store had for them.
   */
  private copySection(
    relativePath: string,
    section: string,
    afterEntries: SectionEntries,
    durable: ConfigDocument,
    ignored: IgnoredEntry[]
  ): ChangeRecord | null {
    const existing = durable.getSection(section);
    const entries = new Map<string, string>();

    for (const [key, value] of afterEntries) {
      if (this.ignoreRules.matches(relativePath, section, key)) {
        ignored.push({ section, key });
        const kept = existing?.get(key);
        if (kept !== undefined) entries.set(key, kept);
        continue;
      }
      entries.set(key, value);
    }

    if (existing ? sameEntries(existing, entries) : entries.size === 0) {
      return null;
    }
    durable.replaceSection(section, entries);
    return { kind: 'new-section', section, entries: entries.size };
  }
}

function sameEntries(a: SectionEntries, b: SectionEntries): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (b.get(key) !== value) return false;
  }
  return true;
}

/**
 * One-line description of a change, used in the session log.
 */
export function formatChange(record: ChangeRecord): string {
  switch (record.kind) {
    case 'new-section':
      return `new section [${record.section}] (${record.entries} ${record.entries === 1 ? 'entry' : 'entries'})`;
    case 'new-key':
      return `new key [${record.section}] ${record.key} = ${record.value}`;
    case 'new-value':
      return `new value [${record.section}] ${record.key} = ${record.value} (was ${record.previous ?? '?'})`;
  }
}
