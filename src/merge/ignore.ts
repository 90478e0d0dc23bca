// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ignore Rules
 *
 * Entries the client rewrites on its own during normal use. Changes under
 * these (file, section, key) triples never reach the durable store.
 */

import type { IgnoreRule } from './types.js';

/**
 * Rules applied unless the config file disables them.
 */
export const DEFAULT_IGNORE_RULES: readonly IgnoreRule[] = [
  // Window and buffer layout is saved on every exit
  { file: 'weechat.conf', section: 'layout', key: 'window' },
  { file: 'weechat.conf', section: 'layout', key: 'buffer' },
];

function normalizeFile(file: string): string {
  return file.replace(/\\/g, '/').replace(/^\.\//, '');
}

function ruleKey(file: string, section: string, key: string): string {
  return [normalizeFile(file), section, key].join('\u0000');
}

/**
 * Immutable set of ignore rules.
 */
export class IgnoreRuleSet {
  private readonly keys: ReadonlySet<string>;
  private readonly ruleList: readonly IgnoreRule[];

  constructor(rules: Iterable<IgnoreRule> = []) {
    const list: IgnoreRule[] = [];
    const keys = new Set<string>();
    for (const rule of rules) {
      const id = ruleKey(rule.file, rule.section, rule.key);
      if (keys.has(id)) continue;
      keys.add(id);
      list.push({ ...rule, file: normalizeFile(rule.file) });
    }
    this.keys = keys;
    this.ruleList = Object.freeze(list);
  }

  matches(file: string, section: string, key: string): boolean {
    return this.keys.has(ruleKey(file, section, key));
  }

  get size(): number {
    return this.ruleList.length;
  }

  rules(): readonly IgnoreRule[] {
    return this.ruleList;
  }
}
