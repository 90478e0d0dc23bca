// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Utilities
 */

import yaml from 'js-yaml';
import { IgnoreRuleSet } from '../merge/ignore.js';
import { DEFAULT_SNAPSHOT_DELAY_MS } from './merger.js';
import type { DotkeepConfig, ResolvedConfig } from './types.js';

/**
 * Build the immutable ignore set for a session.
 */
export function buildIgnoreRuleSet(config: ResolvedConfig): IgnoreRuleSet {
  return new IgnoreRuleSet(config.ignoreRules);
}

/**
 * Replace the "{dir}" placeholder in client arguments.
 */
export function expandAppArgs(args: string[], liveDir: string): string[] {
  return args.map((arg) => arg.split('{dir}').join(liveDir));
}

/**
 * Create an example configuration file content.
 */
export function getExampleConfig(): string {
  const example: DotkeepConfig = {
    app: {
      command: 'weechat',
      args: ['--dir', '{dir}'],
    },
    snapshotDelayMs: DEFAULT_SNAPSHOT_DELAY_MS,
    filePattern: '**/*.conf',
    format: {
      preset: 'current',
      malformedLines: 'skip',
    },
    useDefaultIgnores: true,
    ignore: [
      { file: 'irc.conf', section: 'look', key: 'display_away' },
    ],
    logIgnored: false,
  };

  return '# dotkeep configuration\n' + yaml.dump(example);
}
