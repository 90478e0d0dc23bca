// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > config file > defaults
 */

import { DEFAULT_FORMAT, FORMAT_PRESETS, type ConfigFormat, type FormatPreset } from '../document/codec.js';
import { DEFAULT_IGNORE_RULES } from '../merge/ignore.js';
import { DEFAULT_FILE_PATTERN } from '../tree/comparator.js';
import { DotkeepPaths } from '../paths.js';
import type { DotkeepConfig, ResolvedConfig } from './types.js';

/** Default delay before the start-up snapshot */
export const DEFAULT_SNAPSHOT_DELAY_MS = 2000;

/**
 * Default configuration values.
 * Directory defaults are computed per call so DOTKEEP_HOME applies.
 */
export function getDefaultConfig(): ResolvedConfig {
  return {
    app: {
      command: 'weechat',
      args: ['--dir', '{dir}'],
    },
    durableDir: DotkeepPaths.store(),
    workDir: DotkeepPaths.work(),
    snapshotDelayMs: DEFAULT_SNAPSHOT_DELAY_MS,
    filePattern: DEFAULT_FILE_PATTERN,
    format: { ...DEFAULT_FORMAT },
    ignoreRules: [...DEFAULT_IGNORE_RULES],
    logIgnored: false,
  };
}

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  app?: string;
  durable?: string;
  workDir?: string;
  delay?: number;
  format?: FormatPreset;
  strict?: boolean;
}

/**
 * Apply the config file's format block on top of a base format.
 */
function resolveFormat(base: ConfigFormat, source: DotkeepConfig['format']): ConfigFormat {
  if (!source) return base;
  const format: ConfigFormat = source.preset ? { ...FORMAT_PRESETS[source.preset] } : { ...base };
  if (source.delimiter !== undefined) format.delimiter = source.delimiter;
  if (source.padDelimiter !== undefined) format.padDelimiter = source.padDelimiter;
  if (source.commentMarker !== undefined) format.commentMarker = source.commentMarker;
  if (source.malformedLines !== undefined) format.malformedLines = source.malformedLines;
  return format;
}

/**
 * Merge the config file with CLI options.
 * Priority: CLI options > config file > defaults
 */
export function mergeConfig(fileConfig: DotkeepConfig | null, cliOptions: CLIOptions = {}): ResolvedConfig {
  const config = getDefaultConfig();

  if (fileConfig) {
    if (fileConfig.app?.command) config.app.command = fileConfig.app.command;
    if (fileConfig.app?.args) config.app.args = [...fileConfig.app.args];
    if (fileConfig.durableDir) config.durableDir = fileConfig.durableDir;
    if (fileConfig.workDir) config.workDir = fileConfig.workDir;
    if (fileConfig.snapshotDelayMs !== undefined) config.snapshotDelayMs = fileConfig.snapshotDelayMs;
    if (fileConfig.filePattern) config.filePattern = fileConfig.filePattern;
    if (fileConfig.logIgnored !== undefined) config.logIgnored = fileConfig.logIgnored;
    config.format = resolveFormat(config.format, fileConfig.format);

    if (fileConfig.useDefaultIgnores === false) {
      config.ignoreRules = [];
    }
    if (fileConfig.ignore) {
      config.ignoreRules = [...config.ignoreRules, ...fileConfig.ignore];
    }
  }

  // CLI options override the config file
  if (cliOptions.app) config.app.command = cliOptions.app;
  if (cliOptions.durable) config.durableDir = cliOptions.durable;
  if (cliOptions.workDir) config.workDir = cliOptions.workDir;
  if (cliOptions.delay !== undefined && Number.isFinite(cliOptions.delay) && cliOptions.delay >= 0) {
    config.snapshotDelayMs = cliOptions.delay;
  }
  if (cliOptions.format) {
    config.format = { ...FORMAT_PRESETS[cliOptions.format], malformedLines: config.format.malformedLines };
  }
  if (cliOptions.strict) config.format.malformedLines = 'error';

  return config;
}
