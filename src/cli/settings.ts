// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Resolve the settings a command runs with from the config file and flags.
 */

import { loadUserConfig, mergeConfig, type CLIOptions, type ResolvedConfig } from '../config/index.js';
import type { FormatPreset } from '../document/codec.js';
import { FORMAT_PRESETS } from '../document/codec.js';
import { DotkeepError, ErrorCategory } from '../errors.js';
import { logger, parseLogLevel } from '../logger.js';

/**
 * Flags shared by every command.
 */
export interface GlobalOptions {
  config?: string;
  app?: string;
  durable?: string;
  workDir?: string;
  delay?: string;
  format?: string;
  strict?: boolean;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

function toPreset(value: string | undefined): FormatPreset | undefined {
  if (value === undefined) return undefined;
  if (value === 'current' || value === 'legacy') return value;
  throw new DotkeepError(
    `Unknown format "${value}"`,
    ErrorCategory.CONFIG,
    [`Use one of: ${Object.keys(FORMAT_PRESETS).join(', ')}`]
  );
}

function toDelay(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const delay = Number(value);
  if (!Number.isFinite(delay) || delay < 0) {
    throw new DotkeepError(`Invalid --delay "${value}"`, ErrorCategory.CONFIG, ['Pass a number of milliseconds']);
  }
  return delay;
}

/**
 * Apply the log level, load the config file and merge the flags into it.
 */
export function resolveSettings(options: GlobalOptions): ResolvedConfig {
  logger.setLevel(parseLogLevel(options));

  const loaded = loadUserConfig(options.config);
  if (loaded.error) {
    throw new DotkeepError(loaded.error, ErrorCategory.CONFIG, ['Fix the YAML syntax or run `dotkeep init` on a new path']);
  }
  for (const warning of loaded.warnings) {
    logger.warn(`${loaded.configPath ?? 'config'}: ${warning}`);
  }
  if (loaded.configPath) {
    logger.debug(`Loaded config from ${loaded.configPath}`);
  }

  const cliOptions: CLIOptions = {
    app: options.app,
    durable: options.durable,
    workDir: options.workDir,
    delay: toDelay(options.delay),
    format: toPreset(options.format),
    strict: options.strict,
  };
  return mergeConfig(loaded.config, cliOptions);
}
