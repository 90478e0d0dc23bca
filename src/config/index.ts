// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (DotkeepConfig, ResolvedConfig)
 * - loader.ts    - File I/O (load/init the YAML config)
 * - validator.ts - Typed parsing and validation
 * - merger.ts    - Defaults and CLI overrides
 * - utils.ts     - Helpers
 */

export type { DotkeepConfig, ResolvedConfig } from './types.js';

export { loadUserConfig, initConfig } from './loader.js';
export type { LoadedConfig } from './loader.js';

export { parseConfigObject, validateConfig } from './validator.js';

export { DEFAULT_SNAPSHOT_DELAY_MS, getDefaultConfig, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export { buildIgnoreRuleSet, expandAppArgs, getExampleConfig } from './utils.js';
