// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Loads and saves the YAML config file.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { DotkeepPaths } from '../paths.js';
import type { DotkeepConfig } from './types.js';
import { parseConfigObject } from './validator.js';
import { getExampleConfig } from './utils.js';

export interface LoadedConfig {
  config: DotkeepConfig | null;
  configPath: string | null;
  warnings: string[];
  error?: string;
}

/**
 * Load the user config file. Defaults to ~/.dotkeep/config.yaml.
 * A missing file is not an error; a file that fails to parse is reported
 * through `error` and yields no config.
 */
export function loadUserConfig(configPath: string = DotkeepPaths.configFile()): LoadedConfig {
  if (!fs.existsSync(configPath)) {
    return { config: null, configPath: null, warnings: [] };
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const { config, warnings } = parseConfigObject(yaml.load(content));
    return { config, configPath, warnings };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { config: null, configPath, warnings: [], error: `Failed to parse ${configPath}: ${message}` };
  }
}

/**
 * Write an example config file.
 */
export function initConfig(configPath: string = DotkeepPaths.configFile()): {
  success: boolean;
  path: string;
  error?: string;
} {
  if (fs.existsSync(configPath)) {
    return {
      success: false,
      path: configPath,
      error: 'Config file already exists',
    };
  }

  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, getExampleConfig());
    return { success: true, path: configPath };
  } catch (error) {
    return {
      success: false,
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
