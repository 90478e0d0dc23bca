// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for the user config file and the resolved settings a
 * session runs with.
 */

import type { ConfigFormat, FormatPreset, MalformedLinePolicy } from '../document/codec.js';
import type { IgnoreRule } from '../merge/types.js';

/**
 * User configuration, read from ~/.dotkeep/config.yaml.
 */
export interface DotkeepConfig {
  /** Client to run */
  app?: {
    /** Executable name or path (default: weechat) */
    command?: string;
    /** Arguments; "{dir}" is replaced by the live config directory */
    args?: string[];
  };

  /** Durable store directory */
  durableDir?: string;

  /** Work tree root, removed after every session */
  workDir?: string;

  /** Delay before the start-up snapshot is taken */
  snapshotDelayMs?: number;

  /** Glob selecting config files inside the store */
  filePattern?: string;

  /** Line format of the client's config files */
  format?: {
    /** Start from a known variant, then apply the fields below */
    preset?: FormatPreset;
    delimiter?: string;
    padDelimiter?: boolean;
    commentMarker?: string;
    malformedLines?: MalformedLinePolicy;
  };

  /** Extra (file, section, key) triples never merged */
  ignore?: IgnoreRule[];

  /** Whether the built-in ignore rules apply (default: true) */
  useDefaultIgnores?: boolean;

  /** Log every ignored entry at debug level */
  logIgnored?: boolean;
}

/**
 * Fully resolved settings for a session.
 */
export interface ResolvedConfig {
  app: {
    command: string;
    args: string[];
  };
  durableDir: string;
  workDir: string;
  snapshotDelayMs: number;
  filePattern: string;
  format: ConfigFormat;
  ignoreRules: IgnoreRule[];
  logIgnored: boolean;
}
