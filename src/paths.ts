// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for dotkeep.
 *
 * All default locations live under one home directory (~/.dotkeep), which
 * DOTKEEP_HOME overrides. The durable store and work tree can each be moved
 * through the config file or CLI flags.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base dotkeep directory.
 * Supports test override via DOTKEEP_HOME environment variable.
 */
export function getDotkeepHome(): string {
  if (process.env.DOTKEEP_HOME) {
    return process.env.DOTKEEP_HOME;
  }
  return join(homedir(), '.dotkeep');
}

/**
 * Path definitions, computed at call time so environment overrides apply.
 */
export const DotkeepPaths = {
  /**
   * Base directory (~/.dotkeep)
   */
  home: (): string => getDotkeepHome(),

  /**
   * User config file (YAML)
   */
  configFile: (): string => join(getDotkeepHome(), 'config.yaml'),

  /**
   * Default durable store: the curated client config directory
   */
  store: (): string => join(getDotkeepHome(), 'store'),

  /**
   * Default work tree root, recreated for every session
   */
  work: (): string => join(getDotkeepHome(), 'work'),

  /**
   * Live config directory the client runs against
   */
  liveDir: (workRoot: string): string => join(workRoot, 'live'),

  /**
   * Pristine copy of the durable store taken before launch
   */
  baselineDir: (workRoot: string): string => join(workRoot, 'baseline'),

  /**
   * Early snapshot of the live directory
   */
  snapshotDir: (workRoot: string): string => join(workRoot, 'snapshot'),
} as const;
