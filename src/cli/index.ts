// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI utilities module.
 */

export {
  type RunOptions,
  runSession,
  mergeTrees,
  showStatus,
  listIgnoreRules,
  createConfigFile,
} from './actions.js';

export { resolveSettings, type GlobalOptions } from './settings.js';
