// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI command actions. Each returns the process exit code.
 */

import chalk from 'chalk';
import { buildIgnoreRuleSet, initConfig, type ResolvedConfig } from '../config/index.js';
import { describeError, exitCodeFor, EXIT_CODES, type ExitCode } from '../errors.js';
import { logger, LogLevel } from '../logger.js';
import { MergeEngine } from '../merge/engine.js';
import { SessionOrchestrator } from '../session/orchestrator.js';
import { syncTrees } from '../session/sync.js';
import type { AppLauncher } from '../session/types.js';
import { spinner } from '../spinner.js';
import { classifyTrees } from '../tree/comparator.js';

export interface RunOptions {
  dryRun?: boolean;
  keepWorkTree?: boolean;
  /** Extra client arguments appended after the configured ones */
  extraArgs?: string[];
  launcher?: AppLauncher;
}

/**
 * Run the client and merge the session's changes.
 */
export async function runSession(config: ResolvedConfig, options: RunOptions = {}): Promise<ExitCode> {
  const orchestrator = new SessionOrchestrator({
    command: config.app.command,
    args: [...config.app.args, ...(options.extraArgs ?? [])],
    durableRoot: config.durableDir,
    workRoot: config.workDir,
    snapshotDelayMs: config.snapshotDelayMs,
    engine: new MergeEngine({ ignoreRules: buildIgnoreRuleSet(config) }),
    format: config.format,
    pattern: config.filePattern,
    dryRun: options.dryRun,
    logIgnored: config.logIgnored,
    keepWorkTree: options.keepWorkTree,
    launcher: options.launcher,
  });

  // Spinners only when nothing else is printing between steps
  spinner.setEnabled(spinner.isEnabled() && logger.getLevel() === LogLevel.NORMAL);
  orchestrator.on('launching', () => spinner.stop());
  orchestrator.on('exited', () => spinner.merging());
  orchestrator.on('merged', () => spinner.stop());

  spinner.preparing(config.durableDir);
  try {
    const result = await orchestrator.run();
    logger.syncSummary(result.report, result.elapsedMs);
    return EXIT_CODES.OK;
  } catch (error) {
    spinner.fail();
    logger.error(describeError(error), error instanceof Error ? error : undefined);
    return exitCodeFor(error);
  }
}

/**
 * Merge an existing snapshot/final pair into a durable store without
 * launching the client.
 */
export async function mergeTrees(
  snapshotRoot: string,
  finalRoot: string,
  durableRoot: string,
  config: ResolvedConfig,
  options: { dryRun?: boolean; baselineRoot?: string } = {}
): Promise<ExitCode> {
  const startedAt = Date.now();
  try {
    const report = await syncTrees({
      snapshotRoot,
      baselineRoot: options.baselineRoot,
      finalRoot,
      durableRoot,
      engine: new MergeEngine({ ignoreRules: buildIgnoreRuleSet(config) }),
      format: config.format,
      pattern: config.filePattern,
      dryRun: options.dryRun,
      logIgnored: config.logIgnored,
    });
    logger.syncSummary(report, Date.now() - startedAt);
    return EXIT_CODES.OK;
  } catch (error) {
    logger.error(describeError(error), error instanceof Error ? error : undefined);
    return exitCodeFor(error);
  }
}

/**
 * Print how each config file under `afterRoot` compares to `baselineRoot`.
 */
export async function showStatus(baselineRoot: string, afterRoot: string, config: ResolvedConfig): Promise<ExitCode> {
  const comparisons = await classifyTrees(baselineRoot, afterRoot, { pattern: config.filePattern });
  if (comparisons.length === 0) {
    console.log(chalk.dim(`No files matching ${config.filePattern} under ${afterRoot}`));
    return EXIT_CODES.OK;
  }
  for (const { relativePath, status } of comparisons) {
    const label =
      status === 'new' ? chalk.green('new      ') :
      status === 'modified' ? chalk.yellow('modified ') :
      chalk.dim('unchanged');
    console.log(`${label} ${relativePath}`);
  }
  return EXIT_CODES.OK;
}

/**
 * Print the active ignore rules.
 */
export function listIgnoreRules(config: ResolvedConfig): ExitCode {
  const rules = buildIgnoreRuleSet(config).rules();
  if (rules.length === 0) {
    console.log(chalk.dim('No ignore rules.'));
    return EXIT_CODES.OK;
  }
  console.log(chalk.bold(`Ignore rules (${rules.length}):`));
  for (const rule of rules) {
    console.log(`  ${chalk.cyan(rule.file)} [${rule.section}] ${rule.key}`);
  }
  return EXIT_CODES.OK;
}

/**
 * Write an example config file.
 */
export function createConfigFile(configPath?: string): ExitCode {
  const result = initConfig(configPath);
  if (!result.success) {
    logger.error(`${result.error ?? 'Could not write config'}: ${result.path}`);
    return EXIT_CODES.FAILURE;
  }
  console.log(chalk.green(`Created ${result.path}`));
  return EXIT_CODES.OK;
}
