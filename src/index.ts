#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { program } from 'commander';
import chalk from 'chalk';
import {
  createConfigFile,
  listIgnoreRules,
  mergeTrees,
  resolveSettings,
  runSession,
  showStatus,
  type GlobalOptions,
} from './cli/index.js';
import { describeError, exitCodeFor, type ExitCode } from './errors.js';
import { VERSION } from './version.js';

program
  .name('dotkeep')
  .description('Run a chat client on a throw-away config tree and keep only the settings you changed')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('-c, --config <file>', 'Config file (default: ~/.dotkeep/config.yaml)')
  .option('--app <command>', 'Client executable to run')
  .option('--durable <dir>', 'Durable store directory')
  .option('--work-dir <dir>', 'Work tree root (removed after the session)')
  .option('--delay <ms>', 'Delay before the start-up snapshot')
  .option('--format <preset>', 'Config line format (current, legacy)')
  .option('--strict', 'Refuse to merge files with unparsable lines instead of skipping the lines')
  .option('--verbose', 'Show every merged change')
  .option('--debug', 'Show file classification, paths and timings')
  .option('--trace', 'Show parse warnings');

/**
 * Run an action with the resolved settings and exit with its code.
 */
async function execute(action: (options: GlobalOptions) => Promise<ExitCode> | ExitCode): Promise<void> {
  let code: ExitCode;
  try {
    code = await action(program.opts<GlobalOptions>());
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    code = exitCodeFor(error);
  }
  process.exitCode = code;
}

program
  .command('run', { isDefault: true })
  .description('Run the client, then merge the settings changed during the session')
  .argument('[args...]', 'Extra arguments for the client (after --)')
  .option('--dry-run', 'Report what would be merged without writing')
  .option('--keep-work-tree', 'Keep the work tree after the session for inspection')
  .action(async (args: string[], opts: { dryRun?: boolean; keepWorkTree?: boolean }) => {
    await execute((options) =>
      runSession(resolveSettings(options), {
        dryRun: opts.dryRun,
        keepWorkTree: opts.keepWorkTree,
        extraArgs: args,
      })
    );
  });

program
  .command('merge')
  .description('Merge a snapshot/final tree pair into the durable store without running the client')
  .argument('<snapshot>', 'Early snapshot directory')
  .argument('<final>', 'Final state directory')
  .argument('[durable]', 'Durable store (default: configured store)')
  .option('--baseline <dir>', 'Tree the session started from, used to find new files (default: snapshot)')
  .option('--dry-run', 'Report what would be merged without writing')
  .action(
    async (
      snapshot: string,
      final: string,
      durable: string | undefined,
      opts: { dryRun?: boolean; baseline?: string }
    ) => {
      await execute((options) => {
        const config = resolveSettings(options);
        return mergeTrees(snapshot, final, durable ?? config.durableDir, config, {
          dryRun: opts.dryRun,
          baselineRoot: opts.baseline,
        });
      });
    }
  );

program
  .command('status')
  .description('Show which config files differ between two trees')
  .argument('<baseline>', 'Baseline directory')
  .argument('<after>', 'After-state directory')
  .action(async (baseline: string, after: string) => {
    await execute((options) => showStatus(baseline, after, resolveSettings(options)));
  });

program
  .command('ignore')
  .description('List the (file, section, key) entries that are never merged')
  .action(async () => {
    await execute((options) => listIgnoreRules(resolveSettings(options)));
  });

program
  .command('init')
  .description('Write an example config file')
  .action(async () => {
    await execute((options) => createConfigFile(options.config));
  });

// Handle uncaught errors
process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`\nUnhandled rejection: ${reason}`));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(describeError(error)));
  process.exit(1);
});
