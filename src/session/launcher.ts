// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Process Launcher
 *
 * Runs the client in the foreground with the terminal handed over to it.
 */

import { spawn } from 'child_process';
import { constants } from 'os';
import { LaunchError } from '../errors.js';
import type { AppHandle, AppLauncher } from './types.js';

export class ProcessLauncher implements AppLauncher {
  launch(command: string, args: string[]): AppHandle {
    const child = spawn(command, args, { stdio: 'inherit' });

    const exited = new Promise<number>((resolve, reject) => {
      child.once('error', (error) => reject(new LaunchError(command, error)));
      child.once('exit', (code, signal) => {
        // Killed by a signal: shell convention 128 + n
        resolve(code ?? (signal ? 128 + constants.signals[signal] : 1));
      });
    });

    return { exited };
  }
}
