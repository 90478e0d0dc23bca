// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { LaunchError, TooFastExitError, WorkTreeError } from '../src/errors.js';
import { SessionOrchestrator, type SessionOptions } from '../src/session/orchestrator.js';
import type { SyncReport } from '../src/session/types.js';
import { FakeLauncher, type FakeClient } from './helpers/fake-launcher.js';
import { makeTempDir, readFile, removeDir, writeTree } from './helpers/trees.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SessionOrchestrator', () => {
  let dir: string;
  let durableRoot: string;
  let workRoot: string;

  beforeEach(() => {
    dir = makeTempDir('session');
    durableRoot = path.join(dir, 'store');
    workRoot = path.join(dir, 'work');
    writeTree(durableRoot, { 'weechat.conf': '[look]\ncolor = red\n' });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  function createSession(
    client: (orchestrator: SessionOrchestrator) => FakeClient,
    overrides: Partial<SessionOptions> = {}
  ): { orchestrator: SessionOrchestrator; launcher: FakeLauncher } {
    let orchestrator: SessionOrchestrator | undefined;
    const launcher = new FakeLauncher((liveDir) => {
      if (!orchestrator) throw new Error('orchestrator not ready');
      return client(orchestrator)(liveDir);
    });
    orchestrator = new SessionOrchestrator({
      command: 'weechat',
      args: ['--dir', '{dir}'],
      durableRoot,
      workRoot,
      snapshotDelayMs: 20,
      launcher,
      ...overrides,
    });
    return { orchestrator, launcher };
  }

  it('merges stored files against the snapshot and copies files the store lacks', async () => {
    const { orchestrator, launcher } = createSession((session) => async (liveDir) => {
      // Defaults written at start-up
      writeTree(liveDir, {
        'weechat.conf': '[look]\ncolor = red\nbar = on\n',
        'irc.conf': '[server]\nnick = default\nport = 6667\n',
      });
      await once(session, 'snapshot');
      // User edits during the session
      writeTree(liveDir, {
        'weechat.conf': '[look]\ncolor = blue\nbar = on\n',
        'irc.conf': '[server]\nnick = tester\nport = 6667\n',
        'alias.conf': '[cmd]\nj = join\n',
      });
      return 0;
    });

    const result = await orchestrator.run();

    expect(launcher.calls).toEqual([{ command: 'weechat', args: ['--dir', path.join(workRoot, 'live')] }]);
    expect(result.clientExitCode).toBe(0);
    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = blue\n');
    expect(readFile(durableRoot, 'irc.conf')).toBe('[server]\nnick = tester\nport = 6667\n');
    expect(readFile(durableRoot, 'alias.conf')).toBe('[cmd]\nj = join\n');
    expect(result.report.copied).toEqual(['alias.conf', 'irc.conf']);
    expect(result.report.merged.map((m) => m.relativePath)).toEqual(['weechat.conf']);
    expect(fs.existsSync(workRoot)).toBe(false);
  });

  it('emits lifecycle events in order', async () => {
    const events: string[] = [];
    const { orchestrator } = createSession((session) => async () => {
      await once(session, 'snapshot');
      return 0;
    });
    for (const name of ['launching', 'snapshot', 'exited', 'merged']) {
      orchestrator.on(name, () => events.push(name));
    }

    await orchestrator.run();

    expect(events).toEqual(['launching', 'snapshot', 'exited', 'merged']);
  });

  it('fails with TooFastExitError and leaves the store alone when the client exits early', async () => {
    const merged = vi.fn<(report: SyncReport) => void>();
    const { orchestrator } = createSession(
      () => async (liveDir) => {
        writeTree(liveDir, { 'weechat.conf': '[look]\ncolor = green\n', 'new.conf': '[a]\n' });
        await delay(50);
        return 0;
      },
      { snapshotDelayMs: 500 }
    );
    orchestrator.on('merged', merged);

    await expect(orchestrator.run()).rejects.toBeInstanceOf(TooFastExitError);

    expect(merged).not.toHaveBeenCalled();
    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = red\n');
    expect(fs.readdirSync(durableRoot)).toEqual(['weechat.conf']);
    expect(fs.existsSync(workRoot)).toBe(false);
  });

  it('cleans up when the client cannot be started', async () => {
    const { orchestrator } = createSession(() => () => Promise.reject(new LaunchError('weechat')));

    await expect(orchestrator.run()).rejects.toBeInstanceOf(LaunchError);
    expect(fs.existsSync(workRoot)).toBe(false);
  });

  it('creates a missing durable store', async () => {
    durableRoot = path.join(dir, 'fresh-store');
    const { orchestrator } = createSession((session) => async (liveDir) => {
      await once(session, 'snapshot');
      writeTree(liveDir, { 'weechat.conf': '[look]\ncolor = blue\n' });
      return 0;
    });

    await orchestrator.run();

    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = blue\n');
  });

  it('keeps the work tree on request', async () => {
    const { orchestrator } = createSession(
      (session) => async () => {
        await once(session, 'snapshot');
        return 0;
      },
      { keepWorkTree: true }
    );

    await orchestrator.run();

    expect(readFile(path.join(workRoot, 'snapshot'), 'weechat.conf')).toBe('[look]\ncolor = red\n');
    expect(readFile(path.join(workRoot, 'baseline'), 'weechat.conf')).toBe('[look]\ncolor = red\n');
  });

  it.each([
    { label: 'is the durable store', target: () => durableRoot },
    { label: 'is inside the durable store', target: () => path.join(durableRoot, 'work') },
    { label: 'contains the durable store', target: () => dir },
  ])('refuses to start when the work tree $label', async ({ target }) => {
    const { orchestrator, launcher } = createSession(() => async () => 0, { workRoot: target() });

    await expect(orchestrator.run()).rejects.toBeInstanceOf(WorkTreeError);

    expect(launcher.calls).toEqual([]);
    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = red\n');
  });

  it('does not write to the store in dry-run mode', async () => {
    const { orchestrator } = createSession(
      (session) => async (liveDir) => {
        await once(session, 'snapshot');
        writeTree(liveDir, { 'weechat.conf': '[look]\ncolor = blue\n' });
        return 0;
      },
      { dryRun: true }
    );

    const result = await orchestrator.run();

    expect(result.report.merged).toHaveLength(1);
    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = red\n');
  });
});
