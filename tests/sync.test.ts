// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_FORMAT } from '../src/document/codec.js';
import { MergeEngine } from '../src/merge/engine.js';
import { DEFAULT_IGNORE_RULES, IgnoreRuleSet } from '../src/merge/ignore.js';
import { syncTrees } from '../src/session/sync.js';
import { makeTempDir, readFile, removeDir, writeTree } from './helpers/trees.js';

describe('syncTrees', () => {
  let dir: string;
  let snapshotRoot: string;
  let finalRoot: string;
  let durableRoot: string;

  beforeEach(() => {
    dir = makeTempDir('sync');
    snapshotRoot = path.join(dir, 'snapshot');
    finalRoot = path.join(dir, 'final');
    durableRoot = path.join(dir, 'durable');
    fs.mkdirSync(durableRoot, { recursive: true });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('merges modified files, copies new ones and leaves unchanged ones', async () => {
    writeTree(snapshotRoot, {
      'weechat.conf': '[look]\ncolor = default\n',
      'irc.conf': '[server]\nnick = a\n',
      'same.conf': '[a]\nk = v\n',
    });
    writeTree(finalRoot, {
      'weechat.conf': '[look]\ncolor = default\nbar = on\n',
      'irc.conf': '[server]\nnick = b\n',
      'same.conf': '[a]\nk = v\n',
      'fresh.conf': '# kept as is\n[new]\nk=v',
    });
    writeTree(durableRoot, { 'irc.conf': '[server]\nnick = a\nreal = Test\n' });

    const report = await syncTrees({ snapshotRoot, finalRoot, durableRoot });

    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\nbar = on\n');
    expect(readFile(durableRoot, 'irc.conf')).toBe('[server]\nnick = b\nreal = Test\n');
    expect(readFile(durableRoot, 'fresh.conf')).toBe('# kept as is\n[new]\nk=v');
    expect(fs.existsSync(path.join(durableRoot, 'same.conf'))).toBe(false);

    expect(report.merged.map((m) => m.relativePath)).toEqual(['irc.conf', 'weechat.conf']);
    expect(report.copied).toEqual(['fresh.conf']);
    expect(report.unchanged).toEqual(['same.conf']);
    expect(report.failed).toEqual([]);
  });

  it('creates parent directories for new nested files', async () => {
    writeTree(snapshotRoot, {});
    writeTree(finalRoot, { 'plugins/script.conf': '[s]\nk = v\n' });

    await syncTrees({ snapshotRoot, finalRoot, durableRoot });

    expect(readFile(durableRoot, 'plugins/script.conf')).toBe('[s]\nk = v\n');
  });

  it('classifies against the baseline and merges against the snapshot', async () => {
    const baselineRoot = path.join(dir, 'baseline');
    writeTree(baselineRoot, { 'weechat.conf': '[look]\ncolor = red\n' });
    writeTree(snapshotRoot, {
      'weechat.conf': '[look]\ncolor = red\nbar = on\n',
      'irc.conf': '[server]\nport = 6667\n',
    });
    writeTree(finalRoot, {
      'weechat.conf': '[look]\ncolor = blue\nbar = on\n',
      'irc.conf': '[server]\nport = 6667\n',
    });
    writeTree(durableRoot, { 'weechat.conf': '[look]\ncolor = red\n' });

    const report = await syncTrees({ snapshotRoot, baselineRoot, finalRoot, durableRoot });

    expect(report.comparisons).toEqual([
      { relativePath: 'irc.conf', status: 'new' },
      { relativePath: 'weechat.conf', status: 'modified' },
    ]);
    expect(report.copied).toEqual(['irc.conf']);
    expect(readFile(durableRoot, 'irc.conf')).toBe('[server]\nport = 6667\n');
    expect(readFile(durableRoot, 'weechat.conf')).toBe('[look]\ncolor = blue\n');
  });

  it('leaves no temporary files behind in the store', async () => {
    writeTree(snapshotRoot, { 'a.conf': '[a]\nk = 1\n' });
    writeTree(finalRoot, { 'a.conf': '[a]\nk = 2\n', 'b.conf': '[b]\nx = 1\n', 'nested/c.conf': '[c]\n' });

    await syncTrees({ snapshotRoot, finalRoot, durableRoot });

    expect(fs.readdirSync(durableRoot).sort()).toEqual(['a.conf', 'b.conf', 'nested']);
    expect(fs.readdirSync(path.join(durableRoot, 'nested'))).toEqual(['c.conf']);
    expect(readFile(durableRoot, 'b.conf')).toBe('[b]\nx = 1\n');
  });

  it('does not rewrite a file whose only differences are ignored', async () => {
    writeTree(snapshotRoot, { 'weechat.conf': '[layout]\nwindow = 1\n' });
    writeTree(finalRoot, { 'weechat.conf': '[layout]\nwindow = 2\n' });

    const report = await syncTrees({
      snapshotRoot,
      finalRoot,
      durableRoot,
      engine: new MergeEngine({ ignoreRules: new IgnoreRuleSet(DEFAULT_IGNORE_RULES) }),
    });

    expect(report.upToDate).toEqual(['weechat.conf']);
    expect(report.merged).toEqual([]);
    expect(fs.existsSync(path.join(durableRoot, 'weechat.conf'))).toBe(false);
  });

  describe('malformed lines', () => {
    beforeEach(() => {
      writeTree(snapshotRoot, {
        'broken.conf': '[a]\nk = 1\n',
        'good.conf': '[a]\nk = 1\n',
      });
      writeTree(finalRoot, {
        'broken.conf': '[a]\nk = 2\ngarbage\n',
        'good.conf': '[a]\nk = 2\n',
      });
    });

    it('skips the bad line and merges the rest by default', async () => {
      const report = await syncTrees({ snapshotRoot, finalRoot, durableRoot });

      expect(readFile(durableRoot, 'broken.conf')).toBe('[a]\nk = 2\n');
      expect(report.warnings).toEqual([
        { relativePath: 'broken.conf', tree: 'final', line: 3, content: 'garbage', message: 'missing "="' },
      ]);
      expect(report.failed).toEqual([]);
    });

    it('leaves only the offending file alone when strict', async () => {
      const report = await syncTrees({
        snapshotRoot,
        finalRoot,
        durableRoot,
        format: { ...DEFAULT_FORMAT, malformedLines: 'error' },
      });

      expect(report.failed.map((f) => f.relativePath)).toEqual(['broken.conf']);
      expect(report.failed[0]?.error.line).toBe(3);
      expect(fs.existsSync(path.join(durableRoot, 'broken.conf'))).toBe(false);
      expect(readFile(durableRoot, 'good.conf')).toBe('[a]\nk = 2\n');
    });
  });

  it('writes nothing in dry-run mode', async () => {
    writeTree(snapshotRoot, { 'a.conf': '[a]\nk = 1\n' });
    writeTree(finalRoot, { 'a.conf': '[a]\nk = 2\n', 'b.conf': '[b]\n' });

    const report = await syncTrees({ snapshotRoot, finalRoot, durableRoot, dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.merged.map((m) => m.changes)).toEqual([
      [{ kind: 'new-value', section: 'a', key: 'k', value: '2', previous: '1' }],
    ]);
    expect(report.copied).toEqual(['b.conf']);
    expect(fs.readdirSync(durableRoot)).toEqual([]);
  });

  it('writes the legacy format when configured', async () => {
    writeTree(snapshotRoot, { 'a.conf': '[a]\nk=1\n' });
    writeTree(finalRoot, { 'a.conf': '[a]\nk=1\nx=2\n' });

    await syncTrees({
      snapshotRoot,
      finalRoot,
      durableRoot,
      format: { ...DEFAULT_FORMAT, padDelimiter: false },
    });

    expect(readFile(durableRoot, 'a.conf')).toBe('[a]\nx=2\n');
  });
});
