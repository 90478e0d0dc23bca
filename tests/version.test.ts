// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { VERSION } from '../src/version.js';

describe('version', () => {
  it('VERSION matches package.json version', () => {
    const packageJson: unknown = JSON.parse(readFileSync(join(import.meta.dirname, '..', 'package.json'), 'utf-8'));

    expect(packageJson).toMatchObject({ name: 'dotkeep', version: VERSION });
  });
});
