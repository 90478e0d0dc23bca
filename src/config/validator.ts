// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Turns the parsed YAML value into a typed config, dropping fields with the
 * wrong type, and reports problems as warnings.
 */

import { FORMAT_PRESETS, type FormatPreset, type MalformedLinePolicy } from '../document/codec.js';
import { pathsOverlap } from '../fs-utils.js';
import type { IgnoreRule } from '../merge/types.js';
import type { DotkeepConfig } from './types.js';

/**
 * Top-level keys understood in the config file.
 */
const KNOWN_KEYS = [
  'app', 'durableDir', 'workDir', 'snapshotDelayMs', 'filePattern',
  'format', 'ignore', 'useDefaultIgnores', 'logIgnored',
];

const MALFORMED_POLICIES: MalformedLinePolicy[] = ['skip', 'error'];

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPreset(value: unknown): value is FormatPreset {
  return typeof value === 'string' && Object.hasOwn(FORMAT_PRESETS, value);
}

function isPolicy(value: unknown): value is MalformedLinePolicy {
  return typeof value === 'string' && MALFORMED_POLICIES.some((policy) => policy === value);
}

/**
 * Build a typed config from an untyped value.
 * Invalid fields are left out and reported in `warnings`.
 */
export function parseConfigObject(raw: unknown): { config: DotkeepConfig; warnings: string[] } {
  const warnings: string[] = [];
  const config: DotkeepConfig = {};

  if (raw === null || raw === undefined) {
    return { config, warnings };
  }
  if (!isRecord(raw)) {
    warnings.push('Config file must contain a mapping at the top level');
    return { config, warnings };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      warnings.push(`Unknown config key "${key}"`);
    }
  }

  const str = (value: unknown, field: string): string | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'string' && value.length > 0) return value;
    warnings.push(`${field} must be a non-empty string`);
    return undefined;
  };
  const bool = (value: unknown, field: string): boolean | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    warnings.push(`${field} must be true or false`);
    return undefined;
  };

  if (raw.app !== undefined) {
    if (isRecord(raw.app)) {
      const command = str(raw.app.command, 'app.command');
      let args: string[] | undefined;
      if (raw.app.args !== undefined) {
        if (Array.isArray(raw.app.args) && raw.app.args.every((arg): arg is string => typeof arg === 'string')) {
          args = raw.app.args;
        } else {
          warnings.push('app.args must be a list of strings');
        }
      }
      config.app = { command, args };
    } else {
      warnings.push('app must be a mapping');
    }
  }

  config.durableDir = str(raw.durableDir, 'durableDir');
  config.workDir = str(raw.workDir, 'workDir');
  config.filePattern = str(raw.filePattern, 'filePattern');
  config.useDefaultIgnores = bool(raw.useDefaultIgnores, 'useDefaultIgnores');
  config.logIgnored = bool(raw.logIgnored, 'logIgnored');

  if (raw.snapshotDelayMs !== undefined) {
    if (typeof raw.snapshotDelayMs === 'number' && Number.isFinite(raw.snapshotDelayMs) && raw.snapshotDelayMs >= 0) {
      config.snapshotDelayMs = raw.snapshotDelayMs;
    } else {
      warnings.push('snapshotDelayMs must be a non-negative number');
    }
  }

  if (raw.format !== undefined) {
    if (isRecord(raw.format)) {
      const format: NonNullable<DotkeepConfig['format']> = {};
      if (raw.format.preset !== undefined) {
        if (isPreset(raw.format.preset)) {
          format.preset = raw.format.preset;
        } else {
          warnings.push(`format.preset must be one of: ${Object.keys(FORMAT_PRESETS).join(', ')}`);
        }
      }
      format.delimiter = str(raw.format.delimiter, 'format.delimiter');
      format.commentMarker = str(raw.format.commentMarker, 'format.commentMarker');
      format.padDelimiter = bool(raw.format.padDelimiter, 'format.padDelimiter');
      if (raw.format.malformedLines !== undefined) {
        if (isPolicy(raw.format.malformedLines)) {
          format.malformedLines = raw.format.malformedLines;
        } else {
          warnings.push(`format.malformedLines must be one of: ${MALFORMED_POLICIES.join(', ')}`);
        }
      }
      config.format = format;
    } else {
      warnings.push('format must be a mapping');
    }
  }

  if (raw.ignore !== undefined) {
    if (Array.isArray(raw.ignore)) {
      const rules: IgnoreRule[] = [];
      raw.ignore.forEach((entry: unknown, index: number) => {
        if (
          isRecord(entry) &&
          typeof entry.file === 'string' && entry.file &&
          typeof entry.section === 'string' && entry.section &&
          typeof entry.key === 'string' && entry.key
        ) {
          rules.push({ file: entry.file, section: entry.section, key: entry.key });
        } else {
          warnings.push(`ignore[${index}] needs string file, section and key`);
        }
      });
      config.ignore = rules;
    } else {
      warnings.push('ignore must be a list');
    }
  }

  return { config, warnings: [...warnings, ...validateConfig(config)] };
}

/**
 * Check values that are well-typed but still unusable.
 * Returns an array of warning messages.
 */
export function validateConfig(config: DotkeepConfig): string[] {
  const warnings: string[] = [];

  if (config.format?.delimiter !== undefined && config.format.delimiter.trim() === '') {
    warnings.push('format.delimiter cannot be whitespace only');
  }
  if (
    config.format?.delimiter !== undefined &&
    config.format.commentMarker !== undefined &&
    config.format.delimiter === config.format.commentMarker
  ) {
    warnings.push('format.delimiter and format.commentMarker must differ');
  }

  if (config.app?.args && !config.app.args.some((arg) => arg.includes('{dir}'))) {
    warnings.push('app.args has no "{dir}" placeholder; the client may write to its real config directory');
  }

  if (config.durableDir && config.workDir && pathsOverlap(config.durableDir, config.workDir)) {
    warnings.push('workDir and durableDir overlap; sessions will refuse to start');
  }

  if (config.snapshotDelayMs !== undefined && config.snapshotDelayMs > 60000) {
    warnings.push('snapshotDelayMs over 60s; sessions shorter than that are never merged');
  }

  return warnings;
}
