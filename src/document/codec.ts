// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config Codec
 *
 * Reads and writes the client's line format:
 *
 *   # comment
 *   [section]
 *   key = value
 *
 * Comments are dropped on read and never written back.
 */

import * as fs from 'node:fs/promises';
import { ConfigDocument, NO_SECTION } from './document.js';
import { FormatError } from '../errors.js';
import { writeFileAtomic } from '../fs-utils.js';

/**
 * What to do with a line that is neither blank, a comment, a header nor an entry.
 */
export type MalformedLinePolicy = 'skip' | 'error';

export interface ConfigFormat {
  /** Separator between key and value */
  delimiter: string;
  /** Write the delimiter with a space on each side */
  padDelimiter: boolean;
  /** Lines whose first non-blank character is this marker are comments */
  commentMarker: string;
  malformedLines: MalformedLinePolicy;
}

/**
 * Known format variants of the client.
 */
export const FORMAT_PRESETS = {
  current: { delimiter: '=', padDelimiter: true, commentMarker: '#', malformedLines: 'skip' },
  legacy: { delimiter: '=', padDelimiter: false, commentMarker: '#', malformedLines: 'skip' },
} as const satisfies Record<string, ConfigFormat>;

export type FormatPreset = keyof typeof FORMAT_PRESETS;

export const DEFAULT_FORMAT: ConfigFormat = { ...FORMAT_PRESETS.current };

export interface ParseWarning {
  line: number;
  content: string;
  message: string;
}

export interface ParseResult {
  document: ConfigDocument;
  warnings: ParseWarning[];
}

export interface ParseOptions {
  format?: ConfigFormat;
  /** File name used in warnings and errors */
  file?: string;
}

/**
 * Parse config text into a document.
 * Later occurrences of a key in the same section overwrite earlier ones.
 */
export function parseConfig(text: string, options: ParseOptions = {}): ParseResult {
  const format = options.format ?? DEFAULT_FORMAT;
  const document = new ConfigDocument();
  const warnings: ParseWarning[] = [];
  let section = NO_SECTION;

  const malformed = (lineNumber: number, content: string, message: string): void => {
    if (format.malformedLines === 'error') {
      throw new FormatError(message, options.file, lineNumber, content);
    }
    warnings.push({ line: lineNumber, content, message });
  };

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const trimmed = raw.trim();
    const lineNumber = i + 1;

    if (trimmed === '' || trimmed.startsWith(format.commentMarker)) {
      continue;
    }

    if (trimmed.startsWith('[')) {
      const name = trimmed.endsWith(']') ? trimmed.slice(1, -1).trim() : '';
      if (!name) {
        malformed(lineNumber, raw, 'invalid section header');
        continue;
      }
      section = name;
      document.ensureSection(section);
      continue;
    }

    const entry = splitEntry(raw, format);
    if (!entry) {
      malformed(lineNumber, raw, `missing "${format.delimiter}"`);
      continue;
    }
    if (!entry.key) {
      malformed(lineNumber, raw, 'empty key');
      continue;
    }
    document.set(section, entry.key, entry.value);
  }

  return { document, warnings };
}

/**
 * Split an entry line into key and value. The padded format splits at the
 * first padded delimiter, so keys may contain a bare one (`meta-= = ...`),
 * and falls back to the first bare delimiter.
 */
function splitEntry(raw: string, format: ConfigFormat): { key: string; value: string } | null {
  if (format.padDelimiter) {
    const padded = ` ${format.delimiter} `;
    let index = raw.indexOf(padded);
    let width = padded.length;
    if (index === -1) {
      index = raw.indexOf(format.delimiter);
      width = format.delimiter.length;
    }
    if (index === -1) return null;
    return { key: raw.slice(0, index).trim(), value: raw.slice(index + width).trim() };
  }

  const index = raw.indexOf(format.delimiter);
  if (index === -1) return null;
  return { key: raw.slice(0, index).trim(), value: raw.slice(index + format.delimiter.length) };
}

/**
 * Serialize a document. Sections are separated by one blank line and the
 * output ends with exactly one newline (empty string for an empty document).
 */
export function serializeConfig(document: ConfigDocument, format: ConfigFormat = DEFAULT_FORMAT): string {
  const separator = format.padDelimiter ? ` ${format.delimiter} ` : format.delimiter;
  const formatEntries = (entries: ReadonlyMap<string, string>): string[] =>
    [...entries].map(([key, value]) => `${key}${separator}${value}`);

  const blocks: string[] = [];
  const globals = document.globals();
  if (globals.size > 0) {
    blocks.push(formatEntries(globals).join('\n'));
  }
  for (const [name, entries] of document.sections()) {
    blocks.push([`[${name}]`, ...formatEntries(entries)].join('\n'));
  }

  const body = blocks.join('\n\n').replace(/\s+$/, '');
  return body ? `${body}\n` : '';
}

/**
 * Load and parse a config file. A missing file yields an empty document.
 */
export async function loadConfigFile(filePath: string, format: ConfigFormat = DEFAULT_FORMAT): Promise<ParseResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return { document: new ConfigDocument(), warnings: [] };
    }
    throw error;
  }
  return parseConfig(text, { format, file: filePath });
}

/**
 * Serialize a document and replace the file in one step.
 */
export async function saveConfigFile(
  document: ConfigDocument,
  filePath: string,
  format: ConfigFormat = DEFAULT_FORMAT
): Promise<void> {
  await writeFileAtomic(filePath, serializeConfig(document, format));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
