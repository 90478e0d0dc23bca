// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Config Document
 *
 * In-memory model of one configuration file: ordered sections, each an
 * ordered map of case-sensitive keys to string values. Entries that appear
 * before the first section header live in the NO_SECTION bucket.
 */

/**
 * Name of the pseudo-section holding entries outside any header.
 * Not a valid header name, so it can never collide with a real section.
 */
export const NO_SECTION = '';

export type SectionEntries = ReadonlyMap<string, string>;

export class ConfigDocument {
  private sectionMap: Map<string, Map<string, string>> = new Map();

  /**
   * Build a document from plain objects, in key order.
   * Mostly useful in tests.
   */
  static from(sections: Record<string, Record<string, string>>): ConfigDocument {
    const doc = new ConfigDocument();
    for (const [name, entries] of Object.entries(sections)) {
      doc.ensureSection(name);
      for (const [key, value] of Object.entries(entries)) {
        doc.set(name, key, value);
      }
    }
    return doc;
  }

  hasSection(name: string): boolean {
    return this.sectionMap.has(name);
  }

  getSection(name: string): SectionEntries | undefined {
    return this.sectionMap.get(name);
  }

  /**
   * Named sections in document order. The NO_SECTION bucket is excluded.
   */
  sections(): Array<[string, SectionEntries]> {
    return [...this.sectionMap.entries()].filter(([name]) => name !== NO_SECTION);
  }

  /**
   * Entries of the NO_SECTION bucket (empty when there are none).
   */
  globals(): SectionEntries {
    return this.sectionMap.get(NO_SECTION) ?? new Map();
  }

  get(section: string, key: string): string | undefined {
    return this.sectionMap.get(section)?.get(key);
  }

  /**
   * Create an empty section at the end if it does not exist yet.
   */
  ensureSection(name: string): void {
    if (!this.sectionMap.has(name)) {
      this.sectionMap.set(name, new Map());
    }
  }

  /**
   * Set one entry, creating the section when needed. A repeated key keeps
   * its original position and takes the new value.
   */
  set(section: string, key: string, value: string): void {
    this.ensureSection(section);
    this.sectionMap.get(section)?.set(key, value);
  }

  /**
   * Replace a section's content wholesale. An existing section keeps its
   * position in the document.
   */
  replaceSection(name: string, entries: SectionEntries): void {
    this.sectionMap.set(name, new Map(entries));
  }

  entryCount(): number {
    let count = 0;
    for (const entries of this.sectionMap.values()) {
      count += entries.size;
    }
    return count;
  }

  isEmpty(): boolean {
    return this.sectionMap.size === 0;
  }

  clone(): ConfigDocument {
    const copy = new ConfigDocument();
    for (const [name, entries] of this.sectionMap) {
      copy.replaceSection(name, entries);
    }
    return copy;
  }

  /**
   * Plain-object view, including NO_SECTION when present.
   */
  toJSON(): Record<string, Record<string, string>> {
    const result: Record<string, Record<string, string>> = {};
    for (const [name, entries] of this.sectionMap) {
      result[name] = Object.fromEntries(entries);
    }
    return result;
  }
}
