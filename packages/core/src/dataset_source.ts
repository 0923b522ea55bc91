// ============================================================================
// @fabricate/core — Dataset Sources
// ============================================================================
//
// A dataset source is the key-value resource behind the store: JSON documents
// addressed by a relative path.
//
// Layout:
//   {root}/
//     {locale}/{provider}.json     # locale datasets, e.g. en-gb/text.json
//     global/{file}                # locale-independent data
// ============================================================================

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DatasetFormatError } from './errors.js';
import type { JsonValue } from './types.js';

export interface DatasetSource {
  /**
   * Parsed JSON at `path`, or `undefined` when nothing is stored there.
   *
   * @throws {DatasetFormatError} When the document exists but is not valid JSON
   */
  read(path: readonly string[]): JsonValue | undefined;

  /** Human-readable location of `path`, used in error messages. */
  locate(path: readonly string[]): string;
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/**
 * Reads JSON files under a root directory.
 *
 * @example
 * ```ts
 * const source = new FileDatasetSource('./data');
 * source.read(['en', 'text.json']); // contents of ./data/en/text.json
 * ```
 */
export class FileDatasetSource implements DatasetSource {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  locate(path: readonly string[]): string {
    return join(this.root, ...path);
  }

  read(path: readonly string[]): JsonValue | undefined {
    const file = this.locate(path);
    let raw: string;
    try {
      raw = readFileSync(file, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new DatasetFormatError(file, err instanceof Error ? err.message : String(err));
    }
  }
}

/**
 * In-process source backed by a map of `'a/b/c.json'` keys to values.
 * Values are stored as given; the store copies what it hands out.
 */
export class MemoryDatasetSource implements DatasetSource {
  private readonly entries: Map<string, JsonValue>;

  constructor(entries: Record<string, JsonValue> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  /** Add or replace a document. */
  set(path: string, value: JsonValue): void {
    this.entries.set(path, value);
  }

  delete(path: string): boolean {
    return this.entries.delete(path);
  }

  locate(path: readonly string[]): string {
    return `memory:${path.join('/')}`;
  }

  read(path: readonly string[]): JsonValue | undefined {
    return this.entries.get(path.join('/'));
  }
}
