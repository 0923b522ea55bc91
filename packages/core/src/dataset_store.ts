// ============================================================================
// @fabricate/core — Dataset Store
// ============================================================================
//
// Resolves a provider's dataset for a locale.
//
// Composition for a composite locale such as en-gb:
//   1. en/{provider}.json     optional base
//   2. en-gb/{provider}.json  top-level keys replace the base's
// At least one of the two must exist. Root locales read only their own file.
//
// Composed results are cached per (locale, provider); every caller gets its
// own deep copy, so a provider may patch its dataset freely.
// ============================================================================

import type { DatasetSource } from './dataset_source.js';
import { DatasetFormatError, DatasetNotFoundError } from './errors.js';
import { type Locale, splitLocale } from './locales.js';
import { logDatasetCacheHit, timer } from './logger.js';
import { assignEntry } from './merge.js';
import { type Dataset, type JsonValue, isJsonObject } from './types.js';

/** Namespace of locale-independent resources. */
export const GLOBAL_NAMESPACE = 'global';

export class DatasetStore {
  readonly source: DatasetSource;
  private datasets = new Map<string, Dataset>();
  private globals = new Map<string, JsonValue>();

  constructor(source: DatasetSource) {
    this.source = source;
  }

  /**
   * Load the dataset of `providerKey` for `locale`.
   *
   * @throws {DatasetNotFoundError} When neither the locale file nor its base exists
   * @throws {DatasetFormatError} When a file is not a JSON object
   */
  load(locale: Locale, providerKey: string): Dataset {
    const cacheKey = `${locale}/${providerKey}`;
    const cached = this.datasets.get(cacheKey);
    if (cached) {
      logDatasetCacheHit(locale, providerKey);
      return structuredClone(cached);
    }

    const t = timer(`load ${providerKey}`);
    const fileName = `${providerKey}.json`;
    const { root, region } = splitLocale(locale);
    const files: string[] = [];
    let data: Dataset = {};

    if (region !== undefined) {
      // A missing base is fine: the exact file may carry everything.
      const base = this.readDataset([root, fileName]);
      if (base) {
        data = base;
        files.push(this.source.locate([root, fileName]));
      }
    }

    const exact = this.readDataset([locale, fileName]);
    if (exact) {
      for (const [key, value] of Object.entries(exact)) {
        assignEntry(data, key, value);
      }
      files.push(this.source.locate([locale, fileName]));
    }

    if (files.length === 0) {
      throw new DatasetNotFoundError(this.source.locate([locale, fileName]));
    }

    this.datasets.set(cacheKey, data);
    t.endWith({ locale, provider: providerKey, files });
    return structuredClone(data);
  }

  /**
   * Read a locale-independent resource from the global namespace.
   *
   * @throws {DatasetNotFoundError} When the resource does not exist
   */
  readGlobal(fileName: string): JsonValue {
    const cached = this.globals.get(fileName);
    if (cached !== undefined) return structuredClone(cached);

    const path = [GLOBAL_NAMESPACE, fileName];
    const value = this.source.read(path);
    if (value === undefined) {
      throw new DatasetNotFoundError(this.source.locate(path));
    }
    this.globals.set(fileName, value);
    return structuredClone(value);
  }

  /** Drop every cached dataset and resource. */
  clear(): void {
    this.datasets.clear();
    this.globals.clear();
  }

  private readDataset(path: string[]): Dataset | undefined {
    const value = this.source.read(path);
    if (value === undefined) return undefined;
    if (!isJsonObject(value)) {
      throw new DatasetFormatError(this.source.locate(path), 'top level must be a JSON object');
    }
    // Sources may hand out shared objects; never mutate them.
    return structuredClone(value);
  }
}
