// ============================================================================
// @fabricate/core — Locale Context
// ============================================================================
//
// Holds a provider's current locale together with the dataset loaded for it.
// The pair is only ever replaced as a whole, after a successful load, so the
// dataset always belongs to the current locale.
//
// Patches applied with patch() are logged. A scoped override reloads the
// previous locale on exit and replays that log, so the restored dataset is
// the one the caller saw before the override. Patches made during the
// override die with it.
//
// Not safe for concurrent callers: an override mutates the shared state for
// its whole duration. Use one provider per task.
// ============================================================================

import type { DatasetStore } from './dataset_store.js';
import { IllegalStateError, LocaleRestoreError, TypeMismatchError } from './errors.js';
import { type Locale, type LocaleInput, validateLocale } from './locales.js';
import { logLocaleOverride } from './logger.js';
import { mergeDataset } from './merge.js';
import { type Dataset, type JsonObject, isJsonObject } from './types.js';

interface LocaleState {
  locale: Locale;
  dataset: Dataset;
  patches: JsonObject[];
}

/**
 * Guard returned by {@link LocaleContext.acquire}. Call `restore()` exactly
 * where the override ends, typically in a `finally` block.
 */
export interface LocaleOverride {
  readonly locale: Locale;
  readonly previous: Locale;
  readonly active: boolean;
  /** Reinstate the previous locale and dataset. Later calls do nothing. */
  restore(): void;
}

export class LocaleContext {
  private readonly store: DatasetStore;
  private readonly providerKey: string;
  private state: LocaleState | undefined;
  private readonly overrides: object[] = [];

  constructor(store: DatasetStore, providerKey: string) {
    this.store = store;
    this.providerKey = providerKey;
  }

  get initialized(): boolean {
    return this.state !== undefined;
  }

  get locale(): Locale {
    return this.current().locale;
  }

  get dataset(): Dataset {
    return this.current().dataset;
  }

  /**
   * Switch to `locale` and load its dataset. On failure nothing changes.
   *
   * @throws {UnsupportedLocaleError} When the tag is not supported
   * @throws {DatasetNotFoundError} When no dataset exists for the locale
   */
  setLocale(locale: LocaleInput): void {
    const resolved = validateLocale(locale);
    const dataset = this.store.load(resolved, this.providerKey);
    this.state = { locale: resolved, dataset, patches: [] };
  }

  /**
   * Deep-merge `patch` into the current dataset.
   *
   * @throws {TypeMismatchError} If `patch` is not a plain JSON object
   */
  patch(patch: unknown): void {
    const state = this.current();
    if (!isJsonObject(patch)) {
      throw new TypeMismatchError('a plain JSON object', patch);
    }
    mergeDataset(state.dataset, structuredClone(patch));
    state.patches.push(structuredClone(patch));
  }

  /**
   * Switch to `locale` until the returned guard is restored. Guards must be
   * restored in reverse order of acquisition.
   *
   * @throws {IllegalStateError} When no locale was ever set
   */
  acquire(locale: LocaleInput): LocaleOverride {
    const saved = this.current();
    this.setLocale(locale);
    const target = this.locale;
    const token = {};
    this.overrides.push(token);
    logLocaleOverride(saved.locale, target, 'enter');

    let active = true;
    return {
      locale: target,
      previous: saved.locale,
      get active() {
        return active;
      },
      restore: () => {
        if (!active) return;
        if (this.overrides[this.overrides.length - 1] !== token) {
          throw new IllegalStateError(
            `Cannot restore "${saved.locale}" before the overrides acquired after it.`,
          );
        }
        logLocaleOverride(target, saved.locale, 'restore');
        this.reload(saved.locale, saved.patches);
        this.overrides.pop();
        active = false;
      },
    };
  }

  /**
   * Run `fn` with `locale` in force, restoring the previous locale on every
   * exit path, including a throw from `fn`.
   *
   * @throws {LocaleRestoreError} When `fn` throws and the restore fails too
   */
  override<T>(locale: LocaleInput, fn: () => T): T {
    const guard = this.acquire(locale);
    let result: T;
    try {
      result = fn();
    } catch (error) {
      try {
        guard.restore();
      } catch (restoreError) {
        throw new LocaleRestoreError(guard.previous, restoreError, error);
      }
      throw error;
    }
    guard.restore();
    return result;
  }

  private reload(locale: Locale, patches: JsonObject[]): void {
    const dataset = this.store.load(locale, this.providerKey);
    for (const patch of patches) {
      mergeDataset(dataset, structuredClone(patch));
    }
    this.state = { locale, dataset, patches };
  }

  private current(): LocaleState {
    if (!this.state) {
      throw new IllegalStateError('No locale has been set for this provider yet.');
    }
    return this.state;
  }
}
