// ============================================================================
// @fabricate/core — Base Providers
// ============================================================================
//
// Every generator extends one of:
//   - BaseProvider      random source, enum coercion, global resources
//   - BaseDataProvider  + a locale and the dataset loaded for it
// ============================================================================

import { loadConfig } from './config.js';
import { type DatasetSource, FileDatasetSource } from './dataset_source.js';
import { DatasetStore } from './dataset_store.js';
import { type EnumDefinition, type EnumInput, coerceEnum } from './enums.js';
import { ConfigurationError, InvalidArgumentError, TypeMismatchError } from './errors.js';
import { hasGlobalSeed } from './global_seed.js';
import { LocaleContext, type LocaleOverride } from './locale_context.js';
import { DEFAULT_LOCALE, type Locale, type LocaleInput } from './locales.js';
import { debug } from './logger.js';
import { SeededRandom } from './random.js';
import {
  type Dataset,
  type JsonValue,
  MissingSeed,
  type PathKey,
  type Seed,
  isConcreteSeed,
} from './types.js';

/** Per-provider constants, passed by each subclass to the base constructor. */
export interface ProviderMeta {
  /** Dataset key: `{locale}/{name}.json`. */
  name: string;
  /** Dataset root shipped with the provider. */
  dataDir?: string;
}

export interface ProviderOptions {
  /** `MissingSeed` (default) keeps the source as is; `null` seeds from entropy. */
  seed?: Seed;
  /** Share one random source between providers. Only reseeded if `seed` is given. */
  random?: SeededRandom;
  /** Dataset root for this instance. */
  dataDir?: string;
  source?: DatasetSource;
  /** Share one store (and its cache) between providers. */
  store?: DatasetStore;
}

export interface DataProviderOptions extends ProviderOptions {
  locale?: LocaleInput;
}

function resolveStore(meta: ProviderMeta, options: ProviderOptions): DatasetStore {
  if (options.store) return options.store;
  if (options.source) return new DatasetStore(options.source);
  const dataDir = options.dataDir ?? meta.dataDir ?? loadConfig().dataDir;
  return new DatasetStore(new FileDatasetSource(dataDir));
}

export abstract class BaseProvider {
  readonly meta: Readonly<ProviderMeta>;
  readonly random: SeededRandom;
  protected readonly store: DatasetStore;
  private currentSeed: Seed;

  constructor(meta: ProviderMeta, options: ProviderOptions = {}) {
    if (!meta.name) {
      throw new ConfigurationError('meta.name', 'Provider meta must name its dataset.');
    }
    this.meta = Object.freeze({ ...meta });

    const seed = options.seed === undefined ? MissingSeed : options.seed;
    if (options.random !== undefined) {
      if (!(options.random instanceof SeededRandom)) {
        throw new TypeMismatchError('a SeededRandom instance', options.random);
      }
      this.random = options.random;
    } else {
      this.random = new SeededRandom();
    }
    this.currentSeed = MissingSeed;
    this.reseed(seed);

    this.store = resolveStore(this.meta, options);
  }

  get seed(): Seed {
    return this.currentSeed;
  }

  /**
   * Reseed the random source. `MissingSeed` is a no-op, `null` reseeds from
   * entropy. Providers sharing the source are reseeded too.
   */
  reseed(seed: Seed = MissingSeed): void {
    if (seed === MissingSeed) return;
    this.currentSeed = seed;
    this.random.seed(seed);
    debug(`reseeded ${this.meta.name}`, { concrete: isConcreteSeed(seed) });
  }

  /**
   * Whether output is reproducible: the instance has a concrete seed, or it
   * has none and the process-wide seed is concrete.
   */
  hasEffectiveSeed(): boolean {
    if (isConcreteSeed(this.currentSeed)) return true;
    return hasGlobalSeed();
  }

  /**
   * Resolve an enum argument: random value when absent, else the value of the
   * given member or member name.
   */
  coerceEnum<M extends Record<string, unknown>>(
    item: EnumInput<M>,
    enumDef: EnumDefinition<M>,
  ): M[keyof M] {
    return coerceEnum(item, enumDef, this.random);
  }

  /**
   * Read `global/{fileName}` from the dataset root.
   *
   * @throws {DatasetNotFoundError} When the resource does not exist
   */
  readGlobalResource(fileName: string): JsonValue {
    return this.store.readGlobal(fileName);
  }

  toString(): string {
    return this.constructor.name;
  }
}

export abstract class BaseDataProvider extends BaseProvider {
  private readonly context: LocaleContext;

  /**
   * @throws {UnsupportedLocaleError} When the locale is not supported
   * @throws {DatasetNotFoundError} When no dataset exists for it
   */
  constructor(meta: ProviderMeta, options: DataProviderOptions = {}) {
    super(meta, options);
    this.context = new LocaleContext(this.store, this.meta.name);
    this.context.setLocale(options.locale === undefined ? DEFAULT_LOCALE : options.locale);
  }

  get locale(): Locale {
    return this.context.locale;
  }

  /** A copy of the current dataset. Change it through {@link updateDataset}. */
  get dataset(): Dataset {
    return structuredClone(this.context.dataset);
  }

  getCurrentLocale(): Locale {
    return this.context.locale;
  }

  /**
   * Nested lookup by key path, returning a copy of the value found.
   * Returns `defaultValue` as soon as a key is missing or a step is not a
   * container.
   *
   * @example
   * ```ts
   * provider.extract(['words', 'bad'], []);
   * provider.extract(['quotes', 0]);
   * ```
   *
   * @throws {InvalidArgumentError} When `keys` is empty
   */
  extract(keys: readonly PathKey[]): JsonValue | undefined;
  extract<D>(keys: readonly PathKey[], defaultValue: D): JsonValue | D;
  extract<D>(keys: readonly PathKey[], defaultValue?: D): JsonValue | D | undefined {
    if (keys.length === 0) {
      throw new InvalidArgumentError('keys', 'The key path must not be empty.');
    }
    let node: JsonValue = this.context.dataset;
    for (const key of keys) {
      if (Array.isArray(node)) {
        if (typeof key !== 'number' || !Number.isInteger(key)) return defaultValue;
        const item: JsonValue | undefined = node[key < 0 ? node.length + key : key];
        if (item === undefined) return defaultValue;
        node = item;
      } else if (typeof node === 'object' && node !== null) {
        const k = String(key);
        if (!Object.hasOwn(node, k)) return defaultValue;
        node = node[k];
      } else {
        return defaultValue;
      }
    }
    return structuredClone(node);
  }

  /**
   * Deep-merge `patch` into the dataset. Survives a {@link withLocale} scope.
   *
   * @throws {TypeMismatchError} If `patch` is not a plain JSON object
   */
  updateDataset(patch: unknown): void {
    this.context.patch(patch);
  }

  /**
   * Switch locale until the returned guard's `restore()` is called.
   *
   * @example
   * ```ts
   * const guard = text.overrideLocale('de');
   * try {
   *   text.word();
   * } finally {
   *   guard.restore();
   * }
   * ```
   */
  overrideLocale(locale: LocaleInput): LocaleOverride {
    return this.context.acquire(locale);
  }

  /**
   * Run `fn` under `locale`; the previous locale and dataset come back on
   * every exit path. `fn` must be synchronous.
   */
  withLocale<T>(locale: LocaleInput, fn: (provider: this) => T): T {
    return this.context.override(locale, () => fn(this));
  }

  toString(): string {
    return `${this.constructor.name} <${this.locale}>`;
  }
}
