// ============================================================================
// @fabricate/core — Public API
// ============================================================================

// Providers
export { BaseProvider, BaseDataProvider } from './provider.js';
export type { ProviderMeta, ProviderOptions, DataProviderOptions } from './provider.js';

// Locales
export {
  LOCALES,
  LOCALE_SEP,
  DEFAULT_LOCALE,
  isLocale,
  validateLocale,
  splitLocale,
} from './locales.js';
export type { Locale, LocaleInput } from './locales.js';
export { LocaleContext } from './locale_context.js';
export type { LocaleOverride } from './locale_context.js';

// Datasets
export { DatasetStore, GLOBAL_NAMESPACE } from './dataset_store.js';
export { FileDatasetSource, MemoryDatasetSource } from './dataset_source.js';
export type { DatasetSource } from './dataset_source.js';
export { mergeDataset } from './merge.js';

// Randomness
export { SeededRandom, seedToArray } from './random.js';
export { getGlobalSeed, setGlobalSeed, hasGlobalSeed } from './global_seed.js';

// Enums
export { defineEnum, coerceEnum } from './enums.js';
export type { EnumDefinition, EnumInput, EnumInputOf, EnumValue } from './enums.js';

// Types
export { MissingSeed, isConcreteSeed, isJsonObject, isJsonValue } from './types.js';
export type {
  ConcreteSeed,
  Dataset,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  PathKey,
  Seed,
} from './types.js';

// Errors
export {
  FabricateError,
  ConfigurationError,
  IllegalStateError,
  LocaleRestoreError,
  TypeMismatchError,
  InvalidArgumentError,
  UnsupportedLocaleError,
  EnumResolutionError,
  DatasetNotFoundError,
  DatasetFormatError,
} from './errors.js';

// Configuration & logging
export { loadConfig, parseSeed } from './config.js';
export type { FabricateConfig } from './config.js';
export { debug, onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
