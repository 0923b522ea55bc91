// ============================================================================
// @fabricate/core — Supported Locales
// ============================================================================

import { ConfigurationError, UnsupportedLocaleError } from './errors.js';

/** Separator between the root and the region of a composite tag. */
export const LOCALE_SEP = '-';

export const LOCALES = [
  'ar-ae',
  'ar-dz',
  'ar-eg',
  'cs',
  'da',
  'de',
  'de-at',
  'de-ch',
  'el',
  'en',
  'en-au',
  'en-ca',
  'en-gb',
  'es',
  'es-mx',
  'et',
  'fa',
  'fi',
  'fr',
  'hr',
  'hu',
  'is',
  'it',
  'ja',
  'kk',
  'ko',
  'nl',
  'nl-be',
  'no',
  'pl',
  'pt',
  'pt-br',
  'ru',
  'sk',
  'sv',
  'tr',
  'uk',
  'zh',
] as const;

export type Locale = (typeof LOCALES)[number];

export const DEFAULT_LOCALE: Locale = 'en';

/** Anything `validateLocale` may turn into a `Locale`, e.g. `en-GB` or `EN_GB`. */
export type LocaleInput = Locale | string;

const SUPPORTED: ReadonlySet<string> = new Set(LOCALES);

export function isLocale(value: unknown): value is Locale {
  return typeof value === 'string' && SUPPORTED.has(value);
}

/**
 * Resolve a locale tag. Matching is case-insensitive and accepts `_` for the
 * separator, so `en-GB`, `EN_GB` and `en-gb` are the same locale.
 *
 * @throws {ConfigurationError} When no locale is given
 * @throws {UnsupportedLocaleError} When the tag is not supported or not a string
 */
export function validateLocale(locale: unknown): Locale {
  if (locale === undefined || locale === null) {
    throw new ConfigurationError('locale');
  }
  if (typeof locale !== 'string') {
    throw new UnsupportedLocaleError(locale);
  }
  const normalized = locale.trim().toLowerCase().replace('_', LOCALE_SEP);
  if (isLocale(normalized)) return normalized;
  throw new UnsupportedLocaleError(locale);
}

/**
 * Split a tag into its root and region: `en-gb` → `{ root: 'en', region: 'gb' }`.
 * Root tags have no region.
 */
export function splitLocale(locale: Locale): { root: string; region?: string } {
  const at = locale.indexOf(LOCALE_SEP);
  if (at === -1) return { root: locale };
  return { root: locale.slice(0, at), region: locale.slice(at + 1) };
}
