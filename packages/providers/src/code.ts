// ============================================================================
// @fabricate/providers — Codes
// ============================================================================

import {
  BaseProvider,
  DatasetFormatError,
  type EnumInputOf,
  type LocaleInput,
  type ProviderOptions,
  DEFAULT_LOCALE,
  splitLocale,
  validateLocale,
} from '@fabricate/core';
import { DATA_DIR } from './data_dir.js';
import { EANFormat, ISBNFormat } from './enums.js';
import { luhnChecksum } from './luhn.js';
import { field, stringList, stringMap } from './resources.js';

/**
 * Identifier codes: ISBN, EAN, IMEI, ISSN, PIN and locale codes.
 *
 * @example
 * ```ts
 * const code = new Code({ seed: 7 });
 * code.isbn('isbn-13', 'de'); // '###-3-#####-###-#' filled with digits
 * code.ean(EANFormat.members.EAN8);
 * ```
 */
export class Code extends BaseProvider {
  constructor(options: ProviderOptions = {}) {
    super({ name: 'code', dataDir: DATA_DIR }, options);
  }

  /** Random locale code (MS-LCID). */
  localeCode(): string {
    const codes = stringList(this.readGlobalResource('locale_codes.json'), 'locale_codes.json');
    return this.random.choice(codes);
  }

  issn(mask = '####-####'): string {
    return this.random.customCode(mask);
  }

  /**
   * ISBN in the registration group of `locale`. Locales without a known
   * group get a random one-digit group.
   *
   * @throws {EnumResolutionError} If `fmt` is not an ISBN format
   */
  isbn(fmt?: EnumInputOf<typeof ISBNFormat>, locale: LocaleInput = DEFAULT_LOCALE): string {
    const format = this.coerceEnum(fmt, ISBNFormat);
    const tag = validateLocale(locale);
    const data = this.readGlobalResource('isbn.json');
    const masks = stringMap(field(data, 'masks'), 'isbn.json#masks');
    const groups = stringMap(field(data, 'groups'), 'isbn.json#groups');

    const group = groups[tag] ?? groups[splitLocale(tag).root] ?? groups.default ?? '#';
    const mask = masks[format];
    if (mask === undefined) {
      throw new DatasetFormatError('isbn.json#masks', `no mask for ${format}`);
    }
    return this.random.customCode(mask.replace('{0}', group));
  }

  /**
   * EAN-8 or EAN-13, ending in a Luhn check digit.
   *
   * @throws {EnumResolutionError} If `fmt` is not an EAN format
   */
  ean(fmt?: EnumInputOf<typeof EANFormat>): string {
    const format = this.coerceEnum(fmt, EANFormat);
    const masks = stringMap(this.readGlobalResource('ean.json'), 'ean.json');
    const mask = masks[format];
    if (mask === undefined) {
      throw new DatasetFormatError('ean.json', `no mask for ${format}`);
    }
    const digits = this.random.customCode(mask);
    return digits + luhnChecksum(digits);
  }

  /** 15-digit IMEI: type allocation code, serial, Luhn check digit. */
  imei(): string {
    const tacs = stringList(this.readGlobalResource('imei_tacs.json'), 'imei_tacs.json');
    const num = this.random.choice(tacs) + String(this.random.randint(100000, 999999));
    return num + luhnChecksum(num);
  }

  pin(mask = '####'): string {
    return this.random.customCode(mask);
  }
}
