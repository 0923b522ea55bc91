// ============================================================================
// @fabricate/providers — Text
// ============================================================================

import { BaseDataProvider, type DataProviderOptions, type PathKey } from '@fabricate/core';
import { DATA_DIR } from './data_dir.js';
import { stringList } from './resources.js';

/**
 * Locale-aware words, sentences, quotes, colors and answers.
 *
 * @example
 * ```ts
 * const text = new Text({ locale: 'en-gb', seed: 1 });
 * text.color();                          // from en-gb/text.json
 * text.withLocale('de', (t) => t.word()); // a German word
 * ```
 */
export class Text extends BaseDataProvider {
  constructor(options: DataProviderOptions = {}) {
    super({ name: 'text', dataDir: DATA_DIR }, options);
  }

  alphabet(lowerCase = false): string[] {
    const letters = this.list(['alphabet']);
    return lowerCase ? letters.map((l) => l.toLowerCase()) : letters;
  }

  words(quantity = 5): string[] {
    return this.random.choices(this.list(['words', 'normal']), quantity);
  }

  word(): string {
    return this.random.choice(this.list(['words', 'normal']));
  }

  sentence(): string {
    return this.random.choice(this.list(['text']));
  }

  quote(): string {
    return this.random.choice(this.list(['quotes']));
  }

  color(): string {
    return this.random.choice(this.list(['color']));
  }

  answer(): string {
    return this.random.choice(this.list(['answers']));
  }

  private list(keys: PathKey[]): string[] {
    return stringList(this.extract(keys), `${this.locale}/text.json#${keys.join('.')}`);
  }
}
