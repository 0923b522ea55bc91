import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryDatasetSource } from '../dataset_source.js';
import { DatasetStore } from '../dataset_store.js';
import {
  DatasetNotFoundError,
  IllegalStateError,
  LocaleRestoreError,
  TypeMismatchError,
  UnsupportedLocaleError,
} from '../errors.js';
import { LocaleContext } from '../locale_context.js';

function createContext(): LocaleContext {
  const source = new MemoryDatasetSource({
    'en/greeting.json': { greeting: 'hello', meta: { lang: 'en' } },
    'fr/greeting.json': { greeting: 'bonjour', meta: { lang: 'fr' } },
    'de/greeting.json': { greeting: 'hallo', meta: { lang: 'de' } },
  });
  return new LocaleContext(new DatasetStore(source), 'greeting');
}

describe('LocaleContext', () => {
  let context: LocaleContext;

  beforeEach(() => {
    context = createContext();
  });

  describe('before a locale is set', () => {
    it('refuses overrides', () => {
      expect(context.initialized).toBe(false);
      expect(() => context.acquire('fr')).toThrow(IllegalStateError);
      expect(() => context.override('fr', () => 1)).toThrow(IllegalStateError);
    });

    it('has no locale or dataset to report', () => {
      expect(() => context.locale).toThrow(IllegalStateError);
      expect(() => context.dataset).toThrow('No locale has been set for this provider yet.');
    });
  });

  describe('setLocale', () => {
    beforeEach(() => {
      context.setLocale('en');
    });

    it('replaces locale and dataset together', () => {
      context.setLocale('FR');
      expect(context.locale).toBe('fr');
      expect(context.dataset.greeting).toBe('bonjour');
    });

    it('keeps the previous state when the locale is unsupported', () => {
      expect(() => context.setLocale('klingon')).toThrow(UnsupportedLocaleError);
      expect(context.locale).toBe('en');
      expect(context.dataset.greeting).toBe('hello');
    });

    it('keeps the previous state when the dataset is missing', () => {
      expect(() => context.setLocale('ja')).toThrow(DatasetNotFoundError);
      expect(context.locale).toBe('en');
      expect(context.dataset.greeting).toBe('hello');
    });

    it('drops patches when the locale is set again', () => {
      context.patch({ greeting: 'hi' });
      context.setLocale('en');
      expect(context.dataset.greeting).toBe('hello');
    });
  });

  describe('patch', () => {
    beforeEach(() => {
      context.setLocale('en');
    });

    it('deep-merges into the current dataset', () => {
      context.patch({ meta: { region: 'us' } });
      expect(context.dataset).toEqual({ greeting: 'hello', meta: { lang: 'en', region: 'us' } });
    });

    it('rejects non-object patches', () => {
      expect(() => context.patch(['greeting'])).toThrow(TypeMismatchError);
      expect(() => context.patch('greeting')).toThrow(TypeMismatchError);
    });

    it('does not keep references to the caller object', () => {
      const patch = { meta: { region: 'us' } };
      context.patch(patch);
      patch.meta.region = 'ca';
      expect(context.dataset.meta).toEqual({ lang: 'en', region: 'us' });
    });
  });

  describe('override', () => {
    beforeEach(() => {
      context.setLocale('en');
    });

    it('runs the callback under the new locale and returns its value', () => {
      const seen = context.override('fr', () => [context.locale, context.dataset.greeting]);
      expect(seen).toEqual(['fr', 'bonjour']);
      expect(context.locale).toBe('en');
      expect(context.dataset.greeting).toBe('hello');
    });

    it('restores the previous locale when the callback throws', () => {
      expect(() =>
        context.override('de', () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(context.locale).toBe('en');
      expect(context.dataset).toEqual({ greeting: 'hello', meta: { lang: 'en' } });
    });

    it('restores patches applied before the override', () => {
      context.patch({ greeting: 'hi' });
      context.override('fr', () => undefined);
      expect(context.dataset.greeting).toBe('hi');
    });

    it('discards patches applied during the override', () => {
      context.override('fr', () => {
        context.patch({ greeting: 'salut' });
        expect(context.dataset.greeting).toBe('salut');
      });
      expect(context.dataset.greeting).toBe('hello');
      context.override('fr', () => {
        expect(context.dataset.greeting).toBe('bonjour');
      });
    });

    it('unwinds nested overrides in order', () => {
      context.override('fr', () => {
        context.override('de', () => {
          expect(context.locale).toBe('de');
        });
        expect(context.locale).toBe('fr');
      });
      expect(context.locale).toBe('en');
    });

    it('keeps the callback error as the cause when the restore also fails', () => {
      const source = new MemoryDatasetSource({
        'en/greeting.json': { greeting: 'hello' },
        'fr/greeting.json': { greeting: 'bonjour' },
      });
      const store = new DatasetStore(source);
      const local = new LocaleContext(store, 'greeting');
      local.setLocale('en');
      const failure = new Error('callback failed');

      try {
        local.override('fr', () => {
          source.delete('en/greeting.json');
          store.clear();
          throw failure;
        });
        expect.unreachable();
      } catch (e) {
        if (!(e instanceof LocaleRestoreError)) throw e;
        expect(e.cause).toBe(failure);
        expect(e.locale).toBe('en');
        expect(e.restoreError).toBeInstanceOf(DatasetNotFoundError);
      }
    });

    it('leaves state alone when the override target cannot load', () => {
      expect(() => context.override('ja', () => undefined)).toThrow(DatasetNotFoundError);
      expect(context.locale).toBe('en');
    });
  });

  describe('acquire', () => {
    beforeEach(() => {
      context.setLocale('en');
    });

    it('returns a guard that restores once', () => {
      const guard = context.acquire('fr');
      expect(guard.locale).toBe('fr');
      expect(guard.previous).toBe('en');
      expect(guard.active).toBe(true);

      guard.restore();
      expect(guard.active).toBe(false);
      expect(context.locale).toBe('en');

      context.setLocale('de');
      guard.restore();
      expect(context.locale).toBe('de');
    });

    it('refuses to restore an outer guard before the inner one', () => {
      const outer = context.acquire('fr');
      const inner = context.acquire('de');

      expect(() => outer.restore()).toThrow(IllegalStateError);
      expect(outer.active).toBe(true);
      expect(context.locale).toBe('de');

      inner.restore();
      expect(context.locale).toBe('fr');
      outer.restore();
      expect(context.locale).toBe('en');
      expect(context.dataset.greeting).toBe('hello');
    });
  });
});
