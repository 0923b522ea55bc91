import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { LOCALES, validateLocale } from '../locales.js';
import { mergeDataset } from '../merge.js';
import { SeededRandom } from '../random.js';
import type { JsonObject } from '../types.js';

// ============================================================================
// Property-Based Tests
// ============================================================================

const key = fc.stringMatching(/^[a-z]{1,6}$/);

const leaf = fc.oneof(
  fc.integer(),
  fc.boolean(),
  fc.string({ maxLength: 20 }),
  fc.constant(null),
  fc.array(fc.integer(), { maxLength: 5 }),
);

const flatObject: fc.Arbitrary<JsonObject> = fc.dictionary(key, leaf, { maxKeys: 8 });

const nestedObject: fc.Arbitrary<JsonObject> = fc.dictionary(key, fc.oneof(leaf, flatObject), {
  maxKeys: 8,
});

const seed = fc.oneof(fc.integer(), fc.string({ maxLength: 30 }));

describe('Property: seeded sequences', () => {
  it('repeats for equal seeds', () => {
    fc.assert(
      fc.property(seed, (s) => {
        const a = new SeededRandom(s);
        const b = new SeededRandom(s);
        expect(a.randints(5, 0, 1000)).toEqual(b.randints(5, 0, 1000));
        expect(a.float()).toBe(b.float());
      }),
      { numRuns: 100 },
    );
  });

  it('keeps randint inside its inclusive bounds', () => {
    fc.assert(
      fc.property(seed, fc.integer({ min: -1000, max: 1000 }), fc.nat(500), (s, min, span) => {
        const value = new SeededRandom(s).randint(min, min + span);
        expect(value).toBeGreaterThanOrEqual(min);
        expect(value).toBeLessThanOrEqual(min + span);
      }),
      { numRuns: 200 },
    );
  });

  it('shuffles into a permutation', () => {
    fc.assert(
      fc.property(seed, fc.array(fc.integer(), { maxLength: 30 }), (s, items) => {
        const shuffled = new SeededRandom(s).shuffle(items);
        expect([...shuffled].sort((x, y) => x - y)).toEqual([...items].sort((x, y) => x - y));
      }),
      { numRuns: 100 },
    );
  });
});

describe('Property: mergeDataset', () => {
  it('keeps keys only the target has and lets the patch win on flat values', () => {
    fc.assert(
      fc.property(flatObject, flatObject, (initial, other) => {
        const merged = mergeDataset(structuredClone(initial), other);
        for (const [k, v] of Object.entries(other)) {
          expect(merged[k]).toEqual(v);
        }
        for (const [k, v] of Object.entries(initial)) {
          if (!Object.hasOwn(other, k)) expect(merged[k]).toEqual(v);
        }
      }),
      { numRuns: 200 },
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(nestedObject, nestedObject, (initial, other) => {
        const once = mergeDataset(structuredClone(initial), other);
        const twice = mergeDataset(structuredClone(once), other);
        expect(twice).toEqual(once);
      }),
      { numRuns: 200 },
    );
  });

  it('leaves the patch untouched', () => {
    fc.assert(
      fc.property(nestedObject, nestedObject, (initial, other) => {
        const before = structuredClone(other);
        mergeDataset(structuredClone(initial), other);
        expect(other).toEqual(before);
      }),
      { numRuns: 100 },
    );
  });
});

describe('Property: validateLocale', () => {
  it('accepts every supported tag in any case and with underscores', () => {
    fc.assert(
      fc.property(fc.constantFrom(...LOCALES), fc.boolean(), (locale, upper) => {
        const written = locale.replace('-', '_');
        expect(validateLocale(upper ? written.toUpperCase() : written)).toBe(locale);
      }),
    );
  });
});
