import { describe, expect, it } from 'vitest';
import { coerceEnum, defineEnum } from '../enums.js';
import { EnumResolutionError } from '../errors.js';
import { SeededRandom } from '../random.js';

const Color = defineEnum('Color', { RED: 'red', GREEN: 'green', BLUE: 'blue' } as const);
const Unit = defineEnum('Unit', { MASS: ['gram', 'gr'], FORCE: ['newton', 'N'] } as const);

describe('defineEnum', () => {
  it('keeps names, members and values in declaration order', () => {
    expect(Color.name).toBe('Color');
    expect(Color.members.GREEN).toBe('green');
    expect(Color.values).toEqual(['red', 'green', 'blue']);
    expect(Color.entries[0]).toEqual(['RED', 'red']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(Color)).toBe(true);
    expect(Object.isFrozen(Color.members)).toBe(true);
  });
});

describe('coerceEnum', () => {
  const random = new SeededRandom(11);

  describe('absent item', () => {
    it('picks a random value for null and undefined', () => {
      expect(Color.values).toContain(coerceEnum(null, Color, random));
      expect(Color.values).toContain(coerceEnum(undefined, Color, random));
    });

    it('picks the same value for the same seed', () => {
      const a = coerceEnum(null, Color, new SeededRandom(3));
      const b = coerceEnum(null, Color, new SeededRandom(3));
      expect(a).toBe(b);
    });
  });

  describe('member values', () => {
    it('returns a member value unchanged', () => {
      expect(coerceEnum('green', Color, random)).toBe('green');
      expect(coerceEnum(Color.members.BLUE, Color, random)).toBe('blue');
    });

    it('returns non-string members by identity', () => {
      expect(coerceEnum(Unit.members.FORCE, Unit, random)).toBe(Unit.members.FORCE);
    });
  });

  describe('member names', () => {
    it('resolves names case-insensitively', () => {
      expect(coerceEnum('RED', Color, random)).toBe('red');
      expect(coerceEnum('Blue', Color, random)).toBe('blue');
      expect(coerceEnum('mass', Unit, random)).toEqual(['gram', 'gr']);
    });
  });

  describe('errors', () => {
    it('rejects an unknown name with the value and enum name', () => {
      try {
        coerceEnum('purple', Color, random);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(EnumResolutionError);
        if (!(e instanceof EnumResolutionError)) throw e;
        expect(e.value).toBe('purple');
        expect(e.enumName).toBe('Color');
        expect(e.message).toBe('"purple" not found in Color. Allowed: RED, GREEN, BLUE.');
      }
    });

    it('rejects a value of the wrong type', () => {
      expect(() => coerceEnum(['gram', 'gr'], Unit, random)).toThrow(EnumResolutionError);
      expect(() => coerceEnum('kilo', Unit, random)).toThrow(/"kilo" not found in Unit/);
    });

    it('rejects an enum without members', () => {
      const Empty = defineEnum('Empty', {});
      expect(() => coerceEnum(null, Empty, random)).toThrow(EnumResolutionError);
      expect(() => coerceEnum(null, Empty, random)).toThrow(/Empty/);
    });
  });
});
