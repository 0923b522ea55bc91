import { InvalidArgumentError } from '@fabricate/core';
import { describe, expect, it } from 'vitest';
import { luhnChecksum } from '../luhn.js';

describe('luhnChecksum', () => {
  it('computes the check digit', () => {
    expect(luhnChecksum('7992739871')).toBe('3');
    expect(luhnChecksum('0')).toBe('0');
    expect(luhnChecksum('5')).toBe('9');
  });

  it('rejects non-digit input', () => {
    expect(() => luhnChecksum('12a4')).toThrow(InvalidArgumentError);
    expect(() => luhnChecksum('')).toThrow(InvalidArgumentError);
  });
});
