import { InvalidArgumentError } from '@fabricate/core';

/**
 * Luhn check digit for a string of digits.
 *
 * @example
 * ```ts
 * luhnChecksum('7992739871'); // '3'
 * ```
 */
export function luhnChecksum(digits: string): string {
  if (!/^\d+$/.test(digits)) {
    throw new InvalidArgumentError('digits', `Luhn input must be digits only, got "${digits}".`);
  }
  let check = 0;
  const reversed = [...digits].reverse();
  for (let i = 0; i < reversed.length; i++) {
    let d = Number(reversed[i]);
    if (i % 2 === 0) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    check += d;
  }
  return String((check * 9) % 10);
}
