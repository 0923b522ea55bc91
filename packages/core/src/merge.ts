// ============================================================================
// @fabricate/core — Dataset Merge
// ============================================================================

import { TypeMismatchError } from './errors.js';
import { type JsonObject, type JsonValue, isJsonObject } from './types.js';

/**
 * Deep-merge `other` into `initial`, mutating and returning `initial`.
 *
 * When both sides hold an object under the same key, merge recursively.
 * Otherwise the value from `other` wins, whatever the two types are.
 * Arrays are values, not mappings: they are replaced, never concatenated.
 *
 * @throws {TypeMismatchError} If `other` is not a plain JSON object
 */
export function mergeDataset(initial: JsonObject, other: unknown): JsonObject {
  if (!isJsonObject(other)) {
    throw new TypeMismatchError('a plain JSON object', other);
  }
  for (const [key, value] of Object.entries(other)) {
    const current = initial[key];
    if (Object.hasOwn(initial, key) && isJsonObject(current) && isJsonObject(value)) {
      mergeDataset(current, value);
    } else {
      assignEntry(initial, key, value);
    }
  }
  return initial;
}

/**
 * Write `key` as an own data property. Plain assignment would route a
 * `__proto__` key (legal in parsed JSON) to the prototype setter.
 */
export function assignEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
