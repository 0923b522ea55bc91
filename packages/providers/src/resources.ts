// ============================================================================
// @fabricate/providers — Resource Shape Checks
// ============================================================================
//
// Datasets and global resources arrive as untyped JSON. These helpers narrow
// them to what a generator expects, naming the offending resource otherwise.
// ============================================================================

import { DatasetFormatError, type JsonValue, isJsonObject } from '@fabricate/core';

export function stringList(value: JsonValue | undefined, where: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new DatasetFormatError(where, 'expected a non-empty list of strings');
  }
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new DatasetFormatError(where, 'expected a non-empty list of strings');
    }
    out.push(item);
  }
  return out;
}

export function stringMap(value: JsonValue | undefined, where: string): Record<string, string> {
  if (!isJsonObject(value)) {
    throw new DatasetFormatError(where, 'expected an object of strings');
  }
  const out: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw new DatasetFormatError(where, `expected a string under "${key}"`);
    }
    out[key] = item;
  }
  return out;
}

/** `value[key]`, or undefined when `value` is not an object. */
export function field(value: JsonValue | undefined, key: string): JsonValue | undefined {
  return isJsonObject(value) ? value[key] : undefined;
}
