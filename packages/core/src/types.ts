// ============================================================================
// @fabricate/core — Type Definitions
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Locale-specific content backing one provider. */
export type Dataset = JsonObject;

/** A step in an `extract()` key path: object key or array index. */
export type PathKey = string | number;

/**
 * Sentinel for "no seed given". Distinct from `null`, which asks for a
 * reseed from entropy.
 */
export const MissingSeed: unique symbol = Symbol('MissingSeed');

export type ConcreteSeed = number | string | Uint8Array;

export type Seed = ConcreteSeed | null | typeof MissingSeed;

export function isConcreteSeed(seed: Seed): seed is ConcreteSeed {
  return seed !== null && seed !== MissingSeed;
}

/**
 * Plain JSON object check. Arrays, class instances and objects holding
 * non-JSON values (functions, Dates, undefined) are rejected.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}
