// ============================================================================
// @fabricate/core — Enum Coercion
// ============================================================================
//
// Generator methods take an optional "enum-ish" argument: nothing (pick one
// at random), a member value, or a member name typed by hand. coerceEnum()
// turns all three into the member value so generators never see the input
// shape.
// ============================================================================

import { EnumResolutionError } from './errors.js';
import type { SeededRandom } from './random.js';

/** A named, closed set of members. */
export interface EnumDefinition<M extends Record<string, unknown>> {
  readonly name: string;
  readonly members: Readonly<M>;
  readonly entries: readonly (readonly [string, M[keyof M]])[];
  readonly values: readonly M[keyof M][];
}

/** What callers may pass where an enum value is expected. */
export type EnumInput<M extends Record<string, unknown>> = M[keyof M] | string | null | undefined;

export type EnumValue<E> =
  E extends EnumDefinition<infer M extends Record<string, unknown>> ? M[keyof M] : never;

/** `EnumInput` of a defined enum: `fmt?: EnumInputOf<typeof ISBNFormat>`. */
export type EnumInputOf<E> =
  E extends EnumDefinition<infer M extends Record<string, unknown>> ? EnumInput<M> : never;

type EnumItem<V> =
  | { kind: 'absent' }
  | { kind: 'member'; value: V }
  | { kind: 'name'; name: string }
  | { kind: 'invalid'; value: unknown };

/**
 * Define an enum from a members object.
 *
 * @example
 * ```ts
 * const Gender = defineEnum('Gender', { MALE: 'male', FEMALE: 'female' } as const);
 * ```
 */
export function defineEnum<M extends Record<string, unknown>>(
  name: string,
  members: M,
): EnumDefinition<M> {
  const entries: (readonly [string, M[keyof M]])[] = [];
  for (const key in members) {
    if (Object.hasOwn(members, key)) entries.push([key, members[key]]);
  }
  return Object.freeze({
    name,
    members: Object.freeze({ ...members }),
    entries: Object.freeze(entries),
    values: Object.freeze(entries.map(([, value]) => value)),
  });
}

/** JS callers can hand in anything; a usable enum has a name and members. */
function isEnumerable(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  if (!('entries' in value) || !Array.isArray(value.entries)) return false;
  return value.entries.length > 0;
}

function classify<M extends Record<string, unknown>>(
  item: unknown,
  enumDef: EnumDefinition<M>,
): EnumItem<M[keyof M]> {
  if (item === null || item === undefined) return { kind: 'absent' };
  const index = enumDef.values.findIndex((v) => v === item);
  if (index !== -1) return { kind: 'member', value: enumDef.values[index] };
  if (typeof item === 'string') return { kind: 'name', name: item };
  return { kind: 'invalid', value: item };
}

/**
 * Resolve `item` against `enumDef` and return the member value.
 *
 * - `null`/`undefined` → a uniformly random value
 * - a member value → that value
 * - a member name, any case → that member's value
 *
 * @throws {EnumResolutionError} For anything else, or when `enumDef` has no members
 */
export function coerceEnum<M extends Record<string, unknown>>(
  item: EnumInput<M>,
  enumDef: EnumDefinition<M>,
  random: SeededRandom,
): M[keyof M] {
  if (!isEnumerable(enumDef)) {
    throw new EnumResolutionError(item, describeEnum(enumDef));
  }

  const resolved = classify(item, enumDef);
  switch (resolved.kind) {
    case 'absent':
      return random.choice(enumDef.values);
    case 'member':
      return resolved.value;
    case 'name': {
      const wanted = resolved.name.toUpperCase();
      const entry = enumDef.entries.find(([key]) => key.toUpperCase() === wanted);
      if (entry) return entry[1];
      throw new EnumResolutionError(resolved.name, enumDef.name, memberNames(enumDef));
    }
    case 'invalid':
      throw new EnumResolutionError(resolved.value, enumDef.name, memberNames(enumDef));
  }
}

function memberNames<M extends Record<string, unknown>>(enumDef: EnumDefinition<M>): string[] {
  return enumDef.entries.map(([key]) => key);
}

function describeEnum(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'name' in value) {
    return String(value.name);
  }
  return String(value);
}
