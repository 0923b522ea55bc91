// ============================================================================
// @fabricate/core — Error Types
// ============================================================================

/**
 * Base error class for all fabricate errors.
 */
export class FabricateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FabricateError';
  }
}

// ---------------------------------------------------------------------------
// Setup Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a required construction parameter is missing.
 */
export class ConfigurationError extends FabricateError {
  public readonly parameter: string;

  constructor(parameter: string, message = `The ${parameter} parameter is required.`) {
    super(message);
    this.name = 'ConfigurationError';
    this.parameter = parameter;
  }
}

/**
 * Thrown when an operation runs before the state it needs exists.
 */
export class IllegalStateError extends FabricateError {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

/**
 * Thrown when a locale override fails and reinstating the previous locale
 * fails as well. `cause` is the override's own error.
 */
export class LocaleRestoreError extends FabricateError {
  public readonly locale: string;
  public readonly restoreError: unknown;

  constructor(locale: string, restoreError: unknown, cause: unknown) {
    super(`Failed to restore locale "${locale}" after an error in the override.`, { cause });
    this.name = 'LocaleRestoreError';
    this.locale = locale;
    this.restoreError = restoreError;
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a value has the wrong type or shape.
 */
export class TypeMismatchError extends FabricateError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, value: unknown) {
    const actual = describeType(value);
    super(`Expected ${expected}, got ${actual}.`);
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when an argument has the right type but an unusable value.
 */
export class InvalidArgumentError extends FabricateError {
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * Thrown when a locale tag is not in the supported set.
 */
export class UnsupportedLocaleError extends FabricateError {
  public readonly locale: unknown;

  constructor(locale: unknown) {
    super(
      typeof locale === 'string'
        ? `Locale "${locale}" is not supported.`
        : `Locale must be a string, got ${describeType(locale)}.`,
    );
    this.name = 'UnsupportedLocaleError';
    this.locale = locale;
  }
}

/**
 * Thrown when an item cannot be resolved against an enum.
 */
export class EnumResolutionError extends FabricateError {
  public readonly value: unknown;
  public readonly enumName: string;

  constructor(value: unknown, enumName: string, allowed: readonly string[] = []) {
    const shown = typeof value === 'string' ? `"${value}"` : describeType(value);
    const hint = allowed.length > 0 ? ` Allowed: ${allowed.join(', ')}.` : '';
    super(`${shown} not found in ${enumName}.${hint}`);
    this.name = 'EnumResolutionError';
    this.value = value;
    this.enumName = enumName;
  }
}

// ---------------------------------------------------------------------------
// Dataset Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when no dataset file exists for a locale (nor for its base locale).
 */
export class DatasetNotFoundError extends FabricateError {
  public readonly path: string;

  constructor(path: string) {
    super(`Dataset not found: ${path}`);
    this.name = 'DatasetNotFoundError';
    this.path = path;
  }
}

/**
 * Thrown when a dataset file is not a JSON object.
 */
export class DatasetFormatError extends FabricateError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid dataset ${path}: ${reason}`);
    this.name = 'DatasetFormatError';
    this.path = path;
  }
}

/** Short type label used in error messages. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (typeof value === 'object') {
    const ctor = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name && ctor.name !== 'Object' ? ctor.name : 'object';
  }
  return typeof value;
}
