/**
 * @fileoverview Helper utilities for error inspection and normalization.
 * @module src/utils/internal/error-handler/helpers
 */

/**
 * Creates a case-insensitive, non-global RegExp for testing error messages.
 */
export function createSafeRegex(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    let flags = pattern.flags.replace('g', '');
    if (!flags.includes('i')) {
      flags += 'i';
    }
    return new RegExp(pattern.source, flags);
  }
  return new RegExp(pattern, 'i');
}

function constructorName(value: object): string | undefined {
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return undefined;
}

/**
 * Retrieves a descriptive name for an error object or value.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  if (error === null) {
    return 'NullValueEncountered';
  }
  if (error === undefined) {
    return 'UndefinedValueEncountered';
  }
  if (typeof error === 'object') {
    const name = constructorName(error);
    if (name && name !== 'Object') {
      return `${name}Encountered`;
    }
  }
  return `${typeof error}Encountered`;
}

/**
 * Extracts a message string from an error object or value.
 */
export function getErrorMessage(error: unknown): string {
  try {
    if (error instanceof AggregateError) {
      const errors: unknown[] = Array.isArray(error.errors) ? error.errors : [];
      const inner = errors
        .map((e) => (e instanceof Error ? e.message : String(e)))
        .filter(Boolean)
        .slice(0, 3)
        .join('; ');
      return inner ? `${error.message}: ${inner}` : error.message;
    }
    if (error instanceof Error) {
      return error.message;
    }
    if (error === null) {
      return 'Null value encountered as error';
    }
    if (error === undefined) {
      return 'Undefined value encountered as error';
    }
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'number' || typeof error === 'boolean') {
      return String(error);
    }
    if (typeof error === 'bigint') {
      return error.toString();
    }
    if (typeof error === 'function') {
      return `[function ${error.name || 'anonymous'}]`;
    }
    if (typeof error === 'symbol') {
      return error.toString();
    }
    const fallback = `Non-Error object encountered (constructor: ${constructorName(error) ?? 'Object'})`;
    try {
      const json = JSON.stringify(error);
      return json && json !== '{}' ? json : fallback;
    } catch (stringifyError) {
      return stringifyError instanceof Error
        ? `${fallback}: ${stringifyError.message}`
        : fallback;
    }
  } catch (conversionError) {
    return `Error converting error to string: ${conversionError instanceof Error ? conversionError.message : 'Unknown conversion error'}`;
  }
}
