import type { ValueType } from "./value-types";

export type ConversionResult<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Convert a raw token into the requested type.
 * Throws TypeConversionError when the token cannot be parsed.
 */
export function convert<T>(raw: string, type: ValueType<T>): T {
  return type.parse(raw);
}

export function tryConvert<T>(raw: string, type: ValueType<T>): ConversionResult<T> {
  try {
    return { ok: true, value: type.parse(raw) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Convert a declared (type-erased) default value.
 * `undefined` and `null` mean "no default"; values that no longer parse are ignored.
 */
export function convertDefault<T>(value: unknown, type: ValueType<T>): ConversionResult<T> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return tryConvert(String(value), type);
}
