import { TypeConversionError } from "../errors";

export type ValueKind =
  | "string"
  | "int"
  | "long"
  | "float"
  | "double"
  | "decimal"
  | "bool"
  | "enum"
  | "nullable";

/**
 * Descriptor of the value an option or argument carries.
 *
 * Descriptors form a closed family built by {@link Types}; `parse` throws
 * {@link TypeConversionError} when the raw token does not fit.
 */
export interface ValueType<T> {
  readonly kind: ValueKind;
  /** Display name used by help output, e.g. `int` or an enum's name. */
  readonly name: string;
  /** Value returned when nothing was supplied and no default is declared. */
  readonly zero: T;
  /** Wrapped type of a nullable descriptor. */
  readonly inner?: ValueType<unknown>;
  parse(raw: string): T;
}

interface PrimitiveOutputs {
  string: string;
  int: number;
  long: bigint;
  float: number;
  double: number;
  decimal: number;
  bool: boolean;
}

type PrimitiveKind = keyof PrimitiveOutputs;

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

const TRUE_WORDS = new Set(["", "1", "yes", "on"]);

function parseBool(raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  // flag-presence fallback, never an error
  return TRUE_WORDS.has(normalized);
}

function parseInt32(raw: string): number {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new TypeConversionError(raw, "int");
  }
  const value = Number(text);
  if (value < INT_MIN || value > INT_MAX) {
    throw new TypeConversionError(raw, "int", "value is out of range");
  }
  // no signed zero for integers
  return value === 0 ? 0 : value;
}

function parseInt64(raw: string): bigint {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new TypeConversionError(raw, "long");
  }
  const value = BigInt(text);
  if (value < LONG_MIN || value > LONG_MAX) {
    throw new TypeConversionError(raw, "long", "value is out of range");
  }
  return value;
}

function parseInvariantNumber(raw: string, target: string, pattern: RegExp): number {
  const text = raw.trim();
  if (!pattern.test(text)) {
    throw new TypeConversionError(raw, target);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new TypeConversionError(raw, target, "value is out of range");
  }
  return value;
}

const PARSERS: { [K in PrimitiveKind]: (raw: string) => PrimitiveOutputs[K] } = {
  string: (raw) => raw,
  int: parseInt32,
  long: parseInt64,
  float: (raw) => Math.fround(parseInvariantNumber(raw, "float", FLOAT_PATTERN)),
  double: (raw) => parseInvariantNumber(raw, "double", FLOAT_PATTERN),
  decimal: (raw) => parseInvariantNumber(raw, "decimal", DECIMAL_PATTERN),
  bool: parseBool,
};

function primitive<K extends PrimitiveKind>(kind: K, zero: PrimitiveOutputs[K]): ValueType<PrimitiveOutputs[K]> {
  const parser = PARSERS[kind];
  return {
    kind,
    name: kind,
    zero,
    parse: (raw) => parser(raw),
  };
}

function isNumericKey(key: string): boolean {
  return key.trim() !== "" && !Number.isNaN(Number(key));
}

function enumeration<E extends string | number>(
  name: string,
  members: Readonly<Record<string, E>>,
): ValueType<E> {
  // numeric enums carry reverse mappings (0 -> "Red"); skip them
  const entries = Object.entries(members).filter(([key]) => !isNumericKey(key));
  const first = entries[0];
  if (!first) {
    throw new TypeError(`Enumeration '${name}' has no members`);
  }

  return {
    kind: "enum",
    name,
    zero: first[1],
    parse(raw) {
      const wanted = raw.trim().toLowerCase();
      const byName = entries.find(([key]) => key.toLowerCase() === wanted);
      if (byName) {
        return byName[1];
      }
      const byValue = entries.find(([, value]) => String(value) === raw.trim());
      if (byValue) {
        return byValue[1];
      }
      throw new TypeConversionError(
        raw,
        name,
        `expected one of ${entries.map(([key]) => key).join(", ")}`,
      );
    },
  };
}

function nullable<T>(inner: ValueType<T>): ValueType<T | null> {
  return {
    kind: "nullable",
    name: inner.name,
    zero: null,
    inner,
    parse: (raw) => inner.parse(raw),
  };
}

/**
 * Built-in value types.
 *
 * Numbers parse in an invariant format: `.` is the decimal point and no
 * thousands separator is accepted, so `"1,000.5"` is rejected.
 */
export const Types = {
  string: primitive("string", ""),
  int: primitive("int", 0),
  long: primitive("long", 0n),
  float: primitive("float", 0),
  double: primitive("double", 0),
  decimal: primitive("decimal", 0),
  bool: primitive("bool", false),
  enumeration,
  nullable,
} as const;

/** Boolean options and arguments treat bare presence as `true`. */
export function isBooleanType(type: ValueType<unknown>): boolean {
  if (type.kind === "nullable" && type.inner) {
    return isBooleanType(type.inner);
  }
  return type.kind === "bool";
}
