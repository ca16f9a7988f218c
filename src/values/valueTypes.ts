import { ConversionFailure } from '../errors';

export type ConvertFn<T> = (text: string) => T;

/**
 * Describes how tokens become values of type T.
 *
 * Conversion is resolved in three tiers:
 * 1. `fromString`: a conversion written for this type;
 * 2. `construct`: a constructor taking the token text;
 * 3. neither: the token is dropped with an "assignment is not implemented" warning.
 *
 * Whatever the first two tiers throw is reported as a {@link ConversionFailure}.
 */
export type ValueType<T> = {
  name: string;
  /** Zero state the bound variable is reset to before every parse. */
  empty: () => T;
  fromString?: ConvertFn<T>;
  construct?: new (text: string) => T;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'n', 'off']);

const DECIMAL_INT = /^[+-]?\d+$/;
const HEX_INT = /^([+-]?)0x([0-9a-f]+)$/i;

export function parseInteger(text: string): number {
  const s = text.trim();
  let n: number;
  if (DECIMAL_INT.test(s)) {
    n = Number(s);
  } else {
    const hex = HEX_INT.exec(s);
    if (!hex) throw new ConversionFailure(text, 'integer');
    n = parseInt(hex[2], 16) * (hex[1] === '-' ? -1 : 1);
  }
  if (!Number.isSafeInteger(n)) throw new ConversionFailure(text, 'integer');
  return n;
}

export function parseFloatValue(text: string): number {
  const s = text.trim();
  // Number('') is 0.
  if (s === '') throw new ConversionFailure(text, 'number');
  const n = Number(s);
  if (!Number.isFinite(n)) throw new ConversionFailure(text, 'number');
  return n;
}

export function parseBoolean(text: string): boolean {
  const s = text.trim().toLowerCase();
  if (TRUE_VALUES.has(s)) return true;
  if (FALSE_VALUES.has(s)) return false;
  throw new ConversionFailure(text, 'boolean');
}

export const integer: ValueType<number> = { name: 'integer', empty: () => 0, fromString: parseInteger };

export const float: ValueType<number> = { name: 'float', empty: () => 0, fromString: parseFloatValue };

export const string: ValueType<string> = { name: 'string', empty: () => '', fromString: (text) => text };

export const boolean: ValueType<boolean> = { name: 'boolean', empty: () => false, fromString: parseBoolean };

/** A user type built from the token text by its constructor. */
export function constructible<T>(name: string, ctor: new (text: string) => T, empty: () => T): ValueType<T> {
  return { name, empty, construct: ctor };
}

/** A type the parser can hold and reset but not convert into; only actions and defaults can set it. */
export function opaque<T>(name: string, empty: () => T): ValueType<T> {
  return { name, empty };
}

export function resolveConversion<T>(type: ValueType<T>): ConvertFn<T> | undefined {
  const fromString = type.fromString;
  if (fromString) return guarded(type.name, fromString);
  const ctor = type.construct;
  if (ctor) return guarded(type.name, (text) => new ctor(text));
  return undefined;
}

// Converters (BigInt, JSON.parse, URL, Date wrappers, ...) reject bad text by throwing.
function guarded<T>(typeName: string, convert: ConvertFn<T>): ConvertFn<T> {
  return (text) => {
    try {
      return convert(text);
    } catch (e: unknown) {
      if (e instanceof ConversionFailure) throw e;
      throw new ConversionFailure(text, typeName);
    }
  };
}
