import { Nullable } from './common-types';

// GENERIC FUNCTIONAL

// eslint-disable-next-line no-void
export const noop = (..._args: unknown[]) => void 0;

// NUMBERS

export function isPositiveInteger (n: number): boolean {
  return Number.isSafeInteger(n) && n > 0;
}

// OBJECTS

/**
 * Copy of `source` with all properties that are `undefined` left out,
 * so that spreading it over defaults does not erase them.
 */
function definedPropsOf<T extends object> (source: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key in source) {
    if (source[key] !== undefined) {
      out[key] = source[key];
    }
  }
  return out;
}

/**
 * Constructs a new instance (flat clone) of a T extends object
 * from the defaults object, with a list of Partial<T> sources applied iteratively from left to right
 * (like with `Object.assign`). Properties set to `undefined` in a source
 * do not override what is already there.
 */
export function objectNewFromDefaultAndPartials<T extends object> (defaults: T, ...sources: Nullable<Partial<T>>[]): T {
  let result: T = { ...defaults };
  sources.forEach((source) => {
    if (source != null) {
      result = { ...result, ...definedPropsOf(source) };
    }
  });
  return result;
}

// PRINTING

export function printNumberAsHex (value: number, minDigits: number = 2): string {
  return value.toString(16).padStart(minDigits, '0');
}
