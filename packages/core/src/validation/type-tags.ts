/**
 * Classguard Core: Built-in Type Tags
 *
 * Type constraints for host values. Each tag pairs a membership test with
 * an optional single-step coercion. A coercer throws when the value cannot
 * be converted; the validation engine turns that into an InvalidValueError.
 */

import type { TypeConstraint } from '../types/member.js';

/** Constructor of a host object type, e.g. Map or a plain ES class. */
export type HostConstructor = abstract new (...args: never[]) => object;

function tag(
  typeName: string,
  matches: (value: unknown) => boolean,
  coerce?: (value: unknown) => unknown,
): TypeConstraint {
  return coerce === undefined
    ? Object.freeze({ typeName, matches })
    : Object.freeze({ typeName, matches, coerce });
}

function toNumber(value: unknown): number {
  const convertible =
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    (typeof value === 'string' && value.trim() !== '');
  const n = convertible ? Number(value) : Number.NaN;
  if (Number.isNaN(n)) {
    throw new TypeError(`cannot convert ${describe(value)} to number`);
  }
  return n;
}

function describe(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : typeof value;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function isPlainObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The built-in type tags.
 *
 * Coercion rules:
 *   number   Number(value) for numbers, booleans, bigints, non-blank strings; NaN fails
 *   integer  Number(value); non-integers fail
 *   string   String(value)
 *   boolean  Boolean(value)
 *   bigint   BigInt(value); BigInt's own errors fail
 *   date     new Date(value); invalid dates fail
 *   array    Array.from(value) for iterables; other values fail
 *   symbol, function, object: never coerced
 */
export const Types = {
  string: tag(
    'string',
    (v) => typeof v === 'string',
    (v) => String(v),
  ),
  number: tag('number', (v) => typeof v === 'number', toNumber),
  integer: tag(
    'integer',
    (v) => typeof v === 'number' && Number.isInteger(v),
    (v) => {
      const n = toNumber(v);
      if (!Number.isInteger(n)) throw new TypeError(`${describe(v)} is not an integer`);
      return n;
    },
  ),
  boolean: tag('boolean', (v) => typeof v === 'boolean', (v) => Boolean(v)),
  bigint: tag('bigint', (v) => typeof v === 'bigint', (v) => {
    if (typeof v === 'bigint' || typeof v === 'boolean' || typeof v === 'number' || typeof v === 'string') {
      return BigInt(v);
    }
    throw new TypeError(`cannot convert ${typeof v} to bigint`);
  }),
  symbol: tag('symbol', (v) => typeof v === 'symbol'),
  function: tag('function', (v) => typeof v === 'function'),
  object: tag('object', isPlainObject),
  array: tag('array', (v) => Array.isArray(v), (v) => {
    if (typeof v === 'string' || isIterable(v)) {
      return Array.from(v);
    }
    throw new TypeError(`${typeof v} is not iterable`);
  }),
  date: tag('date', (v) => v instanceof Date && !Number.isNaN(v.getTime()), (v) => {
    if (typeof v !== 'string' && typeof v !== 'number') {
      throw new TypeError(`cannot convert ${typeof v} to date`);
    }
    const d = new Date(v);
    if (Number.isNaN(d.getTime())) throw new TypeError(`invalid date: ${describe(v)}`);
    return d;
  }),

  /**
   * Tag for instances of a host constructor. Never coerces: constructing
   * an arbitrary class from an arbitrary value is not a conversion.
   */
  instanceOf(ctor: HostConstructor): TypeConstraint {
    return tag(ctor.name, (v) => v instanceof ctor);
  },
} as const;
