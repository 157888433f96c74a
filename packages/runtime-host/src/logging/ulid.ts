/**
 * Classguard Runtime Host: ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifiers, used as
 * `event_id` in the decision log so a reader can drop duplicated lines.
 *
 * Format: 26 characters of Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80 random bits
 *
 * Within one millisecond the random part is incremented instead of redrawn,
 * so ids from one generator sort in creation order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32: no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const RANDOM_LIMIT = 1n << 80n;

function encode(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

function toBigInt(bytes: Uint8Array): bigint {
  let v = 0n;
  for (const byte of bytes) {
    v = (v << 8n) | BigInt(byte);
  }
  return v;
}

export interface UlidSources {
  readonly now?: () => number;
  readonly random?: (size: number) => Uint8Array;
}

/**
 * Create a ULID generator. Clock and randomness are injectable for tests.
 *
 * @throws {RangeError} From the generator, if more than 2^80 ids are
 *   requested within one millisecond
 */
export function createUlidGenerator(sources: UlidSources = {}): () => string {
  const now: () => number = sources.now ?? Date.now;
  const random: (size: number) => Uint8Array = sources.random ?? randomBytes;
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time === lastTime) {
      lastRandom += 1n;
      if (lastRandom >= RANDOM_LIMIT) {
        throw new RangeError('ULID random component overflowed within one millisecond');
      }
    } else {
      lastTime = time;
      lastRandom = toBigInt(random(RANDOM_BYTES));
    }
    return encode(BigInt(time), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}

/** Generate a ULID from the wall clock and node:crypto randomness. */
export const ulid: () => string = createUlidGenerator();
