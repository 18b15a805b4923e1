/**
 * Holdback Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifiers, used as
 * `event_id` in JSONL logs so a log merged from several copies can be
 * deduplicated on read.
 *
 *   10 chars  48-bit millisecond timestamp
 *   16 chars  80-bit random component
 *
 * Generators are monotonic: within one millisecond, or when the clock steps
 * backwards, the previous random component is incremented instead of drawn
 * again, so ids from one generator always sort in creation order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const MAX_RANDOM = (1n << 80n) - 1n;

export type UlidGenerator = () => string;

export interface UlidSources {
  /** Milliseconds since the epoch. */
  readonly now?: () => number;
  /** `size` random bytes. */
  readonly random?: (size: number) => Uint8Array;
}

/** Zero-padded Crockford Base32 of exactly `length` characters. */
export function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

export function createUlidGenerator(sources: UlidSources = {}): UlidGenerator {
  const now = sources.now ?? Date.now;
  const random = sources.random ?? ((size: number) => randomBytes(size));

  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time <= lastTime) {
      // Overflow of 2^80 ids in one millisecond wraps to zero.
      lastRandom = lastRandom === MAX_RANDOM ? 0n : lastRandom + 1n;
    } else {
      lastTime = time;
      lastRandom = 0n;
      for (const byte of random(RANDOM_BYTES)) {
        lastRandom = (lastRandom << 8n) | BigInt(byte);
      }
    }
    return encodeCrockford(BigInt(lastTime), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide generator. */
export const ulid: UlidGenerator = createUlidGenerator();
