/**
 * Promote Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of cryptographic randomness. Used as
 * `event_id` in promotions.jsonl, where it is the dedupe key when log files
 * from several machines are concatenated.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Base32 characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID for `timeMs` (default: now).
 *
 * The random part is not incremented within a millisecond, so ids created in
 * the same millisecond are unique but not ordered among themselves.
 */
export function ulid(timeMs: number = Date.now()): string {
  const random = BigInt(`0x${randomBytes(10).toString('hex')}`);
  return encodeCrockford(BigInt(timeMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
