/**
 * Strata Runtime Host: ULID Generator
 *
 * 26 characters of Crockford Base32: a 48-bit millisecond timestamp (10
 * chars) followed by 80 random bits (16 chars). Ids sort by creation time.
 *
 * Used as the event_id of diagnostic log lines and as the default run id.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Excludes I, L, O and U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

/** Largest timestamp that fits in 48 bits. */
const MAX_TIME = 2 ** 48 - 1;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = (CROCKFORD_ALPHABET[Number(v & 0x1fn)] ?? '0') + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param time - Milliseconds since the epoch; defaults to now
 * @param entropy - Ten random bytes; defaults to `crypto.randomBytes`
 *
 * @example
 * ulid(0, new Uint8Array(10)); // '00000000000000000000000000'
 */
export function ulid(time: number = Date.now(), entropy: Uint8Array = randomBytes(RANDOM_BYTES)): string {
  if (!Number.isInteger(time) || time < 0 || time > MAX_TIME) {
    throw new RangeError(`ULID time must be an integer between 0 and ${MAX_TIME}, got ${time}`);
  }
  if (entropy.length !== RANDOM_BYTES) {
    throw new RangeError(`ULID entropy must be ${RANDOM_BYTES} bytes, got ${entropy.length}`);
  }
  let random = 0n;
  for (const byte of entropy) random = (random << 8n) | BigInt(byte);
  return encodeCrockford(BigInt(time), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}

/** The millisecond timestamp encoded in a ULID, or undefined if it is not one. */
export function ulidTime(id: string): number | undefined {
  if (!/^[0-9A-HJKMNP-TV-Z]{26}$/.test(id)) return undefined;
  let time = 0;
  for (const ch of id.slice(0, TIME_CHARS)) time = time * 32 + CROCKFORD_ALPHABET.indexOf(ch);
  return time <= MAX_TIME ? time : undefined;
}
