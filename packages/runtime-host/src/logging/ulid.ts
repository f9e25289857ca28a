/**
 * Rigger Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of every journal entry.
 *
 *   01JDKPF8X7 M4VQN3BGHST6RWYZ
 *   |--------| |--------------|
 *   48-bit ms  80-bit random
 *   timestamp
 *
 * 26 characters of Crockford Base32 (no I, L, O, U). Within one millisecond
 * the generator is monotonic: the random part of the previous id is
 * incremented, so ids sort in the order they were generated. The journal
 * reader relies on this to break timestamp ties.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const RANDOM_MASK = (1n << 80n) - 1n;

let lastTime = -1;
let lastRandom = 0n;

/** Encode `value` as exactly `length` Crockford characters, zero-padded left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param nowMs - Timestamp component; defaults to Date.now()
 */
export function ulid(nowMs: number = Date.now()): string {
  let random: bigint;
  if (nowMs === lastTime) {
    random = (lastRandom + 1n) & RANDOM_MASK;
  } else {
    random = 0n;
    for (const byte of randomBytes(RANDOM_BYTES)) {
      random = (random << 8n) | BigInt(byte);
    }
  }
  lastTime = nowMs;
  lastRandom = random;
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}

/** Decode the millisecond timestamp of a ULID; `undefined` if malformed. */
export function ulidTime(id: string): number | undefined {
  if (id.length !== TIME_CHARS + RANDOM_CHARS) return undefined;
  let value = 0;
  for (const char of id.slice(0, TIME_CHARS).toUpperCase()) {
    const digit = CROCKFORD_ALPHABET.indexOf(char);
    if (digit === -1) return undefined;
    value = value * 32 + digit;
  }
  return value;
}
