/**
 * @akton/typeid — Crockford base32 for 128-bit values.
 *
 * A 128-bit value is rendered as 26 lowercase characters, most significant
 * first. 26 × 5 = 130 bits, so the value is left-padded with two zero bits
 * and the first character can only be 0-7.
 *
 * Rules:
 * - Lowercase alphabet only, no i, l, o, u
 * - No normalisation of input (uppercase is rejected, not folded)
 */

import { TypeIdError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

export const BASE32_ALPHABET = "0123456789abcdefghjkmnpqrstvwxyz";

/** Length of an encoded suffix. */
export const SUFFIX_LENGTH = 26;

/** Number of bytes in the encoded value. */
export const VALUE_BYTES = 16;

const MAX_VALUE = (1n << 128n) - 1n;

const DECODE_TABLE: ReadonlyMap<string, bigint> = new Map(
  [...BASE32_ALPHABET].map((ch, i) => [ch, BigInt(i)]),
);

// ─── Encode / Decode ─────────────────────────────────────────────────────

/**
 * Encode 16 bytes as a 26-character suffix.
 *
 * [0x01, 0x89, 0x0a, 0x5d, ...] → "01h455vb4pex5vsknk084sn02q"
 */
export function encodeBase32(bytes: Uint8Array): string {
  if (bytes.length !== VALUE_BYTES) {
    throw new TypeIdError(
      "INVALID_UUID",
      `Expected ${String(VALUE_BYTES)} bytes, got ${String(bytes.length)}`,
      String(bytes.length),
    );
  }

  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }

  const chars: string[] = new Array<string>(SUFFIX_LENGTH);
  for (let i = SUFFIX_LENGTH - 1; i >= 0; i--) {
    chars[i] = BASE32_ALPHABET.charAt(Number(value & 31n));
    value >>= 5n;
  }
  return chars.join("");
}

/**
 * Decode a 26-character suffix back into 16 bytes.
 *
 * @throws {TypeIdError} INVALID_SUFFIX on wrong length, a character outside
 *   the alphabet, or a value above 128 bits
 */
export function decodeBase32(suffix: string): Uint8Array {
  if (suffix.length !== SUFFIX_LENGTH) {
    throw new TypeIdError(
      "INVALID_SUFFIX",
      `Suffix must be ${String(SUFFIX_LENGTH)} characters, got ${String(suffix.length)}`,
      suffix,
    );
  }

  let value = 0n;
  for (const ch of suffix) {
    const digit = DECODE_TABLE.get(ch);
    if (digit === undefined) {
      throw new TypeIdError(
        "INVALID_SUFFIX",
        `Invalid character "${ch}" in suffix "${suffix}"`,
        suffix,
      );
    }
    value = (value << 5n) | digit;
  }

  if (value > MAX_VALUE) {
    throw new TypeIdError(
      "INVALID_SUFFIX",
      `Suffix "${suffix}" exceeds 128 bits`,
      suffix,
    );
  }

  const bytes = new Uint8Array(VALUE_BYTES);
  for (let i = VALUE_BYTES - 1; i >= 0; i--) {
    bytes[i] = Number(value & 0xffn);
    value >>= 8n;
  }
  return bytes;
}
