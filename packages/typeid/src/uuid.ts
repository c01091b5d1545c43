/**
 * @akton/typeid — UUID string rendering.
 *
 * Converts between 16-byte values and the canonical 8-4-4-4-12 hex form.
 * Output is always lowercase.
 */

import { TypeIdError } from "./types.js";
import { VALUE_BYTES } from "./base32.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const CANONICAL_UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/** The all-zero UUID. */
export const NIL_UUID = "00000000-0000-0000-0000-000000000000";

export function isUuid(value: unknown): value is string {
  return typeof value === "string" && UUID_PATTERN.test(value);
}

/** Lowercase 8-4-4-4-12 only, the form `bytesToUuid` produces. */
export function isCanonicalUuid(value: unknown): value is string {
  return typeof value === "string" && CANONICAL_UUID_PATTERN.test(value);
}

/**
 * Parse a UUID string into 16 bytes.
 *
 * @throws {TypeIdError} INVALID_UUID if the string is not 8-4-4-4-12 hex
 */
export function uuidToBytes(uuid: string): Uint8Array {
  if (!UUID_PATTERN.test(uuid)) {
    throw new TypeIdError("INVALID_UUID", `Invalid UUID: "${uuid}"`, uuid);
  }

  const hex = uuid.replace(/-/g, "");
  const bytes = new Uint8Array(VALUE_BYTES);
  for (let i = 0; i < VALUE_BYTES; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function bytesToUuid(bytes: Uint8Array): string {
  if (bytes.length !== VALUE_BYTES) {
    throw new TypeIdError(
      "INVALID_UUID",
      `Expected ${String(VALUE_BYTES)} bytes, got ${String(bytes.length)}`,
      String(bytes.length),
    );
  }

  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}
