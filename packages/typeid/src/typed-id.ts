/**
 * @akton/typeid — Typed identifier codec.
 *
 * String form: `<tag>_<suffix>`
 * - tag: lowercase letter, then lowercase letters or digits, at most 63
 * - suffix: 26-character base32 rendering of the 128-bit value
 *
 * Rules:
 * - Parsed and generated identifiers are frozen
 * - Fail-closed: invalid input throws TypeIdError, never repaired
 */

import type { RandomSource, TypedId } from "./types.js";
import { TypeIdError } from "./types.js";
import { decodeBase32, encodeBase32, VALUE_BYTES } from "./base32.js";
import { bytesToUuid, isCanonicalUuid, uuidToBytes } from "./uuid.js";
import { defaultRandomSource, drawRandomBytes } from "./random.js";

// ─── Constants ───────────────────────────────────────────────────────────

export const TAG_SEPARATOR = "_";

export const MAX_TAG_LENGTH = 63;

const TAG_PATTERN = /^[a-z][a-z0-9]*$/;

// ─── Validation ──────────────────────────────────────────────────────────

export function isValidTag(tag: string): boolean {
  return tag.length <= MAX_TAG_LENGTH && TAG_PATTERN.test(tag);
}

/**
 * @throws {TypeIdError} INVALID_TAG
 */
export function validateTag(tag: string): void {
  if (tag === "") {
    throw new TypeIdError("INVALID_TAG", "Type tag cannot be empty", tag);
  }
  if (tag.length > MAX_TAG_LENGTH) {
    throw new TypeIdError(
      "INVALID_TAG",
      `Type tag "${tag}" exceeds ${String(MAX_TAG_LENGTH)} characters`,
      tag,
    );
  }
  if (!TAG_PATTERN.test(tag)) {
    throw new TypeIdError(
      "INVALID_TAG",
      `Type tag "${tag}" must start with a lowercase letter and contain only lowercase letters and digits`,
      tag,
    );
  }
}

// ─── Construction ────────────────────────────────────────────────────────

function freezeId(tag: string, bytes: Uint8Array): TypedId {
  return Object.freeze({ tag, uuid: bytesToUuid(bytes) });
}

/**
 * Build a TypedId from a tag and an existing UUID.
 *
 * Uppercase UUID input is accepted; the stored form is lowercase.
 */
export function typedIdFromUuid(tag: string, uuid: string): TypedId {
  validateTag(tag);
  return freezeId(tag, uuidToBytes(uuid));
}

/**
 * Mint a new identifier with a random version-4 value.
 *
 * This is the only place new identifier values come from.
 *
 * @throws {TypeIdError} INVALID_TAG, or GENERATION_FAILED if the random
 *   source is unavailable
 */
export function generateTypedId(tag: string, random: RandomSource = defaultRandomSource): TypedId {
  validateTag(tag);
  const bytes = drawRandomBytes(VALUE_BYTES, random);
  // RFC 4122: version 4, variant 10xx
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x40;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;
  return freezeId(tag, bytes);
}

// ─── String Codec ────────────────────────────────────────────────────────

/** The 26-character suffix for an identifier's value. */
export function typedIdSuffix(id: TypedId): string {
  return encodeBase32(uuidToBytes(id.uuid));
}

/**
 * Render an identifier in its canonical string form.
 *
 * { tag: "usr", uuid: "01890a5d-ac96-774b-bcce-b302099a8057" }
 *   → "usr_01h455vb4pex5vsknk084sn02q"
 */
export function formatTypedId(id: TypedId): string {
  return `${id.tag}${TAG_SEPARATOR}${typedIdSuffix(id)}`;
}

/**
 * Parse `<tag>_<suffix>`. Splits on the last separator.
 *
 * @throws {TypeIdError} MALFORMED_TYPEID, INVALID_TAG or INVALID_SUFFIX
 */
export function parseTypedId(input: string): TypedId {
  const at = input.lastIndexOf(TAG_SEPARATOR);
  if (at === -1) {
    throw new TypeIdError(
      "MALFORMED_TYPEID",
      `Identifier "${input}" is missing the "${TAG_SEPARATOR}" separator`,
      input,
    );
  }

  const tag = input.slice(0, at);
  const suffix = input.slice(at + 1);

  try {
    validateTag(tag);
    return freezeId(tag, decodeBase32(suffix));
  } catch (err) {
    if (err instanceof TypeIdError) {
      throw new TypeIdError(err.code, `Invalid identifier "${input}": ${err.message}`, input, {
        cause: err,
      });
    }
    throw err;
  }
}

// ─── Comparison / Guards ─────────────────────────────────────────────────

export function typedIdEquals(a: TypedId, b: TypedId): boolean {
  return a.tag === b.tag && a.uuid === b.uuid;
}

export function isTypedId(value: unknown): value is TypedId {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.tag === "string" &&
    isValidTag(v.tag) &&
    isCanonicalUuid(v.uuid)
  );
}
