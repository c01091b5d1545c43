/**
 * @akton/typeid — Typed unique identifiers.
 *
 * A type tag plus a 128-bit value, rendered as `<tag>_<26 base32 chars>`.
 * Generation draws 16 bytes from one substitutable random source and
 * stamps them as a version-4 UUID.
 *
 * @packageDocumentation
 */

// Types
export type { TypedId, RandomSource, TypeIdErrorCode } from "./types.js";
export { TypeIdError } from "./types.js";

// Base32
export {
  BASE32_ALPHABET,
  SUFFIX_LENGTH,
  VALUE_BYTES,
  encodeBase32,
  decodeBase32,
} from "./base32.js";

// UUID rendering
export { NIL_UUID, isUuid, isCanonicalUuid, uuidToBytes, bytesToUuid } from "./uuid.js";

// Random source
export { defaultRandomSource, drawRandomBytes } from "./random.js";

// Identifier codec
export {
  TAG_SEPARATOR,
  MAX_TAG_LENGTH,
  isValidTag,
  validateTag,
  typedIdFromUuid,
  generateTypedId,
  typedIdSuffix,
  formatTypedId,
  parseTypedId,
  typedIdEquals,
  isTypedId,
} from "./typed-id.js";
