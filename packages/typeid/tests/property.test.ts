/**
 * Property-Based Tests for @akton/typeid
 *
 * 1. Any 16 bytes survive encode → decode unchanged
 * 2. Every encoded suffix is 26 characters and starts with 0-7
 * 3. Any valid (tag, value) survives format → parse unchanged
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { encodeBase32, decodeBase32 } from "../src/base32.js";
import { bytesToUuid } from "../src/uuid.js";
import { typedIdFromUuid, formatTypedId, parseTypedId } from "../src/typed-id.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbValue = fc.uint8Array({ minLength: 16, maxLength: 16 });

const arbTag = fc.stringMatching(/^[a-z][a-z0-9]{0,15}$/);

// =============================================================================
// Properties
// =============================================================================

describe("base32 properties", () => {
  it("decode(encode(bytes)) === bytes", () => {
    fc.assert(
      fc.property(arbValue, (bytes) => {
        expect(Array.from(decodeBase32(encodeBase32(bytes)))).toEqual(Array.from(bytes));
      }),
    );
  });

  it("suffixes are 26 characters with a leading 0-7", () => {
    fc.assert(
      fc.property(arbValue, (bytes) => {
        expect(encodeBase32(bytes)).toMatch(/^[0-7][0-9a-hjkmnp-tv-z]{25}$/);
      }),
    );
  });
});

describe("typed identifier properties", () => {
  it("parse(format(id)) equals id", () => {
    fc.assert(
      fc.property(arbTag, arbValue, (tag, bytes) => {
        const id = typedIdFromUuid(tag, bytesToUuid(bytes));
        expect(parseTypedId(formatTypedId(id))).toEqual(id);
      }),
    );
  });
});
