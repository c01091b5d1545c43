/**
 * @akton/typeid — Random source for identifier generation.
 *
 * The only impure dependency of the codec. Everything that mints a new
 * identifier goes through `drawRandomBytes`, so tests can substitute a
 * deterministic source at a single seam.
 */

import { randomBytes } from "node:crypto";
import type { RandomSource } from "./types.js";
import { TypeIdError } from "./types.js";

/** Cryptographically secure bytes from node:crypto. */
export const defaultRandomSource: RandomSource = (size) => randomBytes(size);

/**
 * Draw exactly `size` bytes from `source`.
 *
 * @throws {TypeIdError} GENERATION_FAILED if the source throws, returns
 *   something other than bytes, or returns the wrong number of them
 */
export function drawRandomBytes(size: number, source: RandomSource = defaultRandomSource): Uint8Array {
  let bytes: unknown;
  try {
    bytes = source(size);
  } catch (err) {
    throw new TypeIdError(
      "GENERATION_FAILED",
      `Random source failed: ${err instanceof Error ? err.message : String(err)}`,
      String(size),
      { cause: err },
    );
  }

  if (!(bytes instanceof Uint8Array)) {
    throw new TypeIdError(
      "GENERATION_FAILED",
      `Random source returned ${bytes === null ? "null" : typeof bytes}, expected a Uint8Array`,
      String(size),
    );
  }

  if (bytes.length !== size) {
    throw new TypeIdError(
      "GENERATION_FAILED",
      `Random source returned ${String(bytes.length)} bytes, expected ${String(size)}`,
      String(size),
    );
  }

  // Copy so a source that reuses its buffer cannot alias generated values.
  return Uint8Array.from(bytes);
}
