/**
 * @akton/typeid — Core types.
 *
 * A typed identifier pairs a short type tag with a 128-bit value.
 * The value is held as a canonical lowercase UUID string so that two
 * identifiers compare equal by plain field comparison.
 */

// =============================================================================
// Identifier
// =============================================================================

/**
 * A typed unique identifier, e.g. `usr_01h455vb4pex5vsknk084sn02q`.
 *
 * Always frozen. Construct through `parseTypedId`, `typedIdFromUuid`
 * or `generateTypedId`.
 */
export interface TypedId {
  /** Type tag distinguishing resource kinds (`usr`, `root`, ...) */
  readonly tag: string;
  /** The 128-bit value as a lowercase 8-4-4-4-12 UUID string */
  readonly uuid: string;
}

/**
 * Source of random bytes for identifier generation.
 * Must return exactly `size` bytes or throw.
 */
export type RandomSource = (size: number) => Uint8Array;

// =============================================================================
// Error Types
// =============================================================================

/** Error codes for typed identifier operations. */
export type TypeIdErrorCode =
  | "MALFORMED_TYPEID"
  | "INVALID_TAG"
  | "INVALID_SUFFIX"
  | "INVALID_UUID"
  | "GENERATION_FAILED";

/**
 * Structured error from the identifier codec.
 * Carries the input that failed and nothing else.
 */
export class TypeIdError extends Error {
  public readonly code: TypeIdErrorCode;
  public readonly value: string;

  constructor(code: TypeIdErrorCode, message: string, value: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TypeIdError";
    this.code = code;
    this.value = value;
  }
}
