/**
 * @akton/arn — Core types.
 *
 * Canonical form:
 *
 *   arn:<partition>:<service>:<category>:<tag>_<suffix>
 *
 * Five ":"-separated fields, always. Field positions are used as the
 * `position` of segment errors (0 = the literal "arn").
 */

import type { RandomSource, TypedId } from "@akton/typeid";

// =============================================================================
// Constants
// =============================================================================

export const ARN_PREFIX = "arn";
export const ARN_DELIMITER = ":";

/** Number of delimited fields, including the leading "arn". */
export const SEGMENT_COUNT = 5;

export const DEFAULT_PARTITION = "akton";
export const DEFAULT_SERVICE = "system";
export const DEFAULT_CATEGORY = "default";
export const ROOT_TAG = "root";

/** Field positions within the delimited form. */
export const SEGMENT_POSITION = {
  prefix: 0,
  partition: 1,
  service: 2,
  category: 3,
  resourceId: 4,
} as const;

export type SegmentName = keyof typeof SEGMENT_POSITION;
export type SegmentPosition = (typeof SEGMENT_POSITION)[SegmentName];

/** The three plain-text segments that share one validation rule. */
export type TextSegmentName = "partition" | "service" | "category";

// =============================================================================
// Arn
// =============================================================================

/**
 * A parsed Akton Resource Name.
 *
 * Frozen on construction, together with its resourceId. Produced only by
 * parseArn, createArn, arnWithId, defaultArn and ArnBuilder.
 */
export interface Arn {
  /** Deployment realm, e.g. "prod" */
  readonly partition: string;
  /** Owning subsystem, e.g. "billing" */
  readonly service: string;
  /** Account-like grouping; may be "" */
  readonly category: string;
  readonly resourceId: TypedId;
}

/** The segments accepted by arnWithId, identifier given in either form. */
export interface ArnSegments {
  readonly partition: string;
  readonly service: string;
  readonly category: string;
  readonly resourceId: TypedId | string;
}

// =============================================================================
// Results & Errors
// =============================================================================

/** Error codes for ARN operations. */
export type ArnErrorCode =
  | "MALFORMED_ARN"
  | "INVALID_SEGMENT"
  | "INVALID_IDENTIFIER"
  | "GENERATION_FAILED";

/**
 * Structured error from the ARN codec.
 *
 * Returned inside an ArnResult by the codec operations; thrown by
 * unwrapArn and ArnBuilder.
 */
export class ArnError extends Error {
  public readonly code: ArnErrorCode;
  /** Field position of the offending segment, when one is to blame */
  public readonly position: SegmentPosition | undefined;
  /** The input that failed */
  public readonly value: string;

  constructor(
    code: ArnErrorCode,
    message: string,
    value: string,
    position?: SegmentPosition,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ArnError";
    this.code = code;
    this.value = value;
    this.position = position;
  }
}

export interface ArnFailure {
  readonly ok: false;
  readonly error: ArnError;
}

export type ArnResult<T> = { readonly ok: true; readonly value: T } | ArnFailure;

export interface CreateArnOptions {
  /** Type tag for the generated identifier. Defaults to "root". */
  readonly tag?: string | undefined;
  /** Substitute random source, for tests */
  readonly random?: RandomSource | undefined;
}
