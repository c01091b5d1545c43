/**
 * @akton/arn — Akton Resource Names.
 *
 * Build, parse and validate identifiers of the form
 *
 *   arn:<partition>:<service>:<category>:<tag>_<suffix>
 *
 * Design rules:
 * - All Arn values are frozen
 * - One shared segment rule for every construction path
 * - Codec operations return ArnResult; unwrapArn and ArnBuilder throw
 * - No I/O; the only impure call is the identifier random source
 *
 * @packageDocumentation
 */

// Types
export type {
  Arn,
  ArnSegments,
  ArnErrorCode,
  ArnFailure,
  ArnResult,
  CreateArnOptions,
  SegmentName,
  SegmentPosition,
  TextSegmentName,
} from "./types.js";

export {
  ArnError,
  ARN_PREFIX,
  ARN_DELIMITER,
  SEGMENT_COUNT,
  SEGMENT_POSITION,
  DEFAULT_PARTITION,
  DEFAULT_SERVICE,
  DEFAULT_CATEGORY,
  ROOT_TAG,
} from "./types.js";

// Segment validation
export { validateSegment, validateSegments, isValidSegment } from "./segments.js";

// Codec
export {
  formatArn,
  arnToString,
  parseArn,
  createArn,
  arnWithId,
  arnFromSegments,
  defaultArn,
  unwrapArn,
  arnEquals,
  isArn,
} from "./codec.js";

// Builder
export { ArnBuilder } from "./builder.js";
export type {
  PartitionStage,
  ServiceStage,
  CategoryStage,
  ResourceIdStage,
  BuildStage,
} from "./builder.js";

// Boundary schemas
export { ArnStringSchema, ArnSegmentsSchema } from "./schema.js";
export type { ArnSegmentsInput } from "./schema.js";

// Identifier codec, re-exported for callers that only depend on this package
export type { TypedId, RandomSource } from "@akton/typeid";
export { formatTypedId, parseTypedId, generateTypedId, TypeIdError } from "@akton/typeid";
