/**
 * @akton/arn — The ARN codec.
 *
 * Two-way mapping between Arn values and their canonical string, plus
 * construction around a freshly generated identifier.
 *
 * Rules:
 * - formatArn never fails for a constructed Arn
 * - parseArn, createArn and arnWithId return ArnResult, never throw for
 *   invalid input
 * - Delimiters are never trimmed or collapsed: a stray ":" is a field
 *   count mismatch
 * - Every Arn is frozen
 */

import {
  TypeIdError,
  formatTypedId,
  generateTypedId,
  isTypedId,
  parseTypedId,
  typedIdEquals,
  typedIdFromUuid,
} from "@akton/typeid";
import type { TypedId } from "@akton/typeid";
import {
  ARN_DELIMITER,
  ARN_PREFIX,
  ArnError,
  DEFAULT_CATEGORY,
  DEFAULT_PARTITION,
  DEFAULT_SERVICE,
  ROOT_TAG,
  SEGMENT_COUNT,
  SEGMENT_POSITION,
} from "./types.js";
import type { Arn, ArnFailure, ArnResult, ArnSegments, CreateArnOptions } from "./types.js";
import { validateSegment, validateSegments } from "./segments.js";

// ─── Results ─────────────────────────────────────────────────────────────

function ok<T>(value: T): ArnResult<T> {
  return { ok: true, value };
}

function fail(error: ArnError): ArnFailure {
  return { ok: false, error };
}

/**
 * Return the value of a successful result.
 *
 * @throws {ArnError} the result's error
 */
export function unwrapArn<T>(result: ArnResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// ─── Internal Helpers ────────────────────────────────────────────────────

function freezeArn(partition: string, service: string, category: string, resourceId: TypedId): Arn {
  return Object.freeze({ partition, service, category, resourceId });
}

/** Map a TypeIdError onto the ARN error vocabulary. */
function identifierError(err: TypeIdError, value: string): ArnError {
  const code = err.code === "GENERATION_FAILED" ? "GENERATION_FAILED" : "INVALID_IDENTIFIER";
  return new ArnError(code, err.message, value, SEGMENT_POSITION.resourceId, { cause: err });
}

/** Normalise either identifier form into a fresh frozen TypedId. */
function resolveIdentifier(resourceId: TypedId | string): ArnResult<TypedId> {
  try {
    if (typeof resourceId === "string") {
      return ok(parseTypedId(resourceId));
    }
    return ok(typedIdFromUuid(resourceId.tag, resourceId.uuid));
  } catch (err) {
    if (err instanceof TypeIdError) {
      const value = typeof resourceId === "string" ? resourceId : `${resourceId.tag}:${resourceId.uuid}`;
      return fail(identifierError(err, value));
    }
    throw err;
  }
}

// ─── Format ──────────────────────────────────────────────────────────────

/**
 * Render an Arn in canonical form.
 *
 * formatArn({ partition: "prod", service: "billing", category: "acct1", resourceId })
 *   → "arn:prod:billing:acct1:usr_01h455vb4pex5vsknk084sn02q"
 */
export function formatArn(arn: Arn): string {
  return [
    ARN_PREFIX,
    arn.partition,
    arn.service,
    arn.category,
    formatTypedId(arn.resourceId),
  ].join(ARN_DELIMITER);
}

export const arnToString = formatArn;

// ─── Parse ───────────────────────────────────────────────────────────────

/**
 * Parse an ARN string.
 *
 * Fails with:
 * - MALFORMED_ARN when the input does not split into exactly five fields
 * - INVALID_SEGMENT (position 0-3) for a wrong prefix or a bad segment
 * - INVALID_IDENTIFIER (position 4) when the last field is not `<tag>_<suffix>`
 */
export function parseArn(input: string): ArnResult<Arn> {
  const fields = input.split(ARN_DELIMITER);
  const [prefix, partition, service, category, identifier] = fields;
  if (
    fields.length !== SEGMENT_COUNT ||
    prefix === undefined ||
    partition === undefined ||
    service === undefined ||
    category === undefined ||
    identifier === undefined
  ) {
    return fail(
      new ArnError(
        "MALFORMED_ARN",
        `Expected ${String(SEGMENT_COUNT)} "${ARN_DELIMITER}"-separated fields, got ${String(fields.length)}`,
        input,
      ),
    );
  }

  if (prefix !== ARN_PREFIX) {
    return fail(
      new ArnError(
        "INVALID_SEGMENT",
        `ARN must start with "${ARN_PREFIX}", got "${prefix}"`,
        prefix,
        SEGMENT_POSITION.prefix,
      ),
    );
  }

  const segmentError = validateSegments(partition, service, category);
  if (segmentError !== undefined) {
    return fail(segmentError);
  }

  const id = resolveIdentifier(identifier);
  if (!id.ok) {
    return id;
  }

  return ok(freezeArn(partition, service, category, id.value));
}

// ─── Construct ───────────────────────────────────────────────────────────

/**
 * Construct an Arn around a newly generated identifier.
 *
 * The segments are checked before any randomness is drawn.
 */
export function createArn(
  partition: string,
  service: string,
  category: string,
  options: CreateArnOptions = {},
): ArnResult<Arn> {
  const segmentError = validateSegments(partition, service, category);
  if (segmentError !== undefined) {
    return fail(segmentError);
  }

  const tag = options.tag ?? ROOT_TAG;
  try {
    const resourceId = generateTypedId(tag, options.random);
    return ok(freezeArn(partition, service, category, resourceId));
  } catch (err) {
    if (err instanceof TypeIdError) {
      return fail(identifierError(err, tag));
    }
    throw err;
  }
}

/**
 * Construct an Arn from an identifier issued earlier.
 *
 * `resourceId` may be a TypedId or its `<tag>_<suffix>` string.
 */
export function arnWithId(
  partition: string,
  service: string,
  category: string,
  resourceId: TypedId | string,
): ArnResult<Arn> {
  const segmentError = validateSegments(partition, service, category);
  if (segmentError !== undefined) {
    return fail(segmentError);
  }

  const id = resolveIdentifier(resourceId);
  if (!id.ok) {
    return id;
  }

  return ok(freezeArn(partition, service, category, id.value));
}

/** arnWithId over a segments object. */
export function arnFromSegments(segments: ArnSegments): ArnResult<Arn> {
  return arnWithId(segments.partition, segments.service, segments.category, segments.resourceId);
}

/**
 * `arn:akton:system:default:root_<suffix>` with a fresh identifier.
 *
 * @throws {ArnError} GENERATION_FAILED if the random source fails
 */
export function defaultArn(random?: CreateArnOptions["random"]): Arn {
  return unwrapArn(
    createArn(DEFAULT_PARTITION, DEFAULT_SERVICE, DEFAULT_CATEGORY, { tag: ROOT_TAG, random }),
  );
}

// ─── Comparison / Guards ─────────────────────────────────────────────────

export function arnEquals(a: Arn, b: Arn): boolean {
  return (
    a.partition === b.partition &&
    a.service === b.service &&
    a.category === b.category &&
    typedIdEquals(a.resourceId, b.resourceId)
  );
}

/**
 * Runtime check that a value has the shape and content of a valid Arn.
 * Useful at boundaries where Arn objects arrive deserialised.
 */
export function isArn(value: unknown): value is Arn {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.partition === "string" &&
    validateSegment("partition", v.partition) === undefined &&
    typeof v.service === "string" &&
    validateSegment("service", v.service) === undefined &&
    typeof v.category === "string" &&
    validateSegment("category", v.category) === undefined &&
    isTypedId(v.resourceId)
  );
}
