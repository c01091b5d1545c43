/**
 * @akton/arn — Segment validation.
 *
 * One rule set for partition, service and category, shared by parseArn,
 * createArn, arnWithId, ArnBuilder and the zod schemas.
 *
 * Rules:
 * - Allowed characters: A-Z, a-z, 0-9 and "-"
 * - partition and service must be non-empty
 * - category may be empty (serialised as nothing between two delimiters)
 * - Input is never trimmed or case-folded
 */

import { ArnError, SEGMENT_POSITION } from "./types.js";
import type { TextSegmentName } from "./types.js";

const SEGMENT_CHAR = /^[A-Za-z0-9-]$/;

const REQUIRED: Readonly<Record<TextSegmentName, boolean>> = {
  partition: true,
  service: true,
  category: false,
};

/**
 * Check one text segment.
 *
 * @returns the INVALID_SEGMENT error, or undefined when the value is valid
 */
export function validateSegment(name: TextSegmentName, value: string): ArnError | undefined {
  const position = SEGMENT_POSITION[name];

  if (value === "") {
    return REQUIRED[name]
      ? new ArnError("INVALID_SEGMENT", `Invalid ${name}: cannot be empty`, value, position)
      : undefined;
  }

  for (const ch of value) {
    if (!SEGMENT_CHAR.test(ch)) {
      return new ArnError(
        "INVALID_SEGMENT",
        `Invalid ${name} "${value}": character "${ch}" is not allowed (use A-Z, a-z, 0-9 or "-")`,
        value,
        position,
      );
    }
  }

  return undefined;
}

/**
 * Check partition, service and category in field order.
 *
 * @returns the first failure, or undefined when all three are valid
 */
export function validateSegments(
  partition: string,
  service: string,
  category: string,
): ArnError | undefined {
  return (
    validateSegment("partition", partition) ??
    validateSegment("service", service) ??
    validateSegment("category", category)
  );
}

export function isValidSegment(name: TextSegmentName, value: string): boolean {
  return validateSegment(name, value) === undefined;
}
