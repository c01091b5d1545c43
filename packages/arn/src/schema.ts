/**
 * @akton/arn — Zod schemas for ARN input at system boundaries.
 *
 * Both schemas defer to the codec, so they accept exactly what
 * parseArn / arnWithId accept and report the codec's error message.
 */

import { z } from "zod";
import type { Arn, ArnResult } from "./types.js";
import { arnWithId, parseArn } from "./codec.js";

function toIssue(result: ArnResult<Arn>, ctx: z.RefinementCtx): Arn {
  if (result.ok) {
    return result.value;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: result.error.message,
    params: { code: result.error.code, position: result.error.position },
  });
  return z.NEVER;
}

/** An ARN string, transformed into a frozen Arn. */
export const ArnStringSchema = z.string().transform((input, ctx) => toIssue(parseArn(input), ctx));

/** Explicit segments with an identifier string, transformed into an Arn. */
export const ArnSegmentsSchema = z
  .object({
    partition: z.string(),
    service: z.string(),
    category: z.string().default(""),
    resourceId: z.string(),
  })
  .transform((segments, ctx) =>
    toIssue(
      arnWithId(segments.partition, segments.service, segments.category, segments.resourceId),
      ctx,
    ),
  );

export type ArnSegmentsInput = z.input<typeof ArnSegmentsSchema>;
