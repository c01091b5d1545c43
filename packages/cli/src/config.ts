/**
 * @akton/arn-cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Segment defaults go through the same rules as the codec, so a bad
 * ARN_PARTITION fails at startup rather than on first use.
 */

import { z } from "zod";
import { validateSegment } from "@akton/arn";
import type { TextSegmentName } from "@akton/arn";
import { isValidTag } from "@akton/typeid";

// =============================================================================
// Schema
// =============================================================================

function segment(name: TextSegmentName, fallback: string) {
  return z
    .string()
    .default(fallback)
    .superRefine((value, ctx) => {
      const error = validateSegment(name, value);
      if (error !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
      }
    });
}

export const ConfigSchema = z.object({
  // ARN defaults for `generate`
  ARN_PARTITION: segment("partition", "akton"),
  ARN_SERVICE: segment("service", "system"),
  ARN_CATEGORY: segment("category", "default"),
  ARN_TAG: z
    .string()
    .default("root")
    .refine(isValidTag, {
      message: "ARN_TAG must start with a lowercase letter and contain only lowercase letters and digits (max 63)",
    }),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if any variable is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}
