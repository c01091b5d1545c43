import { createArn, formatArn } from "@akton/arn";
import type { CommandContext, CommandResult } from "../types.js";

export const MAX_GENERATE_COUNT = 1000;

export interface GenerateOptions {
  readonly partition?: string | undefined;
  readonly service?: string | undefined;
  readonly category?: string | undefined;
  readonly tag?: string | undefined;
  readonly count?: number | undefined;
}

/**
 * Print `count` fresh ARNs, one per line.
 * Unset segments and tag fall back to configuration.
 */
export function generateCommand(options: GenerateOptions, ctx: CommandContext): CommandResult {
  const partition = options.partition ?? ctx.config.ARN_PARTITION;
  const service = options.service ?? ctx.config.ARN_SERVICE;
  const category = options.category ?? ctx.config.ARN_CATEGORY;
  const tag = options.tag ?? ctx.config.ARN_TAG;
  const count = options.count ?? 1;

  if (!Number.isInteger(count) || count < 1 || count > MAX_GENERATE_COUNT) {
    return {
      exitCode: 1,
      stdout: [],
      stderr: [
        `${ctx.color.red("error")} --count must be an integer from 1 to ${String(MAX_GENERATE_COUNT)}, got ${String(count)}`,
      ],
    };
  }

  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    const result = createArn(partition, service, category, { tag, random: ctx.random });
    if (!result.ok) {
      ctx.logger.warn({ code: result.error.code, position: result.error.position }, "ARN generation rejected");
      return {
        exitCode: 1,
        stdout: lines,
        stderr: [`${ctx.color.red("error")} ${result.error.code}: ${result.error.message}`],
      };
    }
    lines.push(formatArn(result.value));
  }

  ctx.logger.debug({ count, partition, service, category, tag }, "Generated ARNs");
  return { exitCode: 0, stdout: lines, stderr: [] };
}
