import { parseArn } from "@akton/arn";
import type { CommandContext, CommandResult } from "../types.js";

/**
 * Check each input and print one status line per ARN.
 * Exits 1 if any input is invalid.
 */
export function validateCommand(inputs: readonly string[], ctx: CommandContext): CommandResult {
  const lines: string[] = [];
  let invalid = 0;

  for (const input of inputs) {
    const result = parseArn(input);
    if (result.ok) {
      lines.push(`${ctx.color.green("ok")}  ${input}`);
    } else {
      invalid++;
      ctx.logger.warn({ input, code: result.error.code, position: result.error.position }, "ARN rejected");
      lines.push(`${ctx.color.red("err")} ${input}: ${result.error.message}`);
    }
  }

  ctx.logger.debug({ total: inputs.length, invalid }, "Validation finished");
  return { exitCode: invalid === 0 ? 0 : 1, stdout: lines, stderr: [] };
}
