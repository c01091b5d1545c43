import { formatTypedId, parseArn } from "@akton/arn";
import type { CommandContext, CommandResult } from "../types.js";

/** Print the fields of one ARN as JSON. */
export function parseCommand(input: string, ctx: CommandContext): CommandResult {
  const result = parseArn(input);
  if (!result.ok) {
    ctx.logger.warn({ input, code: result.error.code, position: result.error.position }, "ARN rejected");
    return {
      exitCode: 1,
      stdout: [],
      stderr: [`${ctx.color.red("error")} ${result.error.code}: ${result.error.message}`],
    };
  }

  const arn = result.value;
  const fields = {
    partition: arn.partition,
    service: arn.service,
    category: arn.category,
    tag: arn.resourceId.tag,
    uuid: arn.resourceId.uuid,
    resourceId: formatTypedId(arn.resourceId),
  };
  return { exitCode: 0, stdout: [JSON.stringify(fields, null, 2)], stderr: [] };
}
