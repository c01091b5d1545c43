/**
 * @akton/arn-cli — Argument parsing and dispatch.
 *
 * yargs parses; the command modules decide. Output goes through CliIo so
 * the whole CLI runs in-process under test.
 */

import yargs from "yargs";
import { generateCommand, MAX_GENERATE_COUNT } from "./commands/generate.js";
import { parseCommand } from "./commands/parse.js";
import { validateCommand } from "./commands/validate.js";
import type { CliIo, CommandContext, CommandResult } from "./types.js";

interface RunState {
  result?: CommandResult;
  error?: Error;
  output: string;
}

/**
 * Run one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(
  args: readonly string[],
  ctx: CommandContext,
  io: CliIo,
): Promise<number> {
  const state: RunState = { output: "" };

  const parser = yargs()
    .scriptName("akton-arn")
    .usage("Usage: $0 <command> [options]")
    .command(
      "generate",
      "Print freshly generated ARNs",
      (y) =>
        y
          .option("partition", { type: "string", describe: "Partition segment" })
          .option("service", { type: "string", describe: "Service segment" })
          .option("category", { type: "string", describe: "Category segment, may be empty" })
          .option("tag", { type: "string", describe: "Identifier type tag" })
          .option("count", {
            type: "number",
            default: 1,
            describe: `How many to generate (1-${String(MAX_GENERATE_COUNT)})`,
          }),
      (argv) => {
        state.result = generateCommand(
          {
            partition: argv.partition,
            service: argv.service,
            category: argv.category,
            tag: argv.tag,
            count: argv.count,
          },
          ctx,
        );
      },
    )
    .command(
      "parse <arn>",
      "Print the fields of an ARN as JSON",
      (y) => y.positional("arn", { type: "string", demandOption: true }),
      (argv) => {
        state.result = parseCommand(argv.arn, ctx);
      },
    )
    .command(
      "validate <arns..>",
      "Check one or more ARNs",
      (y) => y.positional("arns", { type: "string", array: true, demandOption: true }),
      (argv) => {
        state.result = validateCommand(argv.arns, ctx);
      },
    )
    .demandCommand(1, "too few arguments, a command is required")
    .strict()
    .version(false)
    .help()
    .alias("help", "h")
    .wrap(null)
    .example("$0 generate --partition prod --service billing --tag usr", "Mint a billing user ARN")
    .example("$0 validate arn:prod:billing:acct1:usr_01h455vb4pex5vsknk084sn02q", "Check an ARN");

  await parser.parseAsync([...args], {}, (err, _argv, output) => {
    if (err) {
      state.error = err;
    }
    state.output = output;
  });

  if (state.error !== undefined) {
    ctx.logger.debug({ args, message: state.error.message }, "Invalid invocation");
    io.stderr(state.output !== "" ? state.output : state.error.message);
    return 1;
  }

  if (state.result === undefined) {
    // --help
    if (state.output !== "") {
      io.stdout(state.output);
    }
    return 0;
  }

  for (const line of state.result.stdout) {
    io.stdout(line);
  }
  for (const line of state.result.stderr) {
    io.stderr(line);
  }
  return state.result.exitCode;
}
