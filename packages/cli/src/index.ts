/**
 * @akton/arn-cli — Command-line front end for @akton/arn.
 *
 * @packageDocumentation
 */

export { runCli } from "./cli.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { CliConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { generateCommand, MAX_GENERATE_COUNT } from "./commands/generate.js";
export type { GenerateOptions } from "./commands/generate.js";
export { parseCommand } from "./commands/parse.js";
export { validateCommand } from "./commands/validate.js";
export type { CommandContext, CommandResult, CliIo } from "./types.js";
