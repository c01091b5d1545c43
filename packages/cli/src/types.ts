/**
 * @akton/arn-cli — Command types.
 *
 * Commands are pure functions from arguments and a context to a
 * CommandResult. Only main.ts touches the process.
 */

import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import type { RandomSource } from "@akton/arn";
import type { CliConfig } from "./config.js";

export interface CommandContext {
  readonly config: CliConfig;
  readonly logger: Logger;
  readonly color: ChalkInstance;
  /** Substitute random source, for tests */
  readonly random?: RandomSource | undefined;
}

export interface CommandResult {
  readonly exitCode: 0 | 1;
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
}

/** Where runCli writes. */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}
