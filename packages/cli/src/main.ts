#!/usr/bin/env node
/**
 * @akton/arn-cli — Entry point.
 *
 * Loads config, builds the logger and hands argv to runCli.
 */

import chalk from "chalk";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  process.exitCode = await runCli(
    hideBin(process.argv),
    { config, logger, color: chalk },
    {
      stdout: (text) => process.stdout.write(`${text}\n`),
      stderr: (text) => process.stderr.write(`${text}\n`),
    },
  );
}

main().catch((err: unknown) => {
  console.error(chalk.red("akton-arn failed:"), err);
  process.exit(1);
});
