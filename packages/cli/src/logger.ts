/**
 * @akton/arn-cli — Logging.
 *
 * pino, written to stderr so stdout carries only command output.
 * Pretty-printed in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CliConfig } from "./config.js";

export function createLogger(config: Pick<CliConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      name: "akton-arn",
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ name: "akton-arn", level: config.LOG_LEVEL }, pino.destination(2));
}
