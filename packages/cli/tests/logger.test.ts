import { describe, it, expect } from "vitest";
import { createLogger } from "../src/logger.js";

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger({ LOG_LEVEL: "debug", NODE_ENV: "production" }).level).toBe("debug");
    expect(createLogger({ LOG_LEVEL: "silent", NODE_ENV: "test" }).level).toBe("silent");
  });

  it("enables levels at or above the threshold only", () => {
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "test" });
    expect(logger.isLevelEnabled("error")).toBe(true);
    expect(logger.isLevelEnabled("warn")).toBe(true);
    expect(logger.isLevelEnabled("info")).toBe(false);
  });
});
