/**
 * Tests for the generate / parse / validate command handlers.
 */

import { describe, it, expect } from "vitest";
import { generateCommand } from "../src/commands/generate.js";
import { parseCommand } from "../src/commands/parse.js";
import { validateCommand } from "../src/commands/validate.js";
import { loadConfig } from "../src/config.js";
import { createTestContext, ID, UUID, zeroSource } from "./setup.js";

// =============================================================================
// generate
// =============================================================================

describe("generateCommand", () => {
  it("falls back to configuration for every unset option", () => {
    const result = generateCommand({}, createTestContext({ random: zeroSource }));
    expect(result).toEqual({
      exitCode: 0,
      stdout: ["arn:akton:system:default:root_00000000008008000000000000"],
      stderr: [],
    });
  });

  it("uses configured defaults from the environment", () => {
    const ctx = createTestContext({
      config: loadConfig({ ARN_PARTITION: "prod", ARN_CATEGORY: "", ARN_TAG: "usr" }),
      random: zeroSource,
    });
    expect(generateCommand({}, ctx).stdout).toEqual([
      "arn:prod:system::usr_00000000008008000000000000",
    ]);
  });

  it("prefers explicit options", () => {
    const result = generateCommand(
      { partition: "prod", service: "billing", category: "acct1", tag: "doc" },
      createTestContext({ random: zeroSource }),
    );
    expect(result.stdout).toEqual(["arn:prod:billing:acct1:doc_00000000008008000000000000"]);
  });

  it("prints one distinct ARN per line", () => {
    const result = generateCommand({ count: 5 }, createTestContext());
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toHaveLength(5);
    expect(new Set(result.stdout).size).toBe(5);
  });

  it("rejects an out-of-range count", () => {
    for (const count of [0, -1, 1.5, 1001]) {
      const result = generateCommand({ count }, createTestContext());
      expect(result.exitCode).toBe(1);
      expect(result.stdout).toEqual([]);
      expect(result.stderr).toEqual([
        `error --count must be an integer from 1 to 1000, got ${String(count)}`,
      ]);
    }
  });

  it("reports an invalid segment", () => {
    const result = generateCommand({ service: "bill ing" }, createTestContext());
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toEqual([
      'error INVALID_SEGMENT: Invalid service "bill ing": character " " is not allowed (use A-Z, a-z, 0-9 or "-")',
    ]);
  });

  it("reports a failing random source", () => {
    const result = generateCommand(
      {},
      createTestContext({
        random: () => {
          throw new Error("no entropy");
        },
      }),
    );
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toEqual(["error GENERATION_FAILED: Random source failed: no entropy"]);
  });
});

// =============================================================================
// parse
// =============================================================================

describe("parseCommand", () => {
  it("prints the fields as JSON", () => {
    const result = parseCommand(`arn:prod:billing:acct1:${ID}`, createTestContext());
    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.stdout[0] ?? "")).toEqual({
      partition: "prod",
      service: "billing",
      category: "acct1",
      tag: "usr",
      uuid: UUID,
      resourceId: ID,
    });
  });

  it("reports the error code and message", () => {
    const result = parseCommand("arn:prod:billing", createTestContext());
    expect(result).toEqual({
      exitCode: 1,
      stdout: [],
      stderr: ['error MALFORMED_ARN: Expected 5 ":"-separated fields, got 3'],
    });
  });
});

// =============================================================================
// validate
// =============================================================================

describe("validateCommand", () => {
  it("prints ok for valid input", () => {
    const result = validateCommand([`arn:prod:billing:acct1:${ID}`], createTestContext());
    expect(result).toEqual({
      exitCode: 0,
      stdout: [`ok  arn:prod:billing:acct1:${ID}`],
      stderr: [],
    });
  });

  it("reports each invalid input and exits 1", () => {
    const result = validateCommand(
      [`arn:prod:billing:acct1:${ID}`, `arn:pr#d:billing:acct1:${ID}`],
      createTestContext(),
    );
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toEqual([
      `ok  arn:prod:billing:acct1:${ID}`,
      `err arn:pr#d:billing:acct1:${ID}: Invalid partition "pr#d": character "#" is not allowed (use A-Z, a-z, 0-9 or "-")`,
    ]);
  });
});
