import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/typeid",
  "packages/arn",
  "packages/cli",
]);
