import { describe, it, expect } from "vitest";
import { validateSegment, validateSegments, isValidSegment } from "../src/segments.js";

describe("validateSegment", () => {
  it("accepts letters, digits and hyphens", () => {
    for (const name of ["partition", "service", "category"] as const) {
      expect(validateSegment(name, "Abc-123")).toBeUndefined();
    }
  });

  it("requires partition and service", () => {
    expect(validateSegment("partition", "")?.position).toBe(1);
    expect(validateSegment("service", "")?.position).toBe(2);
  });

  it("allows an empty category", () => {
    expect(validateSegment("category", "")).toBeUndefined();
  });

  it("names the first disallowed character", () => {
    const error = validateSegment("category", "a.b_c");
    expect(error?.code).toBe("INVALID_SEGMENT");
    expect(error?.position).toBe(3);
    expect(error?.message).toBe(
      'Invalid category "a.b_c": character "." is not allowed (use A-Z, a-z, 0-9 or "-")',
    );
  });

  it("rejects the delimiter, whitespace and non-ASCII letters", () => {
    for (const value of ["a:b", " a", "a ", "a\tb", "é", "a/b"]) {
      expect(isValidSegment("partition", value)).toBe(false);
    }
  });
});

describe("validateSegments", () => {
  it("returns undefined when all three are valid", () => {
    expect(validateSegments("prod", "billing", "")).toBeUndefined();
  });

  it("returns the first failure in field order", () => {
    expect(validateSegments("prod", "bad!", "also bad")?.position).toBe(2);
    expect(validateSegments("prod", "billing", "also bad")?.position).toBe(3);
  });
});
