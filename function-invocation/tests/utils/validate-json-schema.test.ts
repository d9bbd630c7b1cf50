import { describe, test, expect } from "vitest";
import { validateJsonSchema } from "../../src/utils/validate-json-schema.js";

describe("validateJsonSchema", () => {
  const schema = {
    type: "object",
    properties: { location: { type: "string" } },
    required: ["location"],
  };

  test("accepts matching data", () => {
    expect(validateJsonSchema({ location: "Seattle" }, schema)).toEqual({ valid: true });
  });

  test("reports mismatches", () => {
    const result = validateJsonSchema({}, schema);
    if (result.valid) throw new Error("expected a validation failure");
    expect(result.errors).toBe("data must have required property 'location'");
  });

  test("a schema that cannot compile fails validation instead of throwing", () => {
    const result = validateJsonSchema({ a: "x" }, {
      type: "object",
      properties: { a: { type: "strin" } },
    });
    if (result.valid) throw new Error("expected a validation failure");
    expect(result.errors).toMatch(/^schema is invalid/);
  });
});
