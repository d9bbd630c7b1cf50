import { describe, test, expect } from "vitest";
import { validateToolName } from "../../src/utils/validate-tool-name.js";

const PATTERN_MESSAGE =
  "tool name must start with a letter or underscore and contain only letters, digits, underscores, and hyphens";

describe("validateToolName", () => {
  test("accepts valid simple name", () => {
    expect(validateToolName("getWeather")).toBeUndefined();
  });

  test("accepts underscores, digits and hyphens", () => {
    expect(validateToolName("get_weather-2")).toBeUndefined();
  });

  test("accepts a leading underscore", () => {
    expect(validateToolName("_private")).toBeUndefined();
  });

  test("rejects empty string", () => {
    expect(validateToolName("")).toBe("tool name must not be empty");
  });

  test("rejects name starting with digit", () => {
    expect(validateToolName("2fast")).toBe(PATTERN_MESSAGE);
  });

  test("rejects name with spaces", () => {
    expect(validateToolName("get weather")).toBe(PATTERN_MESSAGE);
  });

  test("rejects name exceeding 64 characters", () => {
    expect(validateToolName("a" + "b".repeat(64))).toBe(
      "tool name must be at most 64 characters",
    );
  });

  test("accepts name exactly 64 characters", () => {
    expect(validateToolName("a" + "b".repeat(63))).toBeUndefined();
  });
});
