import { describe, test, expect } from "vitest";
import {
  mergeFunctionCalls,
  parseFunctionArguments,
} from "../../src/types/function-call.js";
import { functionCallPart } from "../../src/types/content-part.js";
import { ContentMismatchError } from "../../src/types/errors.js";

describe("mergeFunctionCalls", () => {
  test("concatenates string argument fragments", () => {
    const merged = mergeFunctionCalls(
      functionCallPart("call-1", "get_weather", '{"loc'),
      functionCallPart("call-1", "", 'ation":"Seattle"}'),
    );
    expect(merged).toEqual({
      kind: "function_call",
      callId: "call-1",
      name: "get_weather",
      arguments: '{"location":"Seattle"}',
    });
  });

  test("merges a fragment without a call id into the open call", () => {
    const merged = mergeFunctionCalls(
      functionCallPart("call-1", "get_weather", '{"a":'),
      functionCallPart("", "", "1}"),
    );
    expect(merged.callId).toBe("call-1");
    expect(merged.arguments).toBe('{"a":1}');
  });

  test("throws ContentMismatchError for a different call id", () => {
    expect(() =>
      mergeFunctionCalls(
        functionCallPart("call-1", "get_weather", "{}"),
        functionCallPart("call-2", "get_time", "{}"),
      ),
    ).toThrow(ContentMismatchError);
  });

  test("shallow-merges map arguments with the right side winning", () => {
    const merged = mergeFunctionCalls(
      functionCallPart("call-1", "f", { a: 1, b: 1 }),
      functionCallPart("call-1", "f", { b: 2 }),
    );
    expect(merged.arguments).toEqual({ a: 1, b: 2 });
  });

  test("takes the other side when one side has no arguments", () => {
    expect(
      mergeFunctionCalls(functionCallPart("call-1", "f"), functionCallPart("call-1", "f", "{}"))
        .arguments,
    ).toBe("{}");
    expect(
      mergeFunctionCalls(functionCallPart("call-1", "f", { a: 1 }), functionCallPart("call-1", "f", ""))
        .arguments,
    ).toEqual({ a: 1 });
  });

  test("rejects mixing string and map arguments", () => {
    expect(() =>
      mergeFunctionCalls(
        functionCallPart("call-1", "f", '{"a":'),
        functionCallPart("call-1", "f", { a: 1 }),
      ),
    ).toThrow(TypeError);
  });

  test("is associative over string fragments", () => {
    const a = functionCallPart("call-1", "f", '{"x"');
    const b = functionCallPart("call-1", "", ':"y');
    const c = functionCallPart("call-1", "", '"}');
    expect(mergeFunctionCalls(mergeFunctionCalls(a, b), c)).toEqual(
      mergeFunctionCalls(a, mergeFunctionCalls(b, c)),
    );
  });
});

describe("parseFunctionArguments", () => {
  test("treats missing and empty arguments as an empty map", () => {
    expect(parseFunctionArguments(functionCallPart("c", "f"))).toEqual({});
    expect(parseFunctionArguments(functionCallPart("c", "f", ""))).toEqual({});
  });

  test("parses a JSON object", () => {
    expect(
      parseFunctionArguments(functionCallPart("c", "f", '{"location":"Seattle"}')),
    ).toEqual({ location: "Seattle" });
  });

  test("returns map arguments unchanged", () => {
    const args = { location: "Seattle" };
    expect(parseFunctionArguments(functionCallPart("c", "f", args))).toBe(args);
  });

  test("keeps non-object JSON under raw", () => {
    expect(parseFunctionArguments(functionCallPart("c", "f", "[1,2]"))).toEqual({
      raw: [1, 2],
    });
  });

  test("keeps unparseable text under raw", () => {
    expect(parseFunctionArguments(functionCallPart("c", "f", "not json"))).toEqual({
      raw: "not json",
    });
  });
});
