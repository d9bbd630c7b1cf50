import { describe, test, expect } from "vitest";
import {
  assistantMessage,
  messageText,
  prepareMessages,
  systemMessage,
  userMessage,
} from "../../src/types/message.js";
import { Role } from "../../src/types/role.js";
import { addUsage, emptyUsage } from "../../src/types/usage.js";
import { functionCallPart } from "../../src/types/content-part.js";
import {
  responseFunctionCalls,
  responseText,
  updateText,
} from "../../src/types/response.js";

describe("prepareMessages", () => {
  test("turns a string into a user message", () => {
    expect(prepareMessages("hi")).toEqual([
      { role: Role.USER, content: [{ kind: "text", text: "hi" }] },
    ]);
  });

  test("accepts a mixed list", () => {
    const messages = prepareMessages([assistantMessage("hello"), "hi"]);
    expect(messages.map((m) => m.role)).toEqual([Role.ASSISTANT, Role.USER]);
  });

  test("returns a new list holding the caller's message objects", () => {
    const original = userMessage("hi");
    const input = [original];
    const prepared = prepareMessages(input);
    expect(prepared).not.toBe(input);
    expect(prepared[0]).toBe(original);
    prepared.push(userMessage("later"));
    expect(input).toHaveLength(1);
  });
});

describe("text helpers", () => {
  test("messageText joins text parts only", () => {
    expect(
      messageText({
        role: Role.ASSISTANT,
        content: [
          { kind: "text", text: "a" },
          { kind: "function_call", callId: "c", name: "f" },
          { kind: "text", text: "b" },
        ],
      }),
    ).toBe("ab");
  });

  test("responseText joins messages with newlines", () => {
    expect(
      responseText({ messages: [assistantMessage("one"), assistantMessage("two")] }),
    ).toBe("one\ntwo");
  });

  test("updateText joins the text parts of one update", () => {
    expect(
      updateText({
        content: [
          { kind: "text", text: "It is " },
          functionCallPart("call-1", "get_weather"),
          { kind: "text", text: "sunny." },
        ],
      }),
    ).toBe("It is sunny.");
  });

  test("systemMessage builds a system-role text message", () => {
    expect(systemMessage("be brief")).toEqual({
      role: Role.SYSTEM,
      content: [{ kind: "text", text: "be brief" }],
    });
  });
});

describe("responseFunctionCalls", () => {
  test("collects calls across every message in order", () => {
    const first = functionCallPart("call-1", "get_weather", "{}");
    const second = functionCallPart("call-2", "get_time", "{}");
    expect(
      responseFunctionCalls({
        messages: [
          { role: Role.ASSISTANT, content: [{ kind: "text", text: "checking" }, first] },
          { role: Role.ASSISTANT, content: [second] },
        ],
      }),
    ).toEqual([first, second]);
  });
});

describe("addUsage", () => {
  test("sums counters and additional counts", () => {
    const sum = addUsage(
      { inputTokens: 1, outputTokens: 2, totalTokens: 3, additionalCounts: { reasoningTokens: 1 } },
      { inputTokens: 4, outputTokens: 5, totalTokens: 9, additionalCounts: { reasoningTokens: 2, cachedTokens: 7 } },
    );
    expect(sum).toEqual({
      inputTokens: 5,
      outputTokens: 7,
      totalTokens: 12,
      additionalCounts: { reasoningTokens: 3, cachedTokens: 7 },
    });
  });

  test("leaves additional counts out when neither side has them", () => {
    expect(addUsage(emptyUsage(), emptyUsage())).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    });
  });
});
