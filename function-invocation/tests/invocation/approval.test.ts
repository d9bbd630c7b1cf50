import { describe, test, expect } from "vitest";
import {
  REJECTED_RESULT_TEXT,
  approvedCalls,
  classifyFunctionCalls,
  collectApprovalResponses,
  createApprovalRequest,
  createApprovalResponse,
  reconcileApprovals,
} from "../../src/invocation/approval.js";
import { resolveInvocationConfig } from "../../src/invocation/config.js";
import { FunctionTool } from "../../src/tools/function-tool.js";
import { ToolRegistry } from "../../src/tools/registry.js";
import { functionCallPart, functionResultPart } from "../../src/types/content-part.js";
import type { Message } from "../../src/types/message.js";
import { Role } from "../../src/types/role.js";
import { UnknownToolError } from "../../src/types/errors.js";

const getWeather = new FunctionTool({ name: "get_weather", execute: () => "sunny" });
const sendEmail = new FunctionTool({
  name: "send_email",
  approvalMode: "always_require",
  execute: () => "sent",
});
const renderChart = new FunctionTool({ name: "render_chart" });
const registry = ToolRegistry.from([getWeather, sendEmail, renderChart]);

describe("classifyFunctionCalls", () => {
  test("executes a batch of ordinary calls", () => {
    const calls = [functionCallPart("call-1", "get_weather", "{}")];
    expect(classifyFunctionCalls(calls, registry, resolveInvocationConfig())).toEqual({
      kind: "execute",
    });
  });

  test("one gated call turns the whole batch into approval requests", () => {
    const weather = functionCallPart("call-1", "get_weather", "{}");
    const email = functionCallPart("call-2", "send_email", "{}");
    const result = classifyFunctionCalls([weather, email], registry, resolveInvocationConfig());
    if (result.kind !== "approval") throw new Error(`expected approval, got ${result.kind}`);
    expect(result.requests.map((r) => r.functionCall)).toEqual([weather, email]);
    expect(result.requests.map((r) => r.kind)).toEqual([
      "function_approval_request",
      "function_approval_request",
    ]);
    const [first, second] = result.requests;
    expect(first?.id).not.toBe(second?.id);
  });

  test("approval wins over a declaration-only call", () => {
    const result = classifyFunctionCalls(
      [functionCallPart("call-1", "render_chart"), functionCallPart("call-2", "send_email")],
      registry,
      resolveInvocationConfig(),
    );
    expect(result.kind).toBe("approval");
  });

  test("a declaration-only call hands the batch back", () => {
    const calls = [
      functionCallPart("call-1", "get_weather", "{}"),
      functionCallPart("call-2", "render_chart", "{}"),
    ];
    expect(classifyFunctionCalls(calls, registry, resolveInvocationConfig())).toEqual({
      kind: "passthrough",
      calls,
    });
  });

  test("a call to an additional tool hands the batch back", () => {
    const pickColor = () => "blue";
    const config = resolveInvocationConfig({ additionalTools: [pickColor] });
    const result = classifyFunctionCalls([functionCallPart("call-1", "pickColor")], registry, config);
    expect(result.kind).toBe("passthrough");
  });

  test("unknown calls raise only when configured to", () => {
    const calls = [functionCallPart("call-1", "get_weather"), functionCallPart("call-2", "missing")];
    expect(classifyFunctionCalls(calls, registry, resolveInvocationConfig()).kind).toBe("execute");
    expect(() =>
      classifyFunctionCalls(calls, registry, resolveInvocationConfig({ terminateOnUnknownCalls: true })),
    ).toThrow(UnknownToolError);
  });

  test("approval responses are not gated again", () => {
    const request = createApprovalRequest(functionCallPart("call-1", "send_email", "{}"));
    const result = classifyFunctionCalls(
      [createApprovalResponse(request, true)],
      registry,
      resolveInvocationConfig(),
    );
    expect(result.kind).toBe("execute");
  });
});

describe("approval responses", () => {
  test("createApprovalResponse keeps the request id and call", () => {
    const call = functionCallPart("call-1", "send_email", "{}");
    const request = { kind: "function_approval_request" as const, id: "req-1", functionCall: call };
    expect(createApprovalResponse(request, false)).toEqual({
      kind: "function_approval_response",
      id: "req-1",
      functionCall: call,
      approved: false,
    });
  });

  test("collectApprovalResponses gathers approved and rejected responses", () => {
    const call = functionCallPart("call-1", "send_email", "{}");
    const approved = { kind: "function_approval_response" as const, id: "req-1", functionCall: call, approved: true };
    const rejected = { kind: "function_approval_response" as const, id: "req-2", functionCall: call, approved: false };
    const responses = collectApprovalResponses([
      { role: Role.USER, content: [approved] },
      { role: Role.USER, content: [{ kind: "text", text: "ok" }, rejected] },
    ]);
    expect([...responses.keys()]).toEqual(["req-1", "req-2"]);
    expect(responses.get("req-2")).toBe(rejected);
  });

  test("approvedCalls keeps only approved responses", () => {
    const call = functionCallPart("call-1", "send_email", "{}");
    const approved = { kind: "function_approval_response" as const, id: "req-1", functionCall: call, approved: true };
    const rejected = { kind: "function_approval_response" as const, id: "req-2", functionCall: call, approved: false };
    const responses = new Map([
      ["req-1", approved],
      ["req-2", rejected],
    ]);
    expect(approvedCalls(responses)).toEqual([approved]);
  });
});

describe("reconcileApprovals", () => {
  test("restores calls and replaces responses with results", () => {
    const weather = functionCallPart("call-1", "get_weather", "{}");
    const email = functionCallPart("call-2", "send_email", "{}");
    const weatherRequest = { kind: "function_approval_request" as const, id: "req-1", functionCall: weather };
    const emailRequest = { kind: "function_approval_request" as const, id: "req-2", functionCall: email };
    const messages: Message[] = [
      { role: Role.ASSISTANT, content: [weather, weatherRequest, emailRequest] },
      {
        role: Role.USER,
        content: [
          createApprovalResponse(weatherRequest, true),
          createApprovalResponse(emailRequest, false),
        ],
      },
    ];
    const responses = collectApprovalResponses(messages);

    reconcileApprovals(messages, responses, [functionResultPart("call-1", "sunny")]);

    expect(messages[0]?.content).toEqual([weather, email]);
    expect(messages[1]).toEqual({
      role: Role.TOOL,
      content: [
        { kind: "function_result", callId: "call-1", result: "sunny" },
        {
          kind: "function_result",
          callId: "call-2",
          result: REJECTED_RESULT_TEXT,
          error: { kind: "rejected", message: REJECTED_RESULT_TEXT },
        },
      ],
    });
  });
});
