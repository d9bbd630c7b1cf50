import { randomUUID } from "node:crypto";
import type { Message } from "../types/message.js";
import { Role } from "../types/role.js";
import type {
  ContentPart,
  FunctionApprovalRequestPart,
  FunctionApprovalResponsePart,
  FunctionCallPart,
  FunctionResultPart,
} from "../types/content-part.js";
import { isApprovalResponsePart, isFunctionCallPart } from "../types/content-part.js";
import { ToolErrorKind, UnknownToolError } from "../types/errors.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { InvocationConfig } from "./config.js";

export const REJECTED_RESULT_TEXT =
  "Error: Tool call invocation was rejected by user.";

/** Calls produced by the model, or approved responses replayed by the caller. */
export type PendingCall = FunctionCallPart | FunctionApprovalResponsePart;

export type BatchClassification =
  | { kind: "execute" }
  | { kind: "approval"; requests: FunctionApprovalRequestPart[] }
  | { kind: "passthrough"; calls: FunctionCallPart[] };

export function createApprovalRequest(
  call: FunctionCallPart,
): FunctionApprovalRequestPart {
  return { kind: "function_approval_request", id: randomUUID(), functionCall: call };
}

export function createApprovalResponse(
  request: FunctionApprovalRequestPart,
  approved: boolean,
): FunctionApprovalResponsePart {
  return {
    kind: "function_approval_response",
    id: request.id,
    functionCall: request.functionCall,
    approved,
  };
}

/**
 * Decides what happens to a whole batch. Gating is all-or-nothing so that a
 * round never sends the model a partial set of results.
 *
 * Only fresh function calls are gated; approval responses already carry the
 * caller's decision.
 */
export function classifyFunctionCalls(
  calls: ReadonlyArray<PendingCall>,
  registry: ToolRegistry,
  config: Pick<InvocationConfig, "additionalTools" | "terminateOnUnknownCalls">,
): BatchClassification {
  const functionCalls = calls.filter(isFunctionCallPart);

  const needsApproval = functionCalls.some(
    (call) => registry.resolve(call.name)?.approvalMode === "always_require",
  );
  if (needsApproval) {
    return { kind: "approval", requests: functionCalls.map(createApprovalRequest) };
  }

  const additionalNames = new Set(config.additionalTools.map((tool) => tool.name));
  const callerSide = functionCalls.some(
    (call) =>
      registry.resolve(call.name)?.declarationOnly === true ||
      additionalNames.has(call.name),
  );
  if (callerSide) {
    return { kind: "passthrough", calls: functionCalls };
  }

  if (config.terminateOnUnknownCalls) {
    const unknown = functionCalls.find((call) => !registry.has(call.name));
    if (unknown !== undefined) {
      throw new UnknownToolError(unknown.name);
    }
  }

  return { kind: "execute" };
}

/**
 * Every approval response in the conversation, approved or not, keyed by
 * request id.
 */
export function collectApprovalResponses(
  messages: ReadonlyArray<Message>,
): Map<string, FunctionApprovalResponsePart> {
  const responses = new Map<string, FunctionApprovalResponsePart>();
  for (const message of messages) {
    for (const part of message.content) {
      if (isApprovalResponsePart(part)) {
        responses.set(part.id, part);
      }
    }
  }
  return responses;
}

export function approvedCalls(
  responses: ReadonlyMap<string, FunctionApprovalResponsePart>,
): FunctionApprovalResponsePart[] {
  return [...responses.values()].filter((response) => response.approved);
}

function rejectionResult(response: FunctionApprovalResponsePart): FunctionResultPart {
  return {
    kind: "function_result",
    callId: response.functionCall.callId,
    result: REJECTED_RESULT_TEXT,
    error: { kind: ToolErrorKind.REJECTED, message: REJECTED_RESULT_TEXT },
  };
}

/**
 * Rewrites approval traffic in place so the model sees plain calls and
 * results. `approvedResults` holds one result per approved response, in the
 * order those responses appear.
 */
export function reconcileApprovals(
  messages: Message[],
  responses: ReadonlyMap<string, FunctionApprovalResponsePart>,
  approvedResults: ReadonlyArray<FunctionResultPart>,
): void {
  let resultIndex = 0;

  for (const message of messages) {
    const callIds = new Set(
      message.content
        .filter(isFunctionCallPart)
        .map((call) => call.callId)
        .filter((callId) => callId !== ""),
    );
    const rewritten: ContentPart[] = [];

    for (const part of message.content) {
      if (part.kind === "function_approval_request") {
        const call = part.functionCall;
        if (callIds.has(call.callId)) continue;
        callIds.add(call.callId);
        rewritten.push(call);
        continue;
      }

      if (part.kind === "function_approval_response") {
        if (part.approved && responses.has(part.id)) {
          const result = approvedResults[resultIndex];
          if (result === undefined) {
            rewritten.push(part);
            continue;
          }
          resultIndex++;
          rewritten.push(result);
        } else {
          rewritten.push(rejectionResult(part));
        }
        message.role = Role.TOOL;
        continue;
      }

      rewritten.push(part);
    }

    message.content = rewritten;
  }
}
