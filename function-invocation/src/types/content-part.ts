import type { ToolFailure } from "./errors.js";
import type { Usage } from "./usage.js";

export interface Annotation {
  kind: string;
  title?: string;
  url?: string;
  fileId?: string;
  snippet?: string;
  startIndex?: number;
  endIndex?: number;
}

export interface TextPart {
  kind: "text";
  text: string;
  annotations?: Annotation[];
  raw?: unknown;
}

export interface ReasoningPart {
  kind: "reasoning";
  text: string;
  annotations?: Annotation[];
  raw?: unknown;
}

export interface DataPart {
  kind: "data";
  uri: string;
  mediaType?: string;
}

export interface FunctionCallPart {
  kind: "function_call";
  callId: string;
  name: string;
  /** A partial JSON string while streaming, a parsed map once complete. */
  arguments?: string | Record<string, unknown>;
  error?: ToolFailure;
  raw?: unknown;
}

export interface FunctionResultPart {
  kind: "function_result";
  callId: string;
  result?: unknown;
  error?: ToolFailure;
}

export interface FunctionApprovalRequestPart {
  kind: "function_approval_request";
  id: string;
  functionCall: FunctionCallPart;
}

export interface FunctionApprovalResponsePart {
  kind: "function_approval_response";
  id: string;
  functionCall: FunctionCallPart;
  approved: boolean;
}

export interface UsagePart {
  kind: "usage";
  usage: Usage;
}

export interface ErrorPart {
  kind: "error";
  message: string;
  code?: string;
}

/**
 * Discriminated union of content parts. Supports switch-based narrowing on `kind`.
 */
export type ContentPart =
  | TextPart
  | ReasoningPart
  | DataPart
  | FunctionCallPart
  | FunctionResultPart
  | FunctionApprovalRequestPart
  | FunctionApprovalResponsePart
  | UsagePart
  | ErrorPart;

export const ContentKind = {
  TEXT: "text",
  REASONING: "reasoning",
  DATA: "data",
  FUNCTION_CALL: "function_call",
  FUNCTION_RESULT: "function_result",
  FUNCTION_APPROVAL_REQUEST: "function_approval_request",
  FUNCTION_APPROVAL_RESPONSE: "function_approval_response",
  USAGE: "usage",
  ERROR: "error",
} as const;

export type ContentKind = (typeof ContentKind)[keyof typeof ContentKind];

export function isTextPart(part: ContentPart): part is TextPart {
  return part.kind === "text";
}

export function isReasoningPart(part: ContentPart): part is ReasoningPart {
  return part.kind === "reasoning";
}

export function isFunctionCallPart(part: ContentPart): part is FunctionCallPart {
  return part.kind === "function_call";
}

export function isFunctionResultPart(
  part: ContentPart,
): part is FunctionResultPart {
  return part.kind === "function_result";
}

export function isApprovalRequestPart(
  part: ContentPart,
): part is FunctionApprovalRequestPart {
  return part.kind === "function_approval_request";
}

export function isApprovalResponsePart(
  part: ContentPart,
): part is FunctionApprovalResponsePart {
  return part.kind === "function_approval_response";
}

export function isUsagePart(part: ContentPart): part is UsagePart {
  return part.kind === "usage";
}

export function textPart(text: string): TextPart {
  return { kind: "text", text };
}

export function functionCallPart(
  callId: string,
  name: string,
  args?: string | Record<string, unknown>,
): FunctionCallPart {
  return args === undefined
    ? { kind: "function_call", callId, name }
    : { kind: "function_call", callId, name, arguments: args };
}

export function functionResultPart(
  callId: string,
  result: unknown,
  error?: ToolFailure,
): FunctionResultPart {
  return error === undefined
    ? { kind: "function_result", callId, result }
    : { kind: "function_result", callId, result, error };
}
