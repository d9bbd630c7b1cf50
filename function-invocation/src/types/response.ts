import type { Message } from "./message.js";
import { messageText } from "./message.js";
import type { Role } from "./role.js";
import type { ContentPart, FunctionCallPart } from "./content-part.js";
import { isFunctionCallPart, isTextPart } from "./content-part.js";
import type { Usage } from "./usage.js";

export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter";

export interface ChatResponse {
  messages: Message[];
  responseId?: string;
  /** Set when the provider keeps the conversation history server-side. */
  conversationId?: string;
  modelId?: string;
  finishReason?: FinishReason;
  usage?: Usage;
  /** Structured output parsed from the response text. */
  value?: unknown;
  raw?: unknown[];
}

/**
 * One fragment of a streamed response.
 */
export interface ResponseUpdate {
  content: ContentPart[];
  role?: Role;
  messageId?: string;
  authorName?: string;
  responseId?: string;
  conversationId?: string;
  modelId?: string;
  finishReason?: FinishReason;
  raw?: unknown;
}

export function responseText(response: ChatResponse): string {
  return response.messages
    .map((message) => messageText(message))
    .join("\n")
    .trim();
}

export function responseFunctionCalls(
  response: ChatResponse,
): FunctionCallPart[] {
  return response.messages.flatMap((message) =>
    message.content.filter(isFunctionCallPart),
  );
}

export function updateText(update: ResponseUpdate): string {
  return update.content
    .filter(isTextPart)
    .map((part) => part.text)
    .join("");
}
