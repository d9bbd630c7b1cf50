import type { Message } from "./message.js";
import type { ChatResponse, ResponseUpdate } from "./response.js";
import type { ToolChoice } from "./tool.js";
import type { ToolSpec } from "../tools/registry.js";

export interface ChatOptions {
  modelId?: string;
  /**
   * Tools in effect for the next model call. Middleware may replace this
   * list between rounds; the invoker re-reads it after every call.
   */
  tools?: ToolSpec[];
  toolChoice?: ToolChoice;
  conversationId?: string;
  /** JSON schema the final text is parsed against. */
  responseFormat?: Record<string, unknown>;
  temperature?: number;
  maxTokens?: number;
  /** Extra arguments offered to every tool call; model arguments win. */
  additionalArguments?: Record<string, unknown>;
  abortSignal?: AbortSignal;
}

/**
 * The inner model call the invoker drives. Implementations translate to and
 * from a provider's wire format.
 */
export interface ChatModel {
  readonly name: string;
  complete(messages: Message[], options: ChatOptions): Promise<ChatResponse>;
  stream(messages: Message[], options: ChatOptions): AsyncIterable<ResponseUpdate>;
}
