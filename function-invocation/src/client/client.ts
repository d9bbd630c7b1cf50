import type { MessageInput } from "../types/message.js";
import type { ChatResponse, ResponseUpdate } from "../types/response.js";
import type { ChatModel, ChatOptions } from "../types/chat-model.js";
import type { InvocationConfig } from "../invocation/config.js";
import { FunctionInvoker } from "../invocation/function-invoker.js";
import type { ToolMiddleware } from "../invocation/tool-middleware.js";
import type { Logger } from "../utils/logger.js";
import type { ChatMiddleware } from "./middleware.js";
import {
  buildMiddlewareChain,
  buildStreamMiddlewareChain,
} from "./middleware.js";

export interface ChatClientOptions {
  model: ChatModel;
  /** Wraps every model call, including each round of a tool loop. */
  middleware?: ChatMiddleware[];
  /** Wraps every tool invocation. */
  toolMiddleware?: ToolMiddleware[];
  functionInvocation?: Partial<InvocationConfig>;
  logger?: Logger;
}

function withMiddleware(
  model: ChatModel,
  middleware: ReadonlyArray<ChatMiddleware>,
): ChatModel {
  const complete = buildMiddlewareChain(middleware, (request) =>
    model.complete(request.messages, request.options),
  );
  const stream = buildStreamMiddlewareChain(middleware, (request) =>
    model.stream(request.messages, request.options),
  );
  return {
    name: model.name,
    complete: (messages, options) => complete({ messages, options }),
    stream: (messages, options) => stream({ messages, options }),
  };
}

/**
 * Entry point for callers: a model wrapped in chat middleware, driven by a
 * function invoker.
 */
export class ChatClient {
  private readonly invoker: FunctionInvoker;
  readonly modelName: string;

  constructor(options: ChatClientOptions) {
    this.modelName = options.model.name;
    this.invoker = new FunctionInvoker({
      model: withMiddleware(options.model, options.middleware ?? []),
      config: options.functionInvocation,
      middleware: options.toolMiddleware,
      logger: options.logger,
    });
  }

  get functionInvocation(): Readonly<InvocationConfig> {
    return this.invoker.config;
  }

  set functionInvocation(config: Partial<InvocationConfig>) {
    this.invoker.config = config;
  }

  getResponse(
    messages: MessageInput,
    options: ChatOptions = {},
  ): Promise<ChatResponse> {
    return this.invoker.getResponse(messages, options);
  }

  getStreamingResponse(
    messages: MessageInput,
    options: ChatOptions = {},
  ): AsyncGenerator<ResponseUpdate, void, undefined> {
    return this.invoker.getStreamingResponse(messages, options);
  }
}
