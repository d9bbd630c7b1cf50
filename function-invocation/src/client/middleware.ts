import type { Message } from "../types/message.js";
import type { ChatResponse, ResponseUpdate } from "../types/response.js";
import type { ChatOptions } from "../types/chat-model.js";

/**
 * One model call as seen by chat middleware. `options` is the invoker's live
 * options object: assigning `options.tools` changes the tools used to run the
 * calls in this response and every later round.
 */
export interface ChatRequest {
  messages: Message[];
  options: ChatOptions;
}

export type NextFn = (request: ChatRequest) => Promise<ChatResponse>;
export type StreamNextFn = (request: ChatRequest) => AsyncIterable<ResponseUpdate>;

export interface ChatMiddleware {
  complete?: (request: ChatRequest, next: NextFn) => Promise<ChatResponse>;
  stream?: (
    request: ChatRequest,
    next: StreamNextFn,
  ) => AsyncIterable<ResponseUpdate>;
}

export function buildMiddlewareChain(
  middlewares: ReadonlyArray<ChatMiddleware>,
  handler: NextFn,
): NextFn {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    if (mw.complete) {
      const next = chain;
      const completeFn = mw.complete;
      chain = (request) => completeFn(request, next);
    }
  }
  return chain;
}

export function buildStreamMiddlewareChain(
  middlewares: ReadonlyArray<ChatMiddleware>,
  handler: StreamNextFn,
): StreamNextFn {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    if (mw.stream) {
      const next = chain;
      const streamFn = mw.stream;
      chain = (request) => streamFn(request, next);
    }
  }
  return chain;
}
