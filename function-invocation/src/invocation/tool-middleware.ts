import type { Message } from "../types/message.js";
import type { FunctionTool } from "../tools/function-tool.js";

export interface ToolInvocationContext {
  readonly tool: FunctionTool;
  /** Validated arguments; a middleware may rewrite them before calling `next`. */
  arguments: Record<string, unknown>;
  readonly callId: string;
  readonly messages: ReadonlyArray<Message>;
  readonly additionalArguments: Readonly<Record<string, unknown>>;
  readonly abortSignal?: AbortSignal;
  /** Ends the orchestration once the current batch's results are attached. */
  terminate: boolean;
}

export type ToolNextFn = (context: ToolInvocationContext) => Promise<unknown>;

/**
 * Wraps a single tool invocation. Returning without calling `next`
 * short-circuits the tool and uses the returned value as its result.
 */
export interface ToolMiddleware {
  execute(context: ToolInvocationContext, next: ToolNextFn): Promise<unknown>;
}

export function buildToolMiddlewareChain(
  middlewares: ReadonlyArray<ToolMiddleware>,
  handler: ToolNextFn,
): ToolNextFn {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    const next = chain;
    chain = (context) => mw.execute(context, next);
  }
  return chain;
}

export const invokeTool: ToolNextFn = (context) =>
  context.tool.invoke(context.arguments, {
    callId: context.callId,
    messages: context.messages,
    additionalArguments: context.additionalArguments,
    abortSignal: context.abortSignal,
  });
