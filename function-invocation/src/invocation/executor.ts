import type { Message } from "../types/message.js";
import type { FunctionCallPart, FunctionResultPart } from "../types/content-part.js";
import type { ToolFailure } from "../types/errors.js";
import {
  ArgumentValidationError,
  UnknownToolError,
  toToolFailure,
} from "../types/errors.js";
import type { Result } from "../types/result.js";
import { err, isErr, ok } from "../types/result.js";
import { isPlainObject, parseFunctionArguments } from "../types/function-call.js";
import type { FunctionTool } from "../tools/function-tool.js";
import type { ToolRegistry } from "../tools/registry.js";
import { validateJsonSchema } from "../utils/validate-json-schema.js";
import type { Logger } from "../utils/logger.js";
import { moduleLogger } from "../utils/logger.js";
import type { PendingCall } from "./approval.js";
import type { ToolInvocationContext, ToolMiddleware, ToolNextFn } from "./tool-middleware.js";
import { buildToolMiddlewareChain, invokeTool } from "./tool-middleware.js";

export const ARGUMENT_PARSING_FAILED_TEXT = "Error: Argument parsing failed.";
export const FUNCTION_FAILED_TEXT = "Error: Function failed.";

export interface ExecutionContext {
  registry: ToolRegistry;
  messages: ReadonlyArray<Message>;
  additionalArguments?: Record<string, unknown>;
  middleware?: ReadonlyArray<ToolMiddleware>;
  includeDetailedErrors?: boolean;
  abortSignal?: AbortSignal;
  logger?: Logger;
}

export interface BatchExecution {
  /** One result per call, in call order. */
  results: FunctionResultPart[];
  /** At least one call produced a failed result. */
  hadErrors: boolean;
  /** A tool middleware asked to stop the orchestration after this batch. */
  terminate: boolean;
}

interface CallOutcome {
  result: FunctionResultPart;
  terminate: boolean;
}

function failedResult(
  call: FunctionCallPart,
  text: string,
  failure: ToolFailure,
  detailed: boolean,
): FunctionResultPart {
  return {
    kind: "function_result",
    callId: call.callId,
    result: detailed ? `${text} Exception: ${failure.message}` : text,
    error: failure,
  };
}

/**
 * Builds the argument map for one call: caller-supplied extras the schema
 * declares, overlaid by what the model sent, then checked against the schema.
 */
function prepareArguments(
  call: FunctionCallPart,
  tool: FunctionTool,
  additionalArguments: Readonly<Record<string, unknown>>,
): Result<Record<string, unknown>, ArgumentValidationError> {
  const declared = tool.parameters["properties"];
  const extras: Record<string, unknown> = {};
  if (isPlainObject(declared)) {
    for (const [key, value] of Object.entries(additionalArguments)) {
      if (Object.hasOwn(declared, key)) extras[key] = value;
    }
  }

  const args = { ...extras, ...parseFunctionArguments(call) };
  const validation = validateJsonSchema(args, tool.parameters);
  if (!validation.valid) {
    return err(new ArgumentValidationError(tool.name, validation.errors));
  }
  return ok(args);
}

async function executeCall(
  pending: PendingCall,
  context: ExecutionContext,
  chain: ToolNextFn,
  log: Logger,
): Promise<CallOutcome> {
  const call =
    pending.kind === "function_approval_response" ? pending.functionCall : pending;
  const detailed = context.includeDetailedErrors ?? false;

  const tool = context.registry.resolve(call.name);
  if (tool === undefined) {
    const error = new UnknownToolError(call.name);
    log.warn({ callId: call.callId, tool: call.name }, "Requested function not found");
    return {
      result: failedResult(call, error.message, toToolFailure(error), false),
      terminate: false,
    };
  }

  const additionalArguments = context.additionalArguments ?? {};
  const prepared = prepareArguments(call, tool, additionalArguments);
  if (isErr(prepared)) {
    log.warn(
      { callId: call.callId, tool: call.name, err: prepared.error },
      "Function arguments failed validation",
    );
    return {
      result: failedResult(
        call,
        ARGUMENT_PARSING_FAILED_TEXT,
        toToolFailure(prepared.error),
        detailed,
      ),
      terminate: false,
    };
  }

  const invocation: ToolInvocationContext = {
    tool,
    arguments: prepared.value,
    callId: call.callId,
    messages: context.messages,
    additionalArguments,
    abortSignal: context.abortSignal,
    terminate: false,
  };

  try {
    const value = await chain(invocation);
    log.debug({ callId: call.callId, tool: call.name }, "Function call completed");
    return {
      result: { kind: "function_result", callId: call.callId, result: value },
      terminate: invocation.terminate,
    };
  } catch (error: unknown) {
    log.debug({ callId: call.callId, tool: call.name }, "Function call failed");
    return {
      result: failedResult(call, FUNCTION_FAILED_TEXT, toToolFailure(error), detailed),
      terminate: invocation.terminate,
    };
  }
}

/**
 * Runs a batch concurrently. Every call yields a result, failed or not; one
 * call's failure never affects the others.
 */
export async function executeFunctionCalls(
  calls: ReadonlyArray<PendingCall>,
  context: ExecutionContext,
): Promise<BatchExecution> {
  const log = moduleLogger("executor", context.logger);
  const chain = buildToolMiddlewareChain(context.middleware ?? [], invokeTool);

  const outcomes = await Promise.all(
    calls.map((call) => executeCall(call, context, chain, log)),
  );

  const results = outcomes.map((outcome) => outcome.result);
  const failed = results.filter((result) => result.error !== undefined).length;
  if (failed > 0) {
    log.warn({ calls: results.length, failed }, "Function calls failed");
  }
  return {
    results,
    hadErrors: failed > 0,
    terminate: outcomes.some((outcome) => outcome.terminate),
  };
}
