export { Role } from "./types/role.js";
export type {
  Annotation,
  ContentPart,
  DataPart,
  ErrorPart,
  FunctionApprovalRequestPart,
  FunctionApprovalResponsePart,
  FunctionCallPart,
  FunctionResultPart,
  ReasoningPart,
  TextPart,
  UsagePart,
} from "./types/content-part.js";
export {
  ContentKind,
  functionCallPart,
  functionResultPart,
  isApprovalRequestPart,
  isApprovalResponsePart,
  isFunctionCallPart,
  isFunctionResultPart,
  isReasoningPart,
  isTextPart,
  isUsagePart,
  textPart,
} from "./types/content-part.js";
export type { Message, MessageInput } from "./types/message.js";
export {
  assistantMessage,
  messageText,
  prepareMessages,
  systemMessage,
  userMessage,
} from "./types/message.js";
export type { ChatResponse, FinishReason, ResponseUpdate } from "./types/response.js";
export { responseFunctionCalls, responseText, updateText } from "./types/response.js";
export type { Usage } from "./types/usage.js";
export { addUsage, emptyUsage } from "./types/usage.js";
export { mergeFunctionCalls, parseFunctionArguments } from "./types/function-call.js";
export type { ToolChoice } from "./types/tool.js";
export type { ChatModel, ChatOptions } from "./types/chat-model.js";
export type { Err, Ok, Result } from "./types/result.js";
export { err, isErr, isOk, ok } from "./types/result.js";
export type { ToolFailure } from "./types/errors.js";
export {
  ArgumentValidationError,
  ConfigurationError,
  ContentMismatchError,
  DeclarationOnlyError,
  ExceptionLimitExceededError,
  InvocationLimitExceededError,
  SDKError,
  ToolError,
  ToolErrorKind,
  UnknownToolError,
  toToolFailure,
} from "./types/errors.js";

export type {
  ApprovalMode,
  FunctionToolOptions,
  ToolDeclaration,
  ToolExecutionContext,
  ToolFunction,
} from "./tools/function-tool.js";
export { FunctionTool } from "./tools/function-tool.js";
export type { ToolSpec } from "./tools/registry.js";
export { ToolRegistry, isToolDeclaration, toolDeclarations } from "./tools/registry.js";

export type { AssembleOptions } from "./streaming/response-assembler.js";
export {
  ResponseAssembler,
  assembleResponse,
  assembleResponseFromStream,
} from "./streaming/response-assembler.js";

export type { InvocationConfig } from "./invocation/config.js";
export {
  DEFAULT_INVOCATION_CONFIG,
  DEFAULT_MAX_CONSECUTIVE_ERRORS_PER_REQUEST,
  DEFAULT_MAX_ITERATIONS,
  resolveInvocationConfig,
} from "./invocation/config.js";
export type { BatchClassification, PendingCall } from "./invocation/approval.js";
export {
  REJECTED_RESULT_TEXT,
  approvedCalls,
  classifyFunctionCalls,
  collectApprovalResponses,
  createApprovalRequest,
  createApprovalResponse,
  reconcileApprovals,
} from "./invocation/approval.js";
export type {
  ToolInvocationContext,
  ToolMiddleware,
  ToolNextFn,
} from "./invocation/tool-middleware.js";
export { buildToolMiddlewareChain } from "./invocation/tool-middleware.js";
export type { BatchExecution, ExecutionContext } from "./invocation/executor.js";
export {
  ARGUMENT_PARSING_FAILED_TEXT,
  FUNCTION_FAILED_TEXT,
  executeFunctionCalls,
} from "./invocation/executor.js";
export type { FunctionInvokerOptions } from "./invocation/function-invoker.js";
export { FunctionInvoker } from "./invocation/function-invoker.js";

export * from "./client/index.js";

export type { Logger, LoggerConfig } from "./utils/logger.js";
export { createLogger, getLogger, setLogger } from "./utils/logger.js";
