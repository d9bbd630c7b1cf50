export class SDKError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SDKError";
  }
}

export class ConfigurationError extends SDKError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised when two streamed content fragments cannot be combined, e.g. function
 * call deltas that carry different call ids.
 */
export class ContentMismatchError extends SDKError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ContentMismatchError";
  }
}

export const ToolErrorKind = {
  DECLARATION_ONLY: "declaration_only",
  INVOCATION_LIMIT_EXCEEDED: "invocation_limit_exceeded",
  EXCEPTION_LIMIT_EXCEEDED: "exception_limit_exceeded",
  ARGUMENT_VALIDATION_FAILED: "argument_validation_failed",
  UNKNOWN_TOOL: "unknown_tool",
  TOOL_EXECUTION_FAILED: "tool_execution_failed",
  REJECTED: "rejected",
} as const;

export type ToolErrorKind = (typeof ToolErrorKind)[keyof typeof ToolErrorKind];

export class ToolError extends SDKError {
  readonly kind: ToolErrorKind;
  readonly toolName: string;

  constructor(
    message: string,
    kind: ToolErrorKind,
    toolName: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ToolError";
    this.kind = kind;
    this.toolName = toolName;
  }
}

export class DeclarationOnlyError extends ToolError {
  constructor(toolName: string) {
    super(
      `Function '${toolName}' is declaration only and cannot be invoked.`,
      ToolErrorKind.DECLARATION_ONLY,
      toolName,
    );
    this.name = "DeclarationOnlyError";
  }
}

export class InvocationLimitExceededError extends ToolError {
  constructor(toolName: string) {
    super(
      `Function '${toolName}' has reached its maximum invocation limit, you can no longer use this tool.`,
      ToolErrorKind.INVOCATION_LIMIT_EXCEEDED,
      toolName,
    );
    this.name = "InvocationLimitExceededError";
  }
}

export class ExceptionLimitExceededError extends ToolError {
  constructor(toolName: string) {
    super(
      `Function '${toolName}' has reached its maximum exception limit, you tried to use this tool too many times and it kept failing.`,
      ToolErrorKind.EXCEPTION_LIMIT_EXCEEDED,
      toolName,
    );
    this.name = "ExceptionLimitExceededError";
  }
}

export class ArgumentValidationError extends ToolError {
  constructor(toolName: string, details: string) {
    super(
      `Invalid arguments for function '${toolName}': ${details}`,
      ToolErrorKind.ARGUMENT_VALIDATION_FAILED,
      toolName,
    );
    this.name = "ArgumentValidationError";
  }
}

export class UnknownToolError extends ToolError {
  constructor(toolName: string) {
    super(
      `Error: Requested function "${toolName}" not found.`,
      ToolErrorKind.UNKNOWN_TOOL,
      toolName,
    );
    this.name = "UnknownToolError";
  }
}

/**
 * Failure record stored on a function result instead of a live exception.
 */
export interface ToolFailure {
  kind: ToolErrorKind;
  message: string;
  cause?: unknown;
}

export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof ToolError) {
    return { kind: error.kind, message: error.message, cause: error };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: ToolErrorKind.TOOL_EXECUTION_FAILED, message, cause: error };
}
