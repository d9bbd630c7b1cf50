import type { Message } from "../types/message.js";
import {
  ConfigurationError,
  DeclarationOnlyError,
  ExceptionLimitExceededError,
  InvocationLimitExceededError,
} from "../types/errors.js";
import { validateToolName } from "../utils/validate-tool-name.js";
import type { Logger } from "../utils/logger.js";
import { moduleLogger } from "../utils/logger.js";

export type ApprovalMode = "never_require" | "always_require";

export interface ToolExecutionContext {
  callId: string;
  messages: ReadonlyArray<Message>;
  /** Caller-supplied extras forwarded with every call of the round. */
  additionalArguments: Readonly<Record<string, unknown>>;
  abortSignal?: AbortSignal;
}

export type ToolFunction = (
  args: Record<string, unknown>,
  context: ToolExecutionContext,
) => unknown;

/**
 * Wire-level description of a tool, as advertised to the model.
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface FunctionToolOptions {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
  execute?: ToolFunction;
  approvalMode?: ApprovalMode;
  maxInvocations?: number;
  maxInvocationExceptions?: number;
  logger?: Logger;
}

const EMPTY_OBJECT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {},
};

function checkLimit(name: string, field: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigurationError(
      `Tool "${name}": ${field} must be an integer of at least 1`,
    );
  }
}

/**
 * A named, schema-described capability the model may ask to invoke.
 *
 * Instances are long-lived: the invocation counters bound a tool's total use
 * across every round of every request made with it, and are never reset.
 */
export class FunctionTool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  readonly approvalMode: ApprovalMode;
  readonly maxInvocations: number | undefined;
  readonly maxInvocationExceptions: number | undefined;
  private readonly implementation: ToolFunction | undefined;
  private readonly logger: Logger;
  private _invocationCount = 0;
  private _invocationExceptionCount = 0;

  constructor(options: FunctionToolOptions) {
    const nameError = validateToolName(options.name);
    if (nameError !== undefined) {
      throw new ConfigurationError(`Invalid tool name "${options.name}": ${nameError}`);
    }
    checkLimit(options.name, "maxInvocations", options.maxInvocations);
    checkLimit(
      options.name,
      "maxInvocationExceptions",
      options.maxInvocationExceptions,
    );

    this.name = options.name;
    this.description = options.description ?? "";
    this.parameters = options.parameters ?? EMPTY_OBJECT_SCHEMA;
    this.approvalMode = options.approvalMode ?? "never_require";
    this.maxInvocations = options.maxInvocations;
    this.maxInvocationExceptions = options.maxInvocationExceptions;
    this.implementation = options.execute;
    this.logger = moduleLogger("tool", options.logger).child({ tool: options.name });
  }

  /**
   * Wraps a bare callable. The tool takes the function's own name unless one
   * is given.
   */
  static fromFunction(
    fn: ToolFunction,
    options: Partial<Omit<FunctionToolOptions, "execute">> = {},
  ): FunctionTool {
    return new FunctionTool({ ...options, name: options.name ?? fn.name, execute: fn });
  }

  /** A tool the model may call but that only the caller can run. */
  static fromDeclaration(declaration: ToolDeclaration): FunctionTool {
    return new FunctionTool({
      name: declaration.name,
      description: declaration.description,
      parameters: declaration.parameters,
    });
  }

  get declarationOnly(): boolean {
    return this.implementation === undefined;
  }

  get invocationCount(): number {
    return this._invocationCount;
  }

  get invocationExceptionCount(): number {
    return this._invocationExceptionCount;
  }

  toDeclaration(): ToolDeclaration {
    return {
      name: this.name,
      description: this.description,
      parameters: this.parameters,
    };
  }

  async invoke(
    args: Record<string, unknown>,
    context: ToolExecutionContext,
  ): Promise<unknown> {
    const implementation = this.implementation;
    if (implementation === undefined) {
      throw new DeclarationOnlyError(this.name);
    }
    if (
      this.maxInvocations !== undefined &&
      this._invocationCount >= this.maxInvocations
    ) {
      throw new InvocationLimitExceededError(this.name);
    }
    if (
      this.maxInvocationExceptions !== undefined &&
      this._invocationExceptionCount >= this.maxInvocationExceptions
    ) {
      throw new ExceptionLimitExceededError(this.name);
    }

    // Checked and counted before the first await: concurrent calls of the same
    // tool cannot both pass the limit check.
    this._invocationCount++;
    this.logger.debug({ callId: context.callId, args }, "Invoking function");
    const startedAt = performance.now();
    try {
      const result = await implementation(args, context);
      this.logger.debug(
        { callId: context.callId, durationMs: performance.now() - startedAt },
        "Function succeeded",
      );
      return result;
    } catch (error: unknown) {
      this._invocationExceptionCount++;
      this.logger.warn(
        {
          callId: context.callId,
          durationMs: performance.now() - startedAt,
          err: error,
        },
        "Function failed",
      );
      throw error;
    }
  }
}
