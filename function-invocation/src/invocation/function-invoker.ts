import type { Message, MessageInput } from "../types/message.js";
import { prepareMessages } from "../types/message.js";
import { Role } from "../types/role.js";
import type {
  FunctionApprovalRequestPart,
  FunctionCallPart,
  FunctionResultPart,
} from "../types/content-part.js";
import {
  isApprovalRequestPart,
  isFunctionCallPart,
  isFunctionResultPart,
} from "../types/content-part.js";
import type { ChatResponse, ResponseUpdate } from "../types/response.js";
import type { ChatModel, ChatOptions } from "../types/chat-model.js";
import { ToolRegistry } from "../tools/registry.js";
import { ResponseAssembler } from "../streaming/response-assembler.js";
import type { Logger } from "../utils/logger.js";
import { moduleLogger } from "../utils/logger.js";
import type { InvocationConfig } from "./config.js";
import { resolveInvocationConfig } from "./config.js";
import {
  approvedCalls,
  classifyFunctionCalls,
  collectApprovalResponses,
  reconcileApprovals,
} from "./approval.js";
import type { ExecutionContext } from "./executor.js";
import { executeFunctionCalls } from "./executor.js";
import type { ToolMiddleware } from "./tool-middleware.js";

export interface FunctionInvokerOptions {
  model: ChatModel;
  config?: Partial<InvocationConfig>;
  middleware?: ToolMiddleware[];
  logger?: Logger;
}

type StopReason = "error_budget" | "terminate";

interface InvocationState {
  /** Conversation sent on the next model call. */
  messages: Message[];
  /** Calls and results of completed rounds, prepended to the final response. */
  transcript: Message[];
  errorsInARow: number;
}

type RoundOutcome =
  | { kind: "approval"; requests: FunctionApprovalRequestPart[] }
  | { kind: "passthrough" }
  | { kind: "results"; message: Message; stop: StopReason | undefined };

interface ApprovalReplay {
  results: FunctionResultPart[];
  stop: StopReason | undefined;
}

/**
 * Calls in the first message that the same message does not already answer.
 */
function unmatchedCalls(response: ChatResponse): FunctionCallPart[] {
  const content = response.messages[0]?.content ?? [];
  const answered = new Set(content.filter(isFunctionResultPart).map((r) => r.callId));
  return content.filter(isFunctionCallPart).filter((call) => !answered.has(call.callId));
}

function hasTools(options: ChatOptions): boolean {
  return options.tools !== undefined && options.tools.length > 0;
}

function withTranscript(state: InvocationState, response: ChatResponse): ChatResponse {
  response.messages.unshift(...state.transcript);
  return response;
}

function attachApprovalRequests(
  response: ChatResponse,
  requests: FunctionApprovalRequestPart[],
): void {
  const first = response.messages[0];
  if (first !== undefined && first.role === Role.ASSISTANT) {
    first.content.push(...requests);
  } else {
    response.messages.push({ role: Role.ASSISTANT, content: [...requests] });
  }
}

/**
 * Drives the model/tool round trip: calls the model, runs the tools it asks
 * for, feeds the results back and repeats until the model answers without
 * tool calls or a budget runs out.
 *
 * The invoker never throws for tool failures; those reach the model as
 * result text. It throws for invalid configuration and, when
 * `terminateOnUnknownCalls` is set, for calls to unregistered tools.
 */
export class FunctionInvoker {
  private readonly model: ChatModel;
  private readonly middleware: ToolMiddleware[];
  private readonly logger: Logger;
  private _config: InvocationConfig;

  constructor(options: FunctionInvokerOptions) {
    this.model = options.model;
    this.middleware = options.middleware ?? [];
    this.logger = moduleLogger("function-invoker", options.logger);
    this._config = resolveInvocationConfig(options.config);
  }

  get config(): Readonly<InvocationConfig> {
    return this._config;
  }

  /** Replaces the configuration; takes effect on the next request. */
  set config(config: Partial<InvocationConfig>) {
    this._config = resolveInvocationConfig(config);
  }

  async getResponse(
    input: MessageInput,
    callerOptions: ChatOptions = {},
  ): Promise<ChatResponse> {
    const config = this._config;
    const options = this.prepareOptions(callerOptions);
    if (!config.enabled) {
      options.toolChoice = { mode: "none" };
      return this.model.complete(prepareMessages(input), options);
    }

    const state: InvocationState = {
      messages: prepareMessages(input),
      transcript: [],
      errorsInARow: 0,
    };

    let stop: StopReason | undefined;
    for (let round = 0; round < config.maxIterations; round++) {
      this.logger.debug({ round }, "Starting function invocation round");

      const replay = await this.replayApprovals(state, options);
      if (replay.stop === "terminate") {
        return { messages: [{ role: Role.TOOL, content: replay.results }] };
      }
      if (replay.stop === "error_budget") {
        stop = replay.stop;
        break;
      }

      const response = await this.model.complete(state.messages, options);
      const calls = unmatchedCalls(response);
      this.trackConversation(state, options, response);

      // Middleware may have swapped the tool list during the call.
      if (calls.length === 0 || !hasTools(options)) {
        return withTranscript(state, response);
      }

      const outcome = await this.handleCalls(calls, state, options);
      if (outcome.kind === "approval") {
        attachApprovalRequests(response, outcome.requests);
        return withTranscript(state, response);
      }
      if (outcome.kind === "passthrough") {
        return withTranscript(state, response);
      }

      response.messages.push(outcome.message);
      if (outcome.stop === "terminate") {
        return withTranscript(state, response);
      }
      this.recordRound(state, response, outcome.message);
      if (outcome.stop === "error_budget") {
        stop = outcome.stop;
        break;
      }
    }

    this.logExhaustion(stop);
    options.toolChoice = { mode: "none" };
    const response = await this.model.complete(state.messages, options);
    return withTranscript(state, response);
  }

  async *getStreamingResponse(
    input: MessageInput,
    callerOptions: ChatOptions = {},
  ): AsyncGenerator<ResponseUpdate, void, undefined> {
    const config = this._config;
    const options = this.prepareOptions(callerOptions);
    if (!config.enabled) {
      options.toolChoice = { mode: "none" };
      yield* this.model.stream(prepareMessages(input), options);
      return;
    }

    const state: InvocationState = {
      messages: prepareMessages(input),
      transcript: [],
      errorsInARow: 0,
    };

    let stop: StopReason | undefined;
    for (let round = 0; round < config.maxIterations; round++) {
      this.logger.debug({ round }, "Starting streaming function invocation round");

      const replay = await this.replayApprovals(state, options);
      if (replay.stop === "terminate") {
        yield { role: Role.TOOL, content: replay.results };
        return;
      }
      if (replay.stop === "error_budget") {
        stop = replay.stop;
        break;
      }

      const assembler = new ResponseAssembler();
      let sawCalls = false;
      for await (const update of this.model.stream(state.messages, options)) {
        assembler.process(update);
        const carriesCalls = update.content.some(
          (part) => isFunctionCallPart(part) || isApprovalRequestPart(part),
        );
        if (carriesCalls) sawCalls = true;
        yield update;
      }
      if (!sawCalls) return;

      const response = assembler.finalize();
      const calls = unmatchedCalls(response);
      this.trackConversation(state, options, response);
      if (calls.length === 0 || !hasTools(options)) return;

      const outcome = await this.handleCalls(calls, state, options);
      if (outcome.kind === "approval") {
        yield { role: Role.ASSISTANT, content: outcome.requests };
        return;
      }
      if (outcome.kind === "passthrough") return;

      yield { role: Role.TOOL, content: outcome.message.content };
      if (outcome.stop === "terminate") return;
      response.messages.push(outcome.message);
      this.recordRound(state, response, outcome.message);
      if (outcome.stop === "error_budget") {
        stop = outcome.stop;
        break;
      }
    }

    this.logExhaustion(stop);
    options.toolChoice = { mode: "none" };
    yield* this.model.stream(state.messages, options);
  }

  private prepareOptions(callerOptions: ChatOptions): ChatOptions {
    // Rejects unusable tools before any model call is made.
    ToolRegistry.from(callerOptions.tools);
    const options: ChatOptions = { ...callerOptions };
    if (hasTools(options) && options.toolChoice === undefined) {
      options.toolChoice = { mode: "auto" };
    }
    return options;
  }

  private executionContext(
    state: InvocationState,
    options: ChatOptions,
  ): ExecutionContext {
    return {
      registry: ToolRegistry.from(options.tools),
      messages: state.messages,
      additionalArguments: options.additionalArguments,
      middleware: this.middleware,
      includeDetailedErrors: this._config.includeDetailedErrors,
      abortSignal: options.abortSignal,
      logger: this.logger,
    };
  }

  /**
   * Executes calls the caller approved since the last request and rewrites
   * the approval traffic into plain calls and results.
   */
  private async replayApprovals(
    state: InvocationState,
    options: ChatOptions,
  ): Promise<ApprovalReplay> {
    const responses = collectApprovalResponses(state.messages);
    if (responses.size === 0) return { results: [], stop: undefined };

    const approved = approvedCalls(responses);
    let results: FunctionResultPart[] = [];
    let stop: StopReason | undefined;
    if (approved.length > 0) {
      const execution = await executeFunctionCalls(
        approved,
        this.executionContext(state, options),
      );
      results = execution.results;
      if (execution.terminate) {
        stop = "terminate";
      } else if (execution.hadErrors && this.countError(state)) {
        stop = "error_budget";
      }
    }
    reconcileApprovals(state.messages, responses, results);
    return { results, stop };
  }

  private async handleCalls(
    calls: FunctionCallPart[],
    state: InvocationState,
    options: ChatOptions,
  ): Promise<RoundOutcome> {
    const context = this.executionContext(state, options);
    const classification = classifyFunctionCalls(calls, context.registry, this._config);
    if (classification.kind === "approval") {
      this.logger.debug(
        { requests: classification.requests.length },
        "Function calls require approval",
      );
      return { kind: "approval", requests: classification.requests };
    }
    if (classification.kind === "passthrough") {
      this.logger.debug(
        { calls: classification.calls.length },
        "Function calls handed back to the caller",
      );
      return { kind: "passthrough" };
    }

    const execution = await executeFunctionCalls(calls, context);
    const message: Message = { role: Role.TOOL, content: execution.results };
    let stop: StopReason | undefined;
    if (execution.terminate) {
      stop = "terminate";
    } else if (!execution.hadErrors) {
      state.errorsInARow = 0;
    } else if (this.countError(state)) {
      stop = "error_budget";
    }
    return { kind: "results", message, stop };
  }

  /** Counts a failed round; true once the consecutive-error budget is spent. */
  private countError(state: InvocationState): boolean {
    state.errorsInARow++;
    const limit = this._config.maxConsecutiveErrorsPerRequest;
    if (state.errorsInARow < limit) return false;
    this.logger.warn(
      { limit },
      "Maximum consecutive function call errors reached, stopping function calls for this request",
    );
    return true;
  }

  private trackConversation(
    state: InvocationState,
    options: ChatOptions,
    response: ChatResponse,
  ): void {
    if (response.conversationId === undefined) return;
    options.conversationId = response.conversationId;
    state.messages = [];
  }

  private recordRound(
    state: InvocationState,
    response: ChatResponse,
    toolMessage: Message,
  ): void {
    state.transcript.push(...response.messages);
    if (response.conversationId !== undefined) {
      state.messages = [toolMessage];
    } else {
      state.messages.push(...response.messages);
    }
  }

  private logExhaustion(stop: StopReason | undefined): void {
    if (stop === undefined) {
      this.logger.warn(
        { maxIterations: this._config.maxIterations },
        "Maximum function invocation rounds reached, requesting a final answer without tools",
      );
    }
  }
}
