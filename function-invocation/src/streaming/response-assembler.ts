import type { Message } from "../types/message.js";
import { Role } from "../types/role.js";
import type { Annotation, ContentPart } from "../types/content-part.js";
import {
  ContentKind,
  isFunctionCallPart,
  isReasoningPart,
  isTextPart,
  isUsagePart,
} from "../types/content-part.js";
import type { ChatResponse, ResponseUpdate } from "../types/response.js";
import { responseText } from "../types/response.js";
import { addUsage, emptyUsage } from "../types/usage.js";
import { mergeFunctionCalls } from "../types/function-call.js";
import { ContentMismatchError } from "../types/errors.js";
import { safeJsonParse } from "../utils/json.js";
import { validateJsonSchema } from "../utils/validate-json-schema.js";
import type { Logger } from "../utils/logger.js";
import { moduleLogger } from "../utils/logger.js";

export interface AssembleOptions {
  /** JSON schema for structured output; parsed from the text when no value arrived. */
  responseFormat?: Record<string, unknown>;
  logger?: Logger;
}

/**
 * Folds streamed updates into a single response. Updates are merged as they
 * arrive; adjacent text fragments are only joined once, in `finalize`.
 */
export class ResponseAssembler {
  private readonly response: ChatResponse = { messages: [] };

  process(update: ResponseUpdate): void {
    const message = this.messageFor(update);

    if (update.authorName !== undefined) message.authorName = update.authorName;
    if (update.role !== undefined) message.role = update.role;
    if (update.messageId) message.messageId = update.messageId;

    for (const part of update.content) {
      this.appendPart(message, part);
    }

    const response = this.response;
    if (update.responseId) response.responseId = update.responseId;
    if (update.conversationId !== undefined) {
      response.conversationId = update.conversationId;
    }
    if (update.modelId !== undefined) response.modelId = update.modelId;
    if (update.finishReason !== undefined) {
      response.finishReason = update.finishReason;
    }
    if (update.raw !== undefined) {
      (response.raw ??= []).push(update.raw);
    }
  }

  finalize(options: AssembleOptions = {}): ChatResponse {
    const response = this.response;
    for (const message of response.messages) {
      message.content = coalesceText(
        coalesceText(message.content, ContentKind.TEXT),
        ContentKind.REASONING,
      );
    }
    if (options.responseFormat !== undefined && response.value === undefined) {
      tryParseValue(response, options.responseFormat, options.logger);
    }
    return response;
  }

  private messageFor(update: ResponseUpdate): Message {
    const messages = this.response.messages;
    const last = messages[messages.length - 1];
    const startsNew =
      last === undefined ||
      (update.messageId !== undefined &&
        update.messageId !== "" &&
        last.messageId !== undefined &&
        last.messageId !== update.messageId) ||
      (update.role !== undefined && last.role !== update.role);

    if (!startsNew) return last;
    const message: Message = { role: Role.ASSISTANT, content: [] };
    messages.push(message);
    return message;
  }

  private appendPart(message: Message, part: ContentPart): void {
    const content = message.content;
    const last = content[content.length - 1];

    if (isFunctionCallPart(part) && last !== undefined && isFunctionCallPart(last)) {
      try {
        content[content.length - 1] = mergeFunctionCalls(last, part);
        return;
      } catch (error: unknown) {
        if (!(error instanceof ContentMismatchError)) throw error;
      }
      content.push(part);
      return;
    }

    if (isUsagePart(part)) {
      this.response.usage = addUsage(this.response.usage ?? emptyUsage(), part.usage);
      return;
    }

    content.push(part);
  }
}

interface TextFields {
  text: string;
  annotations?: Annotation[];
  raw?: unknown;
}

function combineRaw(a: unknown, b: unknown): unknown {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return [...(Array.isArray(a) ? a : [a]), ...(Array.isArray(b) ? b : [b])];
}

function joinFields(a: TextFields, b: TextFields): TextFields {
  const joined: TextFields = { text: a.text + b.text };
  if (a.annotations !== undefined || b.annotations !== undefined) {
    joined.annotations = [...(a.annotations ?? []), ...(b.annotations ?? [])];
  }
  const raw = combineRaw(a.raw, b.raw);
  if (raw !== undefined) joined.raw = raw;
  return joined;
}

function joinParts(a: ContentPart, b: ContentPart): ContentPart | undefined {
  if (isTextPart(a) && isTextPart(b)) {
    return { ...a, ...joinFields(a, b) };
  }
  if (isReasoningPart(a) && isReasoningPart(b)) {
    return { ...a, ...joinFields(a, b) };
  }
  return undefined;
}

function coalesceText(
  content: ContentPart[],
  kind: typeof ContentKind.TEXT | typeof ContentKind.REASONING,
): ContentPart[] {
  const out: ContentPart[] = [];
  for (const part of content) {
    const previous = out[out.length - 1];
    const joined =
      previous !== undefined && part.kind === kind
        ? joinParts(previous, part)
        : undefined;
    if (joined !== undefined) {
      out[out.length - 1] = joined;
    } else {
      out.push(part);
    }
  }
  return out;
}

function tryParseValue(
  response: ChatResponse,
  schema: Record<string, unknown>,
  logger?: Logger,
): void {
  const log = moduleLogger("response-assembler", logger);
  const parsed = safeJsonParse(responseText(response));
  if (!parsed.success) {
    log.debug({ err: parsed.error }, "Failed to parse value from response text");
    return;
  }
  const validation = validateJsonSchema(parsed.value, schema);
  if (!validation.valid) {
    log.debug({ errors: validation.errors }, "Response value does not match schema");
    return;
  }
  response.value = parsed.value;
}

export function assembleResponse(
  updates: Iterable<ResponseUpdate>,
  options: AssembleOptions = {},
): ChatResponse {
  const assembler = new ResponseAssembler();
  for (const update of updates) {
    assembler.process(update);
  }
  return assembler.finalize(options);
}

export async function assembleResponseFromStream(
  updates: AsyncIterable<ResponseUpdate>,
  options: AssembleOptions = {},
): Promise<ChatResponse> {
  const assembler = new ResponseAssembler();
  for await (const update of updates) {
    assembler.process(update);
  }
  return assembler.finalize(options);
}
