import { Role } from "./role.js";
import type { ContentPart } from "./content-part.js";
import { isTextPart } from "./content-part.js";

export interface Message {
  role: Role;
  content: ContentPart[];
  messageId?: string;
  authorName?: string;
}

export type MessageInput = string | Message | Array<string | Message>;

export function systemMessage(text: string): Message {
  return {
    role: Role.SYSTEM,
    content: [{ kind: "text", text }],
  };
}

export function userMessage(text: string): Message {
  return {
    role: Role.USER,
    content: [{ kind: "text", text }],
  };
}

export function assistantMessage(text: string): Message {
  return {
    role: Role.ASSISTANT,
    content: [{ kind: "text", text }],
  };
}

export function messageText(message: Message): string {
  return message.content
    .filter(isTextPart)
    .map((part) => part.text)
    .join("");
}

/**
 * Normalizes caller input into a fresh message list. Strings become user
 * messages. Message objects are kept as they are, so approval traffic
 * rewritten during a request is also rewritten in the caller's history.
 */
export function prepareMessages(input: MessageInput): Message[] {
  const items = Array.isArray(input) ? input : [input];
  return items.map((item) => (typeof item === "string" ? userMessage(item) : item));
}
