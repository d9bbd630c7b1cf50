import type { FunctionCallPart } from "./content-part.js";
import { ContentMismatchError } from "./errors.js";
import { safeJsonParse } from "../utils/json.js";

function isEmptyArguments(args: FunctionCallPart["arguments"]): boolean {
  if (args === undefined || args === "") return true;
  return typeof args !== "string" && Object.keys(args).length === 0;
}

/**
 * Combines two fragments of the same function call. String arguments are
 * concatenated, map arguments are shallow-merged with `b` winning.
 *
 * @throws ContentMismatchError when `b` names a different call id.
 * @throws TypeError when one side is a string and the other a map.
 */
export function mergeFunctionCalls(
  a: FunctionCallPart,
  b: FunctionCallPart,
): FunctionCallPart {
  if (b.callId && a.callId !== b.callId) {
    throw new ContentMismatchError(
      `Cannot merge function call "${b.callId}" into "${a.callId}"`,
    );
  }

  let args: FunctionCallPart["arguments"];
  if (isEmptyArguments(a.arguments)) {
    args = b.arguments;
  } else if (isEmptyArguments(b.arguments)) {
    args = a.arguments;
  } else if (typeof a.arguments === "string" && typeof b.arguments === "string") {
    args = a.arguments + b.arguments;
  } else if (typeof a.arguments === "object" && typeof b.arguments === "object") {
    args = { ...a.arguments, ...b.arguments };
  } else {
    throw new TypeError("Incompatible argument types");
  }

  const merged: FunctionCallPart = {
    kind: "function_call",
    callId: a.callId,
    name: a.name || b.name,
  };
  if (args !== undefined) merged.arguments = args;
  const error = a.error ?? b.error;
  if (error !== undefined) merged.error = error;
  const raw = a.raw ?? b.raw;
  if (raw !== undefined) merged.raw = raw;
  return merged;
}

/**
 * Parses call arguments into a map. Text that is not a JSON object is kept
 * under a single `raw` key.
 */
export function parseFunctionArguments(
  call: FunctionCallPart,
): Record<string, unknown> {
  const args = call.arguments;
  if (args === undefined || args === "") {
    return {};
  }
  if (typeof args !== "string") {
    return args;
  }
  const parsed = safeJsonParse(args);
  if (!parsed.success) {
    return { raw: args };
  }
  if (isPlainObject(parsed.value)) {
    return parsed.value;
  }
  return { raw: parsed.value };
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
