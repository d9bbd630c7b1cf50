import { ConfigurationError } from "../types/errors.js";
import type { ToolSpec } from "../tools/registry.js";

export interface InvocationConfig {
  /** When false, requests go straight to the model with no tool loop. */
  enabled: boolean;
  /** Model rounds that may end in tool calls before the fail-safe round. */
  maxIterations: number;
  /** Consecutive rounds with at least one failed call before giving up. */
  maxConsecutiveErrorsPerRequest: number;
  /** Raise instead of reporting a "not found" result for unregistered calls. */
  terminateOnUnknownCalls: boolean;
  /** Tools known to the host but never executed here; calls to them pass through. */
  additionalTools: ToolSpec[];
  /** Append the underlying exception message to failed call results. */
  includeDetailedErrors: boolean;
}

export const DEFAULT_MAX_ITERATIONS = 40;
export const DEFAULT_MAX_CONSECUTIVE_ERRORS_PER_REQUEST = 3;

export const DEFAULT_INVOCATION_CONFIG: Readonly<InvocationConfig> = {
  enabled: true,
  maxIterations: DEFAULT_MAX_ITERATIONS,
  maxConsecutiveErrorsPerRequest: DEFAULT_MAX_CONSECUTIVE_ERRORS_PER_REQUEST,
  terminateOnUnknownCalls: false,
  additionalTools: [],
  includeDetailedErrors: false,
};

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${field} must be an integer of at least ${min}, got ${value}`,
    );
  }
}

export function resolveInvocationConfig(
  config: Partial<InvocationConfig> = {},
): InvocationConfig {
  const defaults = DEFAULT_INVOCATION_CONFIG;
  const resolved: InvocationConfig = {
    enabled: config.enabled ?? defaults.enabled,
    maxIterations: config.maxIterations ?? defaults.maxIterations,
    maxConsecutiveErrorsPerRequest:
      config.maxConsecutiveErrorsPerRequest ??
      defaults.maxConsecutiveErrorsPerRequest,
    terminateOnUnknownCalls:
      config.terminateOnUnknownCalls ?? defaults.terminateOnUnknownCalls,
    additionalTools: [...(config.additionalTools ?? defaults.additionalTools)],
    includeDetailedErrors:
      config.includeDetailedErrors ?? defaults.includeDetailedErrors,
  };
  requireInteger("maxIterations", resolved.maxIterations, 1);
  requireInteger(
    "maxConsecutiveErrorsPerRequest",
    resolved.maxConsecutiveErrorsPerRequest,
    0,
  );
  return resolved;
}
