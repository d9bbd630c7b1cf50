export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  /** Provider-specific counters, e.g. `reasoningTokens` or `openai.cachedTokens`. */
  additionalCounts?: Record<string, number>;
}

export function emptyUsage(): Usage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

export function addUsage(a: Usage, b: Usage): Usage {
  const sum: Usage = {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
  if (a.additionalCounts !== undefined || b.additionalCounts !== undefined) {
    const counts: Record<string, number> = { ...a.additionalCounts };
    for (const [key, value] of Object.entries(b.additionalCounts ?? {})) {
      counts[key] = (counts[key] ?? 0) + value;
    }
    sum.additionalCounts = counts;
  }
  return sum;
}
