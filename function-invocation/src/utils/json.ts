export type JsonParseResult =
  | { success: true; value: unknown }
  | { success: false; error: Error };

export function safeJsonParse(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    return { success: true, value };
  } catch (error: unknown) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
