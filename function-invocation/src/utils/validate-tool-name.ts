const TOOL_NAME_RE = /^[a-zA-Z_][a-zA-Z0-9_-]*$/;
const MAX_LENGTH = 64;

export function validateToolName(name: string): string | undefined {
  if (name.length === 0) {
    return "tool name must not be empty";
  }
  if (name.length > MAX_LENGTH) {
    return `tool name must be at most ${MAX_LENGTH} characters`;
  }
  if (!TOOL_NAME_RE.test(name)) {
    return "tool name must start with a letter or underscore and contain only letters, digits, underscores, and hyphens";
  }
  return undefined;
}
