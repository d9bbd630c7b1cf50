import type { ToolDeclaration, ToolFunction } from "./function-tool.js";
import { FunctionTool } from "./function-tool.js";

/**
 * Anything a caller may place in `options.tools`: a constructed tool, a bare
 * function (wrapped on the fly), or a bare declaration. Declarations have no
 * implementation, so calls to them are handed back to the caller.
 */
export type ToolSpec = FunctionTool | ToolFunction | ToolDeclaration;

export function isToolDeclaration(spec: ToolSpec): spec is ToolDeclaration {
  return typeof spec === "object" && !(spec instanceof FunctionTool);
}

// Bare functions are wrapped once so their counters survive re-indexing.
const wrappedFunctions = new WeakMap<ToolFunction, FunctionTool>();

function toFunctionTool(spec: FunctionTool | ToolFunction): FunctionTool {
  if (spec instanceof FunctionTool) {
    return spec;
  }
  let tool = wrappedFunctions.get(spec);
  if (!tool) {
    tool = FunctionTool.fromFunction(spec);
    wrappedFunctions.set(spec, tool);
  }
  return tool;
}

export class ToolRegistry {
  private tools = new Map<string, FunctionTool>();

  /**
   * Indexes the tools in effect for one round. Later entries override earlier
   * ones with the same name.
   */
  static from(specs: ReadonlyArray<ToolSpec> | undefined): ToolRegistry {
    const registry = new ToolRegistry();
    for (const spec of specs ?? []) {
      registry.register(
        isToolDeclaration(spec)
          ? FunctionTool.fromDeclaration(spec)
          : toFunctionTool(spec),
      );
    }
    return registry;
  }

  register(tool: FunctionTool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): void {
    this.tools.delete(name);
  }

  resolve(name: string): FunctionTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): FunctionTool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}

export function toolDeclarations(
  specs: ReadonlyArray<ToolSpec> | undefined,
): ToolDeclaration[] {
  return (specs ?? []).map((spec) =>
    isToolDeclaration(spec) ? spec : toFunctionTool(spec).toDeclaration(),
  );
}

