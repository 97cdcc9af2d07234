import { SwitchboardError } from "../errors";
import type { ToolDefinition } from "../types";
import { NATIVE_TOOL_NAMES } from "./builtin";

const NATIVE = new Set<string>(NATIVE_TOOL_NAMES);

/** Every named tool implementation known to the process. */
export class ToolCatalog {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: readonly ToolDefinition[] = []) {
    for (const definition of definitions) {
      if (this.tools.has(definition.name)) {
        throw new SwitchboardError(`Duplicate tool definition: ${definition.name}`);
      }
      this.tools.set(definition.name, definition);
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  names(): ReadonlySet<string> {
    return new Set(this.tools.keys());
  }

  natives(): ToolDefinition[] {
    return Array.from(this.tools.values()).filter((tool) => NATIVE.has(tool.name));
  }
}
