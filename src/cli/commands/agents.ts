import { AgentRegistry } from "../../core/agents/agent-registry";
import { resolveCliOptions, withApplicationContext } from "../utils";

export async function agents(options: Record<string, unknown>): Promise<void> {
  await withApplicationContext(resolveCliOptions(options), async (app) => {
    const registry = app.get(AgentRegistry);
    const router = registry.router().name;
    for (const definition of registry.list()) {
      const flags = [
        definition.name === router ? "router" : undefined,
        definition.delegatable ? "delegatable" : undefined,
        definition.nativeTools ? "workspace" : undefined,
      ].filter((flag): flag is string => flag !== undefined);
      console.log(
        `${definition.name}${flags.length > 0 ? ` [${flags.join(", ")}]` : ""} (${definition.model})`
      );
      console.log(`  ${definition.description}`);
      if (definition.tools.length > 0) {
        console.log(`  tools: ${definition.tools.join(", ")}`);
      }
    }
  });
}
