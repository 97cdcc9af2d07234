import { ConfigError, type ConfigIssue, UnknownAgentError } from "../errors";
import type { AgentDefinition } from "./agent-definition";
import type { LoadedDescriptor } from "./agent-definition.loader";

export interface AgentRegistryOptions {
  routerName: string;
  defaultModel: string;
  /** Names of every tool an agent may list. */
  toolNames: ReadonlySet<string>;
}

/**
 * Lookup table of agent definitions, built once at startup and read-only
 * afterwards.
 */
export class AgentRegistry {
  private readonly definitions: ReadonlyMap<string, AgentDefinition>;
  private readonly routerName: string;

  private constructor(definitions: AgentDefinition[], routerName: string) {
    this.definitions = new Map(definitions.map((definition) => [definition.name, definition]));
    this.routerName = routerName;
  }

  /** Throws ConfigError listing every problem found. */
  static create(loaded: readonly LoadedDescriptor[], options: AgentRegistryOptions): AgentRegistry {
    const issues: ConfigIssue[] = [];
    const seen = new Map<string, string>();
    const definitions: AgentDefinition[] = [];

    for (const { descriptor, source } of loaded) {
      const previous = seen.get(descriptor.name);
      if (previous) {
        issues.push({
          path: source,
          message: `agent name "${descriptor.name}" is already defined in ${previous}`,
        });
        continue;
      }
      seen.set(descriptor.name, source);

      if (options.toolNames.has(descriptor.name)) {
        issues.push({
          path: source,
          message: `agent name "${descriptor.name}" collides with a tool of the same name`,
        });
      }

      for (const tool of descriptor.tools) {
        if (!options.toolNames.has(tool)) {
          issues.push({
            path: `${source}#tools`,
            message: `unknown tool "${tool}" referenced by agent "${descriptor.name}"`,
          });
        }
      }

      definitions.push(
        Object.freeze({
          name: descriptor.name,
          description: descriptor.description,
          systemPrompt: descriptor.systemPrompt,
          model: descriptor.model ?? options.defaultModel,
          tools: Object.freeze([...new Set(descriptor.tools)]),
          delegatable: descriptor.delegatable,
          nativeTools: descriptor.nativeTools,
          source,
        })
      );
    }

    if (!seen.has(options.routerName)) {
      issues.push({
        path: "agents.router",
        message: `router agent "${options.routerName}" is not defined`,
      });
    }

    if (issues.length > 0) {
      throw new ConfigError("Agent registry validation failed", issues);
    }
    return new AgentRegistry(definitions, options.routerName);
  }

  lookup(name: string): AgentDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownAgentError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  list(): AgentDefinition[] {
    return Array.from(this.definitions.values());
  }

  router(): AgentDefinition {
    return this.lookup(this.routerName);
  }
}
