import { Injectable } from "@nestjs/common";
import type { AgentDefinition } from "../agents/agent-definition";
import type { ToolDefinition, ToolExecutionContext, ToolOutput } from "../types";
import { ToolRegistry } from "./registry";
import { ToolCatalog } from "./tool-catalog";

export interface DelegationRequest {
  agentName: string;
  query: string;
  ctx: ToolExecutionContext;
}

export type DelegateHandler = (request: DelegationRequest) => Promise<ToolOutput>;

export interface AgentDirectory {
  list(): AgentDefinition[];
}

export interface ToolsetComposerOptions {
  previewChars?: number;
}

export function createDelegationTool(
  target: AgentDefinition,
  delegate: DelegateHandler
): ToolDefinition {
  return {
    name: target.name,
    description: target.description,
    jsonSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          minLength: 1,
          description: `The request to hand to the ${target.name} agent`,
        },
      },
      required: ["query"],
      additionalProperties: false,
    },
    handler: (args, ctx) =>
      delegate({ agentName: target.name, query: String(args.query), ctx }),
  };
}

/**
 * Builds the toolset an agent may call: workspace tools when the agent is
 * granted them, the tools it lists, then one delegation tool per other
 * agent when it is delegatable.
 */
@Injectable()
export class ToolsetComposer {
  constructor(
    private readonly catalog: ToolCatalog,
    private readonly agents: AgentDirectory,
    private readonly options: ToolsetComposerOptions = {}
  ) {}

  compose(definition: AgentDefinition, delegate: DelegateHandler): ToolRegistry {
    const registry = new ToolRegistry([], { previewChars: this.options.previewChars });

    if (definition.nativeTools) {
      for (const tool of this.catalog.natives()) {
        registry.register(tool);
      }
    }

    for (const name of definition.tools) {
      const tool = this.catalog.get(name);
      if (tool && !registry.has(name)) {
        registry.register(tool);
      }
    }

    if (definition.delegatable) {
      for (const target of this.agents.list()) {
        if (target.name !== definition.name) {
          registry.register(createDelegationTool(target, delegate));
        }
      }
    }

    return registry;
  }
}
