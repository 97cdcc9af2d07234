import { z } from "zod";

export const AGENT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Resolved, immutable agent configuration. */
export interface AgentDefinition {
  readonly name: string;
  readonly description: string;
  /** Eta template rendered once per turn. */
  readonly systemPrompt: string;
  /** `provider:model` identifier. */
  readonly model: string;
  readonly tools: readonly string[];
  /** Delegatable agents receive one delegation tool per other agent. */
  readonly delegatable: boolean;
  /** Grants the session workspace tools (find, grep, read, write, edit). */
  readonly nativeTools: boolean;
  /** File the descriptor was loaded from. */
  readonly source?: string;
}

export interface AgentDescriptor {
  name: string;
  description: string;
  systemPrompt: string;
  model?: string;
  tools: string[];
  delegatable: boolean;
  nativeTools: boolean;
}

export const AGENT_DESCRIPTOR_SCHEMA = z
  .object({
    name: z.string().regex(AGENT_NAME_PATTERN, "may only contain letters, digits, '_' and '-'"),
    description: z.string().min(1),
    systemPrompt: z.string().min(1),
    model: z.string().min(1).optional(),
    tools: z.array(z.string().min(1)).default([]),
    delegatable: z.boolean().default(false),
    nativeTools: z.boolean().default(false),
  })
  .strict();
