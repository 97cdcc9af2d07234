import type { Logger } from "pino";

export type Role = "system" | "user" | "assistant" | "tool";

/** Message shape handed to a provider adapter. */
export interface ChatMessage {
  role: Role;
  content: string;
  name?: string;
  tool_call_id?: string;
}

export interface ToolCallArguments {
  [key: string]: unknown;
}

export interface ToolSchema {
  type: "function";
  name: string;
  description?: string;
  parameters: Record<string, unknown>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StreamEvent =
  | {
      type: "delta";
      text: string;
    }
  | {
      type: "tool_call";
      name: string;
      /** Raw JSON text as produced by the model. */
      arguments: string;
      id?: string;
    }
  | {
      type: "error";
      message: string;
      cause?: unknown;
    }
  | {
      type: "end";
      reason?: string;
      usage?: TokenUsage;
    };

export interface StreamOptions {
  model: string;
  messages: ChatMessage[];
  tools?: ToolSchema[];
  signal?: AbortSignal;
}

export interface ProviderAdapter {
  readonly name: string;
  stream(options: StreamOptions): AsyncIterable<StreamEvent>;
}

export type ToolStatus = "completed" | "error";

/**
 * Outcome of one tool invocation. `content` is what the model sees;
 * `preview` and `length` are what the conversation log records.
 */
export interface ToolResult<TData = unknown> {
  status: ToolStatus;
  content: string;
  preview: string;
  length: number;
  data?: TData;
}

/** What a tool handler returns before the registry wraps it. */
export interface ToolOutput<TData = unknown> {
  content: string;
  data?: TData;
}

export interface ToolExecutionContext {
  sessionId: string;
  userId: string;
  agentName: string;
  /** Active delegation chain, router first. */
  callStack: readonly string[];
  workspaceDir: string;
  withWorkspaceWriteLock<T>(task: () => Promise<T>): Promise<T>;
  logger: Logger;
}

export interface ToolDefinition {
  name: string;
  description: string;
  jsonSchema: Record<string, unknown>;
  /** Receives arguments that already passed `jsonSchema`. */
  handler(args: ToolCallArguments, ctx: ToolExecutionContext): Promise<ToolOutput>;
}
