import Ajv, { type ValidateFunction } from "ajv";
import {
  InvalidParametersError,
  SwitchboardError,
  UnknownToolError,
  errorMessage,
} from "../errors";
import type {
  ToolCallArguments,
  ToolDefinition,
  ToolExecutionContext,
  ToolOutput,
  ToolResult,
  ToolSchema,
} from "../types";
import { previewOf } from "./truncate";

export const DEFAULT_PREVIEW_CHARS = 500;

export interface ToolCall {
  name: string;
  /** JSON text from the model, or arguments that were already decoded. */
  arguments: unknown;
}

export interface ToolRegistryOptions {
  previewChars?: number;
}

type CompiledTool = ToolDefinition & { validate: ValidateFunction };

function formatErrors(validator: ValidateFunction): string {
  if (!validator.errors) return "unknown error";
  return validator.errors
    .map((err) => `${err.instancePath || "."} ${err.message ?? "invalid"}`.trim())
    .join(", ");
}

const isPlainObject = (value: unknown): value is ToolCallArguments =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Tools available to one agent. `execute` validates and runs a call and
 * throws on failure; `invoke` always resolves to a ToolResult.
 */
export class ToolRegistry {
  private readonly ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
  private readonly tools = new Map<string, CompiledTool>();
  private readonly previewChars: number;

  constructor(definitions: ToolDefinition[] = [], options: ToolRegistryOptions = {}) {
    this.previewChars = options.previewChars ?? DEFAULT_PREVIEW_CHARS;
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      throw new SwitchboardError(`Tool ${definition.name} is already registered`);
    }
    this.tools.set(definition.name, {
      ...definition,
      validate: this.ajv.compile(definition.jsonSchema),
    });
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  schemas(): ToolSchema[] {
    return this.list().map((tool) => ({
      type: "function",
      name: tool.name,
      description: tool.description,
      parameters: tool.jsonSchema,
    }));
  }

  parseArguments(call: ToolCall): ToolCallArguments {
    const tool = this.tools.get(call.name);
    if (!tool) {
      throw new UnknownToolError(call.name);
    }

    let candidate: unknown = call.arguments ?? {};
    if (typeof candidate === "string") {
      const text = candidate.trim();
      try {
        candidate = text.length > 0 ? JSON.parse(text) : {};
      } catch {
        throw new InvalidParametersError(call.name, "arguments are not valid JSON");
      }
    }

    if (!isPlainObject(candidate)) {
      throw new InvalidParametersError(call.name, "arguments must be a JSON object");
    }
    const args: ToolCallArguments = { ...candidate };
    if (!tool.validate(args)) {
      throw new InvalidParametersError(call.name, formatErrors(tool.validate));
    }
    return args;
  }

  async execute(call: ToolCall, ctx: ToolExecutionContext): Promise<ToolOutput> {
    const args = this.parseArguments(call);
    const tool = this.tools.get(call.name);
    if (!tool) {
      throw new UnknownToolError(call.name);
    }
    return tool.handler(args, ctx);
  }

  async invoke(call: ToolCall, ctx: ToolExecutionContext): Promise<ToolResult> {
    try {
      const output = await this.execute(call, ctx);
      return this.toResult("completed", output.content, output.data);
    } catch (error) {
      const message =
        error instanceof InvalidParametersError || error instanceof UnknownToolError
          ? error.message
          : `Tool execution failed: ${errorMessage(error)}`;
      ctx.logger.warn(
        { err: error, tool: call.name, agent: ctx.agentName },
        "Tool execution failed"
      );
      return this.toResult("error", message);
    }
  }

  private toResult(status: ToolResult["status"], content: string, data?: unknown): ToolResult {
    return {
      status,
      content,
      preview: previewOf(content, this.previewChars),
      length: content.length,
      ...(data !== undefined ? { data } : {}),
    };
  }
}
