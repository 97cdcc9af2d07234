import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { ProviderSettings } from "../../config/types";
import type { ChatMessage, ProviderAdapter, StreamEvent, StreamOptions, ToolSchema } from "../types";

interface ToolAccumulator {
  id?: string;
  name: string;
  arguments: string;
}

/** Chat Completions adapter; also serves OpenAI-compatible endpoints via `baseUrl`. */
export class OpenAIAdapter implements ProviderAdapter {
  private readonly client: OpenAI;

  constructor(readonly name: string, config: ProviderSettings) {
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || undefined,
      baseURL: config.baseUrl,
    });
  }

  async *stream(options: StreamOptions): AsyncIterable<StreamEvent> {
    const toolBuffer = new Map<number, ToolAccumulator>();
    let usage: { inputTokens: number; outputTokens: number } | undefined;
    let endReason: string | undefined;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: options.model,
          messages: this.formatMessages(options.messages),
          tools: this.formatTools(options.tools),
          stream: true,
          stream_options: { include_usage: true },
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        if (chunk.usage) {
          usage = {
            inputTokens: chunk.usage.prompt_tokens,
            outputTokens: chunk.usage.completion_tokens,
          };
        }

        const choice = chunk.choices[0];
        if (!choice) continue;

        if (choice.delta.content) {
          yield { type: "delta", text: choice.delta.content };
        }

        for (const call of choice.delta.tool_calls ?? []) {
          const existing = toolBuffer.get(call.index) ?? { name: "", arguments: "" };
          if (call.id) existing.id = call.id;
          if (call.function?.name) existing.name += call.function.name;
          if (call.function?.arguments) existing.arguments += call.function.arguments;
          toolBuffer.set(call.index, existing);
        }

        if (choice.finish_reason) {
          endReason = choice.finish_reason;
        }
      }
    } catch (error) {
      yield {
        type: "error",
        message: error instanceof Error ? error.message : "OpenAI request failed",
        cause: error,
      };
      return;
    }

    for (const [, call] of [...toolBuffer.entries()].sort(([a], [b]) => a - b)) {
      yield {
        type: "tool_call",
        id: call.id,
        name: call.name || "unknown_tool",
        arguments: call.arguments,
      };
    }

    yield { type: "end", reason: endReason, usage };
  }

  private formatMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
    return messages.map((message): ChatCompletionMessageParam => {
      switch (message.role) {
        case "system":
          return { role: "system", content: message.content };
        case "user":
          return { role: "user", content: message.content };
        case "tool":
          return {
            role: "tool",
            tool_call_id: message.tool_call_id ?? message.name ?? "tool",
            content: message.content,
          };
        case "assistant":
          if (message.tool_call_id && message.name) {
            return {
              role: "assistant",
              content: null,
              tool_calls: [
                {
                  id: message.tool_call_id,
                  type: "function",
                  function: { name: message.name, arguments: message.content },
                },
              ],
            };
          }
          return { role: "assistant", content: message.content };
        default: {
          const unreachable: never = message.role;
          throw new Error(`Unsupported message role ${String(unreachable)}`);
        }
      }
    });
  }

  private formatTools(tools: ToolSchema[] | undefined): ChatCompletionTool[] | undefined {
    if (!tools || tools.length === 0) return undefined;

    return tools.map((tool): ChatCompletionTool => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }
}
