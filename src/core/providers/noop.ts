import type { ProviderAdapter, StreamEvent, StreamOptions } from "../types";

/** Offline adapter that answers with the latest user message. */
export class NoopAdapter implements ProviderAdapter {
  readonly name = "noop";

  async *stream(options: StreamOptions): AsyncIterable<StreamEvent> {
    const lastUser = [...options.messages].reverse().find((message) => message.role === "user");
    const text = lastUser ? `noop: ${lastUser.content}` : "noop";
    yield { type: "delta", text };
    yield { type: "end", reason: "stop", usage: { inputTokens: 0, outputTokens: 0 } };
  }
}
