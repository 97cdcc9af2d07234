import { AgentRegistry } from "../../core/agents/agent-registry";
import { SessionManager } from "../../core/sessions/session-manager.service";
import { resolveCliOptions, withApplicationContext } from "../utils";

export async function history(
  sessionId: string,
  options: Record<string, unknown>
): Promise<void> {
  await withApplicationContext(resolveCliOptions(options), async (app) => {
    const sessions = app.get(SessionManager);
    const session = await sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session ${sessionId} does not exist`);
    }

    const agentName =
      typeof options.agent === "string" ? options.agent : app.get(AgentRegistry).router().name;
    const messages = await sessions.loadLog(session, agentName);
    for (const message of messages) {
      const status = message.metadata?.tool_status;
      const label =
        message.role === "tool"
          ? `tool ${message.metadata?.tool_name ?? "?"} ${status ?? ""}`.trim()
          : message.role;
      const body =
        message.role === "tool" && status !== "started"
          ? message.metadata?.result_preview ?? message.content
          : message.content;
      console.log(`[${message.timestamp}] ${label}: ${body}`);
    }
    console.log(
      `tokens: ${session.counters.input_tokens} in / ${session.counters.output_tokens} out / ${session.counters.total_tokens} total`
    );
  });
}
