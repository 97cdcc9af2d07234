import { DelegationOrchestrator } from "../../core/agents/delegation-orchestrator.service";
import { resolveCliOptions, withApplicationContext } from "../utils";

export async function ask(
  question: string,
  options: Record<string, unknown>
): Promise<void> {
  const runtime = resolveCliOptions(options);
  await withApplicationContext(runtime, async (app) => {
    const orchestrator = app.get(DelegationOrchestrator);
    const response = await orchestrator.chat({
      userId: options.user,
      question,
      sessionId: typeof options.session === "string" ? options.session : undefined,
    });
    console.log(JSON.stringify(response, null, 2));
  });
}
