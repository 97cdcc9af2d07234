import "reflect-metadata";
import { describe, it, expect, afterEach } from "vitest";
import fs from "fs/promises";
import { setTimeout as delay } from "timers/promises";
import type { AgentDescriptor } from "../../../../src/core/agents/agent-definition";
import {
  DelegationCycleError,
  ExecutionLimitError,
  GuardrailTimeoutError,
  InvalidRequestError,
  UnknownAgentError,
} from "../../../../src/core/errors";
import {
  APPROVED,
  type GuardrailEvaluator,
  type GuardrailStage,
  type GuardrailVerdict,
} from "../../../../src/core/guardrails/guardrail.types";
import { verifyToolPairing } from "../../../../src/core/sessions/conversation-replay";
import type {
  IncidentRecord,
  SupportDataSource,
} from "../../../../src/core/tools/support/support-data.source";
import { MockProvider, textReply, toolCallReply } from "../../../helpers/mock-provider";
import {
  StaticEvaluator,
  type TestRuntime,
  type TestRuntimeOptions,
  createTestRuntime,
  readLog,
} from "../../../helpers/test-runtime";

class FakeSupportDataSource implements SupportDataSource {
  constructor(private readonly incidents: IncidentRecord[]) {}

  async getCustomerOverview() {
    return { user: null, merchant: null, account_status: null, auth_status: null };
  }

  async getRecentOperations() {
    return { merchant_id: null, transfers: [], devices: [] };
  }

  async getActiveIncidents(): Promise<IncidentRecord[]> {
    return this.incidents;
  }
}

class HangingEvaluator implements GuardrailEvaluator {
  evaluate(_stage: string, _text: string, _context: unknown, signal: AbortSignal) {
    return new Promise<typeof APPROVED>((resolve) => {
      signal.addEventListener("abort", () => resolve(APPROVED), { once: true });
    });
  }
}

/** Holds the output check of `heldText` until released. */
class HeldOutputEvaluator implements GuardrailEvaluator {
  readonly holding: Promise<void>;
  private markHolding: () => void = () => undefined;
  private open: () => void = () => undefined;
  private readonly gate: Promise<void>;

  constructor(private readonly heldText: string) {
    this.holding = new Promise<void>((resolve) => {
      this.markHolding = resolve;
    });
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }

  async evaluate(stage: GuardrailStage, text: string): Promise<GuardrailVerdict> {
    if (stage === "output" && text === this.heldText) {
      this.markHolding();
      await this.gate;
    }
    return APPROVED;
  }
}

const INCIDENTS: IncidentRecord[] = [
  {
    id: "inc-1",
    scope: "transfers",
    active: true,
    description: "Delayed transfers",
    started_at: "2026-01-10T06:00:00Z",
  },
];

describe("DelegationOrchestrator", () => {
  let runtime: TestRuntime | undefined;

  const setup = async (options: TestRuntimeOptions) => {
    const created = await createTestRuntime(options);
    runtime = created;
    return created;
  };

  afterEach(async () => {
    runtime?.loggerService.reset();
    await runtime?.cleanup();
    runtime = undefined;
  });

  it("uses the workspace tools and reports what it did", async () => {
    const provider = new MockProvider([
      toolCallReply("write", { path: "native_tools_check.txt", content: "native tools ok" }, "call-1"),
      toolCallReply("read", { path: "native_tools_check.txt" }, "call-2"),
      toolCallReply("find", { pattern: "*" }, "call-3"),
      textReply("Created native_tools_check.txt and read back: native tools ok"),
    ]);
    const active = await setup({ provider });
    const { orchestrator, sessions } = active;

    const response = await orchestrator.chat({
      userId: "user-1",
      question: "Check that the file tools work",
    });

    expect(response.response).toBe("Created native_tools_check.txt and read back: native tools ok");
    expect(response.metadata).toEqual({ input_tokens: 40, output_tokens: 20, total_tokens: 60 });
    expect(provider.calls[0].tools?.map((tool) => tool.name)).toEqual([
      "find",
      "grep",
      "read",
      "write",
      "edit",
      "customer_data_agent",
    ]);

    const log = await readLog(active, response.sessionId, "main");
    expect(
      log.map((entry) =>
        entry.role === "tool"
          ? `${entry.metadata?.tool_name}:${entry.metadata?.tool_status}`
          : entry.role
      )
    ).toEqual([
      "user",
      "write:started",
      "write:completed",
      "read:started",
      "read:completed",
      "find:started",
      "find:completed",
      "assistant",
    ]);
    expect(log[2].content).toBe("Successfully wrote 15 bytes to native_tools_check.txt");
    expect(log[4].content).toBe("native tools ok");
    expect(log[6].content).toBe("native_tools_check.txt");
    expect(verifyToolPairing(log)).toEqual([]);

    const session = await sessions.get(response.sessionId);
    expect(session?.counters.total_tokens).toBe(60);
    if (!session) return;
    expect(await fs.readdir(sessions.workspaceDir(session))).toEqual(["native_tools_check.txt"]);
  });

  it("delegates to a specialist and records both conversations", async () => {
    const incidentsJson = JSON.stringify({ incidents: INCIDENTS }, null, 2);
    const provider = new MockProvider([
      toolCallReply("customer_data_agent", { query: "get_active_incidents" }, "call-r1"),
      toolCallReply("get_active_incidents", {}, "call-s1"),
      textReply("Active incidents: inc-1 (transfers) Delayed transfers"),
      textReply("There is one active incident: transfers are delayed."),
    ]);
    const active = await setup({ provider, supportSource: new FakeSupportDataSource(INCIDENTS) });

    const response = await active.orchestrator.chat({
      userId: "user-1",
      question: "Are there any incidents right now?",
    });

    expect(response.response).toBe("There is one active incident: transfers are delayed.");
    expect(response.metadata).toEqual({ input_tokens: 40, output_tokens: 20, total_tokens: 60 });
    expect(provider.calls[1].tools?.map((tool) => tool.name)).toEqual([
      "get_customer_overview",
      "get_recent_operations",
      "get_active_incidents",
    ]);
    expect(provider.calls[1].messages.slice(1)).toEqual([
      { role: "user", content: "get_active_incidents" },
    ]);
    expect(provider.calls[2].messages.at(-1)).toEqual({
      role: "tool",
      content: incidentsJson,
      name: "get_active_incidents",
      tool_call_id: "call-s1",
    });

    const routerLog = await readLog(active, response.sessionId, "main");
    const routerTools = routerLog.filter((entry) => entry.role === "tool");
    expect(routerTools.map((entry) => entry.metadata?.tool_status)).toEqual([
      "started",
      "completed",
    ]);
    expect(routerTools[0].content).toBe('{"query":"get_active_incidents"}');
    expect(routerTools[1]).toMatchObject({
      content: "Active incidents: inc-1 (transfers) Delayed transfers",
      metadata: { tool_name: "customer_data_agent", tool_call_id: "call-r1" },
    });

    const specialistLog = await readLog(active, response.sessionId, "customer_data_agent");
    expect(specialistLog.map((entry) => [entry.role, entry.content])).toEqual([
      ["user", "get_active_incidents"],
      ["tool", "{}"],
      ["tool", incidentsJson],
      ["assistant", "Active incidents: inc-1 (transfers) Delayed transfers"],
    ]);
    expect(active.orchestrator.cachedExecutorCount).toBe(2);
  });

  it("continues a session from its stored history", async () => {
    const provider = new MockProvider([textReply("Hello there"), textReply("You said hi.")]);
    const { orchestrator } = await setup({ provider });

    const first = await orchestrator.chat({ userId: "user-1", question: "Hi" });
    const second = await orchestrator.chat({
      userId: "user-1",
      question: "What did I say?",
      sessionId: first.sessionId,
    });

    expect(second.sessionId).toBe(first.sessionId);
    expect(second.metadata).toEqual({ input_tokens: 20, output_tokens: 10, total_tokens: 30 });
    expect(provider.calls[1].messages).toEqual([
      { role: "system", content: "You are the router for user-1." },
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello there" },
      { role: "user", content: "What did I say?" },
    ]);
  });

  it("starts a new session for an unknown session id", async () => {
    const provider = new MockProvider([textReply("Welcome")]);
    const { orchestrator } = await setup({ provider });

    const response = await orchestrator.chat({
      userId: "user-1",
      question: "Hello",
      sessionId: "no-such-session",
    });

    expect(response.sessionId).not.toBe("no-such-session");
    expect(response.response).toBe("Welcome");
  });

  it("validates chat requests", async () => {
    const { orchestrator } = await setup({ provider: new MockProvider([]) });

    await expect(orchestrator.chat({ userId: "", question: "Hi" })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    await expect(orchestrator.chat({ userId: "user-1", question: "   " })).rejects.toThrow(
      "Invalid chat request: question: question is required"
    );
  });

  it("answers rejected input without running any agent", async () => {
    const provider = new MockProvider([]);
    const evaluator = new StaticEvaluator({
      input: {
        kind: "rejected",
        reason: "off topic",
        response: "I can only help with your account.",
      },
    });
    const active = await setup({ provider, evaluator });

    const response = await active.orchestrator.chat({
      userId: "user-1",
      question: "Write me a poem",
    });

    expect(response.response).toBe("I can only help with your account.");
    expect(response.metadata).toEqual({ input_tokens: 0, output_tokens: 0, total_tokens: 0 });
    expect(provider.calls).toHaveLength(0);
    const log = await readLog(active, response.sessionId, "main");
    expect(log.map((entry) => [entry.role, entry.content])).toEqual([
      ["user", "Write me a poem"],
      ["assistant", "I can only help with your account."],
    ]);
    expect(log[1].metadata).toEqual({ guardrail: "input_rejected", guardrail_reason: "off topic" });
  });

  it("passes revised input to the router", async () => {
    const provider = new MockProvider([textReply("Balance info")]);
    const evaluator = new StaticEvaluator({
      input: { kind: "revised", content: "What is my balance?" },
    });
    const { orchestrator } = await setup({ provider, evaluator });

    await orchestrator.chat({ userId: "user-1", question: "whats my balance??? asap" });

    expect(provider.calls[0].messages.at(-1)).toEqual({
      role: "user",
      content: "What is my balance?",
    });
  });

  it("replaces revised output and records the final text", async () => {
    const provider = new MockProvider([textReply("Your card 4111 is blocked")]);
    const evaluator = new StaticEvaluator({
      output: { kind: "revised", content: "Your card is blocked", reason: "card number" },
    });
    const active = await setup({ provider, evaluator });

    const response = await active.orchestrator.chat({ userId: "user-1", question: "Card?" });

    expect(response.response).toBe("Your card is blocked");
    const log = await readLog(active, response.sessionId, "main");
    expect(log.at(-1)).toMatchObject({
      role: "assistant",
      content: "Your card is blocked",
      metadata: { guardrail: "output_revised" },
    });
    expect(evaluator.evaluated).toEqual([
      { stage: "input", text: "Card?" },
      { stage: "output", text: "Your card 4111 is blocked" },
    ]);
  });

  it("uses the fallback message when output is rejected without a response", async () => {
    const provider = new MockProvider([textReply("internal details")]);
    const evaluator = new StaticEvaluator({
      output: { kind: "rejected", reason: "leak", response: "" },
    });
    const { orchestrator } = await setup({ provider, evaluator });

    const response = await orchestrator.chat({ userId: "user-1", question: "Tell me" });

    expect(response.response).toBe("This answer was withheld.");
    expect(response.metadata.total_tokens).toBe(15);
  });

  it("fails closed when the guardrail times out", async () => {
    const provider = new MockProvider([textReply("unused")]);
    const { orchestrator } = await setup({
      provider,
      evaluator: new HangingEvaluator(),
      guardrails: { timeoutMs: 20 },
    });

    await expect(orchestrator.chat({ userId: "user-1", question: "Hi" })).rejects.toBeInstanceOf(
      GuardrailTimeoutError
    );
    expect(provider.calls).toHaveLength(0);
  });

  it("continues past a guardrail timeout when failOpen is set", async () => {
    const provider = new MockProvider([textReply("Hello")]);
    const { orchestrator } = await setup({
      provider,
      evaluator: new HangingEvaluator(),
      guardrails: { timeoutMs: 20, failOpen: true },
    });

    const response = await orchestrator.chat({ userId: "user-1", question: "Hi" });

    expect(response.response).toBe("Hello");
  });

  it("fails the request at the tool round limit without storing a reply", async () => {
    const provider = new MockProvider([
      toolCallReply("find", { pattern: "*" }),
      toolCallReply("find", { pattern: "*" }),
      toolCallReply("find", { pattern: "*" }),
      toolCallReply("find", { pattern: "*" }),
    ]);
    const active = await setup({ provider, execution: { maxToolIterations: 3 } });
    const session = await active.sessions.create("user-1");

    await expect(
      active.orchestrator.chat({ userId: "user-1", question: "Loop", sessionId: session.id })
    ).rejects.toThrow(new ExecutionLimitError("main", 3));

    expect(provider.calls).toHaveLength(4);
    const log = await readLog(active, session.id, "main");
    expect(log.filter((entry) => entry.metadata?.tool_status === "started")).toHaveLength(3);
    expect(log.some((entry) => entry.role === "assistant")).toBe(false);
    expect((await active.sessions.get(session.id))?.counters.total_tokens).toBe(0);
  });

  it("turns a delegation cycle into an error result for the calling agent", async () => {
    const agents: AgentDescriptor[] = [
      {
        name: "main",
        description: "Router",
        systemPrompt: "route",
        tools: [],
        delegatable: true,
        nativeTools: false,
      },
      {
        name: "helper",
        description: "Helper",
        systemPrompt: "help",
        tools: [],
        delegatable: true,
        nativeTools: false,
      },
    ];
    const provider = new MockProvider([
      toolCallReply("helper", { query: "check" }, "call-1"),
      toolCallReply("main", { query: "loop back" }, "call-2"),
      textReply("helper done"),
      textReply("all done"),
    ]);
    const active = await setup({ provider, agents });

    const response = await active.orchestrator.chat({ userId: "user-1", question: "Go" });

    expect(response.response).toBe("all done");
    const helperLog = await readLog(active, response.sessionId, "helper");
    expect(helperLog[2]).toMatchObject({
      role: "tool",
      content: "Tool execution failed: Delegation cycle detected: main -> helper -> main",
      metadata: { tool_name: "main", tool_status: "error" },
    });
    const routerLog = await readLog(active, response.sessionId, "main");
    expect(routerLog.map((entry) => entry.role)).toEqual(["user", "tool", "tool", "assistant"]);
  });

  it("refuses direct delegation to an agent already on the call stack", async () => {
    const { orchestrator, sessions } = await setup({ provider: new MockProvider([]) });
    const session = await sessions.create("user-1");

    await expect(
      orchestrator.delegate({
        session,
        userId: "user-1",
        agentName: "main",
        query: "again",
        callStack: ["main"],
      })
    ).rejects.toThrow(new DelegationCycleError(["main", "main"]));
    await expect(
      orchestrator.delegate({
        session,
        userId: "user-1",
        agentName: "billing",
        query: "invoices",
        callStack: ["main"],
      })
    ).rejects.toBeInstanceOf(UnknownAgentError);
  });

  it("shares one executor per session and agent across concurrent requests", async () => {
    const provider = new MockProvider([textReply("a"), textReply("b"), textReply("c")]);
    const active = await setup({ provider });
    const { orchestrator } = active;
    const first = await orchestrator.chat({ userId: "user-1", question: "one" });

    await Promise.all([
      orchestrator.chat({ userId: "user-1", question: "two", sessionId: first.sessionId }),
      orchestrator.chat({ userId: "user-1", question: "three", sessionId: first.sessionId }),
    ]);

    expect(orchestrator.cachedExecutorCount).toBe(1);
    const log = await readLog(active, first.sessionId, "main");
    expect(log).toHaveLength(6);
    expect(
      log
        .filter((entry) => entry.role === "user")
        .map((entry) => entry.content)
        .sort()
    ).toEqual(["one", "three", "two"]);
  });

  it("keeps a pending reply ahead of the next turn on the same session", async () => {
    const provider = new MockProvider([
      textReply("answer a"),
      toolCallReply("customer_data_agent", { query: "get_active_incidents" }, "call-b1"),
      textReply("incidents listed"),
      textReply("answer b"),
    ]);
    const evaluator = new HeldOutputEvaluator("answer a");
    const active = await setup({
      provider,
      evaluator,
      supportSource: new FakeSupportDataSource(INCIDENTS),
    });
    const session = await active.sessions.create("user-1");

    const first = active.orchestrator.chat({
      userId: "user-1",
      question: "a",
      sessionId: session.id,
    });
    await evaluator.holding;
    const second = active.orchestrator.chat({
      userId: "user-1",
      question: "b",
      sessionId: session.id,
    });
    await delay(50);
    evaluator.release();
    const [firstResponse, secondResponse] = await Promise.all([first, second]);

    expect(firstResponse.response).toBe("answer a");
    expect(secondResponse.response).toBe("answer b");
    expect(provider.calls[1].messages.slice(1)).toEqual([
      { role: "user", content: "a" },
      { role: "assistant", content: "answer a" },
      { role: "user", content: "b" },
    ]);

    const log = await readLog(active, session.id, "main");
    expect(
      log.map((entry) =>
        entry.role === "tool"
          ? `${entry.metadata?.tool_name}:${entry.metadata?.tool_status}`
          : `${entry.role}:${entry.content}`
      )
    ).toEqual([
      "user:a",
      "assistant:answer a",
      "user:b",
      "customer_data_agent:started",
      "customer_data_agent:completed",
      "assistant:answer b",
    ]);
    expect(verifyToolPairing(log)).toEqual([]);
  });
});
