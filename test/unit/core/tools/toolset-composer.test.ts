import { describe, it, expect } from "vitest";
import type { AgentDefinition } from "../../../../src/core/agents/agent-definition";
import { nativeTools } from "../../../../src/core/tools/builtin";
import { createSupportTools } from "../../../../src/core/tools/support";
import { ToolCatalog } from "../../../../src/core/tools/tool-catalog";
import {
  type DelegationRequest,
  ToolsetComposer,
} from "../../../../src/core/tools/toolset-composer.service";
import { createToolContext } from "../../../helpers/tool-context";

const agent = (overrides: Partial<AgentDefinition> & { name: string }): AgentDefinition => ({
  description: `${overrides.name} agent`,
  systemPrompt: "prompt",
  model: "noop:test",
  tools: [],
  delegatable: false,
  nativeTools: false,
  ...overrides,
});

const router = agent({ name: "main", delegatable: true, nativeTools: true });
const specialist = agent({
  name: "customer_data_agent",
  description: "Looks up customers",
  tools: ["get_active_incidents", "get_customer_overview", "get_active_incidents"],
});
const billing = agent({ name: "billing", tools: ["read"] });

describe("ToolsetComposer", () => {
  const catalog = new ToolCatalog([...nativeTools, ...createSupportTools(undefined)]);
  const composer = new ToolsetComposer(catalog, { list: () => [router, specialist, billing] });
  const unusedDelegate = async () => ({ content: "" });

  it("gives the router workspace tools and one delegation tool per other agent", () => {
    const tools = composer.compose(router, unusedDelegate);

    expect(tools.names()).toEqual([
      "find",
      "grep",
      "read",
      "write",
      "edit",
      "customer_data_agent",
      "billing",
    ]);
    expect(tools.get("customer_data_agent")?.description).toBe("Looks up customers");
  });

  it("gives plain agents only the tools they list, once each", () => {
    expect(composer.compose(specialist, unusedDelegate).names()).toEqual([
      "get_active_incidents",
      "get_customer_overview",
    ]);
    expect(composer.compose(billing, unusedDelegate).names()).toEqual(["read"]);
  });

  it("routes delegation tool calls to the handler with the caller context", async () => {
    const requests: DelegationRequest[] = [];
    const tools = composer.compose(router, async (request) => {
      requests.push(request);
      return { content: `handled: ${request.query}` };
    });
    const ctx = createToolContext("/tmp/unused");

    const result = await tools.invoke(
      { name: "billing", arguments: '{"query":"open invoices"}' },
      ctx
    );

    expect(result.content).toBe("handled: open invoices");
    expect(requests).toEqual([{ agentName: "billing", query: "open invoices", ctx }]);
  });

  it("requires a non-empty delegation query", async () => {
    const tools = composer.compose(router, unusedDelegate);

    const result = await tools.invoke(
      { name: "billing", arguments: { query: "" } },
      createToolContext("/tmp/unused")
    );

    expect(result.content).toBe(
      "Invalid parameters for tool billing: /query must NOT have fewer than 1 characters"
    );
  });
});
