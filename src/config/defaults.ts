import type { SwitchboardConfig } from "./types";

export const DEFAULT_GUARDRAIL_FALLBACK =
  "I'm sorry, I can't share that response. Please rephrase your question or contact support.";

export const DEFAULT_CONFIG: SwitchboardConfig = {
  model: "openai:gpt-4o-mini",
  providers: {},
  agents: {
    directory: "config/agents",
    router: "main",
  },
  execution: {
    maxToolIterations: 10,
    modelTimeoutMs: 60_000,
  },
  guardrails: {
    enabled: true,
    timeoutMs: 15_000,
    failOpen: false,
    fallbackMessage: DEFAULT_GUARDRAIL_FALLBACK,
  },
  sessions: {
    root: ".switchboard/sessions",
  },
  tools: {
    previewChars: 500,
  },
  logging: {
    level: "info",
    destination: {
      type: "stderr",
    },
    enableTimestamps: true,
  },
};
