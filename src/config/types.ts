export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
}

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface AgentsConfig {
  /** Directory scanned for `*.yml` / `*.yaml` agent descriptors. */
  directory: string;
  /** Name of the agent that receives every chat request. */
  router: string;
}

export interface ExecutionConfig {
  maxToolIterations: number;
  modelTimeoutMs: number;
}

export interface GuardrailsConfig {
  enabled: boolean;
  /** Falls back to the top-level `model` when omitted. */
  model?: string;
  timeoutMs: number;
  failOpen: boolean;
  fallbackMessage: string;
}

export interface SessionsConfig {
  root: string;
}

export interface ToolsConfig {
  previewChars: number;
}

/** Knex client for the support database; only the bundled driver is accepted. */
export type SupportDataClient = "better-sqlite3";

export interface SupportDataConfig {
  client: SupportDataClient;
  /** SQLite database file, or `:memory:`. */
  filename: string;
}

export interface SwitchboardConfig {
  /** Default model identifier in `provider:model` form. */
  model: string;
  providers: Record<string, ProviderSettings>;
  agents: AgentsConfig;
  execution: ExecutionConfig;
  guardrails: GuardrailsConfig;
  sessions: SessionsConfig;
  tools: ToolsConfig;
  supportData?: SupportDataConfig;
  logging: LoggingConfig;
}

export interface CliRuntimeOptions {
  config?: string;
  model?: string;
  logLevel?: LogLevel;
  sessionsRoot?: string;
}
