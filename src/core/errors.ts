export class SwitchboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SwitchboardError";
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised while the process starts: an invalid configuration file or agent
 * descriptor. Never raised while serving a request.
 */
export class ConfigError extends SwitchboardError {
  readonly issues: ConfigIssue[];

  constructor(summary: string, issues: ConfigIssue[] = []) {
    super(
      issues.length > 0
        ? `${summary}\n${issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join("\n")}`
        : summary
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class UnknownAgentError extends SwitchboardError {
  constructor(readonly agentName: string) {
    super(`Unknown agent: ${agentName}`);
    this.name = "UnknownAgentError";
  }
}

export class UnknownToolError extends SwitchboardError {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
  }
}

export class InvalidParametersError extends SwitchboardError {
  constructor(readonly toolName: string, readonly details: string) {
    super(`Invalid parameters for tool ${toolName}: ${details}`);
    this.name = "InvalidParametersError";
  }
}

export class InvalidRequestError extends SwitchboardError {
  constructor(readonly details: string) {
    super(`Invalid chat request: ${details}`);
    this.name = "InvalidRequestError";
  }
}

/** Only ever surfaced as an error ToolResult. */
export class ToolExecutionError extends SwitchboardError {
  constructor(readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolExecutionError";
  }
}

export class ExecutionLimitError extends SwitchboardError {
  constructor(readonly agentName: string, readonly limit: number) {
    super(`Agent ${agentName} exceeded the limit of ${limit} tool rounds in a single turn`);
    this.name = "ExecutionLimitError";
  }
}

export class DelegationCycleError extends SwitchboardError {
  constructor(readonly chain: readonly string[]) {
    super(`Delegation cycle detected: ${chain.join(" -> ")}`);
    this.name = "DelegationCycleError";
  }
}

export class ModelTimeoutError extends SwitchboardError {
  constructor(readonly agentName: string, readonly timeoutMs: number) {
    super(`Model call for agent ${agentName} timed out after ${timeoutMs}ms`);
    this.name = "ModelTimeoutError";
  }
}

export class ModelCallError extends SwitchboardError {
  constructor(readonly agentName: string, message: string, options?: { cause?: unknown }) {
    super(`Model call for agent ${agentName} failed: ${message}`, options);
    this.name = "ModelCallError";
  }
}

export class GuardrailTimeoutError extends SwitchboardError {
  constructor(readonly stage: "input" | "output", readonly timeoutMs: number) {
    super(`The ${stage} guardrail timed out after ${timeoutMs}ms`);
    this.name = "GuardrailTimeoutError";
  }
}

export class ConversationLogError extends SwitchboardError {
  constructor(readonly filePath: string, readonly line: number, reason: string) {
    super(`Corrupt conversation log ${filePath} at line ${line}: ${reason}`);
    this.name = "ConversationLogError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
