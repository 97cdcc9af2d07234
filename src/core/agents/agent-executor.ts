import { randomUUID } from "crypto";
import type { Logger } from "pino";
import type { ExecutionConfig } from "../../config/types";
import { KeyedMutex } from "../concurrency/keyed-mutex";
import { withDeadline } from "../concurrency/deadline";
import { ExecutionLimitError, ModelCallError, ModelTimeoutError } from "../errors";
import type { ProviderFactory } from "../providers/provider-factory.service";
import {
  assistantMessage,
  type MessageMetadata,
  toolFinishedMessage,
  toolStartedMessage,
  userMessage,
} from "../sessions/conversation-message";
import { toChatHistory } from "../sessions/conversation-replay";
import type { SessionManager } from "../sessions/session-manager.service";
import type { Session } from "../sessions/session.types";
import type { TemplateRendererService } from "../templates/template-renderer.service";
import type { ToolRegistry } from "../tools/registry";
import type {
  ChatMessage,
  ProviderAdapter,
  TokenUsage,
  ToolExecutionContext,
  ToolSchema,
  ToolStatus,
} from "../types";
import type { AgentDefinition } from "./agent-definition";

export interface AgentExecutorDependencies {
  definition: AgentDefinition;
  session: Session;
  tools: ToolRegistry;
  sessions: SessionManager;
  providers: ProviderFactory;
  templates: TemplateRendererService;
  execution: ExecutionConfig;
  logger: Logger;
}

export interface AgentTurnRequest {
  prompt: string;
  userId: string;
  /** Delegation chain ending with this agent. */
  callStack: readonly string[];
  /**
   * Decides the reply persisted for the turn. Runs before the turn lock is
   * released; the model's text is kept when omitted.
   */
  finalize?: (result: AgentTurnResult) => Promise<TurnReply>;
}

export interface TurnReply {
  text: string;
  metadata?: MessageMetadata;
}

export interface ToolCallRecord {
  id: string;
  name: string;
  status: ToolStatus;
}

export interface AgentTurnResult {
  /** Reply recorded in the conversation log. */
  text: string;
  usage: TokenUsage;
  toolCalls: ToolCallRecord[];
  /** Model↔tool round trips taken. */
  rounds: number;
}

interface PendingToolCall {
  id?: string;
  name: string;
  arguments: string;
}

interface ModelResponse {
  text: string;
  toolCalls: PendingToolCall[];
  usage?: TokenUsage;
}

const TURN_LOCK = "turn";

/** Rough count used when a provider reports no usage. */
export const estimateTokens = (text: string): number => Math.floor(text.length / 4);

const decodeParams = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

/**
 * Runs turns for one (session, agent) pair, one turn at a time. Everything a
 * turn writes to the conversation log, the final reply included, is written
 * while the turn holds the lock.
 */
export class AgentExecutor {
  readonly definition: AgentDefinition;
  readonly session: Session;

  private readonly tools: ToolRegistry;
  private readonly sessions: SessionManager;
  private readonly providers: ProviderFactory;
  private readonly templates: TemplateRendererService;
  private readonly execution: ExecutionConfig;
  private readonly logger: Logger;
  private readonly turnLock = new KeyedMutex();

  constructor(deps: AgentExecutorDependencies) {
    this.definition = deps.definition;
    this.session = deps.session;
    this.tools = deps.tools;
    this.sessions = deps.sessions;
    this.providers = deps.providers;
    this.templates = deps.templates;
    this.execution = deps.execution;
    this.logger = deps.logger;
  }

  runTurn(request: AgentTurnRequest): Promise<AgentTurnResult> {
    return this.turnLock.runExclusive(TURN_LOCK, () => this.executeTurn(request));
  }

  /** Records a prompt and its reply without calling the model. */
  recordExchange(prompt: string, userId: string, reply: TurnReply): Promise<void> {
    return this.turnLock.runExclusive(TURN_LOCK, async () => {
      await this.sessions.append(
        this.session,
        this.definition.name,
        userMessage(prompt, { user_id: userId })
      );
      await this.sessions.append(
        this.session,
        this.definition.name,
        assistantMessage(reply.text, reply.metadata)
      );
    });
  }

  private async executeTurn(request: AgentTurnRequest): Promise<AgentTurnResult> {
    const { definition, session } = this;
    const history = toChatHistory(await this.sessions.loadLog(session, definition.name));
    const systemPrompt = await this.templates.renderSystemPrompt(definition, {
      userId: request.userId,
      sessionId: session.id,
    });

    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      ...history,
      { role: "user", content: request.prompt },
    ];
    await this.sessions.append(
      session,
      definition.name,
      userMessage(request.prompt, { user_id: request.userId })
    );

    const { adapter, model } = this.providers.resolve(definition.model);
    const schemas = this.tools.schemas();
    const ctx = this.createToolContext(request);
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const toolCalls: ToolCallRecord[] = [];
    let rounds = 0;

    while (true) {
      const response = await this.callModel(adapter, model, messages, schemas);
      usage.inputTokens +=
        response.usage?.inputTokens ??
        estimateTokens(messages.map((message) => message.content).join(""));
      usage.outputTokens +=
        response.usage?.outputTokens ??
        estimateTokens(response.text + response.toolCalls.map((call) => call.arguments).join(""));

      if (response.toolCalls.length === 0) {
        const result: AgentTurnResult = { text: response.text, usage, toolCalls, rounds };
        const reply: TurnReply = request.finalize
          ? await request.finalize(result)
          : { text: response.text };
        await this.sessions.append(
          session,
          definition.name,
          assistantMessage(reply.text, reply.metadata)
        );
        this.logger.debug({ rounds, toolCalls: toolCalls.length, usage }, "Turn completed");
        return { ...result, text: reply.text };
      }

      if (rounds >= this.execution.maxToolIterations) {
        this.logger.warn(
          { limit: this.execution.maxToolIterations },
          "Tool round limit reached, failing the turn"
        );
        throw new ExecutionLimitError(definition.name, this.execution.maxToolIterations);
      }
      rounds += 1;

      for (const call of response.toolCalls) {
        const callId = call.id ?? randomUUID();
        const params = decodeParams(call.arguments);

        await this.sessions.append(
          session,
          definition.name,
          toolStartedMessage({ name: call.name, callId, params })
        );
        const result = await this.tools.invoke({ name: call.name, arguments: call.arguments }, ctx);
        await this.sessions.append(
          session,
          definition.name,
          toolFinishedMessage({ name: call.name, callId, params, result })
        );

        toolCalls.push({ id: callId, name: call.name, status: result.status });
        messages.push(
          { role: "assistant", content: call.arguments, name: call.name, tool_call_id: callId },
          { role: "tool", content: result.content, name: call.name, tool_call_id: callId }
        );
      }
    }
  }

  private callModel(
    adapter: ProviderAdapter,
    model: string,
    messages: ChatMessage[],
    tools: ToolSchema[]
  ): Promise<ModelResponse> {
    const agentName = this.definition.name;
    return withDeadline(
      this.execution.modelTimeoutMs,
      async (signal) => {
        const response: ModelResponse = { text: "", toolCalls: [] };
        for await (const event of adapter.stream({
          model,
          messages: [...messages],
          tools: tools.length > 0 ? tools : undefined,
          signal,
        })) {
          switch (event.type) {
            case "delta":
              response.text += event.text;
              break;
            case "tool_call":
              response.toolCalls.push({ id: event.id, name: event.name, arguments: event.arguments });
              break;
            case "error":
              throw new ModelCallError(agentName, event.message, { cause: event.cause });
            case "end":
              response.usage = event.usage;
              break;
          }
        }
        return response;
      },
      () => new ModelTimeoutError(agentName, this.execution.modelTimeoutMs)
    );
  }

  private createToolContext(request: AgentTurnRequest): ToolExecutionContext {
    return {
      sessionId: this.session.id,
      userId: request.userId,
      agentName: this.definition.name,
      callStack: request.callStack,
      workspaceDir: this.sessions.workspaceDir(this.session),
      withWorkspaceWriteLock: <T>(task: () => Promise<T>) =>
        this.sessions.withWorkspaceWriteLock(this.session, task),
      logger: this.logger,
    };
  }
}
