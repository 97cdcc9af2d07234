import { Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { ExecutionConfig } from "../../config/types";
import { LoggerService } from "../../io/logger.service";
import { DelegationCycleError } from "../errors";
import { GuardrailPipeline } from "../guardrails/guardrail-pipeline.service";
import type { GuardrailVerdict } from "../guardrails/guardrail.types";
import { ProviderFactory } from "../providers/provider-factory.service";
import { SessionManager } from "../sessions/session-manager.service";
import type { Session } from "../sessions/session.types";
import { TemplateRendererService } from "../templates/template-renderer.service";
import type { DelegationRequest } from "../tools/toolset-composer.service";
import { ToolsetComposer } from "../tools/toolset-composer.service";
import type { ToolOutput } from "../types";
import type { AgentDefinition } from "./agent-definition";
import { AgentExecutor, type AgentTurnResult } from "./agent-executor";
import { AgentRegistry } from "./agent-registry";
import { type ChatResponse, parseChatRequest } from "./chat-request";
import { ExecutorCache } from "./executor-cache";

export interface DelegateRequest {
  session: Session;
  userId: string;
  agentName: string;
  query: string;
  /** Agents already running in this request, router first. */
  callStack: readonly string[];
}

const finalText = (text: string, verdict: GuardrailVerdict): string => {
  switch (verdict.kind) {
    case "approved":
      return text;
    case "revised":
      return verdict.content;
    case "rejected":
      return verdict.response;
  }
};

/**
 * Entry point for chat requests. Routes each request through the input
 * guardrail, the router agent and the output guardrail, and runs sub-agents
 * when the router calls their delegation tools.
 */
@Injectable()
export class DelegationOrchestrator {
  private readonly executors = new ExecutorCache<AgentExecutor>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly composer: ToolsetComposer,
    private readonly sessions: SessionManager,
    private readonly guardrails: GuardrailPipeline,
    private readonly providers: ProviderFactory,
    private readonly templates: TemplateRendererService,
    private readonly loggerService: LoggerService,
    private readonly execution: ExecutionConfig
  ) {
    this.logger = loggerService.getLogger("orchestrator");
  }

  async chat(input: unknown): Promise<ChatResponse> {
    const request = parseChatRequest(input);
    const session = await this.sessions.resolve(request.userId, request.sessionId);
    const router = this.registry.router();
    const guardContext = { userId: request.userId, sessionId: session.id };

    const inputVerdict = await this.guardrails.checkInput(request.question, guardContext);
    const executor = await this.executorFor(session, router);
    if (inputVerdict.kind === "rejected") {
      this.logger.info(
        { sessionId: session.id, reason: inputVerdict.reason },
        "Input rejected by guardrail"
      );
      await executor.recordExchange(request.question, request.userId, {
        text: inputVerdict.response,
        metadata: { guardrail: "input_rejected", guardrail_reason: inputVerdict.reason },
      });
      return this.toResponse(session, inputVerdict.response);
    }

    const prompt = inputVerdict.kind === "revised" ? inputVerdict.content : request.question;
    const result = await executor.runTurn({
      prompt,
      userId: request.userId,
      callStack: [router.name],
      finalize: async (turn) => {
        const outputVerdict = await this.guardrails.checkOutput(turn.text, {
          ...guardContext,
          question: request.question,
        });
        if (outputVerdict.kind === "approved") {
          return { text: turn.text };
        }
        this.logger.info(
          { sessionId: session.id, verdict: outputVerdict.kind },
          "Output replaced by guardrail"
        );
        return {
          text: finalText(turn.text, outputVerdict),
          metadata: { guardrail: `output_${outputVerdict.kind}` },
        };
      },
    });

    const updated = await this.sessions.updateCounters(session, result.usage);
    return this.toResponse(updated, result.text);
  }

  /** Runs one turn of `agentName` on behalf of the last agent in `callStack`. */
  async delegate(request: DelegateRequest): Promise<AgentTurnResult> {
    if (request.callStack.includes(request.agentName)) {
      throw new DelegationCycleError([...request.callStack, request.agentName]);
    }

    const definition = this.registry.lookup(request.agentName);
    const executor = await this.executorFor(request.session, definition);
    this.logger.debug(
      { sessionId: request.session.id, agent: definition.name, callStack: request.callStack },
      "Delegating"
    );

    const result = await executor.runTurn({
      prompt: request.query,
      userId: request.userId,
      callStack: [...request.callStack, definition.name],
    });
    await this.sessions.updateCounters(request.session, result.usage);
    return result;
  }

  get cachedExecutorCount(): number {
    return this.executors.size;
  }

  private executorFor(session: Session, definition: AgentDefinition): Promise<AgentExecutor> {
    return this.executors.getOrCreate(session.id, definition.name, () => {
      const tools = this.composer.compose(definition, (request) =>
        this.runDelegationTool(session, request)
      );
      return new AgentExecutor({
        definition,
        session,
        tools,
        sessions: this.sessions,
        providers: this.providers,
        templates: this.templates,
        execution: this.execution,
        logger: this.loggerService.forAgent(session.id, definition.name),
      });
    });
  }

  private async runDelegationTool(
    session: Session,
    request: DelegationRequest
  ): Promise<ToolOutput> {
    const result = await this.delegate({
      session,
      userId: request.ctx.userId,
      agentName: request.agentName,
      query: request.query,
      callStack: request.ctx.callStack,
    });
    return {
      content: result.text,
      data: { agent: request.agentName, toolCalls: result.toolCalls },
    };
  }

  private toResponse(session: Session, response: string): ChatResponse {
    return {
      sessionId: session.id,
      response,
      metadata: { ...session.counters },
    };
  }
}
