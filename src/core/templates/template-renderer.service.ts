import { Injectable } from "@nestjs/common";
import { Eta } from "eta";
import type { AgentDefinition } from "../agents/agent-definition";

export type TemplateVariables = Record<string, unknown>;

export interface SystemPromptContext {
  userId: string;
  sessionId: string;
  now?: Date;
}

@Injectable()
export class TemplateRendererService {
  private readonly engine = new Eta({
    cache: true,
    autoEscape: false,
    useWith: true,
  });

  /** Source text each named prompt was compiled from. */
  private readonly compiledSources = new Map<string, string>();

  async renderString(template: string, variables: TemplateVariables = {}): Promise<string> {
    const rendered = await this.engine.renderStringAsync(template, variables);
    return rendered ?? "";
  }

  /**
   * Renders an agent's system prompt. Each agent's template is compiled once
   * and recompiled only when its source changes.
   */
  async renderSystemPrompt(
    definition: AgentDefinition,
    context: SystemPromptContext
  ): Promise<string> {
    const key = `@system:${definition.name}`;
    if (this.compiledSources.get(key) !== definition.systemPrompt) {
      this.engine.templatesAsync.define(
        key,
        this.engine.compile(definition.systemPrompt, { async: true })
      );
      this.compiledSources.set(key, definition.systemPrompt);
    }

    const rendered = await this.engine.renderAsync(key, {
      agent: definition.name,
      userId: context.userId,
      sessionId: context.sessionId,
      now: (context.now ?? new Date()).toISOString(),
    });
    return rendered ?? "";
  }
}
