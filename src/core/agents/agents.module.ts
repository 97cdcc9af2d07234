import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../../config/config.tokens";
import type { SwitchboardConfig } from "../../config/types";
import { IoModule } from "../../io/io.module";
import { LoggerService } from "../../io/logger.service";
import { GuardrailPipeline } from "../guardrails/guardrail-pipeline.service";
import { GuardrailsModule } from "../guardrails/guardrails.module";
import { ProviderFactory } from "../providers/provider-factory.service";
import { ProvidersModule } from "../providers/providers.module";
import { SessionManager } from "../sessions/session-manager.service";
import { SessionsModule } from "../sessions/sessions.module";
import { TemplateRendererService } from "../templates/template-renderer.service";
import { ToolCatalog } from "../tools/tool-catalog";
import { ToolsModule } from "../tools/tools.module";
import { ToolsetComposer } from "../tools/toolset-composer.service";
import { AgentDefinitionLoader } from "./agent-definition.loader";
import { AgentRegistry } from "./agent-registry";
import { DelegationOrchestrator } from "./delegation-orchestrator.service";

@Module({
  imports: [IoModule, ToolsModule, SessionsModule, GuardrailsModule, ProvidersModule],
  providers: [
    AgentDefinitionLoader,
    TemplateRendererService,
    {
      provide: AgentRegistry,
      useFactory: async (
        loader: AgentDefinitionLoader,
        catalog: ToolCatalog,
        config: SwitchboardConfig
      ) =>
        AgentRegistry.create(await loader.discover(config.agents.directory), {
          routerName: config.agents.router,
          defaultModel: config.model,
          toolNames: catalog.names(),
        }),
      inject: [AgentDefinitionLoader, ToolCatalog, SWITCHBOARD_CONFIG],
    },
    {
      provide: ToolsetComposer,
      useFactory: (catalog: ToolCatalog, registry: AgentRegistry, config: SwitchboardConfig) =>
        new ToolsetComposer(catalog, registry, { previewChars: config.tools.previewChars }),
      inject: [ToolCatalog, AgentRegistry, SWITCHBOARD_CONFIG],
    },
    {
      provide: DelegationOrchestrator,
      useFactory: (
        registry: AgentRegistry,
        composer: ToolsetComposer,
        sessions: SessionManager,
        guardrails: GuardrailPipeline,
        providers: ProviderFactory,
        templates: TemplateRendererService,
        loggerService: LoggerService,
        config: SwitchboardConfig
      ) =>
        new DelegationOrchestrator(
          registry,
          composer,
          sessions,
          guardrails,
          providers,
          templates,
          loggerService,
          config.execution
        ),
      inject: [
        AgentRegistry,
        ToolsetComposer,
        SessionManager,
        GuardrailPipeline,
        ProviderFactory,
        TemplateRendererService,
        LoggerService,
        SWITCHBOARD_CONFIG,
      ],
    },
  ],
  exports: [AgentRegistry, DelegationOrchestrator, SessionsModule],
})
export class AgentsModule {}
