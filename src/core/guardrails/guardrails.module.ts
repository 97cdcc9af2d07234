import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../../config/config.tokens";
import type { SwitchboardConfig } from "../../config/types";
import { IoModule } from "../../io/io.module";
import { LoggerService } from "../../io/logger.service";
import { ProviderFactory } from "../providers/provider-factory.service";
import { ProvidersModule } from "../providers/providers.module";
import { GuardrailPipeline } from "./guardrail-pipeline.service";
import { GUARDRAIL_EVALUATOR, type GuardrailEvaluator } from "./guardrail.types";
import { ModelGuardrailEvaluator } from "./model-guardrail.evaluator";

@Module({
  imports: [IoModule, ProvidersModule],
  providers: [
    {
      provide: GUARDRAIL_EVALUATOR,
      useFactory: (
        providers: ProviderFactory,
        config: SwitchboardConfig,
        loggerService: LoggerService
      ) =>
        new ModelGuardrailEvaluator(
          providers,
          config.guardrails.model ?? config.model,
          loggerService.getLogger("guardrail-evaluator")
        ),
      inject: [ProviderFactory, SWITCHBOARD_CONFIG, LoggerService],
    },
    {
      provide: GuardrailPipeline,
      useFactory: (
        evaluator: GuardrailEvaluator,
        config: SwitchboardConfig,
        loggerService: LoggerService
      ) => new GuardrailPipeline(evaluator, config.guardrails, loggerService),
      inject: [GUARDRAIL_EVALUATOR, SWITCHBOARD_CONFIG, LoggerService],
    },
  ],
  exports: [GuardrailPipeline],
})
export class GuardrailsModule {}
