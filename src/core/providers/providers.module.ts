import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../../config/config.tokens";
import type { SwitchboardConfig } from "../../config/types";
import { ProviderFactory } from "./provider-factory.service";

@Module({
  providers: [
    {
      provide: ProviderFactory,
      useFactory: (config: SwitchboardConfig) => new ProviderFactory(config.providers),
      inject: [SWITCHBOARD_CONFIG],
    },
  ],
  exports: [ProviderFactory],
})
export class ProvidersModule {}
