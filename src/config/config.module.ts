import { type DynamicModule, Module } from "@nestjs/common";
import { ConfigService } from "./loader";
import { CLI_RUNTIME_OPTIONS, SWITCHBOARD_CONFIG } from "./config.tokens";
import type { CliRuntimeOptions } from "./types";

@Module({})
export class ConfigModule {
  static register(options: CliRuntimeOptions = {}): DynamicModule {
    return {
      module: ConfigModule,
      global: true,
      providers: [
        { provide: CLI_RUNTIME_OPTIONS, useValue: options },
        { provide: ConfigService, useFactory: () => new ConfigService() },
        {
          provide: SWITCHBOARD_CONFIG,
          useFactory: (service: ConfigService, cliOptions: CliRuntimeOptions) =>
            service.load(cliOptions),
          inject: [ConfigService, CLI_RUNTIME_OPTIONS],
        },
      ],
      exports: [ConfigService, SWITCHBOARD_CONFIG],
    };
  }
}
