import { type DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "./config/config.module";
import type { CliRuntimeOptions } from "./config/types";
import { AgentsModule } from "./core/agents/agents.module";
import { IoModule } from "./io/io.module";

@Module({})
export class AppModule {
  static register(options: CliRuntimeOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.register(options), IoModule, AgentsModule],
      exports: [AgentsModule, IoModule],
    };
  }
}
