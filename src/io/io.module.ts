import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../config/config.tokens";
import type { SwitchboardConfig } from "../config/types";
import { JsonlWriterService } from "./jsonl-writer.service";
import { LoggerService } from "./logger.service";

@Module({
  providers: [
    {
      provide: LoggerService,
      useFactory: (config: SwitchboardConfig) => {
        const loggerService = new LoggerService();
        loggerService.configure(config.logging);
        return loggerService;
      },
      inject: [SWITCHBOARD_CONFIG],
    },
    JsonlWriterService,
  ],
  exports: [LoggerService, JsonlWriterService],
})
export class IoModule {}
