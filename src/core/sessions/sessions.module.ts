import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../../config/config.tokens";
import type { SwitchboardConfig } from "../../config/types";
import { IoModule } from "../../io/io.module";
import { JsonlWriterService } from "../../io/jsonl-writer.service";
import { LoggerService } from "../../io/logger.service";
import { SessionManager } from "./session-manager.service";

@Module({
  imports: [IoModule],
  providers: [
    {
      provide: SessionManager,
      useFactory: (
        config: SwitchboardConfig,
        writer: JsonlWriterService,
        loggerService: LoggerService
      ) => new SessionManager(config.sessions.root, writer, loggerService),
      inject: [SWITCHBOARD_CONFIG, JsonlWriterService, LoggerService],
    },
  ],
  exports: [SessionManager],
})
export class SessionsModule {}
