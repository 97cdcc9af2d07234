import { Module } from "@nestjs/common";
import { SWITCHBOARD_CONFIG } from "../../config/config.tokens";
import type { SwitchboardConfig } from "../../config/types";
import { nativeTools } from "./builtin";
import { KnexSupportDataSource } from "./support/knex-support-data.source";
import { SUPPORT_DATA_SOURCE, type SupportDataSource } from "./support/support-data.source";
import { createSupportTools } from "./support/support-tools";
import { ToolCatalog } from "./tool-catalog";

@Module({
  providers: [
    {
      provide: SUPPORT_DATA_SOURCE,
      useFactory: async (config: SwitchboardConfig) => {
        if (!config.supportData) {
          return undefined;
        }
        const source = KnexSupportDataSource.fromConfig(config.supportData);
        await source.migrate();
        return source;
      },
      inject: [SWITCHBOARD_CONFIG],
    },
    {
      provide: ToolCatalog,
      useFactory: (source: SupportDataSource | undefined) =>
        new ToolCatalog([...nativeTools, ...createSupportTools(source)]),
      inject: [SUPPORT_DATA_SOURCE],
    },
  ],
  exports: [ToolCatalog, SUPPORT_DATA_SOURCE],
})
export class ToolsModule {}
