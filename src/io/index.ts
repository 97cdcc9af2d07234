export * from "./logger.service";
export * from "./jsonl-writer.service";
export * from "./io.module";
