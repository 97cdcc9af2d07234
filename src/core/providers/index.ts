export * from "./openai";
export * from "./noop";
export * from "./provider-factory.service";
export * from "./providers.module";
