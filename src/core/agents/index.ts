export * from "./agent-definition";
export * from "./agent-definition.loader";
export * from "./agent-registry";
export * from "./agent-executor";
export * from "./executor-cache";
export * from "./chat-request";
export * from "./delegation-orchestrator.service";
export * from "./agents.module";
