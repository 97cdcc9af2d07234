export * from "./app.module";
export * from "./config";
export * from "./io";
export * from "./core/errors";
export * from "./core/types";
export * from "./core/concurrency";
export * from "./core/sessions";
export * from "./core/tools";
export * from "./core/guardrails";
export * from "./core/providers";
export * from "./core/agents";
export * from "./core/templates/template-renderer.service";
