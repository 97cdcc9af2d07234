export * from "./guardrail.types";
export * from "./guardrail-prompts";
export * from "./model-guardrail.evaluator";
export * from "./guardrail-pipeline.service";
export * from "./guardrails.module";
