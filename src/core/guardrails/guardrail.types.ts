export type GuardrailStage = "input" | "output";

export type GuardrailVerdict =
  | { kind: "approved"; reason?: string }
  | { kind: "revised"; content: string; reason?: string }
  | { kind: "rejected"; reason: string; response: string };

export interface GuardrailContext {
  userId: string;
  sessionId: string;
  /** The user's question; set for the output check. */
  question?: string;
}

export interface GuardrailEvaluator {
  evaluate(
    stage: GuardrailStage,
    text: string,
    context: GuardrailContext,
    signal: AbortSignal
  ): Promise<GuardrailVerdict>;
}

export const GUARDRAIL_EVALUATOR = Symbol.for("switchboard:guardrail-evaluator");

export const APPROVED: GuardrailVerdict = Object.freeze({ kind: "approved" });
