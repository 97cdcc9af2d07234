import type { Logger } from "pino";
import { ModelCallError } from "../errors";
import type { ProviderFactory } from "../providers/provider-factory.service";
import { inputGuardrailPrompt, outputGuardrailPrompt } from "./guardrail-prompts";
import type {
  GuardrailContext,
  GuardrailEvaluator,
  GuardrailStage,
  GuardrailVerdict,
} from "./guardrail.types";

const APPROVED_PATTERN = /^APPROVED\b\s*:?\s*([\s\S]*)$/i;
const REJECTED_WITH_DETAIL = /^REJECTED\b\s*:?\s*([\s\S]*?)\s*\|\s*(RESPONSE|REVISED)\s*:\s*([\s\S]*)$/i;
const REJECTED_PATTERN = /^REJECTED\b\s*:?\s*([\s\S]*)$/i;

/**
 * Reads an evaluator reply. Returns undefined for replies in neither
 * format so the caller can decide how to treat them.
 */
export function parseGuardrailReply(
  stage: GuardrailStage,
  reply: string
): GuardrailVerdict | undefined {
  const text = reply.trim();

  const approved = APPROVED_PATTERN.exec(text);
  if (approved) {
    return { kind: "approved", reason: approved[1].trim() };
  }

  const detailed = REJECTED_WITH_DETAIL.exec(text);
  if (detailed) {
    const reason = detailed[1].trim();
    const detail = detailed[3].trim();
    if (stage === "output" && detailed[2].toUpperCase() === "REVISED" && detail.length > 0) {
      return { kind: "revised", content: detail, reason };
    }
    return { kind: "rejected", reason, response: stage === "input" ? detail : "" };
  }

  const rejected = REJECTED_PATTERN.exec(text);
  if (rejected) {
    return { kind: "rejected", reason: rejected[1].trim(), response: "" };
  }

  return undefined;
}

export class ModelGuardrailEvaluator implements GuardrailEvaluator {
  constructor(
    private readonly providers: ProviderFactory,
    private readonly modelId: string,
    private readonly logger: Logger
  ) {}

  async evaluate(
    stage: GuardrailStage,
    text: string,
    context: GuardrailContext,
    signal: AbortSignal
  ): Promise<GuardrailVerdict> {
    const { adapter, model } = this.providers.resolve(this.modelId);
    const prompt =
      stage === "input" ? inputGuardrailPrompt(text, context) : outputGuardrailPrompt(text, context);

    let reply = "";
    for await (const event of adapter.stream({
      model,
      messages: [{ role: "user", content: prompt }],
      signal,
    })) {
      if (event.type === "delta") {
        reply += event.text;
      } else if (event.type === "error") {
        throw new ModelCallError(`${stage}-guardrail`, event.message, { cause: event.cause });
      }
    }

    const verdict = parseGuardrailReply(stage, reply);
    if (!verdict) {
      this.logger.warn({ stage, reply }, "Unexpected guardrail reply format, approving");
      return { kind: "approved", reason: "unparsed evaluator reply" };
    }
    return verdict;
  }
}
