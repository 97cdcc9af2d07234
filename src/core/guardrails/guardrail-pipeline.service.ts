import { Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { GuardrailsConfig } from "../../config/types";
import { LoggerService } from "../../io/logger.service";
import { withDeadline } from "../concurrency/deadline";
import { GuardrailTimeoutError } from "../errors";
import {
  APPROVED,
  type GuardrailContext,
  type GuardrailEvaluator,
  type GuardrailStage,
  type GuardrailVerdict,
} from "./guardrail.types";

/**
 * Runs the input and output checkpoints. Each check is one evaluation bounded
 * by `timeoutMs`. When the evaluator fails or times out the check approves
 * only if `failOpen` is set; otherwise the error fails the turn.
 */
@Injectable()
export class GuardrailPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly evaluator: GuardrailEvaluator,
    private readonly config: GuardrailsConfig,
    loggerService: LoggerService
  ) {
    this.logger = loggerService.getLogger("guardrails");
  }

  checkInput(text: string, context: GuardrailContext): Promise<GuardrailVerdict> {
    return this.check("input", text, context);
  }

  checkOutput(text: string, context: GuardrailContext): Promise<GuardrailVerdict> {
    return this.check("output", text, context);
  }

  private async check(
    stage: GuardrailStage,
    text: string,
    context: GuardrailContext
  ): Promise<GuardrailVerdict> {
    if (!this.config.enabled) {
      return APPROVED;
    }

    let verdict: GuardrailVerdict;
    try {
      verdict = await withDeadline(
        this.config.timeoutMs,
        (signal) => this.evaluator.evaluate(stage, text, context, signal),
        () => new GuardrailTimeoutError(stage, this.config.timeoutMs)
      );
    } catch (error) {
      if (!this.config.failOpen) {
        throw error;
      }
      this.logger.warn(
        { err: error, stage, sessionId: context.sessionId },
        "Guardrail evaluation failed, continuing because failOpen is set"
      );
      return APPROVED;
    }

    if (verdict.kind === "rejected" && verdict.response.trim().length === 0) {
      verdict = { ...verdict, response: this.config.fallbackMessage };
    }

    this.logger.info(
      { stage, verdict: verdict.kind, sessionId: context.sessionId },
      "Guardrail verdict"
    );
    return verdict;
  }
}
