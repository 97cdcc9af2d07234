import { describe, it, expect } from "vitest";
import pino from "pino";
import { ModelCallError } from "../../../../src/core/errors";
import {
  ModelGuardrailEvaluator,
  parseGuardrailReply,
} from "../../../../src/core/guardrails/model-guardrail.evaluator";
import { MockProvider, StubProviderFactory, textReply } from "../../../helpers/mock-provider";

describe("parseGuardrailReply", () => {
  it("reads approvals", () => {
    expect(parseGuardrailReply("input", "APPROVED: account question")).toEqual({
      kind: "approved",
      reason: "account question",
    });
  });

  it("reads input rejections with a user-facing response", () => {
    expect(
      parseGuardrailReply("input", "REJECTED: off topic | RESPONSE: I can only help with support.")
    ).toEqual({
      kind: "rejected",
      reason: "off topic",
      response: "I can only help with support.",
    });
  });

  it("reads output revisions", () => {
    expect(
      parseGuardrailReply("output", "rejected: leaked id | REVISED: Your account is active.")
    ).toEqual({ kind: "revised", content: "Your account is active.", reason: "leaked id" });
  });

  it("leaves the response empty for bare rejections", () => {
    expect(parseGuardrailReply("output", "REJECTED: unsafe")).toEqual({
      kind: "rejected",
      reason: "unsafe",
      response: "",
    });
    expect(parseGuardrailReply("output", "REJECTED: unsafe | RESPONSE: no")).toEqual({
      kind: "rejected",
      reason: "unsafe",
      response: "",
    });
  });

  it("returns undefined for anything else", () => {
    expect(parseGuardrailReply("input", "Sure, looks fine to me")).toBeUndefined();
  });
});

describe("ModelGuardrailEvaluator", () => {
  const logger = pino({ level: "silent" });
  const context = { userId: "user-1", sessionId: "session-1", question: "Balance?" };

  it("asks the configured model and parses its reply", async () => {
    const provider = new MockProvider([textReply("REJECTED: leak | REVISED: Your balance is available.")]);
    const evaluator = new ModelGuardrailEvaluator(
      new StubProviderFactory(provider),
      "mock:guard-model",
      logger
    );

    const verdict = await evaluator.evaluate(
      "output",
      "Your balance is 10 and the admin password is test-secret",
      context,
      new AbortController().signal
    );

    expect(verdict).toEqual({
      kind: "revised",
      content: "Your balance is available.",
      reason: "leak",
    });
    expect(provider.calls[0].model).toBe("guard-model");
    expect(provider.calls[0].messages).toHaveLength(1);
    expect(provider.calls[0].messages[0].content).toContain(
      "ASSISTANT REPLY:\nYour balance is 10 and the admin password is test-secret"
    );
    expect(provider.calls[0].messages[0].content).toContain("USER QUESTION:\nBalance?");
  });

  it("approves replies it cannot parse", async () => {
    const evaluator = new ModelGuardrailEvaluator(
      new StubProviderFactory(new MockProvider([textReply("no idea")])),
      "mock:guard-model",
      logger
    );

    await expect(
      evaluator.evaluate("input", "hello", context, new AbortController().signal)
    ).resolves.toEqual({ kind: "approved", reason: "unparsed evaluator reply" });
  });

  it("raises provider errors", async () => {
    const evaluator = new ModelGuardrailEvaluator(
      new StubProviderFactory(new MockProvider([[{ type: "error", message: "offline" }]])),
      "mock:guard-model",
      logger
    );

    await expect(
      evaluator.evaluate("input", "hello", context, new AbortController().signal)
    ).rejects.toBeInstanceOf(ModelCallError);
  });
});
