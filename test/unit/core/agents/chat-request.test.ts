import { describe, it, expect } from "vitest";
import { parseChatRequest } from "../../../../src/core/agents/chat-request";
import { InvalidRequestError } from "../../../../src/core/errors";

describe("parseChatRequest", () => {
  it("trims the question and accepts a missing session id", () => {
    expect(parseChatRequest({ userId: "user-1", question: "  hello  " })).toEqual({
      userId: "user-1",
      question: "hello",
    });
    expect(parseChatRequest({ userId: "user-1", question: "hi", sessionId: null })).toEqual({
      userId: "user-1",
      question: "hi",
      sessionId: null,
    });
  });

  it("lists every problem in one InvalidRequestError", () => {
    let caught: unknown;
    try {
      parseChatRequest({ question: 42 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidRequestError);
    expect(caught instanceof InvalidRequestError ? caught.details : "").toBe(
      "userId: Required; question: Expected string, received number"
    );
  });
});
