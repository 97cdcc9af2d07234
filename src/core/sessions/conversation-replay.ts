import type { ChatMessage } from "../types";
import {
  type ConversationMessage,
  isToolFinished,
  isToolStarted,
} from "./conversation-message";

export interface ToolPairingViolation {
  index: number;
  reason: string;
}

/**
 * Every `started` entry must be followed directly by one `completed` or
 * `error` entry carrying the same tool name and call id, and no result may
 * appear without its `started` entry.
 */
export function verifyToolPairing(
  messages: readonly ConversationMessage[]
): ToolPairingViolation[] {
  const violations: ToolPairingViolation[] = [];

  messages.forEach((message, index) => {
    if (isToolStarted(message)) {
      const next = messages[index + 1];
      if (!next || !isToolFinished(next)) {
        violations.push({
          index,
          reason: `tool call ${message.metadata?.tool_name ?? "?"} has no result`,
        });
        return;
      }
      if (
        next.metadata?.tool_name !== message.metadata?.tool_name ||
        next.metadata?.tool_call_id !== message.metadata?.tool_call_id
      ) {
        violations.push({
          index: index + 1,
          reason: `result for ${next.metadata?.tool_name ?? "?"} does not match call ${message.metadata?.tool_name ?? "?"}`,
        });
      }
      return;
    }

    if (isToolFinished(message)) {
      const previous = messages[index - 1];
      if (!previous || !isToolStarted(previous)) {
        violations.push({
          index,
          reason: `result for ${message.metadata?.tool_name ?? "?"} has no started entry`,
        });
      }
    }
  });

  return violations;
}

/**
 * Rebuilds provider history from a log. Tool calls are replayed as an
 * assistant message naming the call followed by the tool result; calls that
 * never produced a result are left out.
 */
export function toChatHistory(messages: readonly ConversationMessage[]): ChatMessage[] {
  const history: ChatMessage[] = [];

  messages.forEach((message, index) => {
    if (message.role === "user" || message.role === "assistant") {
      history.push({ role: message.role, content: message.content });
      return;
    }

    const name = message.metadata?.tool_name;
    const callId = message.metadata?.tool_call_id;
    if (!name || !callId) {
      return;
    }

    if (isToolStarted(message)) {
      const next = messages[index + 1];
      if (next && isToolFinished(next) && next.metadata?.tool_call_id === callId) {
        history.push({
          role: "assistant",
          content: message.content,
          name,
          tool_call_id: callId,
        });
      }
      return;
    }

    const previous = messages[index - 1];
    if (previous && isToolStarted(previous) && previous.metadata?.tool_call_id === callId) {
      history.push({
        role: "tool",
        content: message.content,
        name,
        tool_call_id: callId,
      });
    }
  });

  return history;
}
