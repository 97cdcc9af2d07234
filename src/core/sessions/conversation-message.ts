import { z } from "zod";
import type { ToolResult } from "../types";

export type MessageRole = "user" | "assistant" | "tool";
export type ToolCallStatus = "started" | "completed" | "error";

export interface MessageMetadata {
  tool_name?: string;
  tool_params?: unknown;
  tool_status?: ToolCallStatus;
  tool_call_id?: string;
  result_preview?: string;
  result_length?: number;
  [key: string]: unknown;
}

/** One line of a conversation log. */
export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
  metadata?: MessageMetadata;
}

export const CONVERSATION_MESSAGE_SCHEMA: z.ZodType<ConversationMessage> = z.object({
  role: z.enum(["user", "assistant", "tool"]),
  content: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  metadata: z
    .object({
      tool_name: z.string().optional(),
      tool_params: z.unknown().optional(),
      tool_status: z.enum(["started", "completed", "error"]).optional(),
      tool_call_id: z.string().optional(),
      result_preview: z.string().optional(),
      result_length: z.number().int().nonnegative().optional(),
    })
    .catchall(z.unknown())
    .optional(),
});

const now = (): string => new Date().toISOString();

export function userMessage(content: string, metadata?: MessageMetadata): ConversationMessage {
  return { role: "user", content, timestamp: now(), ...(metadata ? { metadata } : {}) };
}

export function assistantMessage(
  content: string,
  metadata?: MessageMetadata
): ConversationMessage {
  return { role: "assistant", content, timestamp: now(), ...(metadata ? { metadata } : {}) };
}

export function toolStartedMessage(call: {
  name: string;
  callId: string;
  params: unknown;
}): ConversationMessage {
  return {
    role: "tool",
    content: JSON.stringify(call.params ?? {}),
    timestamp: now(),
    metadata: {
      tool_name: call.name,
      tool_params: call.params,
      tool_status: "started",
      tool_call_id: call.callId,
    },
  };
}

export function toolFinishedMessage(call: {
  name: string;
  callId: string;
  params: unknown;
  result: ToolResult;
}): ConversationMessage {
  return {
    role: "tool",
    content: call.result.content,
    timestamp: now(),
    metadata: {
      tool_name: call.name,
      tool_params: call.params,
      tool_status: call.result.status,
      tool_call_id: call.callId,
      result_preview: call.result.preview,
      result_length: call.result.length,
    },
  };
}

export const isToolStarted = (message: ConversationMessage): boolean =>
  message.role === "tool" && message.metadata?.tool_status === "started";

export const isToolFinished = (message: ConversationMessage): boolean =>
  message.role === "tool" &&
  (message.metadata?.tool_status === "completed" ||
    message.metadata?.tool_status === "error");
