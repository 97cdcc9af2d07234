import { z } from "zod";
import { InvalidRequestError } from "../errors";

export const CHAT_REQUEST_SCHEMA = z.object({
  userId: z.string().trim().min(1, "userId is required"),
  question: z.string().trim().min(1, "question is required"),
  sessionId: z.string().min(1).nullish(),
});

export type ChatRequest = z.infer<typeof CHAT_REQUEST_SCHEMA>;

export interface ChatResponseMetadata {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface ChatResponse {
  sessionId: string;
  response: string;
  metadata: ChatResponseMetadata;
}

export function parseChatRequest(input: unknown): ChatRequest {
  const parsed = CHAT_REQUEST_SCHEMA.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")
    );
  }
  return parsed.data;
}
