import { z } from "zod";

export interface TokenCounters {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

/** Persisted as `session.json`. */
export interface SessionMetadata {
  session_id: string;
  user_id: string;
  created_at: string;
  updated_at: string;
  token_counters: TokenCounters;
}

export interface Session {
  id: string;
  userId: string;
  createdAt: string;
  updatedAt: string;
  counters: TokenCounters;
}

export const SESSION_METADATA_SCHEMA: z.ZodType<SessionMetadata> = z.object({
  session_id: z.string().min(1),
  user_id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  token_counters: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
    total_tokens: z.number().int().nonnegative(),
  }),
});

export const emptyCounters = (): TokenCounters => ({
  input_tokens: 0,
  output_tokens: 0,
  total_tokens: 0,
});

export const toSession = (metadata: SessionMetadata): Session => ({
  id: metadata.session_id,
  userId: metadata.user_id,
  createdAt: metadata.created_at,
  updatedAt: metadata.updated_at,
  counters: { ...metadata.token_counters },
});

export const toMetadata = (session: Session): SessionMetadata => ({
  session_id: session.id,
  user_id: session.userId,
  created_at: session.createdAt,
  updated_at: session.updatedAt,
  token_counters: { ...session.counters },
});
