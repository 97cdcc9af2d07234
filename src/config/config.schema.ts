import { z } from "zod";
import type { SwitchboardConfig } from "./types";

const MODEL_ID = z
  .string()
  .regex(/^[A-Za-z0-9_-]+:.+$/, "must look like provider:model");

const LOGGING_SCHEMA = z.object({
  level: z.enum(["silent", "error", "warn", "info", "debug", "trace"]),
  destination: z
    .object({
      type: z.enum(["stdout", "stderr", "file"]),
      path: z.string().optional(),
      pretty: z.boolean().optional(),
      colorize: z.boolean().optional(),
    })
    .optional(),
  enableTimestamps: z.boolean().optional(),
});

const SUPPORT_DATA_SCHEMA = z.object({
  client: z.literal("better-sqlite3"),
  filename: z.string().min(1),
});

export const CONFIG_SCHEMA: z.ZodType<SwitchboardConfig> = z.object({
  model: MODEL_ID,
  providers: z.record(
    z.object({
      apiKey: z.string().optional(),
      baseUrl: z.string().url().optional(),
    })
  ),
  agents: z.object({
    directory: z.string().min(1),
    router: z.string().min(1),
  }),
  execution: z.object({
    maxToolIterations: z.number().int().positive(),
    modelTimeoutMs: z.number().int().nonnegative(),
  }),
  guardrails: z.object({
    enabled: z.boolean(),
    model: MODEL_ID.optional(),
    timeoutMs: z.number().int().nonnegative(),
    failOpen: z.boolean(),
    fallbackMessage: z.string().min(1),
  }),
  sessions: z.object({
    root: z.string().min(1),
  }),
  tools: z.object({
    previewChars: z.number().int().positive(),
  }),
  supportData: SUPPORT_DATA_SCHEMA.optional(),
  logging: LOGGING_SCHEMA,
});
