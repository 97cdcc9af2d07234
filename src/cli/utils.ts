import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "../app.module";
import type { CliRuntimeOptions, LogLevel } from "../config/types";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export function resolveCliOptions(options: Record<string, unknown>): CliRuntimeOptions {
  const resolved: CliRuntimeOptions = {};

  if (typeof options.config === "string") resolved.config = options.config;
  if (typeof options.model === "string") resolved.model = options.model;
  if (typeof options.sessionsRoot === "string") resolved.sessionsRoot = options.sessionsRoot;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new Error(
        `Invalid log level "${String(options.logLevel)}". Expected one of: ${LOG_LEVELS.join(", ")}`
      );
    }
    resolved.logLevel = options.logLevel;
  }

  return resolved;
}

export async function createCliApplicationContext(
  options: CliRuntimeOptions
): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule.register(options), {
    logger: false,
    abortOnError: false,
  });
}

export async function withApplicationContext<T>(
  options: CliRuntimeOptions,
  task: (app: INestApplicationContext) => Promise<T>
): Promise<T> {
  const app = await createCliApplicationContext(options);
  try {
    return await task(app);
  } finally {
    await app.close();
  }
}
