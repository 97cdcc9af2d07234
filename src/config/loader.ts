import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import yaml from "yaml";
import { ConfigError } from "../core/errors";
import { CONFIG_SCHEMA } from "./config.schema";
import { DEFAULT_CONFIG } from "./defaults";
import type { CliRuntimeOptions, SwitchboardConfig } from "./types";

const CONFIG_FILENAMES = [
  "switchboard.config.yaml",
  "switchboard.config.yml",
  "switchboard.config.json",
];

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Objects merge key by key; any other value in `override` replaces `base`. */
export function mergeConfigLayers(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }

  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfigLayers(base[key], value);
  }
  return merged;
}

@Injectable()
export class ConfigService {
  constructor(private readonly cwd: string = process.cwd()) {}

  async load(options: CliRuntimeOptions = {}): Promise<SwitchboardConfig> {
    const configPath = await this.resolveConfigPath(options);
    const fileConfig = configPath ? await this.readConfigFile(configPath) : {};
    const merged = mergeConfigLayers(
      mergeConfigLayers(DEFAULT_CONFIG, fileConfig),
      this.cliOverrides(options)
    );
    return this.validate(merged, configPath);
  }

  validate(candidate: unknown, source?: string | null): SwitchboardConfig {
    const result = CONFIG_SCHEMA.safeParse(candidate);
    if (result.success) {
      return result.data;
    }

    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ""}`,
      result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "(root)",
        message: issue.message,
      }))
    );
  }

  private cliOverrides(options: CliRuntimeOptions): PlainObject {
    const overrides: PlainObject = {};
    if (options.model) {
      overrides.model = options.model;
    }
    if (options.logLevel) {
      overrides.logging = { level: options.logLevel };
    }
    if (options.sessionsRoot) {
      overrides.sessions = { root: options.sessionsRoot };
    }
    return overrides;
  }

  private async readConfigFile(candidate: string): Promise<unknown> {
    const data = await fs.readFile(candidate, "utf-8");
    try {
      if (candidate.endsWith(".json")) {
        return JSON.parse(data);
      }
      return yaml.parse(data) ?? {};
    } catch (error) {
      throw new ConfigError(`Unable to parse configuration file ${candidate}`, [
        {
          path: "(file)",
          message: error instanceof Error ? error.message : String(error),
        },
      ]);
    }
  }

  private async resolveConfigPath(
    options: CliRuntimeOptions
  ): Promise<string | null> {
    if (options.config) {
      const explicit = path.resolve(this.cwd, options.config);
      if (!(await this.exists(explicit))) {
        throw new ConfigError(`Config file not found at ${explicit}`);
      }
      return explicit;
    }

    for (const name of CONFIG_FILENAMES) {
      const candidate = path.resolve(this.cwd, name);
      if (await this.exists(candidate)) {
        return candidate;
      }
    }

    return null;
  }

  private async exists(candidate: string): Promise<boolean> {
    return fs.access(candidate).then(
      () => true,
      () => false
    );
  }
}
