import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import yaml from "yaml";
import { ConfigError, type ConfigIssue } from "../errors";
import { AGENT_DESCRIPTOR_SCHEMA, type AgentDescriptor } from "./agent-definition";

export interface LoadedDescriptor {
  descriptor: AgentDescriptor;
  source: string;
}

const DESCRIPTOR_EXTENSIONS = new Set([".yml", ".yaml"]);

/**
 * Reads every YAML agent descriptor in a directory, in file name order.
 * Problems across all files are collected and reported together.
 */
@Injectable()
export class AgentDefinitionLoader {
  async discover(directory: string): Promise<LoadedDescriptor[]> {
    const root = path.resolve(directory);
    let entries: string[];
    try {
      entries = await fs.readdir(root);
    } catch (error) {
      throw new ConfigError(`Unable to read agent directory ${root}`, [
        { path: root, message: error instanceof Error ? error.message : String(error) },
      ]);
    }

    const files = entries
      .filter((entry) => DESCRIPTOR_EXTENSIONS.has(path.extname(entry)))
      .sort();

    const issues: ConfigIssue[] = [];
    const loaded: LoadedDescriptor[] = [];
    for (const file of files) {
      const source = path.join(root, file);
      const result = this.parse(source, await fs.readFile(source, "utf-8"));
      if ("issues" in result) {
        issues.push(...result.issues);
      } else {
        loaded.push(result);
      }
    }

    if (issues.length > 0) {
      throw new ConfigError("Invalid agent descriptors", issues);
    }
    return loaded;
  }

  parse(source: string, text: string): LoadedDescriptor | { issues: ConfigIssue[] } {
    let raw: unknown;
    try {
      raw = yaml.parse(text);
    } catch (error) {
      return {
        issues: [
          { path: source, message: error instanceof Error ? error.message : String(error) },
        ],
      };
    }

    const parsed = AGENT_DESCRIPTOR_SCHEMA.safeParse(raw);
    if (!parsed.success) {
      return {
        issues: parsed.error.issues.map((issue) => ({
          path: `${source}#${issue.path.join(".") || "(root)"}`,
          message: issue.message,
        })),
      };
    }
    return { descriptor: parsed.data, source };
  }
}
