import fg from "fast-glob";
import fs from "fs/promises";
import path from "path";
import type { ToolDefinition } from "../../types";
import { truncateLine } from "../truncate";
import {
  assertWorkspacePattern,
  isInsideWorkspace,
  resolveWorkspacePath,
  toWorkspaceRelative,
} from "../workspace-path";

const DEFAULT_LIMIT = 100;

interface GrepMatch {
  file: string;
  line: number;
  text: string;
}

export const grepTool: ToolDefinition = {
  name: "grep",
  description:
    "Search file contents in the session workspace with a regular expression. Returns file:line: text matches.",
  jsonSchema: {
    type: "object",
    properties: {
      pattern: { type: "string", minLength: 1 },
      path: { type: "string" },
      glob: { type: "string", minLength: 1 },
      ignoreCase: { type: "boolean" },
      limit: { type: "integer", minimum: 1 },
    },
    required: ["pattern"],
    additionalProperties: false,
  },
  async handler(args, ctx) {
    const expression = new RegExp(String(args.pattern), args.ignoreCase === true ? "i" : "");
    const searchDir = resolveWorkspacePath(
      "grep",
      ctx.workspaceDir,
      typeof args.path === "string" ? args.path : undefined
    );
    const glob = typeof args.glob === "string" ? args.glob : "**/*";
    assertWorkspacePattern("grep", glob);
    const limit = typeof args.limit === "number" ? args.limit : DEFAULT_LIMIT;

    const found = await fg(glob, {
      cwd: searchDir,
      onlyFiles: true,
      dot: true,
      absolute: true,
      ignore: ["**/node_modules/**", "**/.git/**"],
      suppressErrors: true,
    });
    const files = [...new Set(found.map((file) => path.resolve(file)))]
      .filter((file) => isInsideWorkspace(ctx.workspaceDir, file))
      .sort();

    const matches: GrepMatch[] = [];
    let limitReached = false;
    for (const file of files) {
      const content = await fs.readFile(file, "utf-8");
      const lines = content.split("\n");
      for (let index = 0; index < lines.length; index += 1) {
        if (!expression.test(lines[index])) {
          continue;
        }
        if (matches.length >= limit) {
          limitReached = true;
          break;
        }
        matches.push({
          file: toWorkspaceRelative(ctx.workspaceDir, file),
          line: index + 1,
          text: truncateLine(lines[index]),
        });
      }
      if (limitReached) break;
    }

    if (matches.length === 0) {
      return { content: "No matches found", data: { matches } };
    }

    const listing = matches.map((match) => `${match.file}:${match.line}: ${match.text}`).join("\n");
    return {
      content: limitReached ? `${listing}\n\n[${limit} matches limit reached]` : listing,
      data: { matches },
    };
  },
};
