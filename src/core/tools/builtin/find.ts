import fg from "fast-glob";
import path from "path";
import type { ToolDefinition } from "../../types";
import {
  assertWorkspacePattern,
  isInsideWorkspace,
  resolveWorkspacePath,
  toWorkspaceRelative,
} from "../workspace-path";

const DEFAULT_LIMIT = 1000;

export const findTool: ToolDefinition = {
  name: "find",
  description:
    "Find files in the session workspace by glob pattern, e.g. '*.txt' or 'notes/**/*.md'.",
  jsonSchema: {
    type: "object",
    properties: {
      pattern: { type: "string", minLength: 1 },
      path: { type: "string" },
      limit: { type: "integer", minimum: 1 },
    },
    required: ["pattern"],
    additionalProperties: false,
  },
  async handler(args, ctx) {
    const pattern = String(args.pattern);
    assertWorkspacePattern("find", pattern);
    const searchDir = resolveWorkspacePath(
      "find",
      ctx.workspaceDir,
      typeof args.path === "string" ? args.path : undefined
    );
    const limit = typeof args.limit === "number" ? args.limit : DEFAULT_LIMIT;

    const found = await fg(pattern, {
      cwd: searchDir,
      onlyFiles: true,
      dot: true,
      absolute: true,
      ignore: ["**/node_modules/**", "**/.git/**"],
      suppressErrors: true,
    });
    const matches = [...new Set(found.map((file) => path.resolve(file)))]
      .filter((file) => isInsideWorkspace(ctx.workspaceDir, file))
      .map((file) => toWorkspaceRelative(ctx.workspaceDir, file))
      .sort();

    if (matches.length === 0) {
      return {
        content: `No files found matching pattern ${pattern}`,
        data: { files: [], truncated: false },
      };
    }

    const files = matches.slice(0, limit);
    const truncated = matches.length > limit;
    const listing = files.join("\n");
    return {
      content: truncated ? `${listing}\n\n[${limit} results limit reached]` : listing,
      data: { files, truncated },
    };
  },
};
