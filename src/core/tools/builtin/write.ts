import fs from "fs/promises";
import path from "path";
import type { ToolDefinition } from "../../types";
import { resolveWorkspacePath } from "../workspace-path";

export const writeTool: ToolDefinition = {
  name: "write",
  description:
    "Write UTF-8 text to a file in the session workspace, creating parent directories and replacing any existing content.",
  jsonSchema: {
    type: "object",
    properties: {
      path: { type: "string", minLength: 1 },
      content: { type: "string" },
    },
    required: ["path", "content"],
    additionalProperties: false,
  },
  async handler(args, ctx) {
    const relPath = String(args.path);
    const content = String(args.content);
    const absolute = resolveWorkspacePath("write", ctx.workspaceDir, relPath);
    const bytesWritten = Buffer.byteLength(content, "utf-8");

    await ctx.withWorkspaceWriteLock(async () => {
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, content, "utf-8");
    });

    return {
      content: `Successfully wrote ${bytesWritten} bytes to ${relPath}`,
      data: { path: relPath, bytesWritten },
    };
  },
};
