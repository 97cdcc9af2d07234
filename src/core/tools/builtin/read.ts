import fs from "fs/promises";
import type { ToolDefinition } from "../../types";
import { truncateHead } from "../truncate";
import { resolveWorkspacePath } from "../workspace-path";

export const readTool: ToolDefinition = {
  name: "read",
  description:
    "Read a UTF-8 text file from the session workspace. Use offset (1-based line) and limit to page through large files.",
  jsonSchema: {
    type: "object",
    properties: {
      path: { type: "string", minLength: 1 },
      offset: { type: "integer", minimum: 1 },
      limit: { type: "integer", minimum: 1 },
    },
    required: ["path"],
    additionalProperties: false,
  },
  async handler(args, ctx) {
    const relPath = String(args.path);
    const absolute = resolveWorkspacePath("read", ctx.workspaceDir, relPath);
    const text = await fs.readFile(absolute, "utf-8");

    const allLines = text.split("\n");
    const start = typeof args.offset === "number" ? args.offset - 1 : 0;
    if (start >= allLines.length) {
      throw new Error(
        `Offset ${start + 1} is beyond the end of ${relPath} (${allLines.length} lines)`
      );
    }
    const end = typeof args.limit === "number" ? start + args.limit : allLines.length;
    const selected = allLines.slice(start, end).join("\n");
    const result = truncateHead(selected);

    const lastLine = start + result.outputLines;
    const more = result.truncated || lastLine < allLines.length;
    const content = more
      ? `${result.content}\n\n[Showing lines ${start + 1}-${lastLine} of ${allLines.length}. Use offset=${lastLine + 1} to continue.]`
      : result.content;

    return {
      content,
      data: { path: relPath, totalLines: allLines.length, truncated: more },
    };
  },
};
