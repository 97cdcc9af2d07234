import fs from "fs/promises";
import type { ToolDefinition } from "../../types";
import { resolveWorkspacePath } from "../workspace-path";

const countOccurrences = (haystack: string, needle: string): number => {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
};

export const editTool: ToolDefinition = {
  name: "edit",
  description:
    "Replace one exact occurrence of oldText with newText in a workspace file. oldText must appear exactly once.",
  jsonSchema: {
    type: "object",
    properties: {
      path: { type: "string", minLength: 1 },
      oldText: { type: "string", minLength: 1 },
      newText: { type: "string" },
    },
    required: ["path", "oldText", "newText"],
    additionalProperties: false,
  },
  async handler(args, ctx) {
    const relPath = String(args.path);
    const oldText = String(args.oldText);
    const newText = String(args.newText);
    const absolute = resolveWorkspacePath("edit", ctx.workspaceDir, relPath);

    await ctx.withWorkspaceWriteLock(async () => {
      const original = await fs.readFile(absolute, "utf-8");
      const occurrences = countOccurrences(original, oldText);
      if (occurrences === 0) {
        throw new Error(`Could not find the text to replace in ${relPath}`);
      }
      if (occurrences > 1) {
        throw new Error(
          `Found ${occurrences} occurrences of the text in ${relPath}; it must be unique`
        );
      }
      const index = original.indexOf(oldText);
      const updated = original.slice(0, index) + newText + original.slice(index + oldText.length);
      await fs.writeFile(absolute, updated, "utf-8");
    });

    return {
      content: `Successfully replaced text in ${relPath}`,
      data: { path: relPath },
    };
  },
};
