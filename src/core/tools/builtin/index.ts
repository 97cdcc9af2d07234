import type { ToolDefinition } from "../../types";
import { editTool } from "./edit";
import { findTool } from "./find";
import { grepTool } from "./grep";
import { readTool } from "./read";
import { writeTool } from "./write";

export const NATIVE_TOOL_NAMES = ["find", "grep", "read", "write", "edit"] as const;

export const nativeTools: ToolDefinition[] = [
  findTool,
  grepTool,
  readTool,
  writeTool,
  editTool,
];

export { editTool, findTool, grepTool, readTool, writeTool };
