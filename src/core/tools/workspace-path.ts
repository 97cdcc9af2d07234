import path from "path";
import { ToolExecutionError } from "../errors";

const escapesRoot = (relative: string): boolean =>
  relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);

export const isInsideWorkspace = (workspaceDir: string, absolute: string): boolean =>
  !escapesRoot(path.relative(path.resolve(workspaceDir), path.resolve(absolute)));

/**
 * Resolves `target` against the session workspace and refuses anything that
 * lands outside it.
 */
export function resolveWorkspacePath(
  toolName: string,
  workspaceDir: string,
  target: string | undefined
): string {
  const root = path.resolve(workspaceDir);
  const absolute = path.resolve(root, target && target.length > 0 ? target : ".");

  if (escapesRoot(path.relative(root, absolute))) {
    throw new ToolExecutionError(
      toolName,
      `Path ${target ?? "."} is outside the session workspace`
    );
  }
  return absolute;
}

/** Glob patterns must stay relative and may not climb out of their directory. */
export function assertWorkspacePattern(toolName: string, pattern: string): void {
  const segments = pattern.split(/[\\/]/);
  if (path.isAbsolute(pattern) || path.win32.isAbsolute(pattern) || segments.includes("..")) {
    throw new ToolExecutionError(
      toolName,
      `Pattern ${pattern} is outside the session workspace`
    );
  }
}

export const toWorkspaceRelative = (workspaceDir: string, absolute: string): string =>
  path.relative(path.resolve(workspaceDir), absolute).split(path.sep).join("/") || ".";
