export const DEFAULT_MAX_LINES = 2000;
export const DEFAULT_MAX_BYTES = 50 * 1024;
export const GREP_MAX_LINE_LENGTH = 500;

export interface TruncationResult {
  content: string;
  truncated: boolean;
  totalLines: number;
  outputLines: number;
}

/** Keeps whole lines from the top of `text` within both limits. */
export function truncateHead(
  text: string,
  limits: { maxLines?: number; maxBytes?: number } = {}
): TruncationResult {
  const maxLines = limits.maxLines ?? DEFAULT_MAX_LINES;
  const maxBytes = limits.maxBytes ?? DEFAULT_MAX_BYTES;
  const lines = text.split("\n");

  const kept: string[] = [];
  let bytes = 0;
  for (const line of lines) {
    const lineBytes = Buffer.byteLength(line, "utf-8") + (kept.length > 0 ? 1 : 0);
    if (kept.length >= maxLines || bytes + lineBytes > maxBytes) {
      break;
    }
    kept.push(line);
    bytes += lineBytes;
  }

  return {
    content: kept.join("\n"),
    truncated: kept.length < lines.length,
    totalLines: lines.length,
    outputLines: kept.length,
  };
}

export function truncateLine(line: string, maxLength = GREP_MAX_LINE_LENGTH): string {
  return line.length <= maxLength ? line : `${line.slice(0, maxLength)}... [truncated]`;
}

export function previewOf(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars)}...`;
}
