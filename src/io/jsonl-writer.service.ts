import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";

export interface JsonlLine {
  /** 1-based line number within the file. */
  line: number;
  text: string;
}

@Injectable()
export class JsonlWriterService {
  async write(filePath: string, event: unknown, append = true): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const payload = `${JSON.stringify(event)}\n`;
    if (append) {
      await fs.appendFile(filePath, payload, "utf-8");
    } else {
      await fs.writeFile(filePath, payload, "utf-8");
    }
  }

  /** Non-empty lines of `filePath`, or an empty list when it does not exist. */
  async readLines(filePath: string): Promise<JsonlLine[]> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    return raw
      .split("\n")
      .map((text, index) => ({ line: index + 1, text: text.trim() }))
      .filter((entry) => entry.text.length > 0);
  }
}

export const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
