import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "../config/types";

const DEFAULT_LOG_FILE = ".switchboard/logs/switchboard.log";

const STREAM_FDS = { stdout: 1, stderr: 2 } as const;

function createRootLogger(config: LoggingConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: undefined,
    timestamp: config.enableTimestamps === false ? false : pino.stdTimeFunctions.isoTime,
  };
  const destination = config.destination;
  if (!destination) {
    return pino(options);
  }

  if (destination.type === "file") {
    const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    return pino(options, pino.destination({ dest: filePath, sync: false }));
  }

  const fd = STREAM_FDS[destination.type];
  if (destination.pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: fd,
          colorize: destination.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino(options, pino.destination({ fd }));
}

/**
 * Holds the process's root pino logger. Components log through children
 * bound to a `scope`; agent executors also bind their session and agent.
 */
@Injectable()
export class LoggerService {
  private root?: Logger;

  configure(config: LoggingConfig): Logger {
    this.root = createRootLogger(config);
    return this.root;
  }

  getLogger(scope?: string): Logger {
    if (!this.root) {
      this.root = createRootLogger({ level: "info" });
    }
    return scope ? this.root.child({ scope }) : this.root;
  }

  forAgent(sessionId: string, agentName: string): Logger {
    return this.getLogger("agent-executor").child({ sessionId, agent: agentName });
  }

  reset(): void {
    this.root = undefined;
  }
}
