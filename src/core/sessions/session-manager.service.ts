import { Injectable } from "@nestjs/common";
import { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import type { Logger } from "pino";
import { JsonlWriterService, isMissingFile } from "../../io/jsonl-writer.service";
import { LoggerService } from "../../io/logger.service";
import { KeyedMutex } from "../concurrency/keyed-mutex";
import { ConversationLogError, SwitchboardError } from "../errors";
import type { TokenUsage } from "../types";
import {
  CONVERSATION_MESSAGE_SCHEMA,
  type ConversationMessage,
} from "./conversation-message";
import { verifyToolPairing } from "./conversation-replay";
import {
  SESSION_METADATA_SCHEMA,
  type Session,
  emptyCounters,
  toMetadata,
  toSession,
} from "./session.types";

const SESSION_ID_PATTERN = /^[A-Za-z0-9-]{1,64}$/;
const STREAM_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const WORKSPACE_DIR = "workspace";
const CONVERSATIONS_DIR = "conversations";
const METADATA_FILE = "session.json";

/**
 * Owns session identity and storage:
 *
 * ```
 * <root>/<sessionId>/session.json
 * <root>/<sessionId>/workspace/
 * <root>/<sessionId>/conversations/<agent>.jsonl
 * ```
 *
 * Conversation logs are append-only; each (session, agent) stream has its
 * own lock, metadata rewrites lock per session and so do workspace writes.
 */
@Injectable()
export class SessionManager {
  private readonly root: string;
  private readonly logger: Logger;
  private readonly streamLocks = new KeyedMutex();
  private readonly metadataLocks = new KeyedMutex();
  private readonly workspaceLocks = new KeyedMutex();

  constructor(
    root: string,
    private readonly writer: JsonlWriterService,
    loggerService: LoggerService
  ) {
    this.root = path.resolve(root);
    this.logger = loggerService.getLogger("sessions");
  }

  /**
   * Loads the session named by `sessionId`, or creates a fresh one for
   * `userId` when the id is absent, malformed or unknown.
   */
  async resolve(userId: string, sessionId?: string | null): Promise<Session> {
    if (sessionId) {
      const existing = await this.get(sessionId);
      if (existing) {
        return existing;
      }
      this.logger.info({ sessionId }, "Unknown session id, creating a new session");
    }
    return this.create(userId);
  }

  async create(userId: string): Promise<Session> {
    const id = randomUUID();
    const createdAt = new Date().toISOString();
    const session: Session = {
      id,
      userId,
      createdAt,
      updatedAt: createdAt,
      counters: emptyCounters(),
    };

    await fs.mkdir(path.join(this.sessionDir(id), WORKSPACE_DIR), { recursive: true });
    await fs.mkdir(path.join(this.sessionDir(id), CONVERSATIONS_DIR), { recursive: true });
    await this.writeMetadata(session);

    this.logger.info({ sessionId: id, userId }, "Created session");
    return session;
  }

  async get(sessionId: string): Promise<Session | undefined> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return undefined;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.metadataPath(sessionId), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed = SESSION_METADATA_SCHEMA.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new SwitchboardError(
        `Session metadata for ${sessionId} is invalid: ${parsed.error.message}`
      );
    }
    return toSession(parsed.data);
  }

  async loadLog(session: Session, agentName: string): Promise<ConversationMessage[]> {
    const filePath = this.conversationPath(session, agentName);
    const lines = await this.writer.readLines(filePath);

    const messages = lines.map(({ line, text }) => {
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch {
        throw new ConversationLogError(filePath, line, "not valid JSON");
      }
      const parsed = CONVERSATION_MESSAGE_SCHEMA.safeParse(value);
      if (!parsed.success) {
        throw new ConversationLogError(filePath, line, parsed.error.issues[0]?.message ?? "invalid entry");
      }
      return parsed.data;
    });

    const violations = verifyToolPairing(messages);
    if (violations.length > 0) {
      this.logger.warn(
        { sessionId: session.id, agent: agentName, violations },
        "Conversation log has unpaired tool entries"
      );
    }
    return messages;
  }

  async append(
    session: Session,
    agentName: string,
    message: ConversationMessage
  ): Promise<void> {
    const filePath = this.conversationPath(session, agentName);
    await this.streamLocks.runExclusive(`${session.id}:${agentName}`, () =>
      this.writer.write(filePath, message, true)
    );
  }

  /** Adds `delta` to the persisted counters and returns the updated session. */
  async updateCounters(session: Session, delta: TokenUsage): Promise<Session> {
    return this.metadataLocks.runExclusive(session.id, async () => {
      const current = (await this.get(session.id)) ?? session;
      const input = current.counters.input_tokens + delta.inputTokens;
      const output = current.counters.output_tokens + delta.outputTokens;
      const updated: Session = {
        ...current,
        updatedAt: new Date().toISOString(),
        counters: {
          input_tokens: input,
          output_tokens: output,
          total_tokens: input + output,
        },
      };
      await this.writeMetadata(updated);
      return updated;
    });
  }

  workspaceDir(session: Session): string {
    return path.join(this.sessionDir(session.id), WORKSPACE_DIR);
  }

  withWorkspaceWriteLock<T>(session: Session, task: () => Promise<T>): Promise<T> {
    return this.workspaceLocks.runExclusive(session.id, task);
  }

  conversationPath(session: Session, agentName: string): string {
    if (!STREAM_NAME_PATTERN.test(agentName)) {
      throw new SwitchboardError(`Invalid conversation stream name: ${agentName}`);
    }
    return path.join(this.sessionDir(session.id), CONVERSATIONS_DIR, `${agentName}.jsonl`);
  }

  private sessionDir(sessionId: string): string {
    return path.join(this.root, sessionId);
  }

  private metadataPath(sessionId: string): string {
    return path.join(this.sessionDir(sessionId), METADATA_FILE);
  }

  private async writeMetadata(session: Session): Promise<void> {
    const target = this.metadataPath(session.id);
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, `${JSON.stringify(toMetadata(session), null, 2)}\n`, "utf-8");
    await fs.rename(temp, target);
  }
}
