import * as fs from "fs/promises";
import path from "path";
import { IMessageLogService, MessageQuery } from "@core/interfaces";
import {
  MessageKind,
  Result,
  StoredMessage,
  failure,
  success,
} from "@core/types";
import { StateError } from "@core/errors";
import { MESSAGES_MAX_LENGTH, MESSAGES_MAX_STORED } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { AtomicFileWriter, isMissingFile } from "./AtomicFileWriter";
import { StoredMessageSchema } from "./schemas";

const logger = getLogger("MessageLogService");

const DEFAULT_QUERY_LIMIT = 20;

/**
 * Parse a JSON Lines log, skipping lines that are not valid messages
 */
export function parseMessageLines(content: string): {
  messages: StoredMessage[];
  skipped: number;
} {
  const messages: StoredMessage[] = [];
  let skipped = 0;
  for (const line of content.split("\n")) {
    if (line.trim() === "") continue;
    try {
      const result = StoredMessageSchema.safeParse(JSON.parse(line));
      if (result.success) {
        messages.push(result.data);
      } else {
        skipped++;
      }
    } catch {
      skipped++;
    }
  }
  return { messages, skipped };
}

/**
 * Messages from the companion device in messages.jsonl, oldest line first.
 * The whole log is cached in memory and rewritten on every change.
 */
export class MessageLogService implements IMessageLogService {
  private readonly filePath: string;
  private readonly writer: AtomicFileWriter;
  private messages: StoredMessage[] = [];
  private lastId = 0;

  constructor(
    dataDirectory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.filePath = path.join(dataDirectory, "messages.jsonl");
    this.writer = new AtomicFileWriter(this.filePath);
  }

  async initialize(): Promise<Result<void>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.messages = [];
        return success(undefined);
      }
      return failure(StateError.loadFailed(this.filePath, toError(error)));
    }

    const { messages, skipped } = parseMessageLines(content);
    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} invalid line(s) in ${this.filePath}`);
    }
    this.messages = messages.slice(-MESSAGES_MAX_STORED);
    this.lastId = this.messages.reduce((max, m) => Math.max(max, m.id), 0);
    logger.info(`Loaded ${this.messages.length} message(s)`);
    return success(undefined);
  }

  async addMessage(
    from: string,
    message: string,
    type: MessageKind = "text",
  ): Promise<Result<StoredMessage>> {
    const now = this.clock();
    const id = Math.max(now.getTime(), this.lastId + 1);
    const stored: StoredMessage = {
      id,
      from,
      message: message.slice(0, MESSAGES_MAX_LENGTH),
      type,
      timestamp: now.toISOString(),
      read: false,
    };

    this.lastId = id;
    this.messages = [...this.messages, stored].slice(-MESSAGES_MAX_STORED);
    const saved = await this.persist();
    if (!saved.success) {
      return failure(saved.error);
    }
    logger.info(`Message ${id} from ${from} (${type})`);
    return success(stored);
  }

  getMessages(query: MessageQuery = {}): StoredMessage[] {
    const limit = query.limit ?? DEFAULT_QUERY_LIMIT;
    const newestFirst = [...this.messages].reverse();
    const filtered = query.unreadOnly
      ? newestFirst.filter((m) => !m.read)
      : newestFirst;
    return filtered.slice(0, limit).map((m) => ({ ...m }));
  }

  getUnreadCount(): number {
    return this.messages.filter((m) => !m.read).length;
  }

  async markAllRead(): Promise<Result<void>> {
    if (this.getUnreadCount() === 0) {
      return success(undefined);
    }
    this.messages = this.messages.map((m) => ({ ...m, read: true }));
    return this.persist();
  }

  async deleteMessage(id: number): Promise<Result<boolean>> {
    const next = this.messages.filter((m) => m.id !== id);
    if (next.length === this.messages.length) {
      return success(false);
    }
    this.messages = next;
    const saved = await this.persist();
    return saved.success ? success(true) : failure(saved.error);
  }

  async deleteMostRecent(): Promise<Result<StoredMessage | null>> {
    const last = this.messages[this.messages.length - 1];
    if (!last) {
      return success(null);
    }
    this.messages = this.messages.slice(0, -1);
    const saved = await this.persist();
    return saved.success ? success(last) : failure(saved.error);
  }

  /**
   * Write the in-memory log. Callers change `messages` before awaiting this,
   * so overlapping operations each build on the previous one.
   */
  private async persist(): Promise<Result<void>> {
    const content = this.messages.map((m) => JSON.stringify(m)).join("\n");
    try {
      await this.writer.write(this.messages.length > 0 ? `${content}\n` : "");
    } catch (error) {
      return failure(StateError.saveFailed(this.filePath, toError(error)));
    }
    return success(undefined);
  }
}
