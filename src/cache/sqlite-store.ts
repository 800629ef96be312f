/**
 * Write-through message store: ring buffers for hot reads plus an unbounded
 * SQLite table as the source of truth.
 *
 * better-sqlite3 is synchronous, so an append (buffer push + row insert) runs
 * to completion before any other cache call can observe the store.
 */

import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { createLogger } from "../utils/logger.js";
import { MemoryChatStore } from "./memory-store.js";
import { ceilToSecond, formatTimestamp, parseTimestamp, tryParseTimestamp } from "./timestamp.js";
import type { BoundedChatStore, CachedMessage, ChatStats } from "./types.js";

const log = createLogger("sqlite-store");

interface MessageRow {
  chat_id: number;
  user_id: number;
  username: string;
  text: string;
  timestamp: string;
}

interface StatsRow {
  total: number;
  users: number;
  oldest: string | null;
  newest: string | null;
}

const COLUMNS = "chat_id, user_id, username, text, timestamp";

export type SqliteChatStoreOptions =
  | {
      maxSize: number;
      /** File path, or ":memory:". */
      dbPath: string;
    }
  | {
      maxSize: number;
      /** Already-open connection; the store takes ownership and closes it. */
      db: Database.Database;
    };

export class SqliteChatStore implements BoundedChatStore {
  readonly kind = "sqlite" as const;
  readonly maxSize: number;
  private readonly memory: MemoryChatStore;
  private readonly db: Database.Database;

  private readonly insertStmt: Database.Statement<[number, number, string, string, string]>;
  private readonly lastNStmt: Database.Statement<[number, number], MessageRow>;
  private readonly sinceStmt: Database.Statement<[number, string], MessageRow>;
  private readonly userStmt: Database.Statement<[number, number, number], MessageRow>;
  private readonly userAllStmt: Database.Statement<[number], MessageRow>;
  private readonly statsStmt: Database.Statement<[number], StatsRow>;
  private readonly chatIdsStmt: Database.Statement<[], { chat_id: number }>;
  private readonly deleteStmt: Database.Statement<[number]>;

  constructor(opts: SqliteChatStoreOptions) {
    this.memory = new MemoryChatStore(opts.maxSize);
    this.maxSize = this.memory.maxSize;

    if ("db" in opts) {
      this.db = opts.db;
    } else {
      if (opts.dbPath !== ":memory:") {
        mkdirSync(path.dirname(opts.dbPath), { recursive: true });
      }
      this.db = new Database(opts.dbPath);
      this.db.pragma("journal_mode = WAL");
    }
    this.ensureSchema();

    this.insertStmt = this.db.prepare<[number, number, string, string, string]>(
      `INSERT INTO messages (${COLUMNS}) VALUES (?, ?, ?, ?, ?)`,
    );
    this.lastNStmt = this.db.prepare<[number, number], MessageRow>(
      `SELECT ${COLUMNS} FROM messages WHERE chat_id = ?
       ORDER BY timestamp DESC, id DESC LIMIT ?`,
    );
    this.sinceStmt = this.db.prepare<[number, string], MessageRow>(
      `SELECT ${COLUMNS} FROM messages WHERE chat_id = ? AND timestamp >= ?
       ORDER BY timestamp, id`,
    );
    // LIMIT -1 means no limit in SQLite.
    this.userStmt = this.db.prepare<[number, number, number], MessageRow>(
      `SELECT ${COLUMNS} FROM messages WHERE chat_id = ? AND user_id = ?
       ORDER BY timestamp DESC, id DESC LIMIT ?`,
    );
    this.userAllStmt = this.db.prepare<[number], MessageRow>(
      `SELECT ${COLUMNS} FROM messages WHERE user_id = ? ORDER BY timestamp, id`,
    );
    this.statsStmt = this.db.prepare<[number], StatsRow>(
      `SELECT COUNT(*) AS total, COUNT(DISTINCT user_id) AS users,
              MIN(timestamp) AS oldest, MAX(timestamp) AS newest
       FROM messages WHERE chat_id = ?`,
    );
    this.chatIdsStmt = this.db.prepare<[], { chat_id: number }>(
      `SELECT DISTINCT chat_id FROM messages ORDER BY chat_id`,
    );
    this.deleteStmt = this.db.prepare<[number]>(`DELETE FROM messages WHERE chat_id = ?`);

    log.info({ dbPath: this.db.name, maxSize: this.maxSize }, "message store opened");
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER NOT NULL,
        user_id INTEGER NOT NULL,
        username TEXT NOT NULL,
        text TEXT NOT NULL,
        timestamp TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_messages_chat_ts ON messages (chat_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_messages_user_ts ON messages (user_id, timestamp);
    `);
  }

  append(message: CachedMessage): void {
    this.memory.append(message);
    try {
      this.insertStmt.run(
        message.chatId,
        message.userId,
        message.username,
        message.text,
        formatTimestamp(message.timestamp),
      );
    } catch (err) {
      log.error(
        { err, op: "append", chatId: message.chatId, userId: message.userId },
        "failed to persist message, kept in memory only",
      );
    }
  }

  lastN(chatId: number, n: number): CachedMessage[] {
    if (n <= 0) return [];
    return this.read(
      "lastN",
      { chatId },
      () => toMessages(this.lastNStmt.all(chatId, Math.floor(n))).reverse(),
      () => this.memory.lastN(chatId, n),
    );
  }

  since(chatId: number, sinceTime: number): CachedMessage[] {
    // Stored values have whole-second precision.
    const bound = formatTimestamp(ceilToSecond(sinceTime));
    return this.read(
      "since",
      { chatId },
      () => toMessages(this.sinceStmt.all(chatId, bound)),
      () => this.memory.since(chatId, sinceTime),
    );
  }

  /** The last `maxSize` persisted messages, the same window the memory store keeps. */
  chatHistory(chatId: number): CachedMessage[] {
    return this.lastN(chatId, this.maxSize);
  }

  userMessages(chatId: number, userId: number, limit?: number): CachedMessage[] {
    const sqlLimit = limit && limit > 0 ? Math.floor(limit) : -1;
    return this.read(
      "userMessages",
      { chatId, userId },
      () => toMessages(this.userStmt.all(chatId, userId, sqlLimit)).reverse(),
      () => this.memory.userMessages(chatId, userId, limit),
    );
  }

  userMessagesByChat(userId: number): Map<number, CachedMessage[]> {
    return this.read(
      "userMessagesByChat",
      { userId },
      () => {
        const byChat = new Map<number, CachedMessage[]>();
        for (const message of toMessages(this.userAllStmt.all(userId))) {
          const list = byChat.get(message.chatId) ?? [];
          list.push(message);
          byChat.set(message.chatId, list);
        }
        return byChat;
      },
      () => this.memory.userMessagesByChat(userId),
    );
  }

  chatStats(chatId: number): ChatStats {
    return this.read(
      "chatStats",
      { chatId },
      () => {
        const row = this.statsStmt.get(chatId);
        return {
          totalMessages: row?.total ?? 0,
          uniqueUsers: row?.users ?? 0,
          oldestMessage: row?.oldest ? parseTimestamp(row.oldest) : null,
          newestMessage: row?.newest ? parseTimestamp(row.newest) : null,
        };
      },
      () => this.memory.chatStats(chatId),
    );
  }

  clearChat(chatId: number): void {
    this.memory.clearChat(chatId);
    try {
      const { changes } = this.deleteStmt.run(chatId);
      log.info({ chatId, deleted: changes }, "cleared chat history");
    } catch (err) {
      log.error({ err, op: "clearChat", chatId }, "failed to delete persisted messages");
    }
  }

  chatIds(): number[] {
    const ids = new Set(this.memory.chatIds());
    try {
      for (const row of this.chatIdsStmt.all()) ids.add(row.chat_id);
    } catch (err) {
      log.error({ err, op: "chatIds" }, "failed to list persisted chats, using memory only");
    }
    return Array.from(ids);
  }

  close(): void {
    this.db.close();
  }

  private read<T>(
    op: string,
    context: { chatId?: number; userId?: number },
    fromDb: () => T,
    fromMemory: () => T,
  ): T {
    try {
      return fromDb();
    } catch (err) {
      log.error({ err, op, ...context }, "message store read failed, falling back to memory");
      return fromMemory();
    }
  }
}

/**
 * Rows whose timestamp doesn't parse are skipped: they can't be placed in
 * chronological order.
 */
function toMessages(rows: MessageRow[]): CachedMessage[] {
  const messages: CachedMessage[] = [];
  for (const row of rows) {
    const timestamp = tryParseTimestamp(row.timestamp);
    if (timestamp === null) {
      log.warn({ chatId: row.chat_id, value: row.timestamp }, "skipping row with invalid timestamp");
      continue;
    }
    messages.push(
      Object.freeze({
        chatId: row.chat_id,
        userId: row.user_id,
        username: row.username,
        text: row.text,
        timestamp,
      }),
    );
  }
  return messages;
}
