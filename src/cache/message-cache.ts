/**
 * Message cache: the single ingestion and query point for group messages.
 *
 * All operations are synchronous and complete without yielding, so calls from
 * concurrently scheduled bot handlers cannot interleave inside one of them.
 * Queries never throw; unknown chats and users yield empty results.
 */

import { createLogger } from "../utils/logger.js";
import { aggregateUserStats, collectUserMessages } from "./aggregate.js";
import {
  capInteractions,
  extractInteractions,
  findCommunicationPartners,
  mergeInteractions,
} from "./interactions.js";
import { applyLimit, MemoryChatStore } from "./memory-store.js";
import { SqliteChatStore } from "./sqlite-store.js";
import { truncateToSecond } from "./timestamp.js";
import type {
  BoundedChatStore,
  CachedMessage,
  ChatStats,
  PartnerStats,
  UserChatStats,
  UserInteractions,
} from "./types.js";

const log = createLogger("message-cache");

export const DEFAULT_MAX_SIZE = 1000;

export interface ChatStoreOptions {
  maxSize?: number;
  /** Enables the SQLite-backed store. */
  dbPath?: string;
}

export function createChatStore(opts: ChatStoreOptions = {}): BoundedChatStore {
  const maxSize = opts.maxSize ?? DEFAULT_MAX_SIZE;
  if (opts.dbPath) {
    return new SqliteChatStore({ maxSize, dbPath: opts.dbPath });
  }
  return new MemoryChatStore(maxSize);
}

export interface MessageCacheOptions {
  /** Capture clock (epoch ms) */
  now?: () => number;
}

export class MessageCache {
  private readonly store: BoundedChatStore;
  private readonly now: () => number;
  /** Newest stamp handed out per chat; each chat's timestamps never decrease. */
  private readonly newest = new Map<number, number>();

  constructor(store: BoundedChatStore, opts: MessageCacheOptions = {}) {
    this.store = store;
    this.now = opts.now ?? Date.now;
    log.info({ kind: store.kind, maxSize: store.maxSize }, "message cache initialized");
  }

  get maxSize(): number {
    return this.store.maxSize;
  }

  /**
   * Record a message stamped with its capture time: the cache clock, or
   * `timestamp` when the caller already captured one. The stamp is truncated
   * to whole seconds and raised to the chat's newest stamp if it is earlier,
   * so every chat stays in chronological order.
   */
  addMessage(
    chatId: number,
    userId: number,
    username: string,
    text: string,
    timestamp?: number,
  ): CachedMessage {
    const captured = truncateToSecond(timestamp ?? this.now());
    const floor = this.newestStamp(chatId);
    if (floor !== undefined && captured < floor) {
      log.debug({ chatId, captured, floor }, "capture time behind chat, clamped");
    }

    const message: CachedMessage = Object.freeze({
      chatId,
      userId,
      username,
      text,
      timestamp: floor !== undefined ? Math.max(captured, floor) : captured,
    });
    this.store.append(message);
    this.newest.set(chatId, message.timestamp);
    log.debug({ chatId, userId }, "cached message");
    return message;
  }

  private newestStamp(chatId: number): number | undefined {
    const known = this.newest.get(chatId);
    if (known !== undefined) return known;
    // First message since startup; a persistent store may already hold history.
    return this.store.lastN(chatId, 1).at(-1)?.timestamp;
  }

  getLastNMessages(chatId: number, n: number): CachedMessage[] {
    const messages = this.store.lastN(chatId, n);
    log.debug({ chatId, requested: n, returned: messages.length }, "last n messages");
    return messages;
  }

  /** Messages with `timestamp >= sinceTime`, oldest first. */
  getMessagesSince(chatId: number, sinceTime: number): CachedMessage[] {
    const messages = this.store.since(chatId, sinceTime);
    log.debug({ chatId, sinceTime, returned: messages.length }, "messages since");
    return messages;
  }

  getChatStats(chatId: number): ChatStats {
    return this.store.chatStats(chatId);
  }

  getUserMessages(chatId: number, userId: number, limit?: number): CachedMessage[] {
    return this.store.userMessages(chatId, userId, limit);
  }

  getUserMessagesAllChats(userId: number, limit?: number): CachedMessage[] {
    const messages = collectUserMessages(this.store.userMessagesByChat(userId));
    return applyLimit(messages, limit);
  }

  getUserChatStats(userId: number): UserChatStats {
    return aggregateUserStats(this.store.userMessagesByChat(userId));
  }

  getUserInteractions(chatId: number, userId: number, limit?: number): UserInteractions {
    const history = this.store.chatHistory(chatId);
    const result = capInteractions(extractInteractions(history, userId, { chatId }), limit);
    log.debug(
      { chatId, userId, partners: result.partners.size },
      "extracted user interactions",
    );
    return result;
  }

  getUserInteractionsAllChats(userId: number, limit?: number): UserInteractions {
    const perChat: UserInteractions[] = [];
    for (const chatId of this.getAllChats()) {
      perChat.push(extractInteractions(this.store.chatHistory(chatId), userId, { chatId }));
    }
    const result = capInteractions(mergeInteractions(perChat), limit);
    log.debug({ userId, partners: result.partners.size }, "extracted interactions across chats");
    return result;
  }

  getCommunicationPartners(chatId: number, userId: number): Map<string, PartnerStats> {
    return findCommunicationPartners(this.store.chatHistory(chatId), userId);
  }

  clearChat(chatId: number): void {
    this.store.clearChat(chatId);
    this.newest.delete(chatId);
  }

  getAllChats(): number[] {
    return this.store.chatIds();
  }

  close(): void {
    this.store.close();
  }
}
