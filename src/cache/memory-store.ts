import { ChatBuffers } from "./ring-buffer.js";
import {
  emptyChatStats,
  type BoundedChatStore,
  type CachedMessage,
  type ChatStats,
} from "./types.js";

/**
 * Ring buffers only. History older than `maxSize` messages per chat is gone,
 * and everything is lost on restart.
 */
export class MemoryChatStore implements BoundedChatStore {
  readonly kind = "memory" as const;
  readonly maxSize: number;
  private readonly buffers: ChatBuffers<CachedMessage>;

  constructor(maxSize: number) {
    this.buffers = new ChatBuffers<CachedMessage>(maxSize);
    this.maxSize = this.buffers.capacity;
  }

  append(message: CachedMessage): void {
    this.buffers.getOrCreate(message.chatId).push(message);
  }

  lastN(chatId: number, n: number): CachedMessage[] {
    if (n <= 0) return [];
    return this.buffers.snapshot(chatId).slice(-n);
  }

  since(chatId: number, sinceTime: number): CachedMessage[] {
    return this.buffers.snapshot(chatId).filter((m) => m.timestamp >= sinceTime);
  }

  chatHistory(chatId: number): CachedMessage[] {
    return this.buffers.snapshot(chatId);
  }

  userMessages(chatId: number, userId: number, limit?: number): CachedMessage[] {
    const messages = this.buffers.snapshot(chatId).filter((m) => m.userId === userId);
    return applyLimit(messages, limit);
  }

  userMessagesByChat(userId: number): Map<number, CachedMessage[]> {
    const byChat = new Map<number, CachedMessage[]>();
    for (const chatId of this.buffers.chatIds()) {
      const messages = this.userMessages(chatId, userId);
      if (messages.length > 0) byChat.set(chatId, messages);
    }
    return byChat;
  }

  chatStats(chatId: number): ChatStats {
    return computeChatStats(this.buffers.snapshot(chatId));
  }

  clearChat(chatId: number): void {
    this.buffers.delete(chatId);
  }

  chatIds(): number[] {
    return this.buffers.chatIds();
  }

  close(): void {}
}

/** Keep the most recent `limit` entries; a missing or non-positive limit keeps all. */
export function applyLimit<T>(items: T[], limit?: number): T[] {
  if (!limit || limit <= 0 || items.length <= limit) return items;
  return items.slice(-limit);
}

export function computeChatStats(messages: CachedMessage[]): ChatStats {
  if (messages.length === 0) return emptyChatStats();

  let oldest = messages[0].timestamp;
  let newest = messages[0].timestamp;
  const users = new Set<number>();
  for (const m of messages) {
    users.add(m.userId);
    if (m.timestamp < oldest) oldest = m.timestamp;
    if (m.timestamp > newest) newest = m.timestamp;
  }

  return {
    totalMessages: messages.length,
    uniqueUsers: users.size,
    oldestMessage: oldest,
    newestMessage: newest,
  };
}
