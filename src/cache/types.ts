/**
 * Message cache types.
 *
 * Timestamps are epoch milliseconds truncated to whole seconds, always the
 * moment the bot captured the message (not the Telegram send date).
 */

export interface CachedMessage {
  readonly chatId: number;
  readonly userId: number;
  /** Display name at capture time; never re-resolved. */
  readonly username: string;
  readonly text: string;
  readonly timestamp: number;
}

export interface ChatStats {
  totalMessages: number;
  uniqueUsers: number;
  oldestMessage: number | null;
  newestMessage: number | null;
}

export interface UserChatStats {
  totalMessages: number;
  chatsCount: number;
  chatIds: number[];
  oldestMessage: number | null;
  newestMessage: number | null;
}

export interface InteractionRecord {
  type: "interaction";
  /** Target user's message, set only when the partner message came after it. */
  userMessage: CachedMessage | null;
  partnerMessage: CachedMessage;
  timestamp: number;
  chatId: number;
}

/**
 * Result of interaction extraction: `self` holds the target user's own
 * messages, every other key is a partner display name.
 */
export type UserInteractions = {
  self: CachedMessage[];
  partners: Map<string, InteractionRecord[]>;
};

export interface PartnerStats {
  userId: number;
  messageCount: number;
  lastInteraction: number;
}

/**
 * Per-chat bounded message storage. Implementations return chronological
 * (oldest-first) arrays and never throw from read methods.
 */
export interface BoundedChatStore {
  readonly kind: "memory" | "sqlite";
  readonly maxSize: number;

  append(message: CachedMessage): void;

  lastN(chatId: number, n: number): CachedMessage[];
  since(chatId: number, sinceTime: number): CachedMessage[];
  /** The most recent `maxSize` messages of one chat, oldest first. */
  chatHistory(chatId: number): CachedMessage[];
  userMessages(chatId: number, userId: number, limit?: number): CachedMessage[];
  /** Per chat, in chat discovery order. Chats with no messages from the user are omitted. */
  userMessagesByChat(userId: number): Map<number, CachedMessage[]>;
  chatStats(chatId: number): ChatStats;

  clearChat(chatId: number): void;
  chatIds(): number[];
  close(): void;
}

export function emptyChatStats(): ChatStats {
  return {
    totalMessages: 0,
    uniqueUsers: 0,
    oldestMessage: null,
    newestMessage: null,
  };
}
