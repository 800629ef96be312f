/**
 * Folds per-chat results for one user into all-chats views.
 */

import type { CachedMessage, UserChatStats } from "./types.js";

/** Merge per-chat lists into one chronological list. Array#sort is stable. */
export function collectUserMessages(
  byChat: ReadonlyMap<number, readonly CachedMessage[]>,
): CachedMessage[] {
  const all: CachedMessage[] = [];
  for (const messages of byChat.values()) all.push(...messages);
  return all.sort((a, b) => a.timestamp - b.timestamp);
}

export function aggregateUserStats(
  byChat: ReadonlyMap<number, readonly CachedMessage[]>,
): UserChatStats {
  const chatIds: number[] = [];
  for (const [chatId, messages] of byChat) {
    if (messages.length > 0) chatIds.push(chatId);
  }

  const all = collectUserMessages(byChat);
  return {
    totalMessages: all.length,
    chatsCount: chatIds.length,
    chatIds,
    oldestMessage: all.length > 0 ? all[0].timestamp : null,
    newestMessage: all.length > 0 ? all[all.length - 1].timestamp : null,
  };
}
