/**
 * Infers who a user talks to from message proximity in a chat.
 *
 * Every message by the target user contributes itself to `self`, and every
 * message by someone else within `contextRange` positions of it becomes an
 * interaction record keyed by that author's display name.
 */

import type {
  CachedMessage,
  InteractionRecord,
  PartnerStats,
  UserInteractions,
} from "./types.js";

export const INTERACTION_CONTEXT_RANGE = 3;
export const PARTNER_WINDOW_SIZE = 5;

export interface ExtractOptions {
  chatId: number;
  contextRange?: number;
}

export function extractInteractions(
  messages: readonly CachedMessage[],
  userId: number,
  opts: ExtractOptions,
): UserInteractions {
  const range = opts.contextRange ?? INTERACTION_CONTEXT_RANGE;
  const result: UserInteractions = { self: [], partners: new Map() };

  messages.forEach((message, i) => {
    if (message.userId !== userId) return;
    result.self.push(message);

    const start = Math.max(0, i - range);
    const end = Math.min(messages.length - 1, i + range);
    for (let j = start; j <= end; j++) {
      const context = messages[j];
      if (context.userId === userId) continue;

      const bucket = result.partners.get(context.username) ?? [];
      bucket.push({
        type: "interaction",
        // Only a message the partner sent after the user's counts as a reply to it.
        userMessage: j > i ? message : null,
        partnerMessage: context,
        timestamp: context.timestamp,
        chatId: opts.chatId,
      });
      result.partners.set(context.username, bucket);
    }
  });

  return result;
}

/** Keep the most recent `limit` records per partner. `self` is left whole. */
export function capInteractions(result: UserInteractions, limit?: number): UserInteractions {
  if (!limit || limit <= 0) return result;

  const partners = new Map<string, InteractionRecord[]>();
  for (const [name, records] of result.partners) {
    partners.set(name, records.length > limit ? records.slice(-limit) : records);
  }
  return { self: result.self, partners };
}

/**
 * Merge per-chat results by partner key, in the order given. Records are
 * concatenated, not re-sorted across chats.
 */
export function mergeInteractions(results: Iterable<UserInteractions>): UserInteractions {
  const merged: UserInteractions = { self: [], partners: new Map() };
  for (const result of results) {
    merged.self.push(...result.self);
    for (const [name, records] of result.partners) {
      const bucket = merged.partners.get(name) ?? [];
      bucket.push(...records);
      merged.partners.set(name, bucket);
    }
  }
  return merged;
}

/**
 * Count messages by other authors within `windowSize` positions of each of the
 * target user's messages.
 */
export function findCommunicationPartners(
  messages: readonly CachedMessage[],
  userId: number,
  windowSize = PARTNER_WINDOW_SIZE,
): Map<string, PartnerStats> {
  const partners = new Map<string, PartnerStats>();

  messages.forEach((message, i) => {
    if (message.userId !== userId) return;

    const start = Math.max(0, i - windowSize);
    const end = Math.min(messages.length - 1, i + windowSize);
    for (let j = start; j <= end; j++) {
      const other = messages[j];
      if (j === i || other.userId === userId) continue;

      const stats = partners.get(other.username);
      partners.set(other.username, {
        userId: other.userId,
        messageCount: (stats?.messageCount ?? 0) + 1,
        lastInteraction: other.timestamp,
      });
    }
  });

  return partners;
}
