/**
 * Command parsing and user-facing reply texts.
 */

import { formatTimestamp } from "../cache/timestamp.js";
import type { ChatStats, UserChatStats } from "../cache/types.js";

export interface ParsedCommand {
  name: string;
  args: string[];
}

/**
 * Parse "/name@bot arg1 arg2". Returns null for text that is not a command, or
 * a command addressed to a different bot.
 */
export function parseCommand(text: string, botUsername?: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) return null;

  const [head, ...args] = trimmed.split(/\s+/);
  const [rawName, mention] = head.slice(1).split("@", 2);
  if (!rawName) return null;
  if (mention && botUsername && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }
  return { name: rawName.toLowerCase(), args };
}

/** Positive integer argument, or undefined when absent or malformed. */
export function parsePositiveInt(arg: string | undefined): number | undefined {
  if (!arg || !/^\d+$/.test(arg)) return undefined;
  const n = Number(arg);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

export function parsePositiveNumber(arg: string | undefined): number | undefined {
  if (!arg) return undefined;
  const n = Number(arg);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function when(ms: number | null): string {
  return ms === null ? "—" : `${formatTimestamp(ms)} UTC`;
}

export function formatChatStats(stats: ChatStats): string {
  return [
    "**Chat statistics**",
    `Messages: ${stats.totalMessages}`,
    `Participants: ${stats.uniqueUsers}`,
    `Oldest: ${when(stats.oldestMessage)}`,
    `Newest: ${when(stats.newestMessage)}`,
  ].join("\n");
}

export function formatUserStats(userId: number, stats: UserChatStats): string {
  return [
    `**User ${userId}**`,
    `Messages: ${stats.totalMessages}`,
    `Chats: ${stats.chatsCount}${stats.chatIds.length > 0 ? ` (${stats.chatIds.join(", ")})` : ""}`,
    `Oldest: ${when(stats.oldestMessage)}`,
    `Newest: ${when(stats.newestMessage)}`,
  ].join("\n");
}

export const REPLIES = {
  start:
    "Hi! I'm a communication coach. I help you analyze how your team talks in work chats.\n\n" +
    "Add me to a group chat and I'll start collecting messages (I can't see history from before I joined). " +
    "When you need a report, run one of the commands in the group.\n\n" +
    "Send /help to learn more.",
  help: [
    "**How to use the bot**",
    "",
    "1. Add me to your group chat. I collect messages from that moment on.",
    "2. Run an analysis command in the group:",
    "- /analyze_last_100 — the last 100 messages",
    "- /analyze_last <n> — the last n messages",
    "- /analyze_last_24h — messages from the last 24 hours",
    "- /analyze_hours <h> — messages from the last h hours",
    "- /analyze_user — reply to someone's message (or pass a user id) for a personal report",
    "- /chat_stats — message statistics",
    "- /clear_cache — forget this chat's messages",
    "3. The report arrives in a **private message** to whoever ran the command.",
    "",
    "Only chat administrators and granted users can run analyses.",
  ].join("\n"),
  adminOnly: "Only chat administrators can use this command.",
  permissionCheckFailed:
    "I couldn't verify your permissions. Make sure I'm an administrator in this chat.",
  notAuthorized: "You are not allowed to use this command.",
  primaryOnly: "Only the primary user can manage access.",
  noMessages:
    "There are no messages to analyze yet. I collect messages from the moment I'm added to the chat.",
  noMessagesInRange: "No messages found for the requested period.",
  noUserMessages: "I have no messages from that user.",
  analysisStarted: "Starting the analysis… This can take a few minutes.",
  analysisBusy: "An analysis you requested is still running. Please wait for it to finish.",
  analysisFailed: "The analysis service couldn't process the request. Please try again later.",
  analysisNotConfigured: "The analysis service is not configured.",
  cacheCleared: "Cached messages for this chat were cleared.",
  internalError: "Something went wrong while handling that command.",
  cannotDm: (botUsername?: string) =>
    `I can't send you a private message. Please start a chat with me${botUsername ? ` (@${botUsername})` : ""} and try again.`,
  usage: (command: string, args: string) => `Usage: /${command} ${args}`,
  granted: (userId: number) => `User ${userId} can now run analyses.`,
  alreadyGranted: (userId: number) => `User ${userId} already has access.`,
  revoked: (userId: number) => `User ${userId} no longer has access.`,
  notGranted: (userId: number) => `User ${userId} had no granted access.`,
  accessList: (userIds: number[]) =>
    userIds.length === 0 ? "No users have been granted access." : `Granted users: ${userIds.join(", ")}`,
} as const;
