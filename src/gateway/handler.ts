/**
 * Routes inbound channel messages: plain group text goes into the message
 * cache, commands run analyses and deliver reports privately.
 */

import type { Analyzer } from "../agent/analyzer.js";
import { ProviderConfigError } from "../agent/types.js";
import type { AccessList } from "../auth/access-list.js";
import type { MessageCache } from "../cache/message-cache.js";
import type { CachedMessage, UserInteractions } from "../cache/types.js";
import type { ChannelPlugin, MessageHandler, MsgContext } from "../channels/interface.js";
import type { AnalysisConfig } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import { AnalysisLimiter } from "./analysis-limit.js";
import {
  REPLIES,
  formatChatStats,
  formatUserStats,
  parseCommand,
  parsePositiveInt,
  parsePositiveNumber,
  type ParsedCommand,
} from "./commands.js";

const log = createLogger("gateway");

const HOUR_MS = 60 * 60 * 1000;

export interface GatewayDeps {
  cache: MessageCache;
  analyzer: Analyzer;
  access: AccessList;
  channel: ChannelPlugin;
  analysis: AnalysisConfig;
  /** Clock for the `/analyze_hours` window (ms) */
  now?: () => number;
}

type AnalysisRequest =
  | { kind: "chat"; messages: CachedMessage[] }
  | { kind: "user"; username: string; messages: CachedMessage[]; interactions: UserInteractions };

export function createMessageHandler(deps: GatewayDeps): MessageHandler {
  const { cache, analyzer, access, channel, analysis } = deps;
  const now = deps.now ?? (() => Date.now());
  const limiter = new AnalysisLimiter();

  const reply = (ctx: MsgContext, text: string) =>
    channel.send(ctx.chatId, { text, replyToId: ctx.messageId });

  async function isAuthorized(ctx: MsgContext): Promise<boolean> {
    if (access.contains(ctx.userId)) return true;
    try {
      if (await channel.isChatAdmin(ctx.chatId, ctx.userId)) return true;
    } catch (err) {
      log.warn({ err, chatId: ctx.chatId, userId: ctx.userId }, "admin check failed");
      await reply(ctx, REPLIES.permissionCheckFailed);
      return false;
    }
    await reply(ctx, REPLIES.adminOnly);
    return false;
  }

  /**
   * Notify the requester privately, run the analysis and deliver the report.
   * Falls back to a group reply when the bot can't reach the requester.
   */
  async function deliverAnalysis(ctx: MsgContext, request: AnalysisRequest): Promise<void> {
    const outcome = await limiter.run(ctx.userId, async () => {
      try {
        await channel.send(ctx.userId, { text: REPLIES.analysisStarted });
      } catch (err) {
        log.warn({ err, userId: ctx.userId }, "cannot reach requester privately");
        if (ctx.chatType === "group") {
          await reply(ctx, REPLIES.cannotDm(await channel.getBotUsername()));
        }
        return;
      }

      let report: string;
      try {
        report =
          request.kind === "chat"
            ? await analyzer.analyzeChat(request.messages)
            : await analyzer.analyzeUser(request);
      } catch (err) {
        log.error({ err, chatId: ctx.chatId, userId: ctx.userId, kind: request.kind }, "analysis failed");
        const text =
          err instanceof ProviderConfigError ? REPLIES.analysisNotConfigured : REPLIES.analysisFailed;
        await channel.send(ctx.userId, { text });
        return;
      }

      await channel.send(ctx.userId, { text: report, markdown: true });
      log.info(
        { chatId: ctx.chatId, userId: ctx.userId, kind: request.kind, messages: request.messages.length },
        "report delivered",
      );
    });

    if (!outcome.ran) {
      await reply(ctx, REPLIES.analysisBusy);
    }
  }

  async function analyzeChatMessages(ctx: MsgContext, messages: CachedMessage[]): Promise<void> {
    if (messages.length === 0) {
      const empty = cache.getChatStats(ctx.chatId).totalMessages === 0;
      await reply(ctx, empty ? REPLIES.noMessages : REPLIES.noMessagesInRange);
      return;
    }
    await deliverAnalysis(ctx, { kind: "chat", messages });
  }

  // Latest display name wins; callers only build this for non-empty histories.
  function userRequest(messages: CachedMessage[], interactions: UserInteractions): AnalysisRequest {
    return { kind: "user", username: messages[messages.length - 1].username, messages, interactions };
  }

  async function handleGroupCommand(ctx: MsgContext, cmd: ParsedCommand): Promise<void> {
    switch (cmd.name) {
      case "analyze_last_100":
      case "analyze_last": {
        const requested =
          cmd.name === "analyze_last_100" ? 100 : parsePositiveInt(cmd.args[0]) ?? analysis.defaultLastN;
        if (!(await isAuthorized(ctx))) return;
        const count = Math.min(requested, cache.maxSize);
        await analyzeChatMessages(ctx, cache.getLastNMessages(ctx.chatId, count));
        return;
      }

      case "analyze_last_24h":
      case "analyze_hours": {
        const hours =
          cmd.name === "analyze_last_24h" ? analysis.recentHours : parsePositiveNumber(cmd.args[0]);
        if (hours === undefined) {
          await reply(ctx, REPLIES.usage("analyze_hours", "<hours>"));
          return;
        }
        if (!(await isAuthorized(ctx))) return;
        await analyzeChatMessages(ctx, cache.getMessagesSince(ctx.chatId, now() - hours * HOUR_MS));
        return;
      }

      case "analyze_user": {
        const target = ctx.replyTo?.userId ?? parsePositiveInt(cmd.args[0]);
        if (target === undefined) {
          await reply(ctx, REPLIES.usage("analyze_user", "<user id> (or reply to a message)"));
          return;
        }
        if (!(await isAuthorized(ctx))) return;

        const messages = cache.getUserMessages(ctx.chatId, target, analysis.userMessageLimit);
        if (messages.length === 0) {
          await reply(ctx, REPLIES.noUserMessages);
          return;
        }
        const interactions = cache.getUserInteractions(ctx.chatId, target, analysis.interactionLimit);
        await deliverAnalysis(ctx, userRequest(messages, interactions));
        return;
      }

      case "chat_stats": {
        if (!(await isAuthorized(ctx))) return;
        await channel.send(ctx.chatId, {
          text: formatChatStats(cache.getChatStats(ctx.chatId)),
          markdown: true,
          replyToId: ctx.messageId,
        });
        return;
      }

      case "clear_cache": {
        if (!(await isAuthorized(ctx))) return;
        cache.clearChat(ctx.chatId);
        log.info({ chatId: ctx.chatId, userId: ctx.userId }, "chat cache cleared by command");
        await reply(ctx, REPLIES.cacheCleared);
        return;
      }

      default:
        log.debug({ command: cmd.name, chatId: ctx.chatId }, "ignoring unknown group command");
    }
  }

  async function handleDirectCommand(ctx: MsgContext, cmd: ParsedCommand): Promise<void> {
    switch (cmd.name) {
      case "start":
        await reply(ctx, REPLIES.start);
        return;

      case "help":
        await channel.send(ctx.chatId, { text: REPLIES.help, markdown: true });
        return;

      case "user_report":
      case "user_stats": {
        if (!access.contains(ctx.userId)) {
          await reply(ctx, REPLIES.notAuthorized);
          return;
        }
        const target = parsePositiveInt(cmd.args[0]);
        if (target === undefined) {
          await reply(ctx, REPLIES.usage(cmd.name, "<user id>"));
          return;
        }

        if (cmd.name === "user_stats") {
          await channel.send(ctx.chatId, {
            text: formatUserStats(target, cache.getUserChatStats(target)),
            markdown: true,
          });
          return;
        }

        const messages = cache.getUserMessagesAllChats(target, analysis.userMessageLimit);
        if (messages.length === 0) {
          await reply(ctx, REPLIES.noUserMessages);
          return;
        }
        const interactions = cache.getUserInteractionsAllChats(target, analysis.interactionLimit);
        await deliverAnalysis(ctx, userRequest(messages, interactions));
        return;
      }

      case "grant":
      case "revoke": {
        if (!access.isPrimary(ctx.userId)) {
          await reply(ctx, REPLIES.primaryOnly);
          return;
        }
        const target = parsePositiveInt(cmd.args[0]);
        if (target === undefined) {
          await reply(ctx, REPLIES.usage(cmd.name, "<user id>"));
          return;
        }
        if (cmd.name === "grant") {
          const added = await access.add(target);
          await reply(ctx, added ? REPLIES.granted(target) : REPLIES.alreadyGranted(target));
        } else {
          const removed = await access.remove(target);
          await reply(ctx, removed ? REPLIES.revoked(target) : REPLIES.notGranted(target));
        }
        return;
      }

      case "access": {
        if (!access.isPrimary(ctx.userId)) {
          await reply(ctx, REPLIES.primaryOnly);
          return;
        }
        await reply(ctx, REPLIES.accessList(access.list()));
        return;
      }

      default:
        log.debug({ command: cmd.name }, "ignoring unknown private command");
    }
  }

  return async (ctx) => {
    if (ctx.chatType === "group" && !ctx.body.trimStart().startsWith("/")) {
      if (ctx.body.trim().length > 0) {
        cache.addMessage(ctx.chatId, ctx.userId, ctx.senderName, ctx.body);
      }
      return;
    }

    // Anything starting with "/" is a command, even one for another bot.
    const cmd = parseCommand(ctx.body, await channel.getBotUsername());
    if (!cmd) return;

    try {
      if (ctx.chatType === "group") await handleGroupCommand(ctx, cmd);
      else await handleDirectCommand(ctx, cmd);
    } catch (err) {
      log.error({ err, command: cmd.name, chatId: ctx.chatId, userId: ctx.userId }, "command failed");
      await reply(ctx, REPLIES.internalError);
    }
  };
}
