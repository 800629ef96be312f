import { Bot, GrammyError } from "grammy";
import { createLogger } from "../../utils/logger.js";
import type { ChannelPlugin, MessageHandler, MsgContext, OutboundMessage } from "../interface.js";
import { markdownToTelegramHtml, splitMessage } from "./format.js";

const log = createLogger("telegram");

// Telegram caps messages at 4096 characters and HTML escaping can grow a chunk.
const SOURCE_CHUNK_LENGTH = 4000;

export interface TelegramConfig {
  token: string;
}

/** Username when set, first name otherwise */
function displayName(user: { username?: string; first_name: string }): string {
  return user.username ?? user.first_name;
}

function isFormattingError(err: unknown): boolean {
  return (
    err instanceof GrammyError &&
    err.error_code === 400 &&
    /can't parse entities|message is too long/i.test(err.description)
  );
}

export function createTelegramPlugin(config: TelegramConfig): ChannelPlugin {
  const bot = new Bot(config.token);
  let messageHandler: MessageHandler | null = null;
  let botUsername: string | undefined;

  bot.on("message:text", async (ctx) => {
    if (!messageHandler) return;

    const from = ctx.message.from;
    // Anonymous admins and channel posts carry no usable sender
    if (!from) return;

    const repliedFrom = ctx.message.reply_to_message?.from;
    const msgCtx: MsgContext = {
      channel: "telegram",
      chatId: ctx.chat.id,
      chatType: ctx.chat.type === "private" ? "direct" : "group",
      userId: from.id,
      senderName: displayName(from),
      body: ctx.message.text,
      messageId: ctx.message.message_id,
      replyTo: repliedFrom ? { userId: repliedFrom.id, senderName: displayName(repliedFrom) } : undefined,
    };

    try {
      await messageHandler(msgCtx);
    } catch (err) {
      log.error({ err, chatId: msgCtx.chatId, userId: msgCtx.userId }, "Error handling message");
    }
  });

  bot.catch((err) => {
    log.error({ err: err.error, updateId: err.ctx.update.update_id }, "Unhandled bot error");
  });

  async function sendChunk(target: number, chunk: string, markdown: boolean, replyToId?: number) {
    const other = replyToId
      ? { reply_parameters: { message_id: replyToId, allow_sending_without_reply: true } }
      : {};

    if (!markdown) {
      await bot.api.sendMessage(target, chunk, other);
      return;
    }

    try {
      await bot.api.sendMessage(target, markdownToTelegramHtml(chunk), { ...other, parse_mode: "HTML" });
    } catch (err) {
      if (!isFormattingError(err)) throw err;
      log.warn({ err, target }, "HTML rejected, sending as plain text");
      await bot.api.sendMessage(target, chunk, other);
    }
  }

  return {
    id: "telegram",

    async start() {
      log.info("Starting Telegram bot...");
      await new Promise<void>((resolve, reject) => {
        bot
          .start({
            allowed_updates: ["message"],
            onStart: (me) => {
              botUsername = me.username;
              resolve();
            },
          })
          .catch(reject);
      });
      log.info({ username: botUsername }, "Telegram bot started");
    },

    async stop() {
      log.info("Stopping Telegram bot...");
      await bot.stop();
      log.info("Telegram bot stopped");
    },

    onMessage(handler: MessageHandler) {
      messageHandler = handler;
    },

    async send(target: number, message: OutboundMessage) {
      const chunks = splitMessage(message.text, SOURCE_CHUNK_LENGTH);
      for (const [i, chunk] of chunks.entries()) {
        // Only the first chunk quotes the command
        await sendChunk(target, chunk, message.markdown ?? false, i === 0 ? message.replyToId : undefined);
      }
    },

    async isChatAdmin(chatId: number, userId: number) {
      const member = await bot.api.getChatMember(chatId, userId);
      return member.status === "administrator" || member.status === "creator";
    },

    async getBotUsername() {
      if (botUsername) return botUsername;
      try {
        const me = await bot.api.getMe();
        botUsername = me.username;
      } catch (err) {
        log.warn({ err }, "Could not fetch bot username");
      }
      return botUsername;
    },
  };
}
