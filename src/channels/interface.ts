/**
 * Channel plugin boundary. The gateway only sees these types; everything
 * Telegram-specific stays in the plugin.
 */

export type ChannelId = "telegram";

export interface MsgContext {
  channel: ChannelId;
  chatId: number;
  chatType: "direct" | "group";
  /** Sender; only messages with an identified sender reach the gateway */
  userId: number;
  senderName: string;
  body: string;
  messageId: number;
  /** Author of the message this one replies to */
  replyTo?: { userId: number; senderName: string };
}

export interface OutboundMessage {
  text: string;
  /** Render `text` as Markdown where the channel supports it */
  markdown?: boolean;
  replyToId?: number;
}

export type MessageHandler = (ctx: MsgContext) => Promise<void>;

export interface ChannelPlugin {
  id: ChannelId;

  start(): Promise<void>;
  stop(): Promise<void>;
  onMessage(handler: MessageHandler): void;

  /** Throws when the message cannot be delivered (e.g. the user never opened a private chat). */
  send(target: number, message: OutboundMessage): Promise<void>;
  isChatAdmin(chatId: number, userId: number): Promise<boolean>;
  getBotUsername(): Promise<string | undefined>;
}
