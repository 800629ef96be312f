import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Analyzer } from "../../agent/analyzer.js";
import { ProviderConfigError } from "../../agent/types.js";
import { AccessList } from "../../auth/access-list.js";
import { MemoryChatStore } from "../../cache/memory-store.js";
import { MessageCache } from "../../cache/message-cache.js";
import { SqliteChatStore } from "../../cache/sqlite-store.js";
import type { ChannelPlugin, MessageHandler, MsgContext, OutboundMessage } from "../../channels/interface.js";
import { analysisConfigSchema } from "../../config/schema.js";
import { REPLIES } from "../commands.js";
import { createMessageHandler } from "../handler.js";

const NOW = Date.UTC(2024, 0, 1, 12, 0, 0);
const GROUP = -100;
const PRIMARY = 1;
const ALICE = 11;
const BOB = 22;

interface Sent {
  target: number;
  message: OutboundMessage;
}

function fakeChannel() {
  const sent: Sent[] = [];
  const channel = {
    id: "telegram",
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    onMessage: vi.fn<ChannelPlugin["onMessage"]>(),
    send: vi.fn<ChannelPlugin["send"]>(async (target, message) => {
      sent.push({ target, message });
    }),
    isChatAdmin: vi.fn<ChannelPlugin["isChatAdmin"]>(async () => false),
    getBotUsername: vi.fn<ChannelPlugin["getBotUsername"]>(async () => "coach_bot"),
  } satisfies ChannelPlugin;
  return { channel, sent };
}

function fakeAnalyzer() {
  return {
    analyzeChat: vi.fn<Analyzer["analyzeChat"]>(async () => "## Chat report"),
    analyzeUser: vi.fn<Analyzer["analyzeUser"]>(async () => "## User report"),
  } satisfies Analyzer;
}

let seq = 0;

function group(userId: number, senderName: string, body: string, extra: Partial<MsgContext> = {}): MsgContext {
  seq += 1;
  return {
    channel: "telegram",
    chatId: GROUP,
    chatType: "group",
    userId,
    senderName,
    body,
    messageId: seq,
    ...extra,
  };
}

function direct(userId: number, body: string): MsgContext {
  seq += 1;
  return {
    channel: "telegram",
    chatId: userId,
    chatType: "direct",
    userId,
    senderName: `user${userId}`,
    body,
    messageId: seq,
  };
}

describe("createMessageHandler", () => {
  let cache: MessageCache;
  let access: AccessList;
  let channel: ReturnType<typeof fakeChannel>["channel"];
  let sent: Sent[];
  let analyzer: ReturnType<typeof fakeAnalyzer>;
  let handle: MessageHandler;

  beforeEach(async () => {
    cache = new MessageCache(new MemoryChatStore(100), { now: () => NOW + 250 });
    access = await AccessList.load({ primaryUserId: PRIMARY });
    ({ channel, sent } = fakeChannel());
    analyzer = fakeAnalyzer();
    handle = createMessageHandler({
      cache,
      analyzer,
      access,
      channel,
      analysis: analysisConfigSchema.parse({}),
      now: () => NOW,
    });
  });

  describe("group ingestion", () => {
    it("caches plain text with the capture time", async () => {
      await handle(group(ALICE, "Alice", "hello team"));

      expect(cache.getLastNMessages(GROUP, 10)).toEqual([
        { chatId: GROUP, userId: ALICE, username: "Alice", text: "hello team", timestamp: NOW },
      ]);
      expect(sent).toEqual([]);
    });

    it("does not cache commands, including ones for other bots", async () => {
      await handle(group(ALICE, "Alice", "/analyze_last@other_bot 5"));
      await handle(group(ALICE, "Alice", "/unknown"));

      expect(cache.getAllChats()).toEqual([]);
      expect(sent).toEqual([]);
    });

    it("does not cache private messages", async () => {
      await handle(direct(ALICE, "just chatting"));

      expect(cache.getAllChats()).toEqual([]);
    });
  });

  describe("authorization", () => {
    it("rejects callers who are neither admins nor granted", async () => {
      const ctx = group(ALICE, "Alice", "/analyze_last_100");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.adminOnly, replyToId: ctx.messageId } },
      ]);
      expect(analyzer.analyzeChat).not.toHaveBeenCalled();
    });

    it("reports when the admin check itself fails", async () => {
      channel.isChatAdmin.mockRejectedValueOnce(new Error("Bad Request: chat not found"));
      const ctx = group(ALICE, "Alice", "/chat_stats");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.permissionCheckFailed, replyToId: ctx.messageId } },
      ]);
    });

    it("lets granted users through without asking the channel", async () => {
      await access.add(ALICE);
      cache.addMessage(GROUP, BOB, "Bob", "hi", NOW);

      await handle(group(ALICE, "Alice", "/clear_cache"));

      expect(channel.isChatAdmin).not.toHaveBeenCalled();
      expect(cache.getAllChats()).toEqual([]);
      expect(sent.map((s) => s.message.text)).toEqual([REPLIES.cacheCleared]);
    });
  });

  describe("chat analysis", () => {
    beforeEach(() => {
      channel.isChatAdmin.mockResolvedValue(true);
    });

    it("delivers the report privately to the caller", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "first", NOW - 3000);
      cache.addMessage(GROUP, BOB, "Bob", "second", NOW - 2000);
      cache.addMessage(GROUP, ALICE, "Alice", "third", NOW - 1000);

      await handle(group(ALICE, "Alice", "/analyze_last 2"));

      expect(analyzer.analyzeChat).toHaveBeenCalledTimes(1);
      expect(analyzer.analyzeChat.mock.calls[0][0].map((m) => m.text)).toEqual(["second", "third"]);
      expect(sent).toEqual([
        { target: ALICE, message: { text: REPLIES.analysisStarted } },
        { target: ALICE, message: { text: "## Chat report", markdown: true } },
      ]);
    });

    it("answers an empty chat with the no-messages reply", async () => {
      const ctx = group(ALICE, "Alice", "/analyze_last_24h");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.noMessages, replyToId: ctx.messageId } },
      ]);
    });

    it("distinguishes an empty time window from an empty chat", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "long ago", NOW - 3 * 60 * 60 * 1000);

      const ctx = group(ALICE, "Alice", "/analyze_hours 1");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.noMessagesInRange, replyToId: ctx.messageId } },
      ]);
      expect(analyzer.analyzeChat).not.toHaveBeenCalled();
    });

    it("selects messages inside the requested hours", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "old", NOW - 3 * 60 * 60 * 1000);
      cache.addMessage(GROUP, BOB, "Bob", "recent", NOW - 30 * 60 * 1000);

      await handle(group(ALICE, "Alice", "/analyze_hours 1.5"));

      expect(analyzer.analyzeChat.mock.calls[0][0].map((m) => m.text)).toEqual(["recent"]);
    });

    it("explains usage when the hours argument is missing", async () => {
      const ctx = group(ALICE, "Alice", "/analyze_hours");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: "Usage: /analyze_hours <hours>", replyToId: ctx.messageId } },
      ]);
    });

    it("asks the caller to open a private chat when the bot cannot DM them", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "hi", NOW);
      channel.send.mockImplementation(async (target, message) => {
        if (target > 0) throw new Error("Forbidden: bot can't initiate conversation with a user");
        sent.push({ target, message });
      });

      const ctx = group(ALICE, "Alice", "/analyze_last");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.cannotDm("coach_bot"), replyToId: ctx.messageId } },
      ]);
      expect(analyzer.analyzeChat).not.toHaveBeenCalled();
    });

    it("reports analysis failures privately", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "hi", NOW);
      analyzer.analyzeChat.mockRejectedValueOnce(new Error("HTTP 500"));

      await handle(group(ALICE, "Alice", "/analyze_last"));

      expect(sent).toEqual([
        { target: ALICE, message: { text: REPLIES.analysisStarted } },
        { target: ALICE, message: { text: REPLIES.analysisFailed } },
      ]);
    });

    it("reports a missing provider configuration", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "hi", NOW);
      analyzer.analyzeChat.mockRejectedValueOnce(new ProviderConfigError("OpenAI API key is not configured"));

      await handle(group(ALICE, "Alice", "/analyze_last"));

      expect(sent.at(-1)).toEqual({ target: ALICE, message: { text: REPLIES.analysisNotConfigured } });
    });

    it("refuses a second analysis while one is running", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "hi", NOW);
      let finish: (report: string) => void = () => {};
      analyzer.analyzeChat.mockImplementationOnce(
        () => new Promise<string>((resolve) => (finish = resolve)),
      );

      const first = handle(group(ALICE, "Alice", "/analyze_last"));
      await vi.waitFor(() => expect(analyzer.analyzeChat).toHaveBeenCalledTimes(1));

      const second = group(ALICE, "Alice", "/analyze_last");
      await handle(second);
      finish("## Chat report");
      await first;

      expect(analyzer.analyzeChat).toHaveBeenCalledTimes(1);
      expect(sent).toEqual([
        { target: ALICE, message: { text: REPLIES.analysisStarted } },
        { target: GROUP, message: { text: REPLIES.analysisBusy, replyToId: second.messageId } },
        { target: ALICE, message: { text: "## Chat report", markdown: true } },
      ]);

      await handle(group(ALICE, "Alice", "/analyze_last"));
      expect(analyzer.analyzeChat).toHaveBeenCalledTimes(2);
    });

    it("caps /analyze_last at the cache size", async () => {
      const persisted = new MessageCache(new SqliteChatStore({ maxSize: 3, dbPath: ":memory:" }));
      for (let i = 1; i <= 10; i++) persisted.addMessage(GROUP, BOB, "Bob", `m${i}`, NOW + i * 1000);
      const capped = createMessageHandler({
        cache: persisted,
        analyzer,
        access,
        channel,
        analysis: analysisConfigSchema.parse({}),
      });

      await capped(group(ALICE, "Alice", "/analyze_last 1000000"));

      expect(analyzer.analyzeChat.mock.calls[0][0].map((m) => m.text)).toEqual(["m8", "m9", "m10"]);
      persisted.close();
    });

    it("sends chat statistics to the group", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "a", NOW - 60_000);
      cache.addMessage(GROUP, ALICE, "Alice", "b", NOW);

      const ctx = group(ALICE, "Alice", "/chat_stats");
      await handle(ctx);

      expect(sent).toEqual([
        {
          target: GROUP,
          message: {
            text: [
              "**Chat statistics**",
              "Messages: 2",
              "Participants: 2",
              "Oldest: 2024-01-01 11:59:00 UTC",
              "Newest: 2024-01-01 12:00:00 UTC",
            ].join("\n"),
            markdown: true,
            replyToId: ctx.messageId,
          },
        },
      ]);
    });
  });

  describe("user analysis", () => {
    beforeEach(() => {
      channel.isChatAdmin.mockResolvedValue(true);
      cache.addMessage(GROUP, ALICE, "Alice", "can you review?", NOW - 3000);
      cache.addMessage(GROUP, BOB, "Bob", "sure", NOW - 2000);
      cache.addMessage(GROUP, BOB, "Bobby", "done", NOW - 1000);
    });

    it("analyzes the author of the replied-to message", async () => {
      await handle(group(ALICE, "Alice", "/analyze_user", { replyTo: { userId: BOB, senderName: "Bob" } }));

      expect(analyzer.analyzeUser).toHaveBeenCalledTimes(1);
      const request = analyzer.analyzeUser.mock.calls[0][0];
      expect(request.username).toBe("Bobby");
      expect(request.messages.map((m) => m.text)).toEqual(["sure", "done"]);
      expect(Array.from(request.interactions.partners.keys())).toEqual(["Alice"]);
      expect(sent.at(-1)).toEqual({ target: ALICE, message: { text: "## User report", markdown: true } });
    });

    it("accepts a user id argument", async () => {
      await handle(group(BOB, "Bob", `/analyze_user ${ALICE}`));

      expect(analyzer.analyzeUser.mock.calls[0][0].messages.map((m) => m.text)).toEqual(["can you review?"]);
    });

    it("explains usage without a target", async () => {
      const ctx = group(ALICE, "Alice", "/analyze_user");
      await handle(ctx);

      expect(sent).toEqual([
        {
          target: GROUP,
          message: { text: "Usage: /analyze_user <user id> (or reply to a message)", replyToId: ctx.messageId },
        },
      ]);
    });

    it("answers when the target has no cached messages", async () => {
      const ctx = group(ALICE, "Alice", "/analyze_user 99");
      await handle(ctx);

      expect(sent).toEqual([
        { target: GROUP, message: { text: REPLIES.noUserMessages, replyToId: ctx.messageId } },
      ]);
    });
  });

  describe("private commands", () => {
    it("greets on /start", async () => {
      const ctx = direct(ALICE, "/start");
      await handle(ctx);

      expect(sent).toEqual([{ target: ALICE, message: { text: REPLIES.start, replyToId: ctx.messageId } }]);
    });

    it("sends help as markdown", async () => {
      await handle(direct(ALICE, "/help"));

      expect(sent).toEqual([{ target: ALICE, message: { text: REPLIES.help, markdown: true } }]);
    });

    it("limits user reports to the access list", async () => {
      await handle(direct(ALICE, `/user_report ${BOB}`));

      expect(sent.map((s) => s.message.text)).toEqual([REPLIES.notAuthorized]);
    });

    it("builds a cross-chat user report", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "in group one", NOW - 2000);
      cache.addMessage(-200, BOB, "Bob", "in group two", NOW - 1000);

      await handle(direct(PRIMARY, `/user_report ${BOB}`));

      const request = analyzer.analyzeUser.mock.calls[0][0];
      expect(request.messages.map((m) => m.text)).toEqual(["in group one", "in group two"]);
      expect(sent).toEqual([
        { target: PRIMARY, message: { text: REPLIES.analysisStarted } },
        { target: PRIMARY, message: { text: "## User report", markdown: true } },
      ]);
    });

    it("summarizes a user's activity across chats", async () => {
      cache.addMessage(GROUP, BOB, "Bob", "a", NOW - 60_000);
      cache.addMessage(-200, BOB, "Bob", "b", NOW);

      await handle(direct(PRIMARY, `/user_stats ${BOB}`));

      expect(sent).toEqual([
        {
          target: PRIMARY,
          message: {
            text: [
              `**User ${BOB}**`,
              "Messages: 2",
              "Chats: 2 (-100, -200)",
              "Oldest: 2024-01-01 11:59:00 UTC",
              "Newest: 2024-01-01 12:00:00 UTC",
            ].join("\n"),
            markdown: true,
          },
        },
      ]);
    });

    it("lets only the primary user manage access", async () => {
      await handle(direct(ALICE, `/grant ${BOB}`));
      expect(sent.map((s) => s.message.text)).toEqual([REPLIES.primaryOnly]);
      expect(access.contains(BOB)).toBe(false);
    });

    it("answers with a generic reply when a command throws", async () => {
      vi.spyOn(access, "add").mockRejectedValueOnce(new Error("EACCES: permission denied"));

      const ctx = direct(PRIMARY, `/grant ${BOB}`);
      await handle(ctx);

      expect(sent).toEqual([
        { target: PRIMARY, message: { text: REPLIES.internalError, replyToId: ctx.messageId } },
      ]);
    });

    it("grants, lists and revokes access", async () => {
      await handle(direct(PRIMARY, `/grant ${BOB}`));
      await handle(direct(PRIMARY, `/grant ${BOB}`));
      await handle(direct(PRIMARY, "/access"));
      await handle(direct(PRIMARY, `/revoke ${BOB}`));
      await handle(direct(PRIMARY, `/revoke ${BOB}`));
      await handle(direct(PRIMARY, "/grant nobody"));

      expect(sent.map((s) => s.message.text)).toEqual([
        REPLIES.granted(BOB),
        REPLIES.alreadyGranted(BOB),
        `Granted users: ${BOB}`,
        REPLIES.revoked(BOB),
        REPLIES.notGranted(BOB),
        "Usage: /grant <user id>",
      ]);
      expect(access.contains(BOB)).toBe(false);
    });
  });
});
