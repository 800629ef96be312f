/**
 * Gateway lifecycle: builds the cache, access list and analyzer from config,
 * attaches the message handler to the channel and starts polling.
 */

import { createAnalyzer } from "../agent/analyzer.js";
import { AccessList } from "../auth/access-list.js";
import { MessageCache, createChatStore } from "../cache/message-cache.js";
import type { ChannelPlugin } from "../channels/interface.js";
import { createTelegramPlugin } from "../channels/telegram/index.js";
import type { Config } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import { defaultAccessStorePath } from "../utils/paths.js";
import { createMessageHandler } from "./handler.js";

const log = createLogger("gateway");

export interface GatewayOptions {
  config: Config;
  /** Defaults to the Telegram plugin built from `config.telegram` */
  channel?: ChannelPlugin;
}

export async function startGateway(opts: GatewayOptions): Promise<() => Promise<void>> {
  const { config } = opts;

  const cache = new MessageCache(
    createChatStore({ maxSize: config.cache.maxSize, dbPath: config.cache.dbPath }),
  );

  let access: AccessList;
  try {
    access = await AccessList.load({
      primaryUserId: config.access.primaryUserId,
      storePath: config.access.storePath ?? defaultAccessStorePath(),
    });
  } catch (err) {
    cache.close();
    throw err;
  }
  if (config.access.primaryUserId === undefined) {
    log.warn("No primary user configured; access can't be granted or revoked");
  }

  const channel = opts.channel ?? createTelegramPlugin({ token: config.telegram.token });
  channel.onMessage(
    createMessageHandler({
      cache,
      analyzer: createAnalyzer(config.llm),
      access,
      channel,
      analysis: config.analysis,
    }),
  );

  try {
    await channel.start();
  } catch (err) {
    cache.close();
    throw err;
  }
  log.info(
    { channel: channel.id, cache: config.cache.dbPath ? "sqlite" : "memory", provider: config.llm.provider },
    "Gateway started",
  );

  return async () => {
    try {
      await channel.stop();
    } finally {
      cache.close();
      log.info("Gateway stopped");
    }
  };
}
