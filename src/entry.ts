#!/usr/bin/env node
/**
 * commcoach entry point
 */

import { program } from "commander";
import { loadConfig } from "./config/loader.js";
import { startGateway } from "./gateway/server.js";
import { defaultConfigPath } from "./utils/paths.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("entry");

program
  .name("commcoach")
  .description("Telegram bot that analyzes team communication in group chats")
  .version("0.1.0");

program
  .command("start")
  .description("Start the bot")
  .option("-c, --config <path>", "Config file path", defaultConfigPath())
  .action(async (options: { config: string }) => {
    try {
      log.info("Starting commcoach...");

      const config = await loadConfig(options.config);
      const stop = await startGateway({ config });

      let stopping = false;
      const shutdown = async () => {
        if (stopping) return;
        stopping = true;
        log.info("Shutting down...");
        try {
          await stop();
          process.exit(0);
        } catch (err) {
          log.error({ err }, "Shutdown failed");
          process.exit(1);
        }
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());

      log.info("commcoach is running. Press Ctrl+C to stop.");
    } catch (err) {
      log.error({ err }, "Failed to start");
      process.exit(1);
    }
  });

program
  .command("check-config")
  .description("Validate the config file and print the effective settings")
  .option("-c, --config <path>", "Config file path", defaultConfigPath())
  .action(async (options: { config: string }) => {
    try {
      const config = await loadConfig(options.config);
      log.info(
        {
          cache: config.cache,
          provider: config.llm.provider,
          primaryUserId: config.access.primaryUserId,
          accessStore: config.access.storePath,
          analysis: config.analysis,
        },
        "Config is valid",
      );
    } catch (err) {
      log.error({ err }, "Invalid config");
      process.exit(1);
    }
  });

program.parse();
