#!/usr/bin/env node
/**
 * Energy Tracker - Application Entry Point
 *
 * Wires the real store, supplier API client and Telegram client into the
 * CLI and hands it the process arguments.
 */
import { ENV_FILE, config } from "./config.js";
import { runCli } from "./cli/index.js";
import { createEnergyApiClient } from "./energy-api/index.js";
import { createLogger } from "./logger.js";
import { createTelegramClient } from "./notifications/index.js";
import { createStore } from "./store/index.js";

const log = createLogger("cli");

log.debug(
  {
    env: config.NODE_ENV,
    db: config.DB_PATH,
    timezone: config.TIMEZONE,
  },
  `${config.APP_NAME} starting`,
);

process.exitCode = await runCli(process.argv, {
  config,
  envPath: ENV_FILE,
  services: {
    openStore: createStore,
    createEnergyApiClient,
    createTelegramClient,
  },
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  now: () => new Date(),
});
