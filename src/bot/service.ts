/**
 * Bot Module - Service Layer
 *
 * Long-polls Telegram for commands from the configured chat, applies them
 * and checkpoints the bot state after every batch.
 */
import { setTimeout as delay } from "node:timers/promises";
import { type Result, err, ok } from "neverthrow";

import { formatAlertError } from "../alerts/errors.js";
import { type Config, formatConfigError, updateConfig } from "../config.js";
import type { LiveDemand } from "../energy-api/index.js";
import { acquireLock } from "../lock.js";
import { createLogger } from "../logger.js";
import {
  type TelegramUpdate,
  chatIdOf,
  formatNotificationError,
  nextOffset,
  textOf,
} from "../notifications/index.js";
import { type BotState, formatStoreError } from "../store/index.js";
import { type BotError, botStoreError, lockError } from "./errors.js";
import { BOT_COMMANDS, type BotDependencies, REPLY_PREFIX } from "./schema.js";
import { decideCommand, formatBotStatus, parseCommand, routeText } from "./transform.js";

const log = createLogger("bot");

export interface CommandBot {
  /** Config as last written by a command */
  readonly config: Config;
  /** Apply one batch of updates and return the state to checkpoint */
  processUpdates(
    state: BotState,
    updates: ReadonlyArray<TelegramUpdate>,
  ): Promise<BotState>;
  /** Poll until the signal aborts. Holds the process lock meanwhile. */
  run(signal: AbortSignal): Promise<Result<void, BotError>>;
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

export function createCommandBot(deps: BotDependencies): CommandBot {
  const { telegram, store } = deps;
  let config = deps.config;

  async function reply(text: string): Promise<void> {
    const sent = await telegram.send(`${REPLY_PREFIX} ${text}`);
    if (sent.isErr()) {
      log.warn({ error: formatNotificationError(sent.error) }, "Reply failed");
    }
  }

  function saveState(state: BotState): void {
    const saved = store.saveBotState(state);
    if (saved.isErr()) {
      log.error({ error: formatStoreError(saved.error) }, "Could not save bot state");
    }
  }

  async function readDemand(): Promise<LiveDemand | null> {
    if (deps.liveDemand === null) {
      return null;
    }
    const demand = await deps.liveDemand();
    if (demand.isErr()) {
      log.warn({ error: formatAlertError(demand.error) }, "Live demand for /status failed");
      return null;
    }
    return demand.value;
  }

  async function handleCommand(text: string, state: BotState): Promise<BotState> {
    log.info({ text }, "Received command");
    const action = decideCommand(parseCommand(text), state);

    if (action.kind === "status") {
      const view = {
        demandThresholdWatts: config.ALERT_THRESHOLD_WATTS,
        reportDemand: config.REPORT_DEMAND,
        reportThresholdWatts: config.REPORT_DEMAND_THRESHOLD_WATTS,
      };
      await reply(formatBotStatus(view, action.state.muted, await readDemand()));
      return action.state;
    }

    if (action.updates !== null) {
      const updated = updateConfig(config, action.updates, deps.envPath);
      if (updated.isErr()) {
        log.error({ error: formatConfigError(updated.error) }, "Config update failed");
        await reply(`Could not save setting: ${formatConfigError(updated.error)}`);
        return action.state;
      }
      config = updated.value;
    }

    if (
      action.state.muted !== state.muted ||
      action.state.pendingCommand !== state.pendingCommand
    ) {
      saveState(action.state);
    }
    await reply(action.text);
    return action.state;
  }

  async function processUpdates(
    initial: BotState,
    updates: ReadonlyArray<TelegramUpdate>,
  ): Promise<BotState> {
    let state = initial;

    for (const update of updates) {
      state = { ...state, updateOffset: nextOffset([update], state.updateOffset) };

      const chatId = chatIdOf(update);
      if (chatId !== telegram.chatId) {
        log.warn({ chatId }, "Ignoring message from unauthorized chat");
        continue;
      }

      const text = textOf(update);
      if (text === "") {
        continue;
      }

      const routed = routeText(text, state.pendingCommand);
      if (routed === null) {
        continue;
      }
      state = await handleCommand(routed, state);
    }

    return state;
  }

  async function run(signal: AbortSignal): Promise<Result<void, BotError>> {
    const lock = acquireLock(config.BOT_LOCK_PATH);
    if (lock.isErr()) {
      return err(lockError(lock.error));
    }

    let started = false;
    try {
      const loaded = store.loadBotState();
      if (loaded.isErr()) {
        return err(botStoreError(loaded.error));
      }

      const registered = await telegram.setMyCommands(BOT_COMMANDS);
      if (registered.isErr()) {
        log.warn(
          { error: formatNotificationError(registered.error) },
          "Failed to register bot commands",
        );
      }

      let state = loaded.value;
      log.info({ offset: state.updateOffset }, "Bot started, listening for commands");
      await reply("Bot online");
      started = true;

      while (!signal.aborted) {
        const updates = await telegram.getUpdates(
          state.updateOffset,
          config.BOT_POLL_TIMEOUT_SECONDS,
          signal,
        );
        if (updates.isErr() && signal.aborted) {
          break;
        }
        if (updates.isErr()) {
          log.error(
            { error: formatNotificationError(updates.error) },
            "Failed to get updates",
          );
          await pause(config.BOT_ERROR_BACKOFF_MS, signal);
          continue;
        }

        if (updates.value.length === 0) {
          continue;
        }
        state = await processUpdates(state, updates.value);
        saveState(state);
      }

      return ok(undefined);
    } finally {
      if (started) {
        await reply("Bot shutting down");
      }
      lock.value.release();
    }
  }

  return {
    get config() {
      return config;
    },
    processUpdates,
    run,
  };
}
