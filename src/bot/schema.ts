/**
 * Bot Module - Types
 *
 * Commands accepted over Telegram and the actions they resolve to.
 */
import type { Result } from "neverthrow";

import type { AlertError } from "../alerts/index.js";
import type { Config, ConfigUpdates } from "../config.js";
import type { LiveDemand } from "../energy-api/index.js";
import type { BotCommand, TelegramClient } from "../notifications/index.js";
import type { BotState, TimeSeriesStore } from "../store/index.js";

/**
 * Menu registered with setMyCommands.
 */
export const BOT_COMMANDS: ReadonlyArray<BotCommand> = [
  { command: "threshold", description: "Set alert threshold (watts)" },
  { command: "report", description: "Set demand report threshold or disable" },
  { command: "mute", description: "Silence all notifications" },
  { command: "unmute", description: "Resume notifications" },
  { command: "status", description: "Show current config + live demand" },
  { command: "help", description: "List available commands" },
];

/** Prefix of every bot reply */
export const REPLY_PREFIX = "🐙";

/**
 * `/threshold@MyBot 1500` parses to { name: "threshold", arg: "1500" }.
 */
export type ParsedCommand = Readonly<{
  name: string;
  arg: string;
}>;

export type CommandAction =
  | Readonly<{
      kind: "reply";
      text: string;
      state: BotState;
      /** Config keys to persist before replying */
      updates: ConfigUpdates | null;
    }>
  | Readonly<{
      kind: "status";
      state: BotState;
    }>;

/**
 * Alert settings as shown and changed by the bot.
 */
export type BotAlertView = Readonly<{
  demandThresholdWatts: number;
  reportDemand: boolean;
  reportThresholdWatts: number;
}>;

export type LiveDemandReader = () => Promise<Result<LiveDemand | null, AlertError>>;

export type BotDependencies = Readonly<{
  telegram: TelegramClient;
  store: TimeSeriesStore;
  config: Config;
  /** .env file rewritten by threshold and report commands */
  envPath: string;
  /** Null when no telemetry device is configured */
  liveDemand: LiveDemandReader | null;
}>;
