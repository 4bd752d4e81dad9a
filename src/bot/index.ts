/**
 * Bot Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  BotDependencies,
  CommandAction,
  LiveDemandReader,
  ParsedCommand,
} from "./schema.js";
export type { BotError } from "./errors.js";
export type { CommandBot } from "./service.js";

// Error utilities
export { formatBotError } from "./errors.js";

// Constants
export { BOT_COMMANDS } from "./schema.js";

// Service (side effects)
export { createCommandBot } from "./service.js";

// Pure transformations
export { decideCommand, parseCommand } from "./transform.js";
