/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type {
  BotCommand,
  TelegramSettings,
  TelegramUpdate,
} from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export { formatNotificationError } from "./errors.js";

// Service functions
export type { Notifier, TelegramClient } from "./service.js";

export { createDisabledNotifier, createTelegramClient } from "./service.js";

// Pure transformations
export { chatIdOf, nextOffset, textOf } from "./transform.js";
