/**
 * Bot Module - Error Types
 *
 * Failures that stop the bot. Command-level problems are replies, not errors.
 */
import type { LockError } from "../lock.js";
import { type StoreError, formatStoreError } from "../store/errors.js";

export type BotError =
  | { readonly type: "LOCK_ERROR"; readonly message: string; readonly cause: LockError }
  | { readonly type: "STORE_ERROR"; readonly message: string; readonly cause: StoreError };

export function lockError(cause: LockError): BotError {
  return { type: "LOCK_ERROR", message: cause.message, cause };
}

export function botStoreError(cause: StoreError): BotError {
  return { type: "STORE_ERROR", message: formatStoreError(cause), cause };
}

export function formatBotError(error: BotError): string {
  switch (error.type) {
    case "LOCK_ERROR":
      return error.message;
    case "STORE_ERROR":
      return `Bot state unavailable: ${error.message}`;
  }
}
