/**
 * Notifications Module - Service Layer
 *
 * Telegram Bot API integration: alert delivery and the command bot's
 * long-poll transport. Delivery is best-effort; callers log failures.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  invalidResponse,
  networkError,
  notConfigured,
  sendFailed,
} from "./errors.js";
import type { NotificationError } from "./errors.js";
import {
  type BotCommand,
  type TelegramSettings,
  TelegramResponseSchema,
  type TelegramUpdate,
  TelegramUpdatesSchema,
} from "./schema.js";
import {
  buildSendMessagePayload,
  buildUpdatesQuery,
  methodUrl,
} from "./transform.js";

const log = createLogger("notifications");

/**
 * Anything that can deliver a text message to the operator.
 */
export interface Notifier {
  send(text: string): Promise<Result<void, NotificationError>>;
}

export interface TelegramClient extends Notifier {
  readonly chatId: string;
  getUpdates(
    offset: number | null,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<Result<TelegramUpdate[], NotificationError>>;
  setMyCommands(
    commands: ReadonlyArray<BotCommand>,
  ): Promise<Result<void, NotificationError>>;
}

// =============================================================================
// Transport
// =============================================================================

async function callMethod(
  settings: TelegramSettings,
  method: string,
  init: Readonly<{
    body?: unknown;
    query?: Record<string, string>;
    timeoutMs: number;
    signal?: AbortSignal;
  }>,
): Promise<Result<unknown, NotificationError>> {
  const url = new URL(methodUrl(settings, method));
  for (const [key, value] of Object.entries(init.query ?? {})) {
    url.searchParams.set(key, value);
  }

  try {
    const response = await fetch(url.toString(), {
      method: init.body === undefined ? "GET" : "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      ...(init.body !== undefined && { body: JSON.stringify(init.body) }),
      signal:
        init.signal === undefined
          ? AbortSignal.timeout(init.timeoutMs)
          : AbortSignal.any([init.signal, AbortSignal.timeout(init.timeoutMs)]),
    });

    const data: unknown = await response.json().catch(() => null);
    const parsed = TelegramResponseSchema.safeParse(data);

    if (!response.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success
        ? (parsed.data.description ?? "Unknown error")
        : "Unreadable response";
      log.error(
        { method, statusCode: response.status, error: description },
        "Telegram API request failed",
      );
      return err(sendFailed(description, response.status));
    }

    return ok(parsed.data.result);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ method, error: message }, "Telegram API unreachable");
    return err(networkError(message, error instanceof Error ? error : undefined));
  }
}

// =============================================================================
// Client Factory
// =============================================================================

export function createTelegramClient(settings: TelegramSettings): TelegramClient {
  return {
    chatId: settings.chatId,

    async send(text) {
      log.debug({ messageLength: text.length }, "Sending Telegram message...");
      const result = await callMethod(settings, "sendMessage", {
        body: buildSendMessagePayload(settings.chatId, text),
        timeoutMs: settings.timeoutMs,
      });
      if (result.isOk()) {
        log.info({ chatId: settings.chatId }, "Telegram message sent");
      }
      return result.map(() => undefined);
    },

    async getUpdates(offset, timeoutSeconds, signal) {
      const result = await callMethod(settings, "getUpdates", {
        query: buildUpdatesQuery(offset, timeoutSeconds),
        // Long poll: allow the server its full timeout before aborting
        timeoutMs: timeoutSeconds * 1000 + settings.timeoutMs,
        ...(signal !== undefined && { signal }),
      });
      return result.andThen((payload) => {
        const updates = TelegramUpdatesSchema.safeParse(payload);
        return updates.success
          ? ok(updates.data)
          : err(invalidResponse("Malformed getUpdates result", payload));
      });
    },

    async setMyCommands(commands) {
      const result = await callMethod(settings, "setMyCommands", {
        body: { commands },
        timeoutMs: settings.timeoutMs,
      });
      if (result.isOk()) {
        log.info({ count: commands.length }, "Registered bot command menu");
      }
      return result.map(() => undefined);
    },
  };
}

/**
 * Notifier used when Telegram is not configured or notifications are off.
 */
export function createDisabledNotifier(reason: string): Notifier {
  return {
    async send() {
      log.debug({ reason }, "Notification skipped");
      return err(notConfigured(reason));
    },
  };
}
