/**
 * Notifications Module - Pure Transformations
 *
 * Bot API request building and update inspection.
 */
import type { TelegramSettings, TelegramUpdate } from "./schema.js";

/**
 * Bot API method URL: <apiUrl>/bot<token>/<method>
 */
export function methodUrl(
  settings: Pick<TelegramSettings, "apiUrl" | "botToken">,
  method: string,
): string {
  return `${settings.apiUrl.replace(/\/+$/, "")}/bot${settings.botToken}/${method}`;
}

export function buildSendMessagePayload(
  chatId: string,
  text: string,
): Readonly<{ chat_id: string; text: string }> {
  return { chat_id: chatId, text };
}

/**
 * getUpdates query. Omits the offset on the very first poll.
 */
export function buildUpdatesQuery(
  offset: number | null,
  timeoutSeconds: number,
): Record<string, string> {
  const query: Record<string, string> = { timeout: String(timeoutSeconds) };
  if (offset !== null) {
    query.offset = String(offset);
  }
  return query;
}

/**
 * Chat id of an update's message as a string, or null.
 */
export function chatIdOf(update: TelegramUpdate): string | null {
  const id = update.message?.chat.id;
  return id === undefined ? null : String(id);
}

export function textOf(update: TelegramUpdate): string {
  return update.message?.text?.trim() ?? "";
}

/**
 * Offset that acknowledges every update in the batch.
 */
export function nextOffset(
  updates: ReadonlyArray<TelegramUpdate>,
  current: number | null,
): number | null {
  return updates.reduce<number | null>(
    (offset, update) =>
      offset === null || update.update_id + 1 > offset ? update.update_id + 1 : offset,
    current,
  );
}
