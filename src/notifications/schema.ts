/**
 * Notifications Module - Schemas and Types
 *
 * Data shapes for the Telegram Bot API.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Telegram API Schemas
// =============================================================================

/**
 * Envelope of every Bot API response.
 */
export const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({
    id: z.union([z.number(), z.string()]).describe("Chat the message came from"),
  }),
  text: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export const TelegramUpdatesSchema = z.array(TelegramUpdateSchema);

/**
 * Entry of the command menu registered with setMyCommands.
 */
export type BotCommand = Readonly<{
  command: string;
  description: string;
}>;

// =============================================================================
// Settings
// =============================================================================

export type TelegramSettings = Readonly<{
  apiUrl: string;
  botToken: string;
  chatId: string;
  timeoutMs: number;
}>;
