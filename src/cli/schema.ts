/**
 * CLI Module - Schemas and Types
 *
 * Commander hands options over untyped; each command parses its own with Zod.
 */
import { z } from "zod";

import type { Config } from "../config.js";
import type { EnergyApiClient, EnergyApiSettings } from "../energy-api/index.js";
import type { TelegramClient, TelegramSettings } from "../notifications/index.js";
import type { TimeSeriesStore } from "../store/index.js";

// =============================================================================
// Exit Codes
// =============================================================================

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
/** Some resources failed to sync (quiet mode only) */
export const EXIT_PARTIAL = 2;

// =============================================================================
// Option Schemas
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

export const GlobalOptionsSchema = z.object({
  quiet: z.boolean().default(false),
  json: z.boolean().default(false),
  db: z.string().min(1).optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const SyncOptionsSchema = z.object({
  days: positiveInt.optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});

export const UsageOptionsSchema = z.object({
  days: positiveInt.default(7),
  group: z.enum(["day", "week", "month"]).optional(),
});

export const RatesOptionsSchema = z.object({
  days: positiveInt.default(7),
});

export const CostOptionsSchema = z.object({
  days: positiveInt.default(7),
  group: z.enum(["none", "day", "week", "month"]).default("day"),
});

export const ExportOptionsSchema = z.object({
  output: z.string().min(1).default("energy_export.json"),
});

export const StatusOptionsSchema = z.object({
  write: z.boolean().default(false),
});

// =============================================================================
// Context
// =============================================================================

/**
 * data: command results, always printed.
 * info: progress chatter, dropped by --quiet.
 * error: failures, always printed to stderr.
 */
export interface CliOutput {
  data(text: string): void;
  info(text: string): void;
  error(text: string): void;
}

/**
 * Factories for everything with side effects, swapped out in tests.
 */
export type CliServices = Readonly<{
  openStore: (path: string) => TimeSeriesStore;
  createEnergyApiClient: (settings: EnergyApiSettings) => EnergyApiClient;
  createTelegramClient: (settings: TelegramSettings) => TelegramClient;
}>;

export type CliEnvironment = Readonly<{
  config: Config;
  envPath: string;
  services: CliServices;
  /** Raw stdout/stderr writers; quiet filtering is applied on top */
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}>;

export type CliContext = Readonly<{
  config: Config;
  envPath: string;
  services: CliServices;
  options: GlobalOptions;
  output: CliOutput;
  now: () => Date;
}>;
