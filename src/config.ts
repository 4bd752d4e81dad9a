/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App exits immediately on invalid config - fail fast.
 *
 * Covers:
 * - Runtime and logging
 * - Energy supplier REST + GraphQL credentials and meter identifiers
 * - Storage and timezone
 * - Alert thresholds (rewritable at runtime via updateConfig)
 * - Telegram notifications and command bot
 */
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import dotenv from "dotenv";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined || val.trim() === ""
        ? defaultValue
        : val.toLowerCase() === "true",
    );

/**
 * Optional string - empty string becomes undefined.
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("EnergyTracker").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Energy Supplier API
  // ==========================================================================
  ENERGY_API_KEY: optionalString.describe("REST API key (basic auth user)"),
  ENERGY_ACCOUNT: optionalString.describe("Account number, used by init"),
  ENERGY_MPAN: optionalString.describe("Electricity meter point number"),
  ENERGY_SERIAL: optionalString.describe("Electricity meter serial number"),
  ENERGY_TARIFF_CODE: optionalString.describe(
    "Tariff code, e.g. E-1R-VAR-22-11-01-C",
  ),
  ENERGY_DEVICE_ID: optionalString.describe(
    "Smart meter companion device id for live telemetry",
  ),
  ENERGY_PAYMENT_METHOD: z
    .enum(["DIRECT_DEBIT", "NON_DIRECT_DEBIT"])
    .default("DIRECT_DEBIT")
    .describe("Payment method used to pick between parallel rate series"),
  ENERGY_API_BASE_URL: z
    .string()
    .url()
    .default("https://api.octopus.energy/v1")
    .describe("REST API base URL"),
  ENERGY_GRAPHQL_URL: z
    .string()
    .url()
    .default("https://api.octopus.energy/v1/graphql/")
    .describe("GraphQL endpoint for token exchange and telemetry"),
  HTTP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30_000)
    .describe("Timeout for every outbound HTTP call (ms)"),

  // ==========================================================================
  // Storage
  // ==========================================================================
  DB_PATH: z.string().default("energy.db").describe("SQLite database file"),
  TIMEZONE: z
    .string()
    .default("Europe/London")
    .describe("IANA zone that defines calendar days for costs and alerts"),
  SYNC_DEFAULT_LOOKBACK_DAYS: z.coerce
    .number()
    .int()
    .positive()
    .default(30)
    .describe("Days fetched when a resource has never been synced"),

  // ==========================================================================
  // Alerts
  // ==========================================================================
  ALERT_THRESHOLD_WATTS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("Live demand threshold (W) for high/low alerts"),
  DAILY_ALERT_THRESHOLD_KWH: z.coerce
    .number()
    .positive()
    .default(25)
    .describe("Daily usage threshold (kWh/day) for high/low alerts"),
  REPORT_DEMAND: envBoolean(true).describe(
    "Send a demand report line for each sample above the report threshold",
  ),
  REPORT_DEMAND_THRESHOLD_WATTS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("Demand report threshold (W)"),

  // ==========================================================================
  // Telegram
  // ==========================================================================
  TELEGRAM_BOT_TOKEN: optionalString.describe("Telegram bot token"),
  TELEGRAM_CHAT_ID: optionalString.describe("Chat that receives alerts"),
  TELEGRAM_API_URL: z
    .string()
    .url()
    .default("https://api.telegram.org")
    .describe("Telegram Bot API base URL"),
  BOT_POLL_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(30)
    .describe("Long-poll timeout for getUpdates (s)"),
  BOT_ERROR_BACKOFF_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(5000)
    .describe("Pause after a failed getUpdates call (ms)"),
  BOT_LOCK_PATH: z
    .string()
    .default("energy-bot.lock")
    .describe("Lock file that keeps a single bot process running"),
  STATUS_CACHE_PATH: z
    .string()
    .default("energy-status.txt")
    .describe("File written by `status --write`"),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ENABLE_NOTIFICATIONS: envBoolean(true).describe(
    "Enable Telegram notifications",
  ),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigKey = keyof Config;

// =============================================================================
// Errors
// =============================================================================

export type ConfigError =
  | {
      readonly type: "INVALID_CONFIG";
      readonly message: string;
      readonly issues: ReadonlyArray<z.ZodIssue>;
    }
  | {
      readonly type: "MISSING_CONFIG";
      readonly message: string;
      readonly keys: ReadonlyArray<ConfigKey>;
    }
  | {
      readonly type: "NOT_UPDATABLE";
      readonly message: string;
      readonly key: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly message: string;
      readonly path: string;
    };

export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "INVALID_CONFIG":
      return `${error.message}: ${error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`;
    case "MISSING_CONFIG":
    case "NOT_UPDATABLE":
    case "WRITE_FAILED":
      return error.message;
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Path of the .env file that holds the configuration.
 */
export const ENV_FILE = process.env.ENV_FILE ?? ".env";

/**
 * Parse a raw environment into a Config.
 */
export function parseConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<Config, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    return err({
      type: "INVALID_CONFIG",
      message: "Invalid configuration",
      issues: parsed.error.issues,
    });
  }
  return ok(parsed.data);
}

dotenv.config({ path: ENV_FILE });

// Parse at startup - exits immediately if invalid
const initial = parseConfig(process.env);

if (initial.isErr()) {
  console.error("❌ Invalid configuration:");
  console.error(formatConfigError(initial.error));
  process.exit(1);
}

export const config: Config = initial.value;

/**
 * Check that the keys a command needs are present.
 */
export function requireConfig(
  cfg: Config,
  keys: ReadonlyArray<ConfigKey>,
): Result<Config, ConfigError> {
  const missing = keys.filter((key) => {
    const value = cfg[key];
    return value === undefined || value === "";
  });

  if (missing.length > 0) {
    return err({
      type: "MISSING_CONFIG",
      message: `Missing config: ${missing.join(", ")}. Run 'init' or set the values in ${ENV_FILE}`,
      keys: missing,
    });
  }

  return ok(cfg);
}

// =============================================================================
// Runtime Updates
// =============================================================================

/**
 * Keys that may be rewritten while the program runs (bot commands, `init`,
 * `config set`). Everything else is edited by hand.
 */
export const UPDATABLE_KEYS = [
  "ENERGY_MPAN",
  "ENERGY_SERIAL",
  "ENERGY_TARIFF_CODE",
  "ALERT_THRESHOLD_WATTS",
  "DAILY_ALERT_THRESHOLD_KWH",
  "REPORT_DEMAND",
  "REPORT_DEMAND_THRESHOLD_WATTS",
] as const satisfies ReadonlyArray<ConfigKey>;

export type UpdatableKey = (typeof UPDATABLE_KEYS)[number];

export type ConfigUpdates = Readonly<Partial<Record<UpdatableKey, string>>>;

export function isUpdatableKey(key: string): key is UpdatableKey {
  return UPDATABLE_KEYS.some((candidate) => candidate === key);
}

/**
 * Rewrite KEY=value lines of a .env document, appending keys that are absent.
 */
export function applyEnvUpdates(
  document: string,
  updates: ConfigUpdates,
): string {
  const lines = document === "" ? [] : document.replace(/\n$/, "").split("\n");
  const pending = new Map(Object.entries(updates));

  const rewritten = lines.map((line) => {
    const match = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/.exec(line);
    const key = match?.[1];
    if (key === undefined) return line;
    const value = pending.get(key);
    if (value === undefined) return line;
    pending.delete(key);
    return `${key}=${quoteEnvValue(value)}`;
  });

  for (const [key, value] of pending) {
    if (value !== undefined) {
      rewritten.push(`${key}=${quoteEnvValue(value)}`);
    }
  }

  return `${rewritten.join("\n")}\n`;
}

function quoteEnvValue(value: string): string {
  return /^[A-Za-z0-9_.:/@+-]*$/.test(value) ? value : `'${value}'`;
}

/**
 * Persist updates to the .env file and return the updated config.
 * The single place where configuration changes at runtime.
 */
export function updateConfig(
  cfg: Config,
  updates: ConfigUpdates,
  envPath: string = ENV_FILE,
): Result<Config, ConfigError> {
  const next = parseConfig({ ...configToEnv(cfg), ...updates });
  if (next.isErr()) {
    return next;
  }

  try {
    const current = existsSync(envPath) ? readFileSync(envPath, "utf8") : "";
    writeFileSync(envPath, applyEnvUpdates(current, updates), "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err({
      type: "WRITE_FAILED",
      message: `Could not write ${envPath}: ${reason}`,
      path: envPath,
    });
  }

  return next;
}

function configToEnv(cfg: Config): Record<string, string | undefined> {
  const env: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(cfg)) {
    env[key] = value === undefined ? undefined : String(value);
  }
  return env;
}

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Telegram configuration.
 * Returns null if notifications are disabled or not configured.
 */
export function getTelegramConfig(cfg: Config): Readonly<{
  apiUrl: string;
  botToken: string;
  chatId: string;
  timeoutMs: number;
}> | null {
  if (
    !cfg.ENABLE_NOTIFICATIONS ||
    !cfg.TELEGRAM_BOT_TOKEN ||
    !cfg.TELEGRAM_CHAT_ID
  ) {
    return null;
  }

  return {
    apiUrl: cfg.TELEGRAM_API_URL,
    botToken: cfg.TELEGRAM_BOT_TOKEN,
    chatId: cfg.TELEGRAM_CHAT_ID,
    timeoutMs: cfg.HTTP_TIMEOUT_MS,
  };
}

/**
 * Supplier API connection settings.
 * Returns null when no API key is configured.
 */
export function getEnergyApiConfig(cfg: Config): Readonly<{
  apiKey: string;
  baseUrl: string;
  graphqlUrl: string;
  timeoutMs: number;
  paymentMethod: "DIRECT_DEBIT" | "NON_DIRECT_DEBIT";
}> | null {
  if (!cfg.ENERGY_API_KEY) {
    return null;
  }

  return {
    apiKey: cfg.ENERGY_API_KEY,
    baseUrl: cfg.ENERGY_API_BASE_URL,
    graphqlUrl: cfg.ENERGY_GRAPHQL_URL,
    timeoutMs: cfg.HTTP_TIMEOUT_MS,
    paymentMethod: cfg.ENERGY_PAYMENT_METHOD,
  };
}

/**
 * Alert thresholds as the evaluator consumes them.
 */
export function getAlertSettings(cfg: Config): Readonly<{
  demandThresholdWatts: number;
  dailyThresholdKwh: number;
  reportDemand: boolean;
  reportThresholdWatts: number;
  timezone: string;
}> {
  return {
    demandThresholdWatts: cfg.ALERT_THRESHOLD_WATTS,
    dailyThresholdKwh: cfg.DAILY_ALERT_THRESHOLD_KWH,
    reportDemand: cfg.REPORT_DEMAND,
    reportThresholdWatts: cfg.REPORT_DEMAND_THRESHOLD_WATTS,
    timezone: cfg.TIMEZONE,
  };
}

/**
 * Meter identifiers written by `init`.
 * Returns null until all three are known.
 */
export function getMeterConfig(cfg: Config): Readonly<{
  mpan: string;
  serial: string;
  tariffCode: string;
}> | null {
  if (!cfg.ENERGY_MPAN || !cfg.ENERGY_SERIAL || !cfg.ENERGY_TARIFF_CODE) {
    return null;
  }

  return {
    mpan: cfg.ENERGY_MPAN,
    serial: cfg.ENERGY_SERIAL,
    tariffCode: cfg.ENERGY_TARIFF_CODE,
  };
}
