/**
 * CLI Module - Command Handlers
 *
 * Each handler wires config, store and clients together for one command
 * and turns the outcome into an exit code. Errors stay values until here.
 */
import { writeFileSync } from "node:fs";
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import { readLiveDemand } from "../alerts/index.js";
import { type LiveDemandReader, createCommandBot, formatBotError } from "../bot/index.js";
import {
  type Config,
  type ConfigKey,
  UPDATABLE_KEYS,
  formatConfigError,
  getAlertSettings,
  getEnergyApiConfig,
  getMeterConfig,
  getTelegramConfig,
  isUpdatableKey,
  requireConfig,
  updateConfig,
} from "../config.js";
import { computeCost, formatCostError } from "../cost/index.js";
import { formatEnergyApiError } from "../energy-api/index.js";
import { createLogger } from "../logger.js";
import { type Notifier, createDisabledNotifier } from "../notifications/index.js";
import {
  type TimeSeriesStore,
  formatStoreError,
  summariseConsumption,
} from "../store/index.js";
import {
  buildStatusSummary,
  formatStatusError,
  formatStatusSummary,
  writeStatusFile,
} from "../status/index.js";
import { formatSyncError, runAlertChecks, runSyncCycle } from "../sync/index.js";
import { type TimeWindow, daysAgo } from "../time.js";
import {
  type CliContext,
  type CostOptionsSchema,
  EXIT_ERROR,
  EXIT_OK,
  type ExportOptionsSchema,
  type RatesOptionsSchema,
  type StatusOptionsSchema,
  type SyncOptionsSchema,
  type UsageOptionsSchema,
} from "./schema.js";
import {
  exitCodeForSync,
  formatAlertRun,
  formatCostReport,
  formatExportSummary,
  formatRates,
  formatReadings,
  formatSyncReport,
  formatUsageSummary,
  toJson,
} from "./transform.js";

const log = createLogger("cli");

// =============================================================================
// Helpers
// =============================================================================

function fail(ctx: CliContext, message: string): number {
  ctx.output.error(`Error: ${message}`);
  return EXIT_ERROR;
}

/**
 * Check the keys a command needs, then derive its settings from them.
 */
function configured<T>(
  ctx: CliContext,
  keys: ReadonlyArray<ConfigKey>,
  pick: (cfg: Config) => T | null,
): Result<T, string> {
  const checked = requireConfig(ctx.config, keys);
  if (checked.isErr()) {
    return err(formatConfigError(checked.error));
  }
  const value = pick(checked.value);
  return value === null
    ? err(`${keys.join(", ")} set, but unusable with the current config`)
    : ok(value);
}

/**
 * Open the store for the length of one command.
 */
async function withStore(
  ctx: CliContext,
  use: (store: TimeSeriesStore) => Promise<number> | number,
): Promise<number> {
  const path = ctx.options.db ?? ctx.config.DB_PATH;
  log.debug({ path }, "Opening store");
  const store = ctx.services.openStore(path);
  try {
    return await use(store);
  } finally {
    store.close();
  }
}

function notifierFor(ctx: CliContext): Notifier {
  const telegram = getTelegramConfig(ctx.config);
  return telegram === null
    ? createDisabledNotifier("Telegram not configured or notifications disabled")
    : ctx.services.createTelegramClient(telegram);
}

function recentWindow(days: number, now: Date): TimeWindow {
  return { from: daysAgo(days, now), to: now.toISOString() };
}

function print(ctx: CliContext, value: unknown, text: () => string): void {
  ctx.output.data(ctx.options.json ? toJson(value) : text());
}

// =============================================================================
// init
// =============================================================================

/**
 * Look up the account's electricity meter and save its identifiers.
 */
export async function initCommand(ctx: CliContext): Promise<number> {
  const prepared = configured(ctx, ["ENERGY_API_KEY", "ENERGY_ACCOUNT"], (cfg) => {
    const api = getEnergyApiConfig(cfg);
    return api !== null && cfg.ENERGY_ACCOUNT !== undefined
      ? { api, account: cfg.ENERGY_ACCOUNT }
      : null;
  });
  if (prepared.isErr()) {
    return fail(ctx, prepared.error);
  }

  ctx.output.info(`Looking up account ${prepared.value.account}...`);
  const client = ctx.services.createEnergyApiClient(prepared.value.api);
  const details = await client.getElectricityDetails(prepared.value.account, ctx.now());
  if (details.isErr()) {
    return fail(ctx, formatEnergyApiError(details.error));
  }

  const { mpan, serial, tariffCode } = details.value;
  const saved = updateConfig(
    ctx.config,
    { ENERGY_MPAN: mpan, ENERGY_SERIAL: serial, ENERGY_TARIFF_CODE: tariffCode },
    ctx.envPath,
  );
  if (saved.isErr()) {
    return fail(ctx, formatConfigError(saved.error));
  }

  print(ctx, details.value, () =>
    [
      "Electricity meter found:",
      `  MPAN:   ${mpan}`,
      `  Serial: ${serial}`,
      `  Tariff: ${tariffCode}`,
      `Saved to ${ctx.envPath}`,
    ].join("\n"),
  );
  return EXIT_OK;
}

// =============================================================================
// sync / demand
// =============================================================================

export async function syncCommand(
  ctx: CliContext,
  options: z.output<typeof SyncOptionsSchema>,
): Promise<number> {
  const prepared = configured(ctx, ["ENERGY_API_KEY"], getEnergyApiConfig).andThen((api) =>
    configured(
      ctx,
      ["ENERGY_MPAN", "ENERGY_SERIAL", "ENERGY_TARIFF_CODE"],
      getMeterConfig,
    ).map((meter) => ({ api, meter })),
  );
  if (prepared.isErr()) {
    return fail(ctx, prepared.error);
  }
  const { api, meter } = prepared.value;

  return withStore(ctx, async (store) => {
    const report = await runSyncCycle(
      {
        store,
        client: ctx.services.createEnergyApiClient(api),
        notifier: notifierFor(ctx),
        meter,
        deviceId: ctx.config.ENERGY_DEVICE_ID ?? null,
        alertSettings: getAlertSettings(ctx.config),
        defaultLookbackDays: ctx.config.SYNC_DEFAULT_LOOKBACK_DAYS,
        now: ctx.now,
      },
      { days: options.days, from: options.from, to: options.to },
    );
    if (report.isErr()) {
      return fail(ctx, formatSyncError(report.error));
    }

    if (ctx.options.json) {
      ctx.output.data(toJson(report.value));
    } else {
      ctx.output.info(formatSyncReport(report.value));
    }
    return exitCodeForSync(report.value.status, ctx.options.quiet);
  });
}

/**
 * Run the alert checks on their own, without fetching anything.
 */
export async function demandCommand(ctx: CliContext): Promise<number> {
  const prepared = configured(ctx, ["ENERGY_API_KEY", "ENERGY_DEVICE_ID"], (cfg) => {
    const api = getEnergyApiConfig(cfg);
    return api !== null && cfg.ENERGY_DEVICE_ID !== undefined
      ? { api, deviceId: cfg.ENERGY_DEVICE_ID }
      : null;
  });
  if (prepared.isErr()) {
    return fail(ctx, prepared.error);
  }
  const { api, deviceId } = prepared.value;

  return withStore(ctx, async (store) => {
    const run = await runAlertChecks({
      store,
      client: ctx.services.createEnergyApiClient(api),
      notifier: notifierFor(ctx),
      deviceId,
      alertSettings: getAlertSettings(ctx.config),
      now: ctx.now,
    });

    print(ctx, run, () => formatAlertRun(run.alerts));
    for (const error of run.alertErrors) {
      ctx.output.error(`Error: ${error}`);
    }
    return run.alertErrors.length > 0 ? EXIT_ERROR : EXIT_OK;
  });
}

// =============================================================================
// usage / rates / cost
// =============================================================================

export function usageCommand(
  ctx: CliContext,
  options: z.output<typeof UsageOptionsSchema>,
): Promise<number> {
  return withStore(ctx, (store) => {
    const readings = store.getConsumption(recentWindow(options.days, ctx.now()));
    if (readings.isErr()) {
      return fail(ctx, formatStoreError(readings.error));
    }
    if (readings.value.length === 0 && !ctx.options.json) {
      ctx.output.info("No consumption data. Run 'sync' first.");
      return EXIT_OK;
    }

    if (options.group === undefined) {
      print(ctx, readings.value, () => formatReadings(readings.value));
      return EXIT_OK;
    }

    const summaries = summariseConsumption(
      readings.value,
      options.group,
      ctx.config.TIMEZONE,
    );
    print(ctx, summaries, () => formatUsageSummary(summaries));
    return EXIT_OK;
  });
}

export function ratesCommand(
  ctx: CliContext,
  options: z.output<typeof RatesOptionsSchema>,
): Promise<number> {
  return withStore(ctx, (store) => {
    const rates = store.getRates("unit", recentWindow(options.days, ctx.now()));
    if (rates.isErr()) {
      return fail(ctx, formatStoreError(rates.error));
    }
    if (rates.value.length === 0 && !ctx.options.json) {
      ctx.output.info("No rate data. Run 'sync' first.");
      return EXIT_OK;
    }

    print(ctx, rates.value, () => formatRates(rates.value));
    return EXIT_OK;
  });
}

export function costCommand(
  ctx: CliContext,
  options: z.output<typeof CostOptionsSchema>,
): Promise<number> {
  return withStore(ctx, (store) => {
    const report = computeCost(
      store,
      recentWindow(options.days, ctx.now()),
      options.group,
      ctx.config.TIMEZONE,
    );
    if (report.isErr()) {
      return fail(ctx, formatCostError(report.error));
    }

    print(ctx, report.value, () => formatCostReport(report.value));
    return EXIT_OK;
  });
}

// =============================================================================
// export / status
// =============================================================================

export function exportCommand(
  ctx: CliContext,
  options: z.output<typeof ExportOptionsSchema>,
): Promise<number> {
  return withStore(ctx, (store) => {
    const data = store.exportAll();
    if (data.isErr()) {
      return fail(ctx, formatStoreError(data.error));
    }

    const document = { exportedAt: ctx.now().toISOString(), ...data.value };
    try {
      writeFileSync(options.output, `${toJson(document)}\n`, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return fail(ctx, `Could not write ${options.output}: ${reason}`);
    }

    ctx.output.data(formatExportSummary(options.output, data.value));
    return EXIT_OK;
  });
}

export function statusCommand(
  ctx: CliContext,
  options: z.output<typeof StatusOptionsSchema>,
): Promise<number> {
  return withStore(ctx, (store) => {
    const summary = buildStatusSummary(store, ctx.now(), ctx.config.TIMEZONE);
    if (summary.isErr()) {
      return fail(ctx, formatStatusError(summary.error));
    }

    const text = formatStatusSummary(summary.value);
    if (options.write) {
      const written = writeStatusFile(ctx.config.STATUS_CACHE_PATH, text);
      if (written.isErr()) {
        return fail(ctx, formatStatusError(written.error));
      }
    }

    print(ctx, summary.value, () => text);
    return EXIT_OK;
  });
}

// =============================================================================
// bot
// =============================================================================

function liveDemandReader(ctx: CliContext): LiveDemandReader | null {
  const api = getEnergyApiConfig(ctx.config);
  const deviceId = ctx.config.ENERGY_DEVICE_ID;
  if (api === null || deviceId === undefined) {
    return null;
  }

  const client = ctx.services.createEnergyApiClient(api);
  return () => readLiveDemand(client, client.createTokenSession(), deviceId, ctx.now());
}

/**
 * Run the command bot until SIGINT or SIGTERM.
 */
export async function botCommand(ctx: CliContext): Promise<number> {
  const telegram = configured(
    ctx,
    ["TELEGRAM_BOT_TOKEN", "TELEGRAM_CHAT_ID"],
    getTelegramConfig,
  );
  if (telegram.isErr()) {
    return fail(ctx, telegram.error);
  }
  const settings = telegram.value;

  return withStore(ctx, async (store) => {
    const bot = createCommandBot({
      telegram: ctx.services.createTelegramClient(settings),
      store,
      config: ctx.config,
      envPath: ctx.envPath,
      liveDemand: liveDemandReader(ctx),
    });

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
      log.info({ signal }, "Stopping bot");
      controller.abort();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    try {
      const result = await bot.run(controller.signal);
      return result.isErr() ? fail(ctx, formatBotError(result.error)) : EXIT_OK;
    } finally {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
  });
}

// =============================================================================
// config set
// =============================================================================

export function configSetCommand(ctx: CliContext, key: string, value: string): number {
  if (!isUpdatableKey(key)) {
    return fail(ctx, `${key} cannot be set here. Settable keys: ${UPDATABLE_KEYS.join(", ")}`);
  }

  const updated = updateConfig(ctx.config, { [key]: value }, ctx.envPath);
  if (updated.isErr()) {
    return fail(ctx, formatConfigError(updated.error));
  }

  ctx.output.info(`${key}=${value} saved to ${ctx.envPath}`);
  return EXIT_OK;
}
