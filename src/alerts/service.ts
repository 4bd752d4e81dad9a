/**
 * Alerts Module - Service Layer
 *
 * Reads observations and alert state from the store, runs the state
 * machine, persists the next state and only then notifies.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  EnergyApiClient,
  LiveDemand,
  TokenSession,
} from "../energy-api/index.js";
import { createLogger } from "../logger.js";
import type { Notifier } from "../notifications/index.js";
import { formatNotificationError } from "../notifications/errors.js";
import type {
  AlertChannel,
  AlertDirection,
  AlertState,
  TimeSeriesStore,
} from "../store/index.js";
import { type AlertError, alertStoreError, telemetryFailed } from "./errors.js";
import type { AlertOutcome, AlertSettings, SkipReason } from "./schema.js";
import {
  formatDailyAlert,
  formatDemandAlert,
  formatDemandReport,
  impliedDailyDirection,
  impliedDemandDirection,
  shouldReportDemand,
  transition,
} from "./transform.js";

const log = createLogger("alerts");

export type AlertContext = Readonly<{
  store: TimeSeriesStore;
  notifier: Notifier;
  settings: AlertSettings;
  now: Date;
}>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Send a message unless muted. Failures are logged, never raised.
 */
async function deliver(
  notifier: Notifier,
  text: string,
  muted: boolean,
): Promise<boolean> {
  if (muted) {
    log.info("Notifications muted, message not sent");
    return false;
  }

  const sent = await notifier.send(text);
  if (sent.isErr()) {
    log.warn(
      { error: formatNotificationError(sent.error) },
      "Notification delivery failed",
    );
    return false;
  }
  return true;
}

function loadChannel(
  store: TimeSeriesStore,
  channel: AlertChannel,
): Result<{ state: AlertState; muted: boolean }, AlertError> {
  return store
    .getAlertState(channel)
    .andThen((state) =>
      store.loadBotState().map((bot) => ({ state, muted: bot.muted })),
    )
    .mapErr(alertStoreError);
}

function skipped(
  channel: AlertChannel,
  reason: SkipReason,
  implied: AlertDirection | null,
  value: number | null,
  reported = false,
): AlertOutcome {
  return {
    channel,
    implied,
    value,
    emitted: null,
    skipped: reason,
    delivered: false,
    reported,
  };
}

/**
 * Persist the transition, then announce it.
 */
async function announce(
  ctx: AlertContext,
  loaded: { state: AlertState; muted: boolean },
  implied: AlertDirection,
  value: number,
  message: string,
  reported: boolean,
): Promise<Result<AlertOutcome, AlertError>> {
  const { emit, next } = transition(loaded.state, implied, ctx.now, value);
  const channel = loaded.state.channel;

  if (!emit) {
    return ok(skipped(channel, "unchanged", implied, value, reported));
  }

  const saved = ctx.store.saveAlertState(next);
  if (saved.isErr()) {
    return err(alertStoreError(saved.error));
  }

  log.info(
    { channel, from: loaded.state.direction, to: next.direction, value },
    "Alert direction changed",
  );

  const delivered = await deliver(ctx.notifier, message, loaded.muted);
  return ok({
    channel,
    implied,
    value,
    emitted: next.direction,
    skipped: null,
    delivered,
    reported,
  });
}

// =============================================================================
// Daily Usage
// =============================================================================

/**
 * Compare the two latest complete local days with the daily threshold.
 */
export async function evaluateDailyUsage(
  ctx: AlertContext,
): Promise<Result<AlertOutcome, AlertError>> {
  const days = ctx.store.getRecentCompleteDays(2, ctx.now, ctx.settings.timezone);
  if (days.isErr()) {
    return err(alertStoreError(days.error));
  }

  const loaded = loadChannel(ctx.store, "daily_usage");
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const latest = days.value.at(-1);
  if (days.value.length < 2 || latest === undefined) {
    log.debug({ days: days.value.length }, "Not enough complete days");
    return ok(skipped("daily_usage", "insufficient_data", null, null));
  }

  const threshold = ctx.settings.dailyThresholdKwh;
  const implied = impliedDailyDirection(days.value, threshold);
  if (implied === null) {
    return ok(skipped("daily_usage", "straddling_threshold", null, latest.kwh));
  }

  return announce(
    ctx,
    loaded.value,
    implied,
    latest.kwh,
    formatDailyAlert(implied, days.value, threshold),
    false,
  );
}

// =============================================================================
// Live Demand
// =============================================================================

/**
 * Read the latest demand sample through the cycle's token session.
 */
export async function readLiveDemand(
  client: Pick<EnergyApiClient, "getLiveDemand">,
  session: TokenSession,
  deviceId: string,
  now: Date,
): Promise<Result<LiveDemand | null, AlertError>> {
  const token = await session.getToken();
  if (token.isErr()) {
    return err(telemetryFailed(token.error));
  }

  const demand = await client.getLiveDemand(token.value, deviceId, now);
  return demand.mapErr(telemetryFailed);
}

/**
 * Report the sample when it is above the report threshold, then run the
 * demand channel's state machine.
 */
export async function evaluateLiveDemand(
  ctx: AlertContext,
  demand: LiveDemand | null,
): Promise<Result<AlertOutcome, AlertError>> {
  const loaded = loadChannel(ctx.store, "live_demand");
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  if (demand === null) {
    return ok(skipped("live_demand", "no_telemetry", null, null));
  }

  const reported =
    shouldReportDemand(demand, ctx.settings) &&
    (await deliver(ctx.notifier, formatDemandReport(demand), loaded.value.muted));

  const threshold = ctx.settings.demandThresholdWatts;
  const implied = impliedDemandDirection(demand.demandWatts, threshold);

  return announce(
    ctx,
    loaded.value,
    implied,
    demand.demandWatts,
    formatDemandAlert(implied, demand, threshold),
    reported,
  );
}
