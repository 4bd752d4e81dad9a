/**
 * Status Module - Service Layer
 *
 * Gathers the summary from the store and caches the rendered text.
 */
import { writeFileSync } from "node:fs";
import { type Result, err, ok } from "neverthrow";

import { computeCost, formatCostError } from "../cost/index.js";
import { createLogger } from "../logger.js";
import type { TimeSeriesStore } from "../store/index.js";
import { addDays, localDate, localDayBounds, localMinute } from "../time.js";
import { type StatusError, statusStoreError, writeFailed } from "./errors.js";
import type { DayUsage, StatusSummary } from "./schema.js";
import { ledgerLines } from "./transform.js";

const log = createLogger("status");

function yesterdayUsage(
  store: TimeSeriesStore,
  now: Date,
  zone: string,
): Result<DayUsage, StatusError> {
  const date = addDays(localDate(now.toISOString(), zone), -1);
  const bounds = localDayBounds(date, zone);

  return store
    .getDailyTotals(bounds, zone, now)
    .mapErr(statusStoreError)
    .map((totals) => {
      const day = totals.find((total) => total.date === date);
      const cost = computeCost(store, bounds, "none", zone);
      if (cost.isErr()) {
        log.debug({ date, error: formatCostError(cost.error) }, "Yesterday not priced");
      }

      return {
        date,
        kwh: day?.kwh ?? 0,
        readings: day?.readings ?? 0,
        expectedReadings: day?.expectedReadings ?? 48,
        costPence: cost.isOk() ? cost.value.total.totalPence : null,
        costError: cost.isErr() ? formatCostError(cost.error) : null,
      };
    });
}

/**
 * Snapshot of sync progress, yesterday's usage, current prices and alert state.
 */
export function buildStatusSummary(
  store: TimeSeriesStore,
  now: Date,
  zone: string,
): Result<StatusSummary, StatusError> {
  const snapshot = store
    .listLedger()
    .andThen((ledger) =>
      store.getCurrentOpenRate("unit").andThen((unitRate) =>
        store.getCurrentOpenRate("standing").andThen((standing) =>
          store.getAlertState("daily_usage").andThen((daily) =>
            store.getAlertState("live_demand").andThen((demand) =>
              store.loadBotState().map((bot) => ({
                ledger,
                unitRate,
                standing,
                daily,
                demand,
                muted: bot.muted,
              })),
            ),
          ),
        ),
      ),
    )
    .mapErr(statusStoreError);

  return snapshot.andThen((parts) =>
    yesterdayUsage(store, now, zone).map(
      (yesterday): StatusSummary => ({
        generatedAt: now.toISOString(),
        localTime: localMinute(now, zone),
        yesterday,
        unitRatePence: parts.unitRate?.valueIncVat ?? null,
        standingChargePence: parts.standing?.valueIncVat ?? null,
        alerts: {
          daily_usage: parts.daily.direction,
          live_demand: parts.demand.direction,
        },
        muted: parts.muted,
        ledger: ledgerLines(parts.ledger),
      }),
    ),
  );
}

/**
 * Replace the cache file with the rendered summary.
 */
export function writeStatusFile(path: string, text: string): Result<void, StatusError> {
  try {
    writeFileSync(path, `${text}\n`, "utf8");
  } catch (error) {
    return err(writeFailed(path, error instanceof Error ? error.message : String(error)));
  }
  log.debug({ path }, "Status cache written");
  return ok(undefined);
}
