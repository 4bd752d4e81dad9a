/**
 * Status Module - Pure Transformations
 *
 * Renders the cached status text.
 */
import { formatPounds } from "../cost/transform.js";
import { RESOURCE_TYPES, type SyncLedgerEntry } from "../store/schema.js";
import type { LedgerLine, StatusSummary } from "./schema.js";

/**
 * One line per resource, in sync order, including never-synced ones.
 */
export function ledgerLines(entries: ReadonlyArray<SyncLedgerEntry>): LedgerLine[] {
  return RESOURCE_TYPES.map((resource) => ({
    resource,
    syncedThrough: entries.find((entry) => entry.resource === resource)?.syncedThrough ?? null,
  }));
}

function pence(value: number | null, unit: string): string {
  return value === null ? "unknown" : `${value.toFixed(2)}p/${unit}`;
}

/**
 * @example
 * 🐙 Energy status 2024-01-03 12:00
 * Yesterday 2024-01-02: 12.40 kWh (48/48), £3.21
 * Rates: 24.50p/kWh, 45.00p/day standing
 * Alerts: daily high, demand none
 * Last sync: consumption 2024-01-02T23:30, unit_rates never, ...
 */
export function formatStatusSummary(summary: StatusSummary): string {
  const { yesterday } = summary;
  const cost =
    yesterday.costPence === null ? "cost unknown" : formatPounds(yesterday.costPence);

  const lines = [
    `🐙 Energy status ${summary.localTime}`,
    `Yesterday ${yesterday.date}: ${yesterday.kwh.toFixed(2)} kWh (${yesterday.readings}/${yesterday.expectedReadings}), ${cost}`,
    `Rates: ${pence(summary.unitRatePence, "kWh")}, ${pence(summary.standingChargePence, "day")} standing`,
    `Alerts: daily ${summary.alerts.daily_usage}, demand ${summary.alerts.live_demand}${summary.muted ? " (muted)" : ""}`,
    `Last sync: ${summary.ledger
      .map((line) => `${line.resource} ${line.syncedThrough?.slice(0, 16) ?? "never"}`)
      .join(", ")}`,
  ];

  return lines.join("\n");
}
