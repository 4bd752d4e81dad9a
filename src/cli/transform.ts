/**
 * CLI Module - Pure Transformations
 *
 * Tables, report lines and exit codes.
 * No side effects, no I/O - just data in, data out.
 */
import type { AlertOutcome } from "../alerts/index.js";
import type { CostReport } from "../cost/index.js";
import type {
  ConsumptionReading,
  ConsumptionSummary,
  RatePeriod,
  StoreExport,
} from "../store/index.js";
import { formatSyncError } from "../sync/errors.js";
import type { ResourceOutcome, SyncReport, SyncStatus } from "../sync/index.js";
import { EXIT_ERROR, EXIT_OK, EXIT_PARTIAL } from "./schema.js";

// =============================================================================
// Tables
// =============================================================================

/**
 * Plain aligned table: header, dashed rule, rows.
 *
 * @example
 * formatTable(["period", "kwh"], [["2024-01", "310.50"]])
 * // "period   kwh\n-------  ------\n2024-01  310.50"
 */
export function formatTable(
  headers: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string>>,
): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );

  const line = (cells: ReadonlyArray<string>) =>
    widths
      .map((width, column) => (cells[column] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  return [
    line(headers),
    line(widths.map((width) => "-".repeat(width))),
    ...rows.map(line),
  ].join("\n");
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatReadings(readings: ReadonlyArray<ConsumptionReading>): string {
  return formatTable(
    ["interval_start", "interval_end", "kwh"],
    readings.map((reading) => [
      reading.intervalStart,
      reading.intervalEnd,
      reading.kwh.toFixed(4),
    ]),
  );
}

export function formatUsageSummary(summaries: ReadonlyArray<ConsumptionSummary>): string {
  return formatTable(
    ["period", "total_kwh", "readings"],
    summaries.map((summary) => [
      summary.period,
      summary.kwh.toFixed(4),
      String(summary.readings),
    ]),
  );
}

export function formatRates(periods: ReadonlyArray<RatePeriod>): string {
  return formatTable(
    ["valid_from", "valid_to", "value_exc_vat", "value_inc_vat"],
    periods.map((period) => [
      period.validFrom,
      period.validTo ?? "open",
      period.valueExcVat.toFixed(4),
      period.valueIncVat.toFixed(4),
    ]),
  );
}

/**
 * One row per group and a closing total row.
 */
export function formatCostReport(report: CostReport): string {
  const rows = [...report.groups, report.total].map((group) => [
    group.period,
    group.kwh.toFixed(2),
    group.energyPence.toFixed(2),
    group.standingPence.toFixed(2),
    group.totalPence.toFixed(2),
    (group.totalPence / 100).toFixed(2),
  ]);

  return formatTable(
    ["period", "kWh", "usage (p)", "standing (p)", "total (p)", "total (£)"],
    rows,
  );
}

// =============================================================================
// Sync Report
// =============================================================================

function resourceLine(outcome: ResourceOutcome): string {
  switch (outcome.status) {
    case "synced":
      return `  ${outcome.resource}: ${outcome.recordCount} records, synced through ${outcome.syncedThrough}`;
    case "up_to_date":
      return `  ${outcome.resource}: up to date`;
    case "failed":
      return `  ${outcome.resource}: FAILED ${formatSyncError(outcome.error)}`;
  }
}

function alertLine(outcome: AlertOutcome): string {
  if (outcome.emitted !== null) {
    const delivery = outcome.delivered ? "sent" : "not sent";
    return `  ${outcome.channel}: ${outcome.emitted} alert (${delivery})`;
  }
  return `  ${outcome.channel}: no alert (${outcome.skipped ?? "unchanged"})`;
}

export function formatSyncReport(report: SyncReport): string {
  const lines = [
    "Resources:",
    ...report.resources.map(resourceLine),
    ...(report.alerts.length > 0 ? ["Alerts:", ...report.alerts.map(alertLine)] : []),
    ...report.alertErrors.map((error) => `  ${error}`),
    report.status === "ok" ? "Sync complete." : `Sync ${report.status}.`,
  ];
  return lines.join("\n");
}

export function formatAlertRun(alerts: ReadonlyArray<AlertOutcome>): string {
  return alerts.map(alertLine).join("\n");
}

/**
 * Partial failures only change the exit code in quiet (scheduled) runs.
 */
export function exitCodeForSync(status: SyncStatus, quiet: boolean): number {
  switch (status) {
    case "ok":
      return EXIT_OK;
    case "partial":
      return quiet ? EXIT_PARTIAL : EXIT_OK;
    case "failed":
      return EXIT_ERROR;
  }
}

// =============================================================================
// Export
// =============================================================================

export function formatExportSummary(path: string, data: StoreExport): string {
  return [
    `Exported to ${path}`,
    `  consumption:      ${data.consumption.length} records`,
    `  unit_rates:       ${data.unitRates.length} records`,
    `  standing_charges: ${data.standingCharges.length} records`,
    `  sync_log:         ${data.syncLog.length} entries`,
  ].join("\n");
}
