/**
 * Alerts Module - Pure Transformations
 *
 * The high/low/none state machine and alert message formatting.
 * No side effects, no I/O - just data in, data out.
 */
import type { LiveDemand } from "../energy-api/index.js";
import type { AlertDirection, AlertState, DailyTotal } from "../store/index.js";
import { type AlertSettings, DEMAND_WARNING_WATTS, type Transition } from "./schema.js";

// =============================================================================
// Implied Direction
// =============================================================================

/**
 * Direction implied by the two most recent complete days.
 * Null when fewer than two days are known or the days disagree.
 */
export function impliedDailyDirection(
  days: ReadonlyArray<DailyTotal>,
  thresholdKwh: number,
): AlertDirection | null {
  const [previous, latest] = days.slice(-2);
  if (previous === undefined || latest === undefined) {
    return null;
  }

  const previousHigh = previous.kwh >= thresholdKwh;
  const latestHigh = latest.kwh >= thresholdKwh;
  if (previousHigh !== latestHigh) {
    return null;
  }
  return latestHigh ? "high" : "low";
}

export function impliedDemandDirection(
  demandWatts: number,
  thresholdWatts: number,
): AlertDirection {
  return demandWatts >= thresholdWatts ? "high" : "low";
}

// =============================================================================
// State Machine
// =============================================================================

/**
 * Emit only when the implied direction differs from the last one announced.
 */
export function transition(
  state: AlertState,
  implied: AlertDirection | null,
  now: Date,
  value: number,
): Transition {
  if (implied === null || implied === "none" || implied === state.direction) {
    return { emit: false, next: state };
  }

  return {
    emit: true,
    next: {
      channel: state.channel,
      direction: implied,
      lastAlertAt: now.toISOString(),
      lastValue: value,
    },
  };
}

// =============================================================================
// Messages
// =============================================================================

function arrow(direction: AlertDirection): string {
  return direction === "high" ? "⬆️" : "⬇️";
}

function label(direction: AlertDirection): string {
  return direction === "high" ? "High" : "Low";
}

/**
 * Minute precision of an ISO timestamp, e.g. 2024-01-01T12:04
 */
function toMinute(iso: string): string {
  return iso.slice(0, 16);
}

export function formatDailyAlert(
  direction: AlertDirection,
  days: ReadonlyArray<DailyTotal>,
  thresholdKwh: number,
): string {
  const usage = days
    .slice(-2)
    .map((day) => `${day.date}: ${day.kwh.toFixed(2)} kWh`)
    .join("\n");
  return `${arrow(direction)} ${label(direction)} daily usage alert\n${usage}\nThreshold: ${thresholdKwh} kWh/day`;
}

export function formatDemandAlert(
  direction: AlertDirection,
  demand: LiveDemand,
  thresholdWatts: number,
): string {
  return [
    `${arrow(direction)} ${label(direction)} usage alert`,
    `Demand: ${demand.demandWatts.toFixed(0)}W at ${toMinute(demand.readAt)}`,
    `Threshold: ${thresholdWatts.toFixed(0)}W`,
  ].join("\n");
}

/**
 * @example
 * formatDemandReport({ demandWatts: 3200, readAt: "2024-01-01T18:00:10.000Z" })
 * // "⚠️ Demand: 3200W at 2024-01-01T18:00"
 */
export function formatDemandReport(demand: LiveDemand): string {
  const warning = demand.demandWatts >= DEMAND_WARNING_WATTS ? "⚠️ " : "";
  return `${warning}Demand: ${demand.demandWatts.toFixed(0)}W at ${toMinute(demand.readAt)}`;
}

export function shouldReportDemand(
  demand: LiveDemand,
  settings: Pick<AlertSettings, "reportDemand" | "reportThresholdWatts">,
): boolean {
  return settings.reportDemand && demand.demandWatts >= settings.reportThresholdWatts;
}
