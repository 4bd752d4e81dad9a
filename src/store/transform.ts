/**
 * Store Module - Pure Transformations
 *
 * Row mapping, rate-series validation and daily aggregation.
 * No side effects, no I/O - just data in, data out.
 */
import {
  type GroupBy,
  type TimeWindow,
  expectedIntervalsForDay,
  localDate,
  localDayBounds,
  periodKeyForDate,
} from "../time.js";
import type {
  ConsumptionReading,
  ConsumptionSummary,
  DailyTotal,
  RatePeriod,
} from "./schema.js";

// =============================================================================
// Rate Series Validation
// =============================================================================

export type RateOverlap = Readonly<{
  first: RatePeriod;
  second: RatePeriod;
}>;

/**
 * Apply incoming periods over stored ones. Same validFrom replaces.
 * Result is sorted by validFrom.
 */
export function mergeRatePeriods(
  existing: ReadonlyArray<RatePeriod>,
  incoming: ReadonlyArray<RatePeriod>,
): RatePeriod[] {
  const byStart = new Map<string, RatePeriod>();
  for (const period of existing) byStart.set(period.validFrom, period);
  for (const period of incoming) byStart.set(period.validFrom, period);
  return sortRatePeriods([...byStart.values()]);
}

export function sortRatePeriods(
  periods: ReadonlyArray<RatePeriod>,
): RatePeriod[] {
  return [...periods].sort((a, b) =>
    a.validFrom < b.validFrom ? -1 : a.validFrom > b.validFrom ? 1 : 0,
  );
}

/**
 * Find overlapping neighbours in a series of one kind.
 *
 * With periods sorted by start, any overlap shows up between neighbours,
 * and two open-ended periods always overlap.
 *
 * @example
 * findRateOverlaps([
 *   { validFrom: "…T00:00", validTo: null, … },
 *   { validFrom: "…T13:00", validTo: null, … },
 * ]) // one overlap
 */
export function findRateOverlaps(
  periods: ReadonlyArray<RatePeriod>,
): RateOverlap[] {
  const sorted = sortRatePeriods(periods);
  const overlaps: RateOverlap[] = [];

  for (let i = 1; i < sorted.length; i += 1) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous === undefined || current === undefined) continue;

    if (previous.validTo === null || previous.validTo > current.validFrom) {
      overlaps.push({ first: previous, second: current });
    }
  }

  return overlaps;
}

/**
 * Keep one record per interval start; later entries win.
 */
export function dedupeReadings(
  readings: ReadonlyArray<ConsumptionReading>,
): ConsumptionReading[] {
  const byStart = new Map<string, ConsumptionReading>();
  for (const reading of readings) byStart.set(reading.intervalStart, reading);
  return [...byStart.values()].sort((a, b) =>
    a.intervalStart < b.intervalStart ? -1 : 1,
  );
}

// =============================================================================
// Ledger
// =============================================================================

/**
 * Resume point after committing consumption.
 *
 * Consumption is published with a lag, so the ledger only moves up to the
 * last interval actually received (never past the window end, never back).
 */
export function consumptionSyncedThrough(
  readings: ReadonlyArray<ConsumptionReading>,
  window: TimeWindow,
  previous: string | null,
): string {
  let fromBatch = window.from;

  for (const reading of readings) {
    if (reading.intervalEnd > fromBatch) {
      fromBatch = reading.intervalEnd;
    }
  }
  if (fromBatch > window.to) {
    fromBatch = window.to;
  }

  return previous !== null && previous > fromBatch ? previous : fromBatch;
}

/**
 * Resume point after committing a rate series: the window end, unless the
 * ledger is already further ahead.
 */
export function ratesSyncedThrough(
  window: TimeWindow,
  previous: string | null,
): string {
  return previous !== null && previous > window.to ? previous : window.to;
}

// =============================================================================
// Daily Aggregation
// =============================================================================

/**
 * Sum readings per local calendar day.
 *
 * A day is complete when it has ended at `now` and every half-hour of it is
 * present (46/48/50 depending on clock changes).
 */
export function summariseDays(
  readings: ReadonlyArray<ConsumptionReading>,
  zone: string,
  now: Date,
): DailyTotal[] {
  const totals = new Map<string, { kwh: number; readings: number }>();

  for (const reading of readings) {
    const date = localDate(reading.intervalStart, zone);
    const entry = totals.get(date) ?? { kwh: 0, readings: 0 };
    totals.set(date, {
      kwh: entry.kwh + reading.kwh,
      readings: entry.readings + 1,
    });
  }

  const nowIso = now.toISOString();

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : 1))
    .map(([date, entry]) => {
      const expectedReadings = expectedIntervalsForDay(date, zone);
      const ended = localDayBounds(date, zone).to <= nowIso;
      return {
        date,
        kwh: entry.kwh,
        readings: entry.readings,
        expectedReadings,
        complete: ended && entry.readings >= expectedReadings,
      };
    });
}

/**
 * The `count` latest complete days, oldest first.
 */
export function latestCompleteDays(
  days: ReadonlyArray<DailyTotal>,
  count: number,
): DailyTotal[] {
  return days.filter((day) => day.complete).slice(-count);
}

/**
 * Sum readings per period (day / ISO week / month / total).
 */
export function summariseConsumption(
  readings: ReadonlyArray<ConsumptionReading>,
  groupBy: GroupBy,
  zone: string,
): ConsumptionSummary[] {
  const totals = new Map<string, { kwh: number; readings: number }>();

  for (const reading of readings) {
    const period = periodKeyForDate(localDate(reading.intervalStart, zone), groupBy);
    const entry = totals.get(period) ?? { kwh: 0, readings: 0 };
    totals.set(period, {
      kwh: entry.kwh + reading.kwh,
      readings: entry.readings + 1,
    });
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : 1))
    .map(([period, entry]) => ({ period, ...entry }));
}
