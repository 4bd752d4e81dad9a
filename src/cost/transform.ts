/**
 * Cost Module - Pure Transformations
 *
 * Joins half-hourly consumption with the rate series in force at each
 * interval, then adds one standing charge per local calendar day.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { ConsumptionReading, RatePeriod } from "../store/index.js";
import { findRateOverlaps, sortRatePeriods } from "../store/transform.js";
import {
  type GroupBy,
  localDate,
  localDayBounds,
  periodKeyForDate,
} from "../time.js";
import {
  type CostError,
  ambiguousRate,
  noRateCoverage,
  noStandingCharge,
} from "./errors.js";
import type {
  CostGroup,
  DailyStandingCharge,
  IntervalCost,
  RateIndex,
} from "./schema.js";

// =============================================================================
// Rate Index
// =============================================================================

/**
 * Sort a rate series for lookup. Overlapping periods make the price at some
 * instant ambiguous and are rejected.
 */
export function buildRateIndex(
  periods: ReadonlyArray<RatePeriod>,
): Result<RateIndex, CostError> {
  const overlap = findRateOverlaps(periods)[0];
  if (overlap) {
    return err(ambiguousRate(overlap.second.validFrom));
  }
  return ok({ periods: sortRatePeriods(periods) });
}

/**
 * Binary search for the period whose [validFrom, validTo) contains `instant`.
 */
export function findRate(index: RateIndex, instant: string): RatePeriod | null {
  const { periods } = index;
  let low = 0;
  let high = periods.length - 1;
  let candidate: RatePeriod | null = null;

  // Last period starting at or before the instant
  while (low <= high) {
    const mid = (low + high) >> 1;
    const period = periods[mid];
    if (period === undefined) break;
    if (period.validFrom <= instant) {
      candidate = period;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  if (candidate === null) {
    return null;
  }
  return candidate.validTo === null || candidate.validTo > instant ? candidate : null;
}

// =============================================================================
// Interval and Daily Costs
// =============================================================================

export function computeIntervalCosts(
  readings: ReadonlyArray<ConsumptionReading>,
  unitRates: RateIndex,
  zone: string,
): Result<IntervalCost[], CostError> {
  const costs: IntervalCost[] = [];

  for (const reading of readings) {
    const rate = findRate(unitRates, reading.intervalStart);
    if (rate === null) {
      return err(noRateCoverage(reading.intervalStart));
    }
    costs.push({
      intervalStart: reading.intervalStart,
      date: localDate(reading.intervalStart, zone),
      kwh: reading.kwh,
      unitRate: rate.valueIncVat,
      pence: reading.kwh * rate.valueIncVat,
    });
  }

  return ok(costs);
}

/**
 * Distinct local dates touched by the intervals, ascending.
 */
export function chargeableDates(costs: ReadonlyArray<IntervalCost>): string[] {
  return [...new Set(costs.map((cost) => cost.date))].sort();
}

/**
 * One standing charge per date, priced at the date's local midnight.
 */
export function computeStandingCharges(
  dates: ReadonlyArray<string>,
  standingCharges: RateIndex,
  zone: string,
): Result<DailyStandingCharge[], CostError> {
  const charges: DailyStandingCharge[] = [];

  for (const date of dates) {
    const rate = findRate(standingCharges, localDayBounds(date, zone).from);
    if (rate === null) {
      return err(noStandingCharge(date));
    }
    charges.push({ date, pence: rate.valueIncVat });
  }

  return ok(charges);
}

// =============================================================================
// Aggregation
// =============================================================================

type GroupTotals = {
  kwh: number;
  readings: number;
  days: number;
  energyPence: number;
  standingPence: number;
};

function emptyTotals(): GroupTotals {
  return { kwh: 0, readings: 0, days: 0, energyPence: 0, standingPence: 0 };
}

function toGroup(period: string, totals: GroupTotals): CostGroup {
  return {
    period,
    ...totals,
    totalPence: totals.energyPence + totals.standingPence,
  };
}

/**
 * Sum interval costs and daily standing charges into groups.
 * Each date's standing charge lands in the group that holds the date.
 */
export function aggregateCosts(
  intervals: ReadonlyArray<IntervalCost>,
  standing: ReadonlyArray<DailyStandingCharge>,
  groupBy: GroupBy,
): CostGroup[] {
  const groups = new Map<string, GroupTotals>();

  const totalsFor = (date: string): GroupTotals => {
    const key = periodKeyForDate(date, groupBy);
    const existing = groups.get(key);
    if (existing) return existing;
    const created = emptyTotals();
    groups.set(key, created);
    return created;
  };

  for (const interval of intervals) {
    const totals = totalsFor(interval.date);
    totals.kwh += interval.kwh;
    totals.readings += 1;
    totals.energyPence += interval.pence;
  }

  for (const charge of standing) {
    const totals = totalsFor(charge.date);
    totals.days += 1;
    totals.standingPence += charge.pence;
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([period, totals]) => toGroup(period, totals));
}

/**
 * Grand total across groups.
 */
export function totalOf(groups: ReadonlyArray<CostGroup>): CostGroup {
  const totals = emptyTotals();
  for (const group of groups) {
    totals.kwh += group.kwh;
    totals.readings += group.readings;
    totals.days += group.days;
    totals.energyPence += group.energyPence;
    totals.standingPence += group.standingPence;
  }
  return toGroup("total", totals);
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * @example
 * formatPounds(1234) // "£12.34"
 */
export function formatPounds(pence: number): string {
  return `£${(pence / 100).toFixed(2)}`;
}
