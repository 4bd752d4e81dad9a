/**
 * Cost Module - Types
 *
 * All money is in pence, including VAT, at full precision.
 */
import type { RatePeriod } from "../store/index.js";
import type { GroupBy, TimeWindow } from "../time.js";

/**
 * Rate periods of one kind, sorted by validFrom and free of overlaps.
 */
export type RateIndex = Readonly<{
  periods: ReadonlyArray<RatePeriod>;
}>;

export type IntervalCost = Readonly<{
  intervalStart: string;
  /** Local calendar date of the interval */
  date: string;
  kwh: number;
  /** Pence per kWh */
  unitRate: number;
  pence: number;
}>;

export type DailyStandingCharge = Readonly<{
  date: string;
  pence: number;
}>;

export type CostGroup = Readonly<{
  period: string;
  kwh: number;
  readings: number;
  days: number;
  energyPence: number;
  standingPence: number;
  totalPence: number;
}>;

export type CostReport = Readonly<{
  window: TimeWindow;
  groupBy: GroupBy;
  groups: ReadonlyArray<CostGroup>;
  total: CostGroup;
}>;
