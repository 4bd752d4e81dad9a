/**
 * Cost Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import type { ConsumptionReading, RatePeriod } from "../../store/index.js";
import {
  aggregateCosts,
  buildRateIndex,
  chargeableDates,
  computeIntervalCosts,
  computeStandingCharges,
  findRate,
  formatPounds,
  totalOf,
} from "../transform.js";

const ZONE = "Europe/London";

function rate(
  kind: RatePeriod["kind"],
  validFrom: string,
  validTo: string | null,
  valueIncVat: number,
): RatePeriod {
  return { kind, validFrom, validTo, valueExcVat: valueIncVat, valueIncVat };
}

function reading(intervalStart: string, kwh: number): ConsumptionReading {
  const end = new Date(Date.parse(intervalStart) + 30 * 60 * 1000).toISOString();
  return { intervalStart, intervalEnd: end, kwh };
}

const UNIT_RATES = [
  rate("unit", "2024-01-01T00:00:00.000Z", "2024-01-01T13:00:00.000Z", 20),
  rate("unit", "2024-01-01T13:00:00.000Z", null, 25),
];

const STANDING = [rate("standing", "2023-12-01T00:00:00.000Z", null, 50)];

// =============================================================================
// Rate Index
// =============================================================================

describe("findRate", () => {
  const index = buildRateIndex(UNIT_RATES)._unsafeUnwrap();

  it("uses the period in force at the instant", () => {
    expect(findRate(index, "2024-01-01T12:30:00.000Z")?.valueIncVat).toBe(20);
    expect(findRate(index, "2024-01-01T13:00:00.000Z")?.valueIncVat).toBe(25);
  });

  it("returns null before the first period", () => {
    expect(findRate(index, "2023-12-31T23:30:00.000Z")).toBeNull();
  });

  it("returns null inside a gap between periods", () => {
    const gapped = buildRateIndex([
      rate("unit", "2024-01-01T00:00:00.000Z", "2024-01-01T06:00:00.000Z", 20),
      rate("unit", "2024-01-01T07:00:00.000Z", null, 25),
    ])._unsafeUnwrap();
    expect(findRate(gapped, "2024-01-01T06:30:00.000Z")).toBeNull();
  });
});

describe("buildRateIndex", () => {
  it("rejects overlapping periods", () => {
    const result = buildRateIndex([
      rate("unit", "2024-01-01T00:00:00.000Z", null, 20),
      rate("unit", "2024-01-01T12:00:00.000Z", null, 25),
    ]);
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "AMBIGUOUS_RATE",
      message: "More than one unit rate is valid at 2024-01-01T12:00:00.000Z",
      validFrom: "2024-01-01T12:00:00.000Z",
    });
  });
});

// =============================================================================
// Costs
// =============================================================================

describe("computeIntervalCosts", () => {
  const unitIndex = buildRateIndex(UNIT_RATES)._unsafeUnwrap();

  it("prices each interval at the rate in force at its start", () => {
    const costs = computeIntervalCosts(
      [reading("2024-01-01T12:30:00.000Z", 0.5), reading("2024-01-01T13:30:00.000Z", 0.5)],
      unitIndex,
      ZONE,
    )._unsafeUnwrap();

    expect(costs.map((c) => c.pence)).toEqual([10, 12.5]);
  });

  it("fails when an interval has no rate", () => {
    const result = computeIntervalCosts(
      [reading("2023-12-31T23:30:00.000Z", 0.5)],
      unitIndex,
      ZONE,
    );
    expect(result._unsafeUnwrapErr().type).toBe("NO_RATE_COVERAGE");
  });
});

describe("computeStandingCharges", () => {
  it("fails for a day without a standing charge", () => {
    const index = buildRateIndex([
      rate("standing", "2024-01-02T00:00:00.000Z", null, 50),
    ])._unsafeUnwrap();

    const result = computeStandingCharges(["2024-01-01"], index, ZONE);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "NO_STANDING_CHARGE",
      message: "No standing charge covers 2024-01-01",
      date: "2024-01-01",
    });
  });

  it("prices a summer day at its local midnight", () => {
    const index = buildRateIndex([
      rate("standing", "2024-06-01T00:00:00.000Z", "2024-06-30T23:00:00.000Z", 40),
      rate("standing", "2024-06-30T23:00:00.000Z", null, 60),
    ])._unsafeUnwrap();

    const charges = computeStandingCharges(["2024-07-01"], index, ZONE)._unsafeUnwrap();

    expect(charges).toEqual([{ date: "2024-07-01", pence: 60 }]);
  });
});

describe("aggregateCosts", () => {
  const unitIndex = buildRateIndex(UNIT_RATES)._unsafeUnwrap();
  const standingIndex = buildRateIndex(STANDING)._unsafeUnwrap();

  function price(readings: ConsumptionReading[]) {
    const intervals = computeIntervalCosts(readings, unitIndex, ZONE)._unsafeUnwrap();
    const standing = computeStandingCharges(
      chargeableDates(intervals),
      standingIndex,
      ZONE,
    )._unsafeUnwrap();
    return { intervals, standing };
  }

  it("adds one standing charge for a day with a rate change", () => {
    const { intervals, standing } = price([
      reading("2024-01-01T12:30:00.000Z", 0.5),
      reading("2024-01-01T13:30:00.000Z", 0.5),
    ]);

    expect(aggregateCosts(intervals, standing, "none")).toEqual([
      {
        period: "total",
        kwh: 1,
        readings: 2,
        days: 1,
        energyPence: 22.5,
        standingPence: 50,
        totalPence: 72.5,
      },
    ]);
  });

  it("day groups sum to the ungrouped total", () => {
    const { intervals, standing } = price([
      reading("2024-01-01T23:30:00.000Z", 0.25),
      reading("2024-01-02T00:00:00.000Z", 0.75),
      reading("2024-01-03T10:00:00.000Z", 1.5),
      reading("2024-01-05T18:00:00.000Z", 2),
    ]);

    const byDay = aggregateCosts(intervals, standing, "day");
    const [ungrouped] = aggregateCosts(intervals, standing, "none");

    expect(byDay.map((g) => g.period)).toEqual([
      "2024-01-01",
      "2024-01-02",
      "2024-01-03",
      "2024-01-05",
    ]);
    expect(totalOf(byDay)).toEqual(ungrouped);
  });

  it("counts each day's standing charge once in a week group", () => {
    const { intervals, standing } = price([
      reading("2024-01-01T14:00:00.000Z", 1),
      reading("2024-01-01T15:00:00.000Z", 1),
      reading("2024-01-02T14:00:00.000Z", 1),
    ]);

    const [week] = aggregateCosts(intervals, standing, "week");

    expect(week?.period).toBe("2024-W01");
    expect(week?.days).toBe(2);
    expect(week?.standingPence).toBe(100);
    expect(week?.energyPence).toBe(75);
  });
});

// =============================================================================
// Rendering
// =============================================================================

describe("formatPounds", () => {
  it("renders pence as pounds", () => {
    expect(formatPounds(1234)).toBe("£12.34");
  });
});
