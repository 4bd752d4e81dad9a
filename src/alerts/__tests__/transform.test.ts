/**
 * Alerts Module - Transform Tests
 *
 * Unit tests for the direction state machine and message formatting.
 */
import { describe, expect, it } from "vitest";

import type { AlertState, DailyTotal } from "../../store/index.js";
import {
  formatDailyAlert,
  formatDemandAlert,
  formatDemandReport,
  impliedDailyDirection,
  impliedDemandDirection,
  shouldReportDemand,
  transition,
} from "../transform.js";

function day(date: string, kwh: number): DailyTotal {
  return { date, kwh, readings: 48, expectedReadings: 48, complete: true };
}

const NONE: AlertState = {
  channel: "daily_usage",
  direction: "none",
  lastAlertAt: null,
  lastValue: null,
};

const NOW = new Date("2024-01-03T09:00:00.000Z");

describe("impliedDailyDirection", () => {
  it("is high when both days reach the threshold", () => {
    expect(impliedDailyDirection([day("2024-01-01", 25), day("2024-01-02", 32)], 25)).toBe(
      "high",
    );
  });

  it("is low when both days are below", () => {
    expect(impliedDailyDirection([day("2024-01-01", 12), day("2024-01-02", 18)], 25)).toBe(
      "low",
    );
  });

  it("is undecided when the days straddle the threshold", () => {
    expect(
      impliedDailyDirection([day("2024-01-01", 30), day("2024-01-02", 18)], 25),
    ).toBeNull();
  });

  it("needs two days", () => {
    expect(impliedDailyDirection([day("2024-01-02", 30)], 25)).toBeNull();
  });

  it("uses only the two latest days", () => {
    expect(
      impliedDailyDirection(
        [day("2024-01-01", 5), day("2024-01-02", 30), day("2024-01-03", 31)],
        25,
      ),
    ).toBe("high");
  });
});

describe("impliedDemandDirection", () => {
  it("treats the threshold itself as high", () => {
    expect(impliedDemandDirection(1000, 1000)).toBe("high");
    expect(impliedDemandDirection(999, 1000)).toBe("low");
  });
});

describe("transition", () => {
  it("emits on the first decided direction", () => {
    const result = transition(NONE, "high", NOW, 32);

    expect(result).toEqual({
      emit: true,
      next: {
        channel: "daily_usage",
        direction: "high",
        lastAlertAt: "2024-01-03T09:00:00.000Z",
        lastValue: 32,
      },
    });
  });

  it("stays silent when the direction is unchanged", () => {
    const high: AlertState = { ...NONE, direction: "high", lastValue: 30 };

    expect(transition(high, "high", NOW, 40)).toEqual({ emit: false, next: high });
  });

  it("emits when the direction flips", () => {
    const high: AlertState = { ...NONE, direction: "high" };

    const result = transition(high, "low", NOW, 12);

    expect(result.emit).toBe(true);
    expect(result.next.direction).toBe("low");
  });

  it("keeps the state when undecided", () => {
    const high: AlertState = { ...NONE, direction: "high" };

    expect(transition(high, null, NOW, 20)).toEqual({ emit: false, next: high });
  });
});

describe("messages", () => {
  it("formats a daily alert with both days", () => {
    expect(
      formatDailyAlert("high", [day("2024-01-01", 30), day("2024-01-02", 33)], 25),
    ).toBe(
      "⬆️ High daily usage alert\n2024-01-01: 30.00 kWh\n2024-01-02: 33.00 kWh\nThreshold: 25 kWh/day",
    );
  });

  it("formats a demand alert at minute precision", () => {
    expect(
      formatDemandAlert(
        "low",
        { demandWatts: 412.4, readAt: "2024-01-01T12:04:30.000Z" },
        1000,
      ),
    ).toBe("⬇️ Low usage alert\nDemand: 412W at 2024-01-01T12:04\nThreshold: 1000W");
  });

  it("marks heavy demand in reports", () => {
    expect(
      formatDemandReport({ demandWatts: 3200, readAt: "2024-01-01T18:00:10.000Z" }),
    ).toBe("⚠️ Demand: 3200W at 2024-01-01T18:00");
    expect(
      formatDemandReport({ demandWatts: 2100, readAt: "2024-01-01T18:00:10.000Z" }),
    ).toBe("Demand: 2100W at 2024-01-01T18:00");
  });

  it("reports only when enabled and above the report threshold", () => {
    const demand = { demandWatts: 2500, readAt: "2024-01-01T18:00:10.000Z" };

    expect(shouldReportDemand(demand, { reportDemand: true, reportThresholdWatts: 2000 })).toBe(
      true,
    );
    expect(shouldReportDemand(demand, { reportDemand: false, reportThresholdWatts: 2000 })).toBe(
      false,
    );
    expect(shouldReportDemand(demand, { reportDemand: true, reportThresholdWatts: 3000 })).toBe(
      false,
    );
  });
});
