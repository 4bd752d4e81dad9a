/**
 * Status Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import type { StatusSummary } from "../schema.js";
import { formatStatusSummary, ledgerLines } from "../transform.js";

const SUMMARY: StatusSummary = {
  generatedAt: "2024-07-03T11:00:00.000Z",
  localTime: "2024-07-03 12:00",
  yesterday: {
    date: "2024-07-02",
    kwh: 12.4,
    readings: 46,
    expectedReadings: 48,
    costPence: 321.456,
    costError: null,
  },
  unitRatePence: 24.5,
  standingChargePence: null,
  alerts: { daily_usage: "high", live_demand: "none" },
  muted: true,
  ledger: [
    { resource: "consumption", syncedThrough: "2024-07-02T23:30:00.000Z" },
    { resource: "unit_rates", syncedThrough: null },
  ],
};

describe("formatStatusSummary", () => {
  it("renders one line per topic", () => {
    expect(formatStatusSummary(SUMMARY).split("\n")).toEqual([
      "🐙 Energy status 2024-07-03 12:00",
      "Yesterday 2024-07-02: 12.40 kWh (46/48), £3.21",
      "Rates: 24.50p/kWh, unknown standing",
      "Alerts: daily high, demand none (muted)",
      "Last sync: consumption 2024-07-02T23:30, unit_rates never",
    ]);
  });

  it("says when yesterday could not be priced", () => {
    const text = formatStatusSummary({
      ...SUMMARY,
      yesterday: { ...SUMMARY.yesterday, costPence: null, costError: "No unit rate" },
    });

    expect(text.split("\n")[1]).toBe("Yesterday 2024-07-02: 12.40 kWh (46/48), cost unknown");
  });
});

describe("ledgerLines", () => {
  it("lists every resource in sync order", () => {
    expect(
      ledgerLines([
        {
          resource: "standing_charges",
          syncedThrough: "2024-07-03T10:00:00.000Z",
          updatedAt: "2024-07-03T10:00:05.000Z",
          recordCount: 1,
        },
      ]),
    ).toEqual([
      { resource: "consumption", syncedThrough: null },
      { resource: "unit_rates", syncedThrough: null },
      { resource: "standing_charges", syncedThrough: "2024-07-03T10:00:00.000Z" },
    ]);
  });
});
