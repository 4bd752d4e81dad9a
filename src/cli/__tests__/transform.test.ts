/**
 * CLI Transform Tests
 *
 * Tables, report text and exit codes.
 */
import { describe, expect, it } from "vitest";

import type { CostGroup, CostReport } from "../../cost/index.js";
import { networkError } from "../../energy-api/errors.js";
import { fetchFailed } from "../../sync/errors.js";
import type { SyncReport } from "../../sync/index.js";
import {
  exitCodeForSync,
  formatCostReport,
  formatRates,
  formatSyncReport,
  formatTable,
} from "../transform.js";

const WINDOW = {
  from: "2024-01-01T00:00:00.000Z",
  to: "2024-01-02T00:00:00.000Z",
};

describe("formatTable", () => {
  it("pads every column to its widest cell", () => {
    const table = formatTable(["period", "kwh"], [["2024-01", "310.50"]]);

    expect(table).toBe("period   kwh\n-------  ------\n2024-01  310.50");
  });

  it("prints only the header and rule without rows", () => {
    expect(formatTable(["a", "bb"], [])).toBe("a  bb\n-  --");
  });
});

describe("formatRates", () => {
  it("shows an open-ended rate as open", () => {
    const table = formatRates([
      {
        kind: "unit",
        validFrom: "2024-01-01T00:00:00.000Z",
        validTo: null,
        valueExcVat: 20,
        valueIncVat: 21,
      },
    ]);

    const row = table.split("\n")[2]?.split(/\s{2,}/);
    expect(row).toEqual(["2024-01-01T00:00:00.000Z", "open", "20.0000", "21.0000"]);
  });
});

describe("formatCostReport", () => {
  it("prints a row per group and a total row", () => {
    const day: CostGroup = {
      period: "2024-01-01",
      kwh: 1,
      readings: 2,
      days: 1,
      energyPence: 22,
      standingPence: 40,
      totalPence: 62,
    };
    const report: CostReport = {
      window: WINDOW,
      groupBy: "day",
      groups: [day],
      total: { ...day, period: "total" },
    };

    const lines = formatCostReport(report).split("\n");

    expect(lines).toHaveLength(4);
    expect(lines[0]?.split(/\s{2,}/)).toEqual([
      "period",
      "kWh",
      "usage (p)",
      "standing (p)",
      "total (p)",
      "total (£)",
    ]);
    expect(lines[2]?.split(/\s{2,}/)).toEqual([
      "2024-01-01",
      "1.00",
      "22.00",
      "40.00",
      "62.00",
      "0.62",
    ]);
    expect(lines[3]?.split(/\s{2,}/)[0]).toBe("total");
  });
});

describe("formatSyncReport", () => {
  it("lists each resource and the outcome", () => {
    const report: SyncReport = {
      startedAt: WINDOW.to,
      finishedAt: WINDOW.to,
      status: "partial",
      resources: [
        {
          resource: "consumption",
          status: "synced",
          window: WINDOW,
          recordCount: 48,
          syncedThrough: WINDOW.to,
        },
        {
          resource: "unit_rates",
          status: "failed",
          window: WINDOW,
          error: fetchFailed(networkError("socket hang up")),
        },
        { resource: "standing_charges", status: "up_to_date", window: WINDOW },
      ],
      alerts: [
        {
          channel: "daily_usage",
          implied: null,
          value: null,
          emitted: null,
          skipped: "insufficient_data",
          delivered: false,
          reported: false,
        },
      ],
      alertErrors: [],
    };

    expect(formatSyncReport(report)).toBe(
      [
        "Resources:",
        "  consumption: 48 records, synced through 2024-01-02T00:00:00.000Z",
        "  unit_rates: FAILED Fetch failed: Network error: socket hang up",
        "  standing_charges: up to date",
        "Alerts:",
        "  daily_usage: no alert (insufficient_data)",
        "Sync partial.",
      ].join("\n"),
    );
  });
});

describe("exitCodeForSync", () => {
  it("maps ok to 0 and failed to 1", () => {
    expect(exitCodeForSync("ok", true)).toBe(0);
    expect(exitCodeForSync("failed", false)).toBe(1);
  });

  it("returns 2 for a partial sync only in quiet mode", () => {
    expect(exitCodeForSync("partial", true)).toBe(2);
    expect(exitCodeForSync("partial", false)).toBe(0);
  });
});
