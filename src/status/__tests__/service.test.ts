/**
 * Status Service Integration Tests
 *
 * Builds summaries from an in-memory store.
 */
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import type { ConsumptionReading } from "../../store/schema.js";
import { type TimeSeriesStore, createStore } from "../../store/service.js";
import { buildStatusSummary, writeStatusFile } from "../service.js";
import { formatStatusSummary } from "../transform.js";

const HALF_HOUR_MS = 30 * 60 * 1000;
const NOW = new Date("2024-01-03T12:00:00.000Z");
const ZONE = "Europe/London";

function halfHours(date: string, count: number, kwh: number): ConsumptionReading[] {
  const start = Date.parse(`${date}T00:00:00.000Z`);
  return Array.from({ length: count }, (_, i) => ({
    intervalStart: new Date(start + i * HALF_HOUR_MS).toISOString(),
    intervalEnd: new Date(start + (i + 1) * HALF_HOUR_MS).toISOString(),
    kwh,
  }));
}

describe("Status Service", () => {
  let store: TimeSeriesStore;

  beforeEach(() => {
    store = createStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  test("summarises yesterday, prices and sync progress", () => {
    // Arrange
    store.upsertConsumption(halfHours("2024-01-02", 48, 0.25));
    store.upsertRates("unit", [
      {
        kind: "unit",
        validFrom: "2023-12-01T00:00:00.000Z",
        validTo: null,
        valueExcVat: 19.05,
        valueIncVat: 20,
      },
    ]);
    store.upsertRates("standing", [
      {
        kind: "standing",
        validFrom: "2023-12-01T00:00:00.000Z",
        validTo: null,
        valueExcVat: 38.1,
        valueIncVat: 40,
      },
    ]);
    store.setLedger("consumption", "2024-01-03T00:00:00.000Z", 48, NOW);

    // Act
    const summary = buildStatusSummary(store, NOW, ZONE)._unsafeUnwrap();

    // Assert
    expect(summary.yesterday).toEqual({
      date: "2024-01-02",
      kwh: 12,
      readings: 48,
      expectedReadings: 48,
      costPence: 280,
      costError: null,
    });
    expect(formatStatusSummary(summary).split("\n")).toEqual([
      "🐙 Energy status 2024-01-03 12:00",
      "Yesterday 2024-01-02: 12.00 kWh (48/48), £2.80",
      "Rates: 20.00p/kWh, 40.00p/day standing",
      "Alerts: daily none, demand none",
      "Last sync: consumption 2024-01-03T00:00, unit_rates never, standing_charges never",
    ]);
  });

  test("leaves the cost empty when no rate covers yesterday", () => {
    store.upsertConsumption(halfHours("2024-01-02", 48, 0.25));

    const summary = buildStatusSummary(store, NOW, ZONE)._unsafeUnwrap();

    expect(summary.yesterday.costPence).toBeNull();
    expect(summary.yesterday.costError).not.toBeNull();
    expect(summary.unitRatePence).toBeNull();
  });

  test("writes the rendered text to the cache file", () => {
    const dir = mkdtempSync(join(tmpdir(), "energy-status-"));
    const path = join(dir, "status.txt");

    const result = writeStatusFile(path, "line one");

    expect(result.isOk()).toBe(true);
    expect(readFileSync(path, "utf8")).toBe("line one\n");
    rmSync(dir, { recursive: true, force: true });
  });
});
