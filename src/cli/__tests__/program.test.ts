/**
 * CLI Program Tests
 *
 * Runs whole commands against an in-memory store and a scratch
 * directory. Nothing here reaches the network.
 */
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const { setLogLevel } = vi.hoisted(() => ({ setLogLevel: vi.fn() }));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  setLogLevel: (level: string) => setLogLevel(level),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import { parseConfig } from "../../config.js";
import type { ConsumptionReading } from "../../store/schema.js";
import { type TimeSeriesStore, createStore } from "../../store/service.js";
import { runCli } from "../program.js";
import type { CliEnvironment } from "../schema.js";

const NOW = new Date("2024-01-04T12:00:00.000Z");
const HALF_HOUR_MS = 30 * 60 * 1000;

function halfHours(date: string, count: number, kwh: number): ConsumptionReading[] {
  const start = Date.parse(`${date}T00:00:00.000Z`);
  return Array.from({ length: count }, (_, i) => ({
    intervalStart: new Date(start + i * HALF_HOUR_MS).toISOString(),
    intervalEnd: new Date(start + (i + 1) * HALF_HOUR_MS).toISOString(),
    kwh,
  }));
}

function seedDay(store: TimeSeriesStore): void {
  store.upsertConsumption(halfHours("2024-01-02", 48, 0.25))._unsafeUnwrap();
  store
    .upsertRates("unit", [
      {
        kind: "unit",
        validFrom: "2024-01-01T00:00:00.000Z",
        validTo: null,
        valueExcVat: 19.05,
        valueIncVat: 20,
      },
    ])
    ._unsafeUnwrap();
  store
    .upsertRates("standing", [
      {
        kind: "standing",
        validFrom: "2024-01-01T00:00:00.000Z",
        validTo: null,
        valueExcVat: 38.1,
        valueIncVat: 40,
      },
    ])
    ._unsafeUnwrap();
}

describe("CLI Program", () => {
  let dir: string;
  let store: TimeSeriesStore;
  let stdout: string[];
  let stderr: string[];
  let env: CliEnvironment;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "energy-cli-"));
    store = createStore(":memory:");
    stdout = [];
    stderr = [];
    setLogLevel.mockClear();

    env = {
      config: parseConfig({
        NODE_ENV: "test",
        STATUS_CACHE_PATH: join(dir, "status.txt"),
      })._unsafeUnwrap(),
      envPath: join(dir, ".env"),
      services: {
        openStore: () => ({ ...store, close: () => undefined }),
        createEnergyApiClient: () => {
          throw new Error("No supplier API in tests");
        },
        createTelegramClient: () => {
          throw new Error("No Telegram in tests");
        },
      },
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      now: () => NOW,
    };
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  const run = (...args: string[]) => runCli(["node", "energy-tracker", ...args], env);
  const lines = () => stdout.join("").split("\n");

  describe("usage", () => {
    test("tells the user to sync when nothing is stored", async () => {
      // Act
      const code = await run("usage");

      // Assert
      expect(code).toBe(0);
      expect(stdout.join("")).toBe("No consumption data. Run 'sync' first.\n");
    });

    test("prints nothing in quiet mode and lowers the log level", async () => {
      // Act
      const code = await run("--quiet", "usage");

      // Assert
      expect(code).toBe(0);
      expect(stdout).toEqual([]);
      expect(setLogLevel).toHaveBeenCalledWith("warn");
    });

    test("totals readings per day", async () => {
      // Arrange
      seedDay(store);

      // Act
      const code = await run("usage", "--group", "day");

      // Assert
      expect(code).toBe(0);
      expect(lines()[2]?.split(/\s{2,}/)).toEqual(["2024-01-02", "12.0000", "48"]);
    });

    test("prints raw readings as JSON", async () => {
      // Arrange
      seedDay(store);

      // Act
      const code = await run("--json", "usage", "--days", "3");

      // Assert
      expect(code).toBe(0);
      const readings: unknown = JSON.parse(stdout.join(""));
      expect(Array.isArray(readings) && readings.length).toBe(48);
    });

    test("rejects a non-numeric --days", async () => {
      // Act
      const code = await run("usage", "--days", "abc");

      // Assert
      expect(code).toBe(1);
      expect(stderr.join("")).toMatch(/^Error: invalid options: --days: /);
    });
  });

  describe("cost", () => {
    test("adds energy and one standing charge for the day", async () => {
      // Arrange
      seedDay(store);

      // Act
      const code = await run("--json", "cost", "--group", "none");

      // Assert
      expect(code).toBe(0);
      expect(JSON.parse(stdout.join(""))).toMatchObject({
        total: { kwh: 12, energyPence: 240, standingPence: 40, totalPence: 280 },
      });
    });
  });

  describe("export", () => {
    test("writes every table to the output file", async () => {
      // Arrange
      seedDay(store);
      const output = join(dir, "export.json");

      // Act
      const code = await run("export", "--output", output);

      // Assert
      expect(code).toBe(0);
      const document: unknown = JSON.parse(readFileSync(output, "utf8"));
      expect(document).toMatchObject({ exportedAt: NOW.toISOString() });
      expect(lines()).toEqual([
        `Exported to ${output}`,
        "  consumption:      48 records",
        "  unit_rates:       1 records",
        "  standing_charges: 1 records",
        "  sync_log:         0 entries",
        "",
      ]);
    });
  });

  describe("status", () => {
    test("writes the summary to the status cache", async () => {
      // Arrange
      seedDay(store);

      // Act
      const code = await run("status", "--write");

      // Assert
      expect(code).toBe(0);
      const path = join(dir, "status.txt");
      expect(existsSync(path)).toBe(true);
      expect(readFileSync(path, "utf8").split("\n")[0]).toBe(
        "🐙 Energy status 2024-01-04 12:00",
      );
      expect(lines()[0]).toBe("🐙 Energy status 2024-01-04 12:00");
    });
  });

  describe("config set", () => {
    test("saves an updatable key to the env file", async () => {
      // Act
      const code = await run("config", "set", "ALERT_THRESHOLD_WATTS", "1500");

      // Assert
      expect(code).toBe(0);
      expect(readFileSync(join(dir, ".env"), "utf8")).toBe("ALERT_THRESHOLD_WATTS=1500\n");
    });

    test("refuses keys that are not updatable", async () => {
      // Act
      const code = await run("config", "set", "DB_PATH", "other.db");

      // Assert
      expect(code).toBe(1);
      expect(stderr.join("")).toMatch(/^Error: DB_PATH cannot be set here\./);
      expect(existsSync(join(dir, ".env"))).toBe(false);
    });

    test("refuses values the config schema rejects", async () => {
      // Act
      const code = await run("config", "set", "ALERT_THRESHOLD_WATTS", "lots");

      // Assert
      expect(code).toBe(1);
      expect(existsSync(join(dir, ".env"))).toBe(false);
    });
  });

  describe("configuration errors", () => {
    test("sync names the missing API key", async () => {
      // Act
      const code = await run("sync");

      // Assert
      expect(code).toBe(1);
      expect(stderr.join("")).toMatch(/^Error: Missing config: ENERGY_API_KEY\./);
    });

    test("bot needs Telegram credentials", async () => {
      // Act
      const code = await run("bot");

      // Assert
      expect(code).toBe(1);
      expect(stderr.join("")).toMatch(
        /^Error: Missing config: TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID\./,
      );
    });
  });

  test("unknown commands exit with 1", async () => {
    // Act
    const code = await run("launch");

    // Assert
    expect(code).toBe(1);
    expect(stderr.join("")).toContain("unknown command 'launch'");
  });
});
