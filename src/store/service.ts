/**
 * Store Module - Service Layer
 *
 * SQLite-backed time-series store (better-sqlite3, WAL mode).
 * Every write for a resource happens inside one transaction together with
 * its ledger advance, so the ledger is the durability boundary.
 */
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import { createLogger } from "../logger.js";
import { type TimeWindow, daysAgo } from "../time.js";
import { type StoreError, invalidRow, rateOverlap, storeFailed } from "./errors.js";
import { migrate } from "./migrations.js";
import {
  type AlertChannel,
  type AlertState,
  AlertStateRowSchema,
  type BotState,
  BotStateSchema,
  type CommitSummary,
  type ConsumptionReading,
  ConsumptionRowSchema,
  type DailyTotal,
  INITIAL_BOT_STATE,
  type RateKind,
  type RatePeriod,
  RatePeriodRowSchema,
  type ResourceBatch,
  type ResourceType,
  SettingRowSchema,
  type StoreExport,
  type SyncLedgerEntry,
  SyncLedgerRowSchema,
  type SyncLogEntry,
  SyncLogRowSchema,
  initialAlertState,
  rateKindForResource,
} from "./schema.js";
import {
  consumptionSyncedThrough,
  dedupeReadings,
  findRateOverlaps,
  latestCompleteDays,
  mergeRatePeriods,
  ratesSyncedThrough,
  summariseDays,
} from "./transform.js";

const log = createLogger("store");

const BOT_STATE_KEY = "bot_state";

/**
 * Extra days scanned behind `now` when looking for complete days, so a few
 * days of publication lag still leave enough complete days to compare.
 */
const COMPLETE_DAY_LOOKBACK = 14;

/**
 * Time-series store contract used by the sync, cost, alert and bot modules.
 */
export interface TimeSeriesStore {
  /** Upsert a fetched batch, advance its ledger and log the sync, atomically */
  commitResource(
    batch: ResourceBatch,
    window: TimeWindow,
    now: Date,
  ): Result<CommitSummary, StoreError>;
  upsertConsumption(
    records: ReadonlyArray<ConsumptionReading>,
  ): Result<number, StoreError>;
  upsertRates(
    kind: RateKind,
    records: ReadonlyArray<RatePeriod>,
  ): Result<number, StoreError>;
  recordSyncFailure(
    resource: ResourceType,
    window: TimeWindow,
    message: string,
    now: Date,
  ): Result<void, StoreError>;

  getConsumption(window: TimeWindow): Result<ConsumptionReading[], StoreError>;
  getRates(kind: RateKind, window: TimeWindow): Result<RatePeriod[], StoreError>;
  getCurrentOpenRate(kind: RateKind): Result<RatePeriod | null, StoreError>;
  getDailyTotals(
    window: TimeWindow,
    zone: string,
    now: Date,
  ): Result<DailyTotal[], StoreError>;
  getRecentCompleteDays(
    count: number,
    now: Date,
    zone: string,
  ): Result<DailyTotal[], StoreError>;

  getLedger(resource: ResourceType): Result<SyncLedgerEntry | null, StoreError>;
  setLedger(
    resource: ResourceType,
    syncedThrough: string,
    recordCount: number,
    now: Date,
  ): Result<void, StoreError>;
  listLedger(): Result<SyncLedgerEntry[], StoreError>;

  getAlertState(channel: AlertChannel): Result<AlertState, StoreError>;
  saveAlertState(state: AlertState): Result<void, StoreError>;

  loadBotState(): Result<BotState, StoreError>;
  saveBotState(state: BotState): Result<void, StoreError>;

  exportAll(): Result<StoreExport, StoreError>;
  close(): void;
}

// =============================================================================
// Helpers
// =============================================================================

function attempt<T>(operation: string, fn: () => T): Result<T, StoreError> {
  try {
    return ok(fn());
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    log.error({ operation, error: cause.message }, "SQLite operation failed");
    return err(storeFailed(operation, cause.message, cause));
  }
}

function parseRows<T>(
  schema: z.ZodType<T>,
  table: string,
  rows: unknown[],
): Result<T[], StoreError> {
  const parsed: T[] = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (!result.success) {
      return err(invalidRow(table, result.error.message, row));
    }
    parsed.push(result.data);
  }
  return ok(parsed);
}

function toConsumption(row: z.infer<typeof ConsumptionRowSchema>): ConsumptionReading {
  return {
    intervalStart: row.interval_start,
    intervalEnd: row.interval_end,
    kwh: row.kwh,
  };
}

function toRatePeriod(row: z.infer<typeof RatePeriodRowSchema>): RatePeriod {
  return {
    kind: row.kind,
    validFrom: row.valid_from,
    validTo: row.valid_to,
    valueExcVat: row.value_exc_vat,
    valueIncVat: row.value_inc_vat,
  };
}

function toLedgerEntry(row: z.infer<typeof SyncLedgerRowSchema>): SyncLedgerEntry {
  return {
    resource: row.resource,
    syncedThrough: row.synced_through,
    updatedAt: row.updated_at,
    recordCount: row.record_count,
  };
}

function toSyncLogEntry(row: z.infer<typeof SyncLogRowSchema>): SyncLogEntry {
  return {
    id: row.id,
    resource: row.resource,
    syncedAt: row.synced_at,
    periodFrom: row.period_from,
    periodTo: row.period_to,
    recordCount: row.record_count,
    outcome: row.outcome,
    error: row.error,
  };
}

function toAlertState(row: z.infer<typeof AlertStateRowSchema>): AlertState {
  return {
    channel: row.channel,
    direction: row.direction,
    lastAlertAt: row.last_alert_at,
    lastValue: row.last_value,
  };
}

// =============================================================================
// Store Factory
// =============================================================================

/**
 * Open (or create) the store at `filePath`. Use ":memory:" for tests.
 */
export function createStore(filePath: string): TimeSeriesStore {
  const db: Database = new DatabaseConstructor(filePath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("busy_timeout = 2500");
  migrate(db);

  log.debug({ filePath }, "Store opened");

  const statements = {
    upsertConsumption: db.prepare(
      `INSERT INTO consumption (interval_start, interval_end, kwh)
       VALUES (@intervalStart, @intervalEnd, @kwh)
       ON CONFLICT (interval_start) DO UPDATE SET
         interval_end = excluded.interval_end,
         kwh = excluded.kwh`,
    ),
    upsertRate: db.prepare(
      `INSERT INTO rate_periods (kind, valid_from, valid_to, value_exc_vat, value_inc_vat)
       VALUES (@kind, @validFrom, @validTo, @valueExcVat, @valueIncVat)
       ON CONFLICT (kind, valid_from) DO UPDATE SET
         valid_to = excluded.valid_to,
         value_exc_vat = excluded.value_exc_vat,
         value_inc_vat = excluded.value_inc_vat`,
    ),
    setLedger: db.prepare(
      `INSERT INTO sync_ledger (resource, synced_through, updated_at, record_count)
       VALUES (?, ?, ?, ?)
       ON CONFLICT (resource) DO UPDATE SET
         synced_through = excluded.synced_through,
         updated_at = excluded.updated_at,
         record_count = excluded.record_count`,
    ),
    appendSyncLog: db.prepare(
      `INSERT INTO sync_log (resource, synced_at, period_from, period_to, record_count, outcome, error)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ),
    selectAllConsumption: db.prepare(
      `SELECT interval_start, interval_end, kwh FROM consumption ORDER BY interval_start`,
    ),
    selectConsumption: db.prepare(
      `SELECT interval_start, interval_end, kwh FROM consumption
       WHERE interval_start >= ? AND interval_start < ?
       ORDER BY interval_start`,
    ),
    selectRatesInWindow: db.prepare(
      `SELECT kind, valid_from, valid_to, value_exc_vat, value_inc_vat FROM rate_periods
       WHERE kind = ? AND valid_from < ? AND (valid_to IS NULL OR valid_to > ?)
       ORDER BY valid_from`,
    ),
    selectAllRates: db.prepare(
      `SELECT kind, valid_from, valid_to, value_exc_vat, value_inc_vat FROM rate_periods
       WHERE kind = ? ORDER BY valid_from`,
    ),
    selectOpenRate: db.prepare(
      `SELECT kind, valid_from, valid_to, value_exc_vat, value_inc_vat FROM rate_periods
       WHERE kind = ? AND valid_to IS NULL
       ORDER BY valid_from DESC LIMIT 1`,
    ),
    selectLedger: db.prepare(
      `SELECT resource, synced_through, updated_at, record_count FROM sync_ledger
       WHERE resource = ?`,
    ),
    selectAllLedger: db.prepare(
      `SELECT resource, synced_through, updated_at, record_count FROM sync_ledger
       ORDER BY resource`,
    ),
    selectSyncLog: db.prepare(
      `SELECT id, resource, synced_at, period_from, period_to, record_count, outcome, error
       FROM sync_log ORDER BY id`,
    ),
    selectAlertState: db.prepare(
      `SELECT channel, direction, last_alert_at, last_value FROM alert_state
       WHERE channel = ?`,
    ),
    selectAllAlertState: db.prepare(
      `SELECT channel, direction, last_alert_at, last_value FROM alert_state
       ORDER BY channel`,
    ),
    saveAlertState: db.prepare(
      `INSERT INTO alert_state (channel, direction, last_alert_at, last_value)
       VALUES (@channel, @direction, @lastAlertAt, @lastValue)
       ON CONFLICT (channel) DO UPDATE SET
         direction = excluded.direction,
         last_alert_at = excluded.last_alert_at,
         last_value = excluded.last_value`,
    ),
    selectSetting: db.prepare(`SELECT key, value FROM settings WHERE key = ?`),
    saveSetting: db.prepare(
      `INSERT INTO settings (key, value) VALUES (?, ?)
       ON CONFLICT (key) DO UPDATE SET value = excluded.value`,
    ),
  };

  const writeConsumption = db.transaction(
    (records: ReadonlyArray<ConsumptionReading>) => {
      for (const record of records) {
        statements.upsertConsumption.run(record);
      }
    },
  );

  const writeRates = db.transaction((records: ReadonlyArray<RatePeriod>) => {
    for (const record of records) {
      statements.upsertRate.run(record);
    }
  });

  const commitTransaction = db.transaction(
    (
      batch: ResourceBatch,
      window: TimeWindow,
      syncedThrough: string,
      nowIso: string,
    ) => {
      if (batch.resource === "consumption") {
        writeConsumption(batch.records);
      } else {
        writeRates(batch.records);
      }
      statements.setLedger.run(
        batch.resource,
        syncedThrough,
        nowIso,
        batch.records.length,
      );
      statements.appendSyncLog.run(
        batch.resource,
        nowIso,
        window.from,
        window.to,
        batch.records.length,
        "success",
        null,
      );
    },
  );

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  function getConsumption(
    window: TimeWindow,
  ): Result<ConsumptionReading[], StoreError> {
    return attempt("getConsumption", () =>
      statements.selectConsumption.all(window.from, window.to),
    )
      .andThen((rows) => parseRows(ConsumptionRowSchema, "consumption", rows))
      .map((rows) => rows.map(toConsumption));
  }

  function getAllRates(kind: RateKind): Result<RatePeriod[], StoreError> {
    return attempt("getAllRates", () => statements.selectAllRates.all(kind))
      .andThen((rows) => parseRows(RatePeriodRowSchema, "rate_periods", rows))
      .map((rows) => rows.map(toRatePeriod));
  }

  function getLedger(
    resource: ResourceType,
  ): Result<SyncLedgerEntry | null, StoreError> {
    return attempt("getLedger", () => statements.selectLedger.all(resource))
      .andThen((rows) => parseRows(SyncLedgerRowSchema, "sync_ledger", rows))
      .map((rows) => {
        const row = rows[0];
        return row ? toLedgerEntry(row) : null;
      });
  }

  function listLedger(): Result<SyncLedgerEntry[], StoreError> {
    return attempt("listLedger", () => statements.selectAllLedger.all())
      .andThen((rows) => parseRows(SyncLedgerRowSchema, "sync_ledger", rows))
      .map((rows) => rows.map(toLedgerEntry));
  }

  function getDailyTotals(
    window: TimeWindow,
    zone: string,
    now: Date,
  ): Result<DailyTotal[], StoreError> {
    return getConsumption(window).map((readings) =>
      summariseDays(readings, zone, now),
    );
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  function validateRates(
    kind: RateKind,
    incoming: ReadonlyArray<RatePeriod>,
  ): Result<RatePeriod[], StoreError> {
    const records = incoming.map((record) => ({ ...record, kind }));
    return getAllRates(kind).andThen((existing) => {
      const overlap = findRateOverlaps(mergeRatePeriods(existing, records))[0];
      if (overlap) {
        log.warn(
          {
            kind,
            first: overlap.first.validFrom,
            second: overlap.second.validFrom,
          },
          "Rejecting rate periods that would overlap",
        );
        return err(rateOverlap(kind, overlap.first, overlap.second));
      }
      return ok(records);
    });
  }

  function commitResource(
    batch: ResourceBatch,
    window: TimeWindow,
    now: Date,
  ): Result<CommitSummary, StoreError> {
    const nowIso = now.toISOString();

    return getLedger(batch.resource).andThen((previous) => {
      const previousThrough = previous?.syncedThrough ?? null;

      const prepared: Result<
        { batch: ResourceBatch; syncedThrough: string },
        StoreError
      > =
        batch.resource === "consumption"
          ? ok({
              batch: { resource: batch.resource, records: dedupeReadings(batch.records) },
              syncedThrough: consumptionSyncedThrough(
                batch.records,
                window,
                previousThrough,
              ),
            })
          : validateRates(rateKindForResource(batch.resource), batch.records).map(
              (records) => ({
                batch: { resource: batch.resource, records },
                syncedThrough: ratesSyncedThrough(window, previousThrough),
              }),
            );

      return prepared.andThen(({ batch: ready, syncedThrough }) =>
        attempt("commitResource", () =>
          commitTransaction(ready, window, syncedThrough, nowIso),
        ).map(() => {
          log.info(
            {
              resource: ready.resource,
              records: ready.records.length,
              syncedThrough,
            },
            `Committed ${ready.records.length} ${ready.resource} records`,
          );
          return {
            resource: ready.resource,
            recordCount: ready.records.length,
            syncedThrough,
          };
        }),
      );
    });
  }

  return {
    commitResource,

    upsertConsumption(records) {
      const unique = dedupeReadings(records);
      return attempt("upsertConsumption", () => writeConsumption(unique)).map(
        () => unique.length,
      );
    },

    upsertRates(kind, records) {
      return validateRates(kind, records).andThen((valid) =>
        attempt("upsertRates", () => writeRates(valid)).map(() => valid.length),
      );
    },

    recordSyncFailure(resource, window, message, now) {
      return attempt("recordSyncFailure", () => {
        statements.appendSyncLog.run(
          resource,
          now.toISOString(),
          window.from,
          window.to,
          0,
          "failure",
          message,
        );
      });
    },

    getConsumption,

    getRates(kind, window) {
      return attempt("getRates", () =>
        statements.selectRatesInWindow.all(kind, window.to, window.from),
      )
        .andThen((rows) => parseRows(RatePeriodRowSchema, "rate_periods", rows))
        .map((rows) => rows.map(toRatePeriod));
    },

    getCurrentOpenRate(kind) {
      return attempt("getCurrentOpenRate", () =>
        statements.selectOpenRate.all(kind),
      )
        .andThen((rows) => parseRows(RatePeriodRowSchema, "rate_periods", rows))
        .map((rows) => {
          const row = rows[0];
          return row ? toRatePeriod(row) : null;
        });
    },

    getDailyTotals,

    getRecentCompleteDays(count, now, zone) {
      const window = {
        from: daysAgo(count + COMPLETE_DAY_LOOKBACK, now),
        to: now.toISOString(),
      };
      return getDailyTotals(window, zone, now).map((days) =>
        latestCompleteDays(days, count),
      );
    },

    getLedger,

    setLedger(resource, syncedThrough, recordCount, now) {
      return attempt("setLedger", () => {
        statements.setLedger.run(
          resource,
          syncedThrough,
          now.toISOString(),
          recordCount,
        );
      });
    },

    listLedger,

    getAlertState(channel) {
      return attempt("getAlertState", () =>
        statements.selectAlertState.all(channel),
      )
        .andThen((rows) => parseRows(AlertStateRowSchema, "alert_state", rows))
        .map((rows) => {
          const row = rows[0];
          return row ? toAlertState(row) : initialAlertState(channel);
        });
    },

    saveAlertState(state) {
      return attempt("saveAlertState", () => {
        statements.saveAlertState.run(state);
      });
    },

    loadBotState() {
      return attempt("loadBotState", () =>
        statements.selectSetting.all(BOT_STATE_KEY),
      )
        .andThen((rows) => parseRows(SettingRowSchema, "settings", rows))
        .andThen((rows) => {
          const row = rows[0];
          if (!row) {
            return ok(INITIAL_BOT_STATE);
          }
          return attempt("loadBotState", (): unknown => JSON.parse(row.value)).andThen(
            (value) => {
              const parsed = BotStateSchema.safeParse(value);
              return parsed.success
                ? ok(parsed.data)
                : err(invalidRow("settings", parsed.error.message, row));
            },
          );
        });
    },

    saveBotState(state) {
      return attempt("saveBotState", () => {
        statements.saveSetting.run(BOT_STATE_KEY, JSON.stringify(state));
      });
    },

    exportAll() {
      return attempt("exportAll", () => statements.selectAllConsumption.all())
        .andThen((rows) => parseRows(ConsumptionRowSchema, "consumption", rows))
        .map((rows) => rows.map(toConsumption))
        .andThen((consumption) =>
        getAllRates("unit").andThen((unitRates) =>
          getAllRates("standing").andThen((standingCharges) =>
            listLedger().andThen((syncLedger) =>
              attempt("exportAll", () => statements.selectSyncLog.all())
                .andThen((rows) => parseRows(SyncLogRowSchema, "sync_log", rows))
                .andThen((syncLog) =>
                  attempt("exportAll", () => statements.selectAllAlertState.all())
                    .andThen((rows) =>
                      parseRows(AlertStateRowSchema, "alert_state", rows),
                    )
                    .map((alertRows) => ({
                      consumption,
                      unitRates,
                      standingCharges,
                      syncLedger,
                      syncLog: syncLog.map(toSyncLogEntry),
                      alertState: alertRows.map(toAlertState),
                    })),
                ),
            ),
          ),
        ),
      );
    },

    close() {
      db.close();
      log.debug({ filePath }, "Store closed");
    },
  };
}
