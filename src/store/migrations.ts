/**
 * Store Module - Schema Migration
 */
import type { Database } from "better-sqlite3";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS consumption (
    interval_start TEXT PRIMARY KEY,
    interval_end   TEXT NOT NULL,
    kwh            REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS rate_periods (
    kind           TEXT NOT NULL CHECK (kind IN ('unit', 'standing')),
    valid_from     TEXT NOT NULL,
    valid_to       TEXT,
    value_exc_vat  REAL NOT NULL,
    value_inc_vat  REAL NOT NULL,
    PRIMARY KEY (kind, valid_from)
  );

  CREATE TABLE IF NOT EXISTS sync_ledger (
    resource       TEXT PRIMARY KEY,
    synced_through TEXT NOT NULL,
    updated_at     TEXT NOT NULL,
    record_count   INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS sync_log (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    resource       TEXT NOT NULL,
    synced_at      TEXT NOT NULL,
    period_from    TEXT NOT NULL,
    period_to      TEXT NOT NULL,
    record_count   INTEGER NOT NULL DEFAULT 0,
    outcome        TEXT NOT NULL CHECK (outcome IN ('success', 'failure')),
    error          TEXT
  );

  CREATE TABLE IF NOT EXISTS alert_state (
    channel        TEXT PRIMARY KEY,
    direction      TEXT NOT NULL CHECK (direction IN ('none', 'high', 'low')),
    last_alert_at  TEXT,
    last_value     REAL
  );

  CREATE TABLE IF NOT EXISTS settings (
    key            TEXT PRIMARY KEY,
    value          TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_rate_periods_kind_to ON rate_periods (kind, valid_to);
  CREATE INDEX IF NOT EXISTS idx_sync_log_resource ON sync_log (resource, synced_at);
`;

export function migrate(db: Database): void {
  db.exec(SCHEMA_SQL);
}
