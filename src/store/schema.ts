/**
 * Store Module - Schemas and Types
 *
 * Domain records persisted by the time-series store.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Resources
// =============================================================================

/**
 * Independently synced remote streams. Each has its own ledger entry.
 */
export const RESOURCE_TYPES = [
  "consumption",
  "unit_rates",
  "standing_charges",
] as const;

export const ResourceTypeSchema = z.enum(RESOURCE_TYPES);

export type ResourceType = z.infer<typeof ResourceTypeSchema>;

// =============================================================================
// Consumption
// =============================================================================

/**
 * One settled half-hour of metered import. Keyed by intervalStart.
 */
export const ConsumptionReadingSchema = z.object({
  intervalStart: z.string().describe("UTC ISO start, natural key"),
  intervalEnd: z.string().describe("UTC ISO end"),
  kwh: z.number().nonnegative().describe("Energy imported in the interval"),
});

export type ConsumptionReading = Readonly<
  z.infer<typeof ConsumptionReadingSchema>
>;

// =============================================================================
// Rate Periods
// =============================================================================

/**
 * unit: pence per kWh. standing: pence per day.
 */
export const RateKindSchema = z.enum(["unit", "standing"]);

export type RateKind = z.infer<typeof RateKindSchema>;

/**
 * A price valid over [validFrom, validTo). validTo null = still current.
 * Keyed by (kind, validFrom).
 */
export const RatePeriodSchema = z.object({
  kind: RateKindSchema,
  validFrom: z.string(),
  validTo: z.string().nullable(),
  valueExcVat: z.number(),
  valueIncVat: z.number(),
});

export type RatePeriod = Readonly<z.infer<typeof RatePeriodSchema>>;

/**
 * Records fetched for one resource in one cycle, committed as a unit.
 */
export type ResourceBatch =
  | Readonly<{
      resource: "consumption";
      records: ReadonlyArray<ConsumptionReading>;
    }>
  | Readonly<{
      resource: "unit_rates" | "standing_charges";
      records: ReadonlyArray<RatePeriod>;
    }>;

export function rateKindForResource(
  resource: "unit_rates" | "standing_charges",
): RateKind {
  return resource === "unit_rates" ? "unit" : "standing";
}

// =============================================================================
// Sync Ledger
// =============================================================================

/**
 * Durable resume point: everything before syncedThrough has been stored.
 */
export type SyncLedgerEntry = Readonly<{
  resource: ResourceType;
  syncedThrough: string;
  updatedAt: string;
  recordCount: number;
}>;

export type SyncOutcome = "success" | "failure";

export type SyncLogEntry = Readonly<{
  id: number;
  resource: ResourceType;
  syncedAt: string;
  periodFrom: string;
  periodTo: string;
  recordCount: number;
  outcome: SyncOutcome;
  error: string | null;
}>;

export type CommitSummary = Readonly<{
  resource: ResourceType;
  recordCount: number;
  syncedThrough: string;
}>;

// =============================================================================
// Alert State
// =============================================================================

export const AlertDirectionSchema = z.enum(["none", "high", "low"]);

export type AlertDirection = z.infer<typeof AlertDirectionSchema>;

export const AlertChannelSchema = z.enum(["daily_usage", "live_demand"]);

export type AlertChannel = z.infer<typeof AlertChannelSchema>;

/**
 * Last direction notified on a channel. One row per channel.
 */
export const AlertStateSchema = z.object({
  channel: AlertChannelSchema,
  direction: AlertDirectionSchema,
  lastAlertAt: z.string().nullable(),
  lastValue: z.number().nullable(),
});

export type AlertState = Readonly<z.infer<typeof AlertStateSchema>>;

export function initialAlertState(channel: AlertChannel): AlertState {
  return { channel, direction: "none", lastAlertAt: null, lastValue: null };
}

// =============================================================================
// Bot State
// =============================================================================

export const PendingCommandSchema = z.enum(["threshold", "report"]);

export type PendingCommand = z.infer<typeof PendingCommandSchema>;

/**
 * Command-bot state that must survive restarts.
 */
export const BotStateSchema = z.object({
  muted: z.boolean(),
  pendingCommand: PendingCommandSchema.nullable(),
  updateOffset: z.number().int().nullable(),
});

export type BotState = Readonly<z.infer<typeof BotStateSchema>>;

export const INITIAL_BOT_STATE: BotState = {
  muted: false,
  pendingCommand: null,
  updateOffset: null,
};

// =============================================================================
// Aggregates
// =============================================================================

/**
 * Consumption for one local calendar day.
 */
export type DailyTotal = Readonly<{
  date: string;
  kwh: number;
  readings: number;
  expectedReadings: number;
  /** Day has ended and every half-hour is present */
  complete: boolean;
}>;

export type ConsumptionSummary = Readonly<{
  period: string;
  kwh: number;
  readings: number;
}>;

/**
 * Full dump of every table, for `export`.
 */
export type StoreExport = Readonly<{
  consumption: ReadonlyArray<ConsumptionReading>;
  unitRates: ReadonlyArray<RatePeriod>;
  standingCharges: ReadonlyArray<RatePeriod>;
  syncLedger: ReadonlyArray<SyncLedgerEntry>;
  syncLog: ReadonlyArray<SyncLogEntry>;
  alertState: ReadonlyArray<AlertState>;
}>;

// =============================================================================
// SQLite Row Shapes
// =============================================================================

export const ConsumptionRowSchema = z.object({
  interval_start: z.string(),
  interval_end: z.string(),
  kwh: z.number(),
});

export const RatePeriodRowSchema = z.object({
  kind: RateKindSchema,
  valid_from: z.string(),
  valid_to: z.string().nullable(),
  value_exc_vat: z.number(),
  value_inc_vat: z.number(),
});

export const SyncLedgerRowSchema = z.object({
  resource: ResourceTypeSchema,
  synced_through: z.string(),
  updated_at: z.string(),
  record_count: z.number().int(),
});

export const SyncLogRowSchema = z.object({
  id: z.number().int(),
  resource: ResourceTypeSchema,
  synced_at: z.string(),
  period_from: z.string(),
  period_to: z.string(),
  record_count: z.number().int(),
  outcome: z.enum(["success", "failure"]),
  error: z.string().nullable(),
});

export const AlertStateRowSchema = z.object({
  channel: AlertChannelSchema,
  direction: AlertDirectionSchema,
  last_alert_at: z.string().nullable(),
  last_value: z.number().nullable(),
});

export const SettingRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});
