/**
 * Status Module - Types
 *
 * One-screen summary cached for login banners.
 */
import type { AlertChannel, AlertDirection, ResourceType } from "../store/index.js";

export type DayUsage = Readonly<{
  date: string;
  kwh: number;
  readings: number;
  expectedReadings: number;
  /** Null when the day cannot be priced */
  costPence: number | null;
  costError: string | null;
}>;

export type LedgerLine = Readonly<{
  resource: ResourceType;
  syncedThrough: string | null;
}>;

export type StatusSummary = Readonly<{
  generatedAt: string;
  /** Wall-clock time of generation in the configured zone */
  localTime: string;
  yesterday: DayUsage;
  unitRatePence: number | null;
  standingChargePence: number | null;
  alerts: Readonly<Record<AlertChannel, AlertDirection>>;
  muted: boolean;
  ledger: ReadonlyArray<LedgerLine>;
}>;
