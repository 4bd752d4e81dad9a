/**
 * Sync Module - Types
 *
 * Window options, per-resource outcomes and the cycle report.
 */
import type { AlertOutcome, AlertSettings } from "../alerts/index.js";
import type { ElectricityDetails, EnergyApiClient } from "../energy-api/index.js";
import type { Notifier } from "../notifications/index.js";
import type { ResourceType, TimeSeriesStore } from "../store/index.js";
import type { TimeWindow } from "../time.js";
import type { SyncError } from "./errors.js";

/**
 * Caller overrides, in priority order: from/to, then days.
 * Without either each resource resumes from its ledger.
 */
export type SyncWindowOptions = Readonly<{
  from?: string;
  to?: string;
  days?: number;
}>;

export type WindowSource = "explicit" | "days" | "ledger" | "default";

export type ResolvedWindow = Readonly<{
  window: TimeWindow;
  source: WindowSource;
}>;

export type ResourceOutcome =
  | Readonly<{
      resource: ResourceType;
      status: "synced";
      window: TimeWindow;
      recordCount: number;
      syncedThrough: string;
    }>
  | Readonly<{
      resource: ResourceType;
      status: "failed";
      window: TimeWindow;
      error: SyncError;
    }>
  | Readonly<{
      resource: ResourceType;
      status: "up_to_date";
      window: TimeWindow;
    }>;

/**
 * ok: every resource synced or was already current.
 * partial: at least one resource failed, at least one did not.
 * failed: every resource failed, or the credentials were rejected.
 */
export type SyncStatus = "ok" | "partial" | "failed";

export type SyncReport = Readonly<{
  startedAt: string;
  finishedAt: string;
  status: SyncStatus;
  resources: ReadonlyArray<ResourceOutcome>;
  alerts: ReadonlyArray<AlertOutcome>;
  /** Formatted alert failures; they never change the sync status */
  alertErrors: ReadonlyArray<string>;
}>;

export type SyncClient = Pick<
  EnergyApiClient,
  "fetchResource" | "createTokenSession" | "getLiveDemand"
>;

/**
 * What the alert checks need: no meter, the store is only read and
 * alert state written.
 */
export type AlertDependencies = Readonly<{
  store: TimeSeriesStore;
  client: Pick<EnergyApiClient, "createTokenSession" | "getLiveDemand">;
  notifier: Notifier;
  /** Smart meter companion device; live demand is skipped when null */
  deviceId: string | null;
  alertSettings: AlertSettings;
  now: () => Date;
}>;

/**
 * Everything a cycle touches, injected by the CLI.
 */
export type SyncDependencies = Readonly<{
  store: TimeSeriesStore;
  client: SyncClient;
  notifier: Notifier;
  meter: ElectricityDetails;
  /** Smart meter companion device; live demand is skipped when null */
  deviceId: string | null;
  alertSettings: AlertSettings;
  defaultLookbackDays: number;
  now: () => Date;
}>;
