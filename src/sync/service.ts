/**
 * Sync Module - Service Layer
 *
 * One cycle: fetch every resource into the store, one unit of work per
 * resource, then evaluate alerts over what is stored.
 * A failed resource is logged and recorded; the others still run.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type AlertError,
  type AlertOutcome,
  evaluateDailyUsage,
  evaluateLiveDemand,
  formatAlertError,
  readLiveDemand,
} from "../alerts/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { RESOURCE_TYPES, type ResourceType, formatStoreError } from "../store/index.js";
import type { TimeWindow } from "../time.js";
import {
  type SyncError,
  commitFailed,
  fetchFailed,
  formatSyncError,
} from "./errors.js";
import type {
  AlertDependencies,
  ResourceOutcome,
  SyncDependencies,
  SyncReport,
  SyncWindowOptions,
} from "./schema.js";
import { isEmptyWindow, resolveSyncWindow, summarizeStatus } from "./transform.js";

const log = createLogger("sync");

// =============================================================================
// Per Resource
// =============================================================================

async function syncResource(
  deps: SyncDependencies,
  resource: ResourceType,
  window: TimeWindow,
): Promise<ResourceOutcome> {
  if (isEmptyWindow(window)) {
    log.info({ resource, from: window.from }, "Already up to date");
    return { resource, status: "up_to_date", window };
  }

  const startTime = Date.now();
  logOperationStart(log, `sync ${resource}`, { ...window });

  const fetched = await deps.client.fetchResource(resource, deps.meter, window);
  const committed = fetched
    .mapErr(fetchFailed)
    .andThen((batch) =>
      deps.store.commitResource(batch, window, deps.now()).mapErr(commitFailed),
    );

  if (committed.isOk()) {
    const { recordCount, syncedThrough } = committed.value;
    logOperationComplete(log, `sync ${resource}`, startTime, { records: recordCount });
    return { resource, status: "synced", window, recordCount, syncedThrough };
  }

  const error = committed.error;
  logOperationFailed(log, `sync ${resource}`, formatSyncError(error));

  const recorded = deps.store.recordSyncFailure(
    resource,
    window,
    formatSyncError(error),
    deps.now(),
  );
  if (recorded.isErr()) {
    log.error(
      { resource, error: formatStoreError(recorded.error) },
      "Could not record sync failure",
    );
  }

  return { resource, status: "failed", window, error };
}

// =============================================================================
// Alerts
// =============================================================================

export type AlertRun = Readonly<{
  alerts: ReadonlyArray<AlertOutcome>;
  alertErrors: ReadonlyArray<string>;
}>;

/**
 * Daily usage first, then live demand when a device is configured.
 * Failures are collected, never raised.
 */
export async function runAlertChecks(deps: AlertDependencies): Promise<AlertRun> {
  const alerts: AlertOutcome[] = [];
  const alertErrors: string[] = [];
  const context = {
    store: deps.store,
    notifier: deps.notifier,
    settings: deps.alertSettings,
    now: deps.now(),
  };

  const daily = await evaluateDailyUsage(context);
  if (daily.isOk()) {
    alerts.push(daily.value);
  } else {
    log.warn({ error: formatAlertError(daily.error) }, "Daily usage check failed");
    alertErrors.push(formatAlertError(daily.error));
  }

  if (deps.deviceId === null) {
    log.debug("No device id configured, skipping live demand");
    return { alerts, alertErrors };
  }

  const session = deps.client.createTokenSession();
  const demand = await readLiveDemand(deps.client, session, deps.deviceId, context.now);
  const evaluated: Result<AlertOutcome, AlertError> = demand.isOk()
    ? await evaluateLiveDemand(context, demand.value)
    : err(demand.error);

  if (evaluated.isOk()) {
    alerts.push(evaluated.value);
  } else {
    log.warn({ error: formatAlertError(evaluated.error) }, "Live demand check failed");
    alertErrors.push(formatAlertError(evaluated.error));
  }

  return { alerts, alertErrors };
}

// =============================================================================
// Cycle
// =============================================================================

/**
 * Run one sync cycle. Only an unusable window fails the call;
 * resource failures are reported in the SyncReport.
 */
export async function runSyncCycle(
  deps: SyncDependencies,
  options: SyncWindowOptions = {},
): Promise<Result<SyncReport, SyncError>> {
  const startedAt = deps.now();
  const resources: ResourceOutcome[] = [];

  for (const resource of RESOURCE_TYPES) {
    const ledger = deps.store.getLedger(resource);
    if (ledger.isErr()) {
      log.warn(
        { resource, error: formatStoreError(ledger.error) },
        "Ledger unreadable, using default lookback",
      );
    }
    const syncedThrough = ledger.isOk() ? (ledger.value?.syncedThrough ?? null) : null;

    const resolved = resolveSyncWindow(
      options,
      syncedThrough,
      startedAt,
      deps.defaultLookbackDays,
    );
    if (resolved.isErr()) {
      return err(resolved.error);
    }
    if (resolved.value.source === "ledger") {
      log.info({ resource, from: resolved.value.window.from }, "Resuming from ledger");
    }

    resources.push(await syncResource(deps, resource, resolved.value.window));
  }

  const { alerts, alertErrors } = await runAlertChecks(deps);
  const status = summarizeStatus(resources);

  log.info(
    {
      status,
      records: resources.reduce(
        (sum, outcome) => sum + (outcome.status === "synced" ? outcome.recordCount : 0),
        0,
      ),
    },
    "Sync cycle finished",
  );

  return ok({
    startedAt: startedAt.toISOString(),
    finishedAt: deps.now().toISOString(),
    status,
    resources,
    alerts,
    alertErrors,
  });
}
