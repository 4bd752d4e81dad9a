/**
 * Sync Module - Pure Transformations
 *
 * Window resolution and report status.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import { type TimeWindow, daysAgo, toUtcIso } from "../time.js";
import { type SyncError, invalidWindow, isFatalSyncError } from "./errors.js";
import type {
  ResolvedWindow,
  ResourceOutcome,
  SyncStatus,
  SyncWindowOptions,
} from "./schema.js";

// =============================================================================
// Window Resolution
// =============================================================================

function parseBound(label: string, value: string): Result<string, SyncError> {
  const iso = toUtcIso(value);
  return iso === null
    ? err(invalidWindow(`cannot parse ${label} "${value}"`))
    : ok(iso);
}

function ordered(
  window: TimeWindow,
  source: ResolvedWindow["source"],
): Result<ResolvedWindow, SyncError> {
  if (window.from >= window.to) {
    return err(invalidWindow(`${window.from} is not before ${window.to}`));
  }
  return ok({ window, source });
}

/**
 * Pick the fetch window for one resource.
 *
 * Priority: explicit from/to, then `days` (midnight UTC N days ago), then the
 * resource's ledger, then the default lookback. `to` defaults to now.
 * A ledger window may be empty when the resource is already current.
 */
export function resolveSyncWindow(
  options: SyncWindowOptions,
  syncedThrough: string | null,
  now: Date,
  defaultLookbackDays: number,
): Result<ResolvedWindow, SyncError> {
  const to =
    options.to === undefined ? ok(now.toISOString()) : parseBound("to", options.to);

  return to.andThen((periodTo): Result<ResolvedWindow, SyncError> => {
    if (options.from !== undefined) {
      return parseBound("from", options.from).andThen((from) =>
        ordered({ from, to: periodTo }, "explicit"),
      );
    }

    if (options.days !== undefined) {
      if (!Number.isInteger(options.days) || options.days <= 0) {
        return err(invalidWindow(`days must be a positive integer, got ${options.days}`));
      }
      return ordered({ from: daysAgo(options.days, now), to: periodTo }, "days");
    }

    if (syncedThrough !== null) {
      return ok({
        window: { from: syncedThrough, to: periodTo },
        source: "ledger",
      });
    }

    return ordered(
      { from: daysAgo(defaultLookbackDays, now), to: periodTo },
      "default",
    );
  });
}

export function isEmptyWindow(window: TimeWindow): boolean {
  return window.from >= window.to;
}

// =============================================================================
// Report
// =============================================================================

export function summarizeStatus(outcomes: ReadonlyArray<ResourceOutcome>): SyncStatus {
  const failures = outcomes.filter((outcome) => outcome.status === "failed");
  if (failures.length === 0) {
    return "ok";
  }

  const fatal = failures.some(
    (outcome) => outcome.status === "failed" && isFatalSyncError(outcome.error),
  );
  if (fatal || failures.length === outcomes.length) {
    return "failed";
  }
  return "partial";
}
