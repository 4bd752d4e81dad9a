/**
 * Sync Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  AlertDependencies,
  ResolvedWindow,
  ResourceOutcome,
  SyncClient,
  SyncDependencies,
  SyncReport,
  SyncStatus,
  SyncWindowOptions,
} from "./schema.js";
export type { SyncError } from "./errors.js";
export type { AlertRun } from "./service.js";

// Error utilities
export { formatSyncError } from "./errors.js";

// Service (side effects)
export { runAlertChecks, runSyncCycle } from "./service.js";

// Pure transformations
export { resolveSyncWindow, summarizeStatus } from "./transform.js";
