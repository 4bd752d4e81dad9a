/**
 * Sync Module - Error Types
 *
 * Typed error union for sync failures.
 * Errors are values, not exceptions.
 */
import type { EnergyApiError } from "../energy-api/index.js";
import { formatEnergyApiError, isAuthError } from "../energy-api/errors.js";
import { type StoreError, formatStoreError } from "../store/errors.js";

export type SyncError =
  | {
      readonly type: "INVALID_WINDOW";
      readonly message: string;
    }
  | {
      readonly type: "FETCH_FAILED";
      readonly message: string;
      readonly cause: EnergyApiError;
    }
  | {
      readonly type: "STORE_FAILED";
      readonly message: string;
      readonly cause: StoreError;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function invalidWindow(message: string): SyncError {
  return { type: "INVALID_WINDOW", message };
}

export function fetchFailed(cause: EnergyApiError): SyncError {
  return { type: "FETCH_FAILED", message: formatEnergyApiError(cause), cause };
}

export function commitFailed(cause: StoreError): SyncError {
  return { type: "STORE_FAILED", message: formatStoreError(cause), cause };
}

// =============================================================================
// Error Utilities
// =============================================================================

export function formatSyncError(error: SyncError): string {
  switch (error.type) {
    case "INVALID_WINDOW":
      return `Invalid sync window: ${error.message}`;
    case "FETCH_FAILED":
      return `Fetch failed: ${error.message}`;
    case "STORE_FAILED":
      return `Store failed: ${error.message}`;
  }
}

/**
 * Rejected credentials fail the whole cycle, not just one resource.
 */
export function isFatalSyncError(error: SyncError): boolean {
  return error.type === "FETCH_FAILED" && isAuthError(error.cause);
}
