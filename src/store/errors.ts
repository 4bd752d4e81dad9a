/**
 * Store Module - Error Types
 *
 * Typed error unions for storage operations.
 * Errors are values, not exceptions.
 */
import type { RateKind } from "./schema.js";

type PeriodBounds = Readonly<{ validFrom: string; validTo: string | null }>;

/**
 * Errors that can occur during store operations.
 */
export type StoreError =
  | {
      readonly type: "STORE_FAILED";
      readonly operation: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "RATE_OVERLAP";
      readonly kind: RateKind;
      readonly message: string;
      readonly first: PeriodBounds;
      readonly second: PeriodBounds;
    }
  | {
      readonly type: "INVALID_ROW";
      readonly table: string;
      readonly message: string;
      readonly row?: unknown;
    };

/**
 * Create a STORE_FAILED error.
 */
export function storeFailed(
  operation: string,
  message: string,
  cause?: Error,
): StoreError {
  if (cause) {
    return { type: "STORE_FAILED", operation, message, cause };
  }
  return { type: "STORE_FAILED", operation, message };
}

/**
 * Create a RATE_OVERLAP error.
 */
export function rateOverlap(
  kind: RateKind,
  first: PeriodBounds,
  second: PeriodBounds,
): StoreError {
  return {
    type: "RATE_OVERLAP",
    kind,
    message: `${kind} rate periods overlap: [${first.validFrom}, ${first.validTo ?? "open"}) and [${second.validFrom}, ${second.validTo ?? "open"})`,
    first,
    second,
  };
}

/**
 * Create an INVALID_ROW error.
 */
export function invalidRow(
  table: string,
  message: string,
  row?: unknown,
): StoreError {
  return { type: "INVALID_ROW", table, message, row };
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "STORE_FAILED":
      return `Store ${error.operation} failed: ${error.message}`;
    case "RATE_OVERLAP":
      return `Data integrity: ${error.message}`;
    case "INVALID_ROW":
      return `Invalid ${error.table} row: ${error.message}`;
  }
}
