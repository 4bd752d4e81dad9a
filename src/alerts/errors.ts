/**
 * Alerts Module - Error Types
 *
 * Notification failures are not errors here: delivery is best-effort and
 * only logged. What fails an evaluation is reading or saving state.
 */
import type { EnergyApiError } from "../energy-api/index.js";
import { formatEnergyApiError } from "../energy-api/errors.js";
import { type StoreError, formatStoreError } from "../store/errors.js";

export type AlertError =
  | {
      readonly type: "STORE_ERROR";
      readonly message: string;
      readonly cause: StoreError;
    }
  | {
      readonly type: "TELEMETRY_FAILED";
      readonly message: string;
      readonly cause: EnergyApiError;
    };

export function alertStoreError(cause: StoreError): AlertError {
  return { type: "STORE_ERROR", message: formatStoreError(cause), cause };
}

export function telemetryFailed(cause: EnergyApiError): AlertError {
  return {
    type: "TELEMETRY_FAILED",
    message: formatEnergyApiError(cause),
    cause,
  };
}

export function formatAlertError(error: AlertError): string {
  switch (error.type) {
    case "STORE_ERROR":
      return `Alert state unavailable: ${error.message}`;
    case "TELEMETRY_FAILED":
      return `Live demand unavailable: ${error.message}`;
  }
}
