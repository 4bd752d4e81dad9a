/**
 * Cost Module - Error Types
 *
 * A cost is never guessed: every gap or conflict in the rate data is an error.
 */
import { type StoreError, formatStoreError } from "../store/errors.js";

export type CostError =
  | {
      readonly type: "NO_RATE_COVERAGE";
      readonly message: string;
      readonly intervalStart: string;
    }
  | {
      readonly type: "AMBIGUOUS_RATE";
      readonly message: string;
      readonly validFrom: string;
    }
  | {
      readonly type: "NO_STANDING_CHARGE";
      readonly message: string;
      readonly date: string;
    }
  | {
      readonly type: "STORE_ERROR";
      readonly message: string;
      readonly cause: StoreError;
    };

export function noRateCoverage(intervalStart: string): CostError {
  return {
    type: "NO_RATE_COVERAGE",
    message: `No unit rate covers the interval starting ${intervalStart}`,
    intervalStart,
  };
}

export function ambiguousRate(validFrom: string): CostError {
  return {
    type: "AMBIGUOUS_RATE",
    message: `More than one unit rate is valid at ${validFrom}`,
    validFrom,
  };
}

export function noStandingCharge(date: string): CostError {
  return {
    type: "NO_STANDING_CHARGE",
    message: `No standing charge covers ${date}`,
    date,
  };
}

export function costStoreError(cause: StoreError): CostError {
  return { type: "STORE_ERROR", message: formatStoreError(cause), cause };
}

export function formatCostError(error: CostError): string {
  switch (error.type) {
    case "NO_RATE_COVERAGE":
    case "AMBIGUOUS_RATE":
    case "NO_STANDING_CHARGE":
      return `Data integrity: ${error.message}. Run sync to fetch rates.`;
    case "STORE_ERROR":
      return error.message;
  }
}
