/**
 * Energy API Module - Error Types
 *
 * Typed error unions for supplier API operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur talking to the supplier API.
 *
 * TOKEN_EXCHANGE_FAILED is kept apart from data-fetch failures: a failed
 * exchange must never be confused with a failed page.
 */
export type EnergyApiError =
  | {
      readonly type: "AUTH_FAILED";
      readonly message: string;
      readonly status: number;
    }
  | {
      readonly type: "TOKEN_EXCHANGE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "HTTP_ERROR";
      readonly message: string;
      readonly status: number;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "GRAPHQL_ERROR";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "INVALID_TARIFF";
      readonly message: string;
      readonly tariffCode: string;
    }
  | {
      readonly type: "NO_METER_POINT";
      readonly message: string;
      readonly accountNumber: string;
    }
  | {
      readonly type: "TOO_MANY_PAGES";
      readonly message: string;
      readonly pages: number;
    };

export function authFailed(message: string, status: number): EnergyApiError {
  return { type: "AUTH_FAILED", message, status };
}

export function tokenExchangeFailed(
  message: string,
  cause?: Error,
): EnergyApiError {
  if (cause) {
    return { type: "TOKEN_EXCHANGE_FAILED", message, cause };
  }
  return { type: "TOKEN_EXCHANGE_FAILED", message };
}

export function httpError(message: string, status: number): EnergyApiError {
  return { type: "HTTP_ERROR", message, status };
}

export function networkError(message: string, cause?: Error): EnergyApiError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

export function graphqlError(message: string): EnergyApiError {
  return { type: "GRAPHQL_ERROR", message };
}

export function invalidResponse(
  message: string,
  responseData?: unknown,
): EnergyApiError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function invalidTariff(tariffCode: string): EnergyApiError {
  return {
    type: "INVALID_TARIFF",
    message: `Cannot extract product code from tariff: ${tariffCode}`,
    tariffCode,
  };
}

export function noMeterPoint(accountNumber: string): EnergyApiError {
  return {
    type: "NO_METER_POINT",
    message: `No electricity meter points found on account ${accountNumber}`,
    accountNumber,
  };
}

export function tooManyPages(pages: number): EnergyApiError {
  return {
    type: "TOO_MANY_PAGES",
    message: `Stopped after ${pages} pages without reaching the end`,
    pages,
  };
}

/**
 * Format an EnergyApiError for logging.
 */
export function formatEnergyApiError(error: EnergyApiError): string {
  switch (error.type) {
    case "AUTH_FAILED":
      return `Authentication failed (HTTP ${error.status}): ${error.message}`;
    case "TOKEN_EXCHANGE_FAILED":
      return `Token exchange failed: ${error.message}`;
    case "HTTP_ERROR":
      return `HTTP error: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "GRAPHQL_ERROR":
      return `GraphQL error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "INVALID_TARIFF":
    case "NO_METER_POINT":
    case "TOO_MANY_PAGES":
      return error.message;
  }
}

/**
 * Auth failures are fatal for the whole run, not just one resource.
 */
export function isAuthError(error: EnergyApiError): boolean {
  return error.type === "AUTH_FAILED" || error.type === "TOKEN_EXCHANGE_FAILED";
}
