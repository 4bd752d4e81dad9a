/**
 * Energy API Module - Pure Transformations
 *
 * Request building, record decoding and account inspection.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { ConsumptionReading, RateKind, RatePeriod } from "../store/index.js";
import { type TimeWindow, toUtcIso } from "../time.js";
import {
  type EnergyApiError,
  invalidResponse,
  invalidTariff,
} from "./errors.js";
import {
  type AccountResponse,
  type Agreement,
  ConsumptionResultSchema,
  type ElectricityDetails,
  type LiveDemand,
  type PageRequest,
  type PaymentMethod,
  RateResultSchema,
  type TelemetryReading,
} from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/** Largest page the REST API serves. */
export const PAGE_SIZE = 25_000;

/** Upper bound on pages followed for one resource in one fetch. */
export const MAX_PAGES = 500;

/** Telemetry lookback for live demand. */
export const LIVE_DEMAND_LOOKBACK_MINUTES = 5;

/**
 * E-1R-VAR-22-11-01-C -> VAR-22-11-01
 * E-1R-AGILE-FLEX-22-11-25-C -> AGILE-FLEX-22-11-25
 */
const TARIFF_PATTERN = /^[EG]-[12]R-(.+)-[A-P]$/;

export const TOKEN_MUTATION = `
  mutation obtainKrakenToken($input: ObtainJSONWebTokenInput!) {
    obtainKrakenToken(input: $input) { token }
  }
`;

export const TELEMETRY_QUERY = `
  query smartMeterTelemetry($deviceId: String!, $start: DateTime!, $end: DateTime!) {
    smartMeterTelemetry(deviceId: $deviceId, grouping: TEN_SECONDS, start: $start, end: $end) {
      readAt
      demand
      consumptionDelta
    }
  }
`;

// =============================================================================
// Requests
// =============================================================================

/**
 * Extract the product code a tariff belongs to.
 */
export function extractProductCode(
  tariffCode: string,
): Result<string, EnergyApiError> {
  const product = TARIFF_PATTERN.exec(tariffCode)?.[1];
  return product === undefined ? err(invalidTariff(tariffCode)) : ok(product);
}

/**
 * Basic auth with the API key as user and an empty password.
 */
export function basicAuthHeader(apiKey: string): string {
  return `Basic ${Buffer.from(`${apiKey}:`).toString("base64")}`;
}

export function firstPage(
  url: string,
  params: Readonly<Record<string, string>>,
): PageRequest {
  return { kind: "first", url, params };
}

export function continuationPage(url: string): PageRequest {
  return { kind: "continuation", url };
}

/**
 * Resolve a page request to the URL to fetch.
 * Continuations are used verbatim.
 */
export function requestUrl(request: PageRequest): string {
  if (request.kind === "continuation") {
    return request.url;
  }
  const url = new URL(request.url);
  for (const [key, value] of Object.entries(request.params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function windowParams(window: TimeWindow): Record<string, string> {
  return { period_from: window.from, period_to: window.to };
}

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path}`;
}

export function consumptionUrl(baseUrl: string, mpan: string, serial: string): string {
  return joinUrl(
    baseUrl,
    `electricity-meter-points/${encodeURIComponent(mpan)}/meters/${encodeURIComponent(serial)}/consumption/`,
  );
}

export function tariffUrl(
  baseUrl: string,
  productCode: string,
  tariffCode: string,
  kind: RateKind,
): string {
  const series = kind === "unit" ? "standard-unit-rates" : "standing-charges";
  return joinUrl(
    baseUrl,
    `products/${encodeURIComponent(productCode)}/electricity-tariffs/${encodeURIComponent(tariffCode)}/${series}/`,
  );
}

export function accountUrl(baseUrl: string, accountNumber: string): string {
  return joinUrl(baseUrl, `accounts/${encodeURIComponent(accountNumber)}/`);
}

// =============================================================================
// Record Decoding
// =============================================================================

/**
 * Decode consumption results into readings with UTC timestamps.
 */
export function decodeConsumption(
  results: ReadonlyArray<unknown>,
): Result<ConsumptionReading[], EnergyApiError> {
  const readings: ConsumptionReading[] = [];

  for (const raw of results) {
    const parsed = ConsumptionResultSchema.safeParse(raw);
    if (!parsed.success) {
      return err(invalidResponse("Malformed consumption record", raw));
    }
    const intervalStart = toUtcIso(parsed.data.interval_start);
    const intervalEnd = toUtcIso(parsed.data.interval_end);
    if (intervalStart === null || intervalEnd === null) {
      return err(invalidResponse("Unparseable consumption interval", raw));
    }
    readings.push({ intervalStart, intervalEnd, kwh: parsed.data.consumption });
  }

  return ok(readings);
}

/**
 * Decode rate results, keeping records for the configured payment method
 * (records without one apply to every method).
 */
export function decodeRates(
  kind: RateKind,
  paymentMethod: PaymentMethod,
  results: ReadonlyArray<unknown>,
): Result<RatePeriod[], EnergyApiError> {
  const periods: RatePeriod[] = [];

  for (const raw of results) {
    const parsed = RateResultSchema.safeParse(raw);
    if (!parsed.success) {
      return err(invalidResponse(`Malformed ${kind} rate record`, raw));
    }
    const record = parsed.data;
    if (record.payment_method && record.payment_method !== paymentMethod) {
      continue;
    }

    const validFrom = toUtcIso(record.valid_from);
    const validTo = record.valid_to === null ? null : toUtcIso(record.valid_to);
    if (validFrom === null || (record.valid_to !== null && validTo === null)) {
      return err(invalidResponse(`Unparseable ${kind} rate validity`, raw));
    }

    periods.push({
      kind,
      validFrom,
      validTo,
      valueExcVat: record.value_exc_vat,
      valueIncVat: record.value_inc_vat,
    });
  }

  return ok(periods);
}

// =============================================================================
// Account
// =============================================================================

/**
 * The agreement in force at `nowIso`: open-ended or ending later, latest
 * start first. Falls back to the last listed agreement.
 */
export function selectCurrentAgreement(
  agreements: ReadonlyArray<Agreement>,
  nowIso: string,
): Agreement | null {
  const byStartDesc = [...agreements].sort((a, b) => {
    const aFrom = a.valid_from ?? "";
    const bFrom = b.valid_from ?? "";
    return aFrom < bFrom ? 1 : aFrom > bFrom ? -1 : 0;
  });

  const current = byStartDesc.find((agreement) => {
    if (agreement.valid_to === null || agreement.valid_to === undefined) {
      return true;
    }
    const validTo = toUtcIso(agreement.valid_to);
    return validTo !== null && validTo > nowIso;
  });

  return current ?? agreements[agreements.length - 1] ?? null;
}

/**
 * First electricity meter point with a meter and an agreement.
 */
export function findElectricityDetails(
  account: AccountResponse,
  now: Date,
): ElectricityDetails | null {
  const nowIso = now.toISOString();

  for (const property of account.properties) {
    for (const point of property.electricity_meter_points) {
      const serial = point.meters[point.meters.length - 1]?.serial_number;
      const agreement = selectCurrentAgreement(point.agreements, nowIso);
      if (!point.mpan || !serial || !agreement) {
        continue;
      }
      return { mpan: point.mpan, serial, tariffCode: agreement.tariff_code };
    }
  }

  return null;
}

// =============================================================================
// Telemetry
// =============================================================================

/**
 * Latest sample with a usable demand value, or null.
 */
export function latestDemand(
  readings: ReadonlyArray<TelemetryReading>,
): LiveDemand | null {
  for (let i = readings.length - 1; i >= 0; i -= 1) {
    const reading = readings[i];
    if (!reading || reading.demand === null) continue;

    const demandWatts = Number(reading.demand);
    const readAt = toUtcIso(reading.readAt);
    if (Number.isFinite(demandWatts) && readAt !== null) {
      return { demandWatts, readAt };
    }
  }
  return null;
}

/**
 * First GraphQL error message, if the response carries any.
 */
export function firstGraphqlError(
  errors: ReadonlyArray<{ message?: string | undefined }> | undefined,
): string | null {
  if (!errors || errors.length === 0) {
    return null;
  }
  return errors[0]?.message ?? "Unknown GraphQL error";
}
