/**
 * Energy API Module - Schemas and Types
 *
 * Zod schemas for supplier REST and GraphQL payloads.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ResourceType } from "../store/index.js";
import type { EnergyApiError } from "./errors.js";

// =============================================================================
// REST Pagination
// =============================================================================

/**
 * Envelope shared by every paginated REST endpoint.
 * `next` is an absolute URL that already carries all query parameters.
 */
export const PageEnvelopeSchema = z.object({
  count: z.number().int().optional(),
  next: z.string().nullable().optional(),
  previous: z.string().nullable().optional(),
  results: z.array(z.unknown()),
});

/**
 * Two-phase page request. Only the first request carries filters; a
 * continuation is the server's opaque link and is fetched as-is.
 */
export type PageRequest =
  | Readonly<{
      kind: "first";
      url: string;
      params: Readonly<Record<string, string>>;
    }>
  | Readonly<{
      kind: "continuation";
      url: string;
    }>;

/**
 * One fetched page of decoded records.
 */
export type Page<T> = Readonly<{
  pageNumber: number;
  records: ReadonlyArray<T>;
  next: string | null;
}>;

// =============================================================================
// REST Records
// =============================================================================

export const ConsumptionResultSchema = z.object({
  consumption: z.number().nonnegative(),
  interval_start: z.string(),
  interval_end: z.string(),
});

export const RateResultSchema = z.object({
  value_exc_vat: z.number(),
  value_inc_vat: z.number(),
  valid_from: z.string(),
  valid_to: z.string().nullable(),
  payment_method: z.string().nullable().optional(),
});

// =============================================================================
// Account
// =============================================================================

export const AgreementSchema = z.object({
  tariff_code: z.string(),
  valid_from: z.string().nullable().optional(),
  valid_to: z.string().nullable().optional(),
});

export type Agreement = z.infer<typeof AgreementSchema>;

export const ElectricityMeterPointSchema = z.object({
  mpan: z.string().optional(),
  meters: z
    .array(z.object({ serial_number: z.string().optional() }))
    .default([]),
  agreements: z.array(AgreementSchema).default([]),
});

export const AccountResponseSchema = z.object({
  number: z.string().optional(),
  properties: z
    .array(
      z.object({
        electricity_meter_points: z.array(ElectricityMeterPointSchema).default([]),
      }),
    )
    .default([]),
});

export type AccountResponse = z.infer<typeof AccountResponseSchema>;

/**
 * Meter identifiers needed to sync one electricity supply.
 */
export type ElectricityDetails = Readonly<{
  mpan: string;
  serial: string;
  tariffCode: string;
}>;

// =============================================================================
// GraphQL
// =============================================================================

const GraphqlErrorsSchema = z
  .array(z.object({ message: z.string().optional() }).passthrough())
  .optional();

export const TokenResponseSchema = z.object({
  data: z
    .object({
      obtainKrakenToken: z.object({ token: z.string().min(1) }).nullable(),
    })
    .nullable()
    .optional(),
  errors: GraphqlErrorsSchema,
});

export const TelemetryReadingSchema = z.object({
  readAt: z.string(),
  demand: z.union([z.number(), z.string()]).nullable(),
  consumptionDelta: z.union([z.number(), z.string()]).nullable().optional(),
});

export const TelemetryResponseSchema = z.object({
  data: z
    .object({
      smartMeterTelemetry: z.array(TelemetryReadingSchema).nullable(),
    })
    .nullable()
    .optional(),
  errors: GraphqlErrorsSchema,
});

export type TelemetryReading = z.infer<typeof TelemetryReadingSchema>;

/**
 * Latest live demand sample from the smart meter companion device.
 */
export type LiveDemand = Readonly<{
  demandWatts: number;
  readAt: string;
}>;

// =============================================================================
// Client Settings
// =============================================================================

export type PaymentMethod = "DIRECT_DEBIT" | "NON_DIRECT_DEBIT";

export type EnergyApiSettings = Readonly<{
  apiKey: string;
  baseUrl: string;
  graphqlUrl: string;
  timeoutMs: number;
  paymentMethod: PaymentMethod;
}>;

/**
 * How one REST resource is requested and decoded.
 */
export type Endpoint<T> = Readonly<{
  resource: ResourceType;
  firstRequest: PageRequest;
  decode: (results: ReadonlyArray<unknown>) => Result<T[], EnergyApiError>;
}>;
