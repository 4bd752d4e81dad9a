/**
 * Energy API Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the supplier REST and GraphQL APIs.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type {
  ConsumptionReading,
  RateKind,
  RatePeriod,
  ResourceBatch,
  ResourceType,
} from "../store/index.js";
import { type TimeWindow, minutesBefore } from "../time.js";
import {
  type EnergyApiError,
  authFailed,
  graphqlError,
  httpError,
  invalidResponse,
  networkError,
  noMeterPoint,
  tokenExchangeFailed,
  tooManyPages,
} from "./errors.js";
import {
  AccountResponseSchema,
  type ElectricityDetails,
  type Endpoint,
  type EnergyApiSettings,
  type LiveDemand,
  type Page,
  PageEnvelopeSchema,
  type PageRequest,
  TelemetryResponseSchema,
  TokenResponseSchema,
} from "./schema.js";
import {
  LIVE_DEMAND_LOOKBACK_MINUTES,
  MAX_PAGES,
  PAGE_SIZE,
  TELEMETRY_QUERY,
  TOKEN_MUTATION,
  accountUrl,
  basicAuthHeader,
  consumptionUrl,
  continuationPage,
  decodeConsumption,
  decodeRates,
  extractProductCode,
  findElectricityDetails,
  firstGraphqlError,
  firstPage,
  latestDemand,
  requestUrl,
  tariffUrl,
  windowParams,
} from "./transform.js";

const log = createLogger("api");

/** Exchange attempts allowed per session: the first plus one retry. */
export const MAX_TOKEN_ATTEMPTS = 2;

/**
 * Lazy, finite sequence of pages. Every iteration starts again from the
 * first page and ends after the last page or the first error.
 */
export type PagedSequence<T> = AsyncIterable<Result<Page<T>, EnergyApiError>>;

/**
 * Holds one bearer token for the length of a sync cycle.
 */
export interface TokenSession {
  getToken(): Promise<Result<string, EnergyApiError>>;
  /** Exchange calls made so far */
  readonly attempts: number;
}

export interface EnergyApiClient {
  paginate<T>(endpoint: Endpoint<T>): PagedSequence<T>;
  consumptionEndpoint(
    meter: ElectricityDetails,
    window: TimeWindow,
  ): Endpoint<ConsumptionReading>;
  rateEndpoint(
    kind: RateKind,
    tariffCode: string,
    window: TimeWindow,
  ): Result<Endpoint<RatePeriod>, EnergyApiError>;
  /** Fetch every page of one resource for the window */
  fetchResource(
    resource: ResourceType,
    meter: ElectricityDetails,
    window: TimeWindow,
  ): Promise<Result<ResourceBatch, EnergyApiError>>;
  exchangeToken(): Promise<Result<string, EnergyApiError>>;
  createTokenSession(): TokenSession;
  getLiveDemand(
    token: string,
    deviceId: string,
    now: Date,
  ): Promise<Result<LiveDemand | null, EnergyApiError>>;
  getElectricityDetails(
    accountNumber: string,
    now: Date,
  ): Promise<Result<ElectricityDetails, EnergyApiError>>;
}

// =============================================================================
// Pagination
// =============================================================================

/**
 * Drain a paged sequence. Either every record or the first error;
 * records from pages before a failure never escape.
 */
export async function fetchAll<T>(
  pages: PagedSequence<T>,
): Promise<Result<T[], EnergyApiError>> {
  const records: T[] = [];
  for await (const page of pages) {
    if (page.isErr()) {
      return err(page.error);
    }
    records.push(...page.value.records);
  }
  return ok(records);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isTimeout(cause: Error): boolean {
  return cause.name === "TimeoutError" || cause.name === "AbortError";
}

/**
 * Read a successful response body. Malformed JSON is the server's fault,
 * anything else while reading is the transport's.
 */
async function readJsonBody(
  response: Response,
  source: string,
): Promise<Result<unknown, EnergyApiError>> {
  try {
    return ok(await response.json());
  } catch (error) {
    const cause = toError(error);
    if (cause instanceof SyntaxError) {
      return err(invalidResponse(`${source} returned malformed JSON: ${cause.message}`));
    }
    if (isTimeout(cause)) {
      return err(networkError("Response body timed out", cause));
    }
    return err(networkError(`Failed to read response from ${source}`, cause));
  }
}

// =============================================================================
// Client Factory
// =============================================================================

export function createEnergyApiClient(
  settings: EnergyApiSettings,
): EnergyApiClient {
  const authorization = basicAuthHeader(settings.apiKey);

  async function getJson(url: string): Promise<Result<unknown, EnergyApiError>> {
    log.debug({ url }, "GET");

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          Authorization: authorization,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(settings.timeoutMs),
      });

      if (response.status === 401 || response.status === 403) {
        return err(
          authFailed(`HTTP ${response.status}: ${response.statusText}`, response.status),
        );
      }

      if (!response.ok) {
        const body = await response.text();
        return err(
          httpError(`HTTP ${response.status}: ${body.slice(0, 200)}`, response.status),
        );
      }

      return readJsonBody(response, url);
    } catch (error) {
      const cause = toError(error);
      if (isTimeout(cause)) {
        return err(networkError("Request timed out", cause));
      }
      return err(networkError(`Failed to fetch ${url}`, cause));
    }
  }

  async function postGraphql(
    body: Readonly<{ query: string; variables: Record<string, unknown> }>,
    token?: string,
  ): Promise<Result<unknown, EnergyApiError>> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (token !== undefined) {
      headers.Authorization = token;
    }

    try {
      const response = await fetch(settings.graphqlUrl, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(settings.timeoutMs),
      });

      if (response.status === 401 || response.status === 403) {
        return err(
          authFailed(`HTTP ${response.status}: ${response.statusText}`, response.status),
        );
      }
      if (!response.ok) {
        return err(
          httpError(`HTTP ${response.status}: ${response.statusText}`, response.status),
        );
      }

      return readJsonBody(response, settings.graphqlUrl);
    } catch (error) {
      const cause = toError(error);
      if (isTimeout(cause)) {
        return err(networkError("GraphQL request timed out", cause));
      }
      return err(networkError("GraphQL request failed", cause));
    }
  }

  async function fetchPage<T>(
    endpoint: Endpoint<T>,
    request: PageRequest,
    pageNumber: number,
  ): Promise<Result<Page<T>, EnergyApiError>> {
    const body = await getJson(requestUrl(request));
    if (body.isErr()) {
      return err(body.error);
    }

    const envelope = PageEnvelopeSchema.safeParse(body.value);
    if (!envelope.success) {
      return err(
        invalidResponse(`Invalid ${endpoint.resource} page envelope`, body.value),
      );
    }

    return endpoint.decode(envelope.data.results).map((records) => ({
      pageNumber,
      records,
      next: envelope.data.next ?? null,
    }));
  }

  function paginate<T>(endpoint: Endpoint<T>): PagedSequence<T> {
    return {
      async *[Symbol.asyncIterator]() {
        let request: PageRequest = endpoint.firstRequest;

        for (let pageNumber = 1; ; pageNumber += 1) {
          if (pageNumber > MAX_PAGES) {
            yield err(tooManyPages(MAX_PAGES));
            return;
          }

          const page = await fetchPage(endpoint, request, pageNumber);
          yield page;

          if (page.isErr() || page.value.next === null) {
            if (page.isOk()) {
              log.debug(
                { resource: endpoint.resource, pages: pageNumber },
                "Pagination complete",
              );
            }
            return;
          }

          request = continuationPage(page.value.next);
        }
      },
    };
  }

  function consumptionEndpoint(
    meter: ElectricityDetails,
    window: TimeWindow,
  ): Endpoint<ConsumptionReading> {
    return {
      resource: "consumption",
      firstRequest: firstPage(consumptionUrl(settings.baseUrl, meter.mpan, meter.serial), {
        ...windowParams(window),
        page_size: String(PAGE_SIZE),
        order_by: "period",
      }),
      decode: decodeConsumption,
    };
  }

  function rateEndpoint(
    kind: RateKind,
    tariffCode: string,
    window: TimeWindow,
  ): Result<Endpoint<RatePeriod>, EnergyApiError> {
    return extractProductCode(tariffCode).map((productCode): Endpoint<RatePeriod> => ({
      resource: kind === "unit" ? "unit_rates" : "standing_charges",
      firstRequest: firstPage(tariffUrl(settings.baseUrl, productCode, tariffCode, kind), {
        ...windowParams(window),
        page_size: String(PAGE_SIZE),
      }),
      decode: (results: ReadonlyArray<unknown>) =>
        decodeRates(kind, settings.paymentMethod, results),
    }));
  }

  async function fetchResource(
    resource: ResourceType,
    meter: ElectricityDetails,
    window: TimeWindow,
  ): Promise<Result<ResourceBatch, EnergyApiError>> {
    if (resource === "consumption") {
      const records = await fetchAll(paginate(consumptionEndpoint(meter, window)));
      return records.map((list): ResourceBatch => ({ resource, records: list }));
    }

    const kind = resource === "unit_rates" ? "unit" : "standing";
    const endpoint = rateEndpoint(kind, meter.tariffCode, window);
    if (endpoint.isErr()) {
      return err(endpoint.error);
    }
    const records = await fetchAll(paginate(endpoint.value));
    return records.map((list): ResourceBatch => ({ resource, records: list }));
  }

  // ---------------------------------------------------------------------------
  // GraphQL
  // ---------------------------------------------------------------------------

  async function exchangeToken(): Promise<Result<string, EnergyApiError>> {
    log.debug("Exchanging API key for GraphQL token");

    const response = await postGraphql({
      query: TOKEN_MUTATION,
      variables: { input: { APIKey: settings.apiKey } },
    });
    if (response.isErr()) {
      const cause = "cause" in response.error ? response.error.cause : undefined;
      return err(tokenExchangeFailed(response.error.message, cause));
    }

    const parsed = TokenResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(tokenExchangeFailed("Invalid token response format"));
    }

    const message = firstGraphqlError(parsed.data.errors);
    if (message !== null) {
      return err(tokenExchangeFailed(message));
    }

    const token = parsed.data.data?.obtainKrakenToken?.token;
    if (!token) {
      return err(tokenExchangeFailed("Token missing from response"));
    }

    log.debug({ length: token.length }, "GraphQL token obtained");
    return ok(token);
  }

  function createTokenSession(): TokenSession {
    let token: string | null = null;
    let failure: EnergyApiError | null = null;
    let attempts = 0;

    return {
      get attempts() {
        return attempts;
      },

      async getToken() {
        if (token !== null) {
          return ok(token);
        }

        while (attempts < MAX_TOKEN_ATTEMPTS) {
          attempts += 1;
          const result = await exchangeToken();
          if (result.isOk()) {
            token = result.value;
            return ok(token);
          }
          failure = result.error;
          log.warn(
            { attempt: attempts, error: result.error.message },
            "Token exchange failed",
          );
        }

        return err(failure ?? tokenExchangeFailed("Token exchange not attempted"));
      },
    };
  }

  async function getLiveDemand(
    token: string,
    deviceId: string,
    now: Date,
  ): Promise<Result<LiveDemand | null, EnergyApiError>> {
    const response = await postGraphql(
      {
        query: TELEMETRY_QUERY,
        variables: {
          deviceId,
          start: minutesBefore(LIVE_DEMAND_LOOKBACK_MINUTES, now),
          end: now.toISOString(),
        },
      },
      token,
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const parsed = TelemetryResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(invalidResponse("Invalid telemetry response format", response.value));
    }

    const message = firstGraphqlError(parsed.data.errors);
    if (message !== null) {
      return err(graphqlError(message));
    }

    const demand = latestDemand(parsed.data.data?.smartMeterTelemetry ?? []);
    if (demand === null) {
      log.debug({ deviceId }, "No live telemetry in lookback window");
    } else {
      log.debug({ ...demand }, "Live demand read");
    }
    return ok(demand);
  }

  async function getElectricityDetails(
    accountNumber: string,
    now: Date,
  ): Promise<Result<ElectricityDetails, EnergyApiError>> {
    const body = await getJson(accountUrl(settings.baseUrl, accountNumber));
    if (body.isErr()) {
      return err(body.error);
    }

    const parsed = AccountResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(invalidResponse("Invalid account response format", body.value));
    }

    const details = findElectricityDetails(parsed.data, now);
    return details === null ? err(noMeterPoint(accountNumber)) : ok(details);
  }

  return {
    paginate,
    consumptionEndpoint,
    rateEndpoint,
    fetchResource,
    exchangeToken,
    createTokenSession,
    getLiveDemand,
    getElectricityDetails,
  };
}
