/**
 * Energy API Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  basicAuthHeader,
  consumptionUrl,
  continuationPage,
  decodeConsumption,
  decodeRates,
  extractProductCode,
  findElectricityDetails,
  firstPage,
  latestDemand,
  requestUrl,
  selectCurrentAgreement,
  tariffUrl,
} from "../transform.js";

// =============================================================================
// Requests
// =============================================================================

describe("extractProductCode", () => {
  it("extracts a variable tariff product", () => {
    expect(extractProductCode("E-1R-VAR-22-11-01-C")._unsafeUnwrap()).toBe(
      "VAR-22-11-01",
    );
  });

  it("keeps hyphens inside the product code", () => {
    expect(
      extractProductCode("E-1R-AGILE-FLEX-22-11-25-C")._unsafeUnwrap(),
    ).toBe("AGILE-FLEX-22-11-25");
  });

  it("rejects codes without a region letter", () => {
    const error = extractProductCode("VAR-22-11-01")._unsafeUnwrapErr();
    expect(error.type).toBe("INVALID_TARIFF");
  });
});

describe("basicAuthHeader", () => {
  it("uses the key as user with an empty password", () => {
    expect(basicAuthHeader("test-key")).toBe("Basic dGVzdC1rZXk6");
  });
});

describe("requestUrl", () => {
  it("adds filters to the first request", () => {
    const url = new URL(
      requestUrl(
        firstPage("https://api.test/v1/things/", {
          period_from: "2024-01-01T00:00:00.000Z",
          page_size: "100",
        }),
      ),
    );
    expect(url.pathname).toBe("/v1/things/");
    expect(url.searchParams.get("period_from")).toBe("2024-01-01T00:00:00.000Z");
    expect(url.searchParams.get("page_size")).toBe("100");
  });

  it("uses a continuation link verbatim", () => {
    const next = "https://api.test/v1/things/?page=2&period_from=x";
    expect(requestUrl(continuationPage(next))).toBe(next);
  });
});

describe("resource urls", () => {
  it("builds the consumption path", () => {
    expect(consumptionUrl("https://api.test/v1/", "1200000000000", "S1")).toBe(
      "https://api.test/v1/electricity-meter-points/1200000000000/meters/S1/consumption/",
    );
  });

  it("builds the standing charge path", () => {
    expect(
      tariffUrl("https://api.test/v1", "VAR-22-11-01", "E-1R-VAR-22-11-01-C", "standing"),
    ).toBe(
      "https://api.test/v1/products/VAR-22-11-01/electricity-tariffs/E-1R-VAR-22-11-01-C/standing-charges/",
    );
  });
});

// =============================================================================
// Decoding
// =============================================================================

describe("decodeConsumption", () => {
  it("normalizes offsets to UTC", () => {
    const readings = decodeConsumption([
      {
        consumption: 0.2,
        interval_start: "2024-07-01T00:00:00+01:00",
        interval_end: "2024-07-01T00:30:00+01:00",
      },
    ])._unsafeUnwrap();

    expect(readings).toEqual([
      {
        intervalStart: "2024-06-30T23:00:00.000Z",
        intervalEnd: "2024-06-30T23:30:00.000Z",
        kwh: 0.2,
      },
    ]);
  });

  it("rejects a record without consumption", () => {
    const result = decodeConsumption([
      { interval_start: "2024-01-01T00:00:00Z", interval_end: "2024-01-01T00:30:00Z" },
    ]);
    expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
  });
});

describe("decodeRates", () => {
  it("keeps records for the configured payment method", () => {
    const periods = decodeRates("unit", "DIRECT_DEBIT", [
      {
        value_exc_vat: 19,
        value_inc_vat: 19.95,
        valid_from: "2024-01-01T00:00:00Z",
        valid_to: null,
        payment_method: "DIRECT_DEBIT",
      },
      {
        value_exc_vat: 20,
        value_inc_vat: 21,
        valid_from: "2024-01-01T00:00:00Z",
        valid_to: null,
        payment_method: "NON_DIRECT_DEBIT",
      },
      {
        value_exc_vat: 18,
        value_inc_vat: 18.9,
        valid_from: "2023-12-01T00:00:00Z",
        valid_to: "2024-01-01T00:00:00Z",
        payment_method: null,
      },
    ])._unsafeUnwrap();

    expect(periods.map((p) => p.valueIncVat)).toEqual([19.95, 18.9]);
    expect(periods[1]?.validTo).toBe("2024-01-01T00:00:00.000Z");
  });
});

// =============================================================================
// Account
// =============================================================================

describe("selectCurrentAgreement", () => {
  const now = "2024-06-01T00:00:00.000Z";

  it("prefers the latest agreement still in force", () => {
    const agreement = selectCurrentAgreement(
      [
        { tariff_code: "E-1R-OLD-C", valid_from: "2023-01-01T00:00:00Z", valid_to: "2024-01-01T00:00:00Z" },
        { tariff_code: "E-1R-NEW-C", valid_from: "2024-01-01T00:00:00Z", valid_to: null },
      ],
      now,
    );
    expect(agreement?.tariff_code).toBe("E-1R-NEW-C");
  });

  it("falls back to the last agreement when all have ended", () => {
    const agreement = selectCurrentAgreement(
      [
        { tariff_code: "E-1R-A-C", valid_from: "2022-01-01T00:00:00Z", valid_to: "2023-01-01T00:00:00Z" },
        { tariff_code: "E-1R-B-C", valid_from: "2023-01-01T00:00:00Z", valid_to: "2024-01-01T00:00:00Z" },
      ],
      now,
    );
    expect(agreement?.tariff_code).toBe("E-1R-B-C");
  });
});

describe("findElectricityDetails", () => {
  it("skips meter points without meters", () => {
    const details = findElectricityDetails(
      {
        properties: [
          {
            electricity_meter_points: [
              { mpan: "111", meters: [], agreements: [{ tariff_code: "E-1R-X-C" }] },
              {
                mpan: "222",
                meters: [{ serial_number: "OLD" }, { serial_number: "NEW" }],
                agreements: [{ tariff_code: "E-1R-VAR-22-11-01-C", valid_to: null }],
              },
            ],
          },
        ],
      },
      new Date("2024-06-01T00:00:00.000Z"),
    );

    expect(details).toEqual({
      mpan: "222",
      serial: "NEW",
      tariffCode: "E-1R-VAR-22-11-01-C",
    });
  });
});

// =============================================================================
// Telemetry
// =============================================================================

describe("latestDemand", () => {
  it("returns the last sample with a demand value", () => {
    expect(
      latestDemand([
        { readAt: "2024-01-01T12:00:00+00:00", demand: "850.0" },
        { readAt: "2024-01-01T12:00:10+00:00", demand: 1200 },
        { readAt: "2024-01-01T12:00:20+00:00", demand: null },
      ]),
    ).toEqual({ demandWatts: 1200, readAt: "2024-01-01T12:00:10.000Z" });
  });

  it("returns null without samples", () => {
    expect(latestDemand([])).toBeNull();
  });
});
