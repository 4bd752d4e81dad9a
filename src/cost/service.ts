/**
 * Cost Module - Service Layer
 *
 * Reads consumption and rate series from the store and prices them.
 */
import type { Result } from "neverthrow";

import { createLogger } from "../logger.js";
import type { TimeSeriesStore } from "../store/index.js";
import { type GroupBy, type TimeWindow, localDate, localDayBounds } from "../time.js";
import { type CostError, costStoreError } from "./errors.js";
import type { CostReport } from "./schema.js";
import {
  aggregateCosts,
  buildRateIndex,
  chargeableDates,
  computeIntervalCosts,
  computeStandingCharges,
  totalOf,
} from "./transform.js";

const log = createLogger("cost");

/**
 * Price every reading in the window and group the result.
 *
 * Fails on the first interval or day whose price is unknown; a partial or
 * zero cost is never returned in its place.
 */
export function computeCost(
  store: TimeSeriesStore,
  window: TimeWindow,
  groupBy: GroupBy,
  zone: string,
): Result<CostReport, CostError> {
  // Standing charges are priced at local midnight, which may precede window.from
  const standingWindow = {
    from: localDayBounds(localDate(window.from, zone), zone).from,
    to: window.to,
  };

  return store
    .getConsumption(window)
    .andThen((readings) =>
      store.getRates("unit", window).andThen((unitRates) =>
        store.getRates("standing", standingWindow).map((standingRates) => ({
          readings,
          unitRates,
          standingRates,
        })),
      ),
    )
    .mapErr(costStoreError)
    .andThen(({ readings, unitRates, standingRates }) =>
      buildRateIndex(unitRates).andThen((unitIndex) =>
        buildRateIndex(standingRates).andThen((standingIndex) =>
          computeIntervalCosts(readings, unitIndex, zone).andThen((intervals) =>
            computeStandingCharges(chargeableDates(intervals), standingIndex, zone).map(
              (standing): CostReport => {
                const groups = aggregateCosts(intervals, standing, groupBy);
                const total = totalOf(groups);
                log.debug(
                  {
                    groupBy,
                    readings: intervals.length,
                    days: standing.length,
                    totalPence: total.totalPence,
                  },
                  "Cost computed",
                );
                return { window, groupBy, groups, total };
              },
            ),
          ),
        ),
      ),
    )
    .mapErr((error) => {
      log.warn({ error: error.message }, "Cost computation failed");
      return error;
    });
}
