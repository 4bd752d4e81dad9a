/**
 * Store Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  AlertChannel,
  AlertDirection,
  AlertState,
  BotState,
  CommitSummary,
  ConsumptionReading,
  ConsumptionSummary,
  DailyTotal,
  PendingCommand,
  RateKind,
  RatePeriod,
  ResourceBatch,
  ResourceType,
  StoreExport,
  SyncLedgerEntry,
  SyncLogEntry,
} from "./schema.js";
export type { StoreError } from "./errors.js";
export type { TimeSeriesStore } from "./service.js";

// Error utilities
export { formatStoreError } from "./errors.js";

// Constants
export {
  INITIAL_BOT_STATE,
  RESOURCE_TYPES,
  initialAlertState,
  rateKindForResource,
} from "./schema.js";

// Service (side effects)
export { createStore } from "./service.js";

// Pure transformations
export {
  findRateOverlaps,
  summariseConsumption,
  summariseDays,
} from "./transform.js";
