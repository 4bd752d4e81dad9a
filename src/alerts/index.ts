/**
 * Alerts Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  AlertOutcome,
  AlertSettings,
  SkipReason,
  Transition,
} from "./schema.js";
export type { AlertError } from "./errors.js";
export type { AlertContext } from "./service.js";

// Error utilities
export { formatAlertError } from "./errors.js";

// Service (side effects)
export {
  evaluateDailyUsage,
  evaluateLiveDemand,
  readLiveDemand,
} from "./service.js";

// Pure transformations
export { formatDemandReport, transition } from "./transform.js";
