/**
 * Energy API Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  ElectricityDetails,
  Endpoint,
  EnergyApiSettings,
  LiveDemand,
  Page,
  PageRequest,
  PaymentMethod,
} from "./schema.js";
export type { EnergyApiError } from "./errors.js";
export type {
  EnergyApiClient,
  PagedSequence,
  TokenSession,
} from "./service.js";

// Error utilities
export { formatEnergyApiError, isAuthError } from "./errors.js";

// Service (side effects)
export {
  MAX_TOKEN_ATTEMPTS,
  createEnergyApiClient,
  fetchAll,
} from "./service.js";

// Pure transformations
export { extractProductCode } from "./transform.js";
