/**
 * Status Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type { DayUsage, LedgerLine, StatusSummary } from "./schema.js";
export type { StatusError } from "./errors.js";

// Error utilities
export { formatStatusError } from "./errors.js";

// Service (side effects)
export { buildStatusSummary, writeStatusFile } from "./service.js";

// Pure transformations
export { formatStatusSummary } from "./transform.js";
