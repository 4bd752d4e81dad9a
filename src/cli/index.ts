/**
 * CLI Module - Public API
 *
 * Exports only what's needed by the entry point.
 */

// Types
export type { CliEnvironment, CliServices } from "./schema.js";

// Constants
export { EXIT_ERROR, EXIT_OK, EXIT_PARTIAL } from "./schema.js";

// Program
export { buildProgram, runCli } from "./program.js";

// Pure transformations
export { exitCodeForSync, formatTable } from "./transform.js";
