/**
 * Module-scoped color-coded loggers for the energy tracker.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs. Everything is written
 * to stderr so command output on stdout stays machine-readable.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Engine
  sync: "\x1b[33m", // yellow
  store: "\x1b[36m", // cyan
  cost: "\x1b[32m", // green
  alerts: "\x1b[35m", // magenta

  // Remote services
  api: "\x1b[34m", // blue
  notifications: "\x1b[95m", // bright magenta
  bot: "\x1b[94m", // bright blue

  // Infrastructure
  cli: "\x1b[37m", // white
  status: "\x1b[92m", // bright green
  lock: "\x1b[91m", // bright red
  config: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

const STDERR = 2;

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const registry: pino.Logger[] = [];

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('sync');
 * log.info({ resource }, 'Fetching consumption');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = config.NODE_ENV === "development";

  const logger = isDevelopment
    ? pino({
        name: module,
        level: config.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: STDERR,
            messageFormat: `${color}[{name}]${RESET} {msg}`,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss",
          },
        },
      })
    : pino({ name: module, level: config.LOG_LEVEL }, pino.destination(STDERR));

  registry.push(logger);
  return logger;
}

/**
 * Change the level of every logger created so far.
 * Used by --quiet, which keeps only warnings and errors.
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of registry) {
    logger.level = level;
  }
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
