/**
 * Module-scoped color-coded loggers for the Wemo exporter.
 *
 * Each module gets its own named child logger with an assigned color for
 * easy visual identification in development logs. All output goes to
 * stderr: stdout is reserved for scraped JSON.
 *
 * @see Rule #27-32 (Traceability & Observability)
 */
import pino from "pino";
import { type LogLevel, runtimeEnv } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Entry points
  cli: "\x1b[34m", // blue
  daemon: "\x1b[33m", // yellow
  oneshot: "\x1b[93m", // bright yellow

  // Poll path
  device: "\x1b[36m", // cyan
  scheduler: "\x1b[35m", // magenta
  registry: "\x1b[32m", // green

  // Read path
  api: "\x1b[94m", // bright blue
  middleware: "\x1b[90m", // gray
} as const satisfies Record<string, string>;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

let currentLevel: LogLevel = runtimeEnv.LOG_LEVEL;
let root: pino.Logger | null = null;
const loggers = new Map<ModuleName, pino.Logger>();

function getRootLogger(): pino.Logger {
  if (root) {
    return root;
  }

  if (runtimeEnv.NODE_ENV === "development") {
    // Pretty printing for development
    root = pino({
      level: currentLevel,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          messageFormat: "{msg}",
          ignore: "pid,hostname,name",
          translateTime: "HH:MM:ss",
        },
      },
    });
  } else {
    // Structured JSON for production
    root = pino({ level: currentLevel }, pino.destination(2));
  }

  return root;
}

/**
 * Create a module-scoped logger with color-coded output.
 * Loggers are cached per module so level changes reach every caller.
 *
 * @example
 * const log = createLogger('device');
 * log.info({ address }, 'Querying Insight params');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const existing = loggers.get(module);
  if (existing) {
    return existing;
  }

  const color = MODULE_COLORS[module];
  const prefix =
    runtimeEnv.NODE_ENV === "development" ? `${color}[${module}]${RESET}` : "";

  const logger = getRootLogger().child(
    { name: module },
    prefix ? { msgPrefix: `${prefix} ` } : {},
  );
  logger.level = currentLevel;
  loggers.set(module, logger);
  return logger;
}

/**
 * Change the level of every module logger (CLI --debug / --quiet).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  if (root) {
    root.level = level;
  }
  for (const logger of loggers.values()) {
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
  logger.debug({ operation, ...context }, `→ ${operation} started`);
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
