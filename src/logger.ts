/**
 * Module-scoped loggers for Communal Bridge.
 *
 * One named pino logger per module, colored by module name in
 * development and plain JSON elsewhere. Credentials and tokens are
 * redacted wherever they appear in log context.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * ANSI color per module for the development formatter.
 */
const MODULE_COLORS = {
  api: "\x1b[34m", // blue
  coordinator: "\x1b[33m", // yellow
  portal: "\x1b[36m", // cyan
  mqtt: "\x1b[91m", // bright red
  store: "\x1b[35m", // magenta
  middleware: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

const REDACTED_PATHS = [
  "password",
  "accessToken",
  "refreshToken",
  "*.password",
  "*.accessToken",
  "*.refreshToken",
  "headers.Authorization",
];

export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Long-running operations reported through the helpers below.
 */
export type OperationName = "authenticate" | "refresh";

const loggers = new Map<ModuleName, pino.Logger>();

function buildLogger(module: ModuleName): pino.Logger {
  const options: pino.LoggerOptions = {
    name: module,
    level: config.LOG_LEVEL,
    base: { app: config.APP_NAME },
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };

  if (config.NODE_ENV !== "development") {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        messageFormat: `${MODULE_COLORS[module]}[{name}]${RESET} {msg}`,
        ignore: "pid,hostname,app",
        translateTime: "HH:MM:ss",
      },
    },
  });
}

/**
 * Logger for one module; repeated calls share the same instance.
 *
 * @example
 * const log = createLogger("coordinator");
 * log.info({ accountId }, "Fetching account");
 */
export function createLogger(module: ModuleName): pino.Logger {
  const existing = loggers.get(module);
  if (existing) return existing;

  const logger = buildLogger(module);
  loggers.set(module, logger);
  return logger;
}

export function logOperationStart(
  logger: pino.Logger,
  operation: OperationName,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `${operation} started`);
}

/**
 * Logs the elapsed time since `startTime` (epoch ms).
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: OperationName,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `${operation} completed in ${durationMs}ms`,
  );
}

export function logOperationFailed(
  logger: pino.Logger,
  operation: OperationName,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ operation, error: message, ...context }, `${operation} failed: ${message}`);
}
