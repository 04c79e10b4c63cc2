import pino, { type DestinationStream, type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string;
  cause?: NormalizedError;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
};

function resolveLevel(): string {
  const envLevel = process.env.PERSONA_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (typeof envLevel === "string" && envLevel.trim().length > 0) {
    return envLevel.trim();
  }
  return "info";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME?.trim();
  return envName && envName.length > 0 ? envName : "persona-resolver";
}

function buildLoggerOptions(overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

/**
 * Builds a JSON logger writing to stdout, or to `destination` when given.
 * The CLI passes stderr so that command output on stdout stays parseable.
 */
export function createLogger(options: CreateLoggerOptions = {}, destination?: DestinationStream): AppLogger {
  const loggerOptions = buildLoggerOptions(options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  if (options.serviceName) {
    loggerOptions.base = { ...(loggerOptions.base ?? {}), service: options.serviceName };
  }
  const logger = destination ? pino(loggerOptions, destination) : pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "identity" } });
export default appLogger;

/** Flattens a thrown value into the fields written under `err`. */
export function normalizeError(error: unknown): NormalizedError {
  if (!(error instanceof Error)) {
    return { message: typeof error === "string" ? error : String(error) };
  }
  const normalized: NormalizedError = { message: error.message, name: error.name };
  if (error.stack) {
    normalized.stack = error.stack;
  }
  if ("code" in error && typeof error.code === "string") {
    normalized.code = error.code;
  }
  if (error.cause !== undefined) {
    normalized.cause = normalizeError(error.cause);
  }
  return normalized;
}
