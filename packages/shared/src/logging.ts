import pino from "pino";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv !== "production" && nodeEnv !== "test";

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Logs go to stderr so `archive-sweep fetch` keeps stdout for its summary.
 * Interactive runs get pino-pretty; NODE_ENV=production or test gets JSON
 * lines that can be piped into jq alongside the saved result files.
 */
const baseLogger = isDev
  ? pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

/** Child logger tagged with the engine component (pacer, merge, cli...). */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Create a logger scoped to one `fetch` call; every stream, retry and
 * comment sub-fetch of that call shares the correlation id.
 */
export function createFetchLogger(fetchId: string): pino.Logger {
  return createLogger({ component: "fetch", correlationId: fetchId });
}

export type { Logger } from "pino";
