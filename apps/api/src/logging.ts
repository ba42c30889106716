import type { LogContext, Logger } from "@ragvault/resources";

import { env } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface StructuredLoggerOptions {
  service: string;
  environment: string;
  minLevel?: LogLevel;
  sink?: (level: LogLevel, serialized: string) => void;
}

export type StructuredLogger = Logger & { event(name: string, data?: LogContext): void };

// eslint-disable-next-line no-console
const consoleSink = (level: LogLevel, serialized: string) => (console[level] ?? console.log)(serialized);

export function createLogger(options: StructuredLoggerOptions): StructuredLogger {
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[level] < threshold) return;

    const payload = {
      level,
      message,
      service: options.service,
      environment: options.environment,
      timestamp: new Date().toISOString(),
      ...context,
    };
    sink(level, JSON.stringify(payload));
  };

  return {
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    debug: (message, context) => write("debug", message, context),
    event: (name, data) => write("info", name, data),
  };
}

export const logger = createLogger({
  service: env.SERVICE_NAME,
  environment: env.NODE_ENV,
  minLevel: env.LOG_LEVEL,
});

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
