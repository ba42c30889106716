import { type LogContext, type Logger } from "./types";

const withContext = (context: LogContext) => (context ? [context] : []);

/** Fallback used when the host does not inject its own logger. */
export const consoleLogger: Logger = {
  info: (message, context) => console.info(`[resources] ${message}`, ...withContext(context)),
  warn: (message, context) => console.warn(`[resources] ${message}`, ...withContext(context)),
  error: (message, context) => console.error(`[resources] ${message}`, ...withContext(context)),
  debug: (message, context) => console.debug(`[resources] ${message}`, ...withContext(context)),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
