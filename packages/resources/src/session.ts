import { consoleLogger } from "./logging";
import { type Logger, type SessionConfig, type StorageSelection } from "./types";

export const DATABASE_ENV_KEY = "POSTGRES_DATABASE";

export type StorageRole = "kv_storage" | "vector_storage" | "graph_storage" | "doc_status_storage";

/** Tenant-scoped databases are only derived when every storage role runs on PostgreSQL. */
export const SESSION_STORAGE_REQUIREMENTS: ReadonlyArray<{
  role: StorageRole;
  key: keyof StorageSelection;
  expected: string;
}> = [
  { role: "kv_storage", key: "kvStorage", expected: "PGKVStorage" },
  { role: "vector_storage", key: "vectorStorage", expected: "PGVectorStorage" },
  { role: "graph_storage", key: "graphStorage", expected: "PGGraphStorage" },
  { role: "doc_status_storage", key: "docStatusStorage", expected: "PGDocStatusStorage" },
];

export type SessionEnv = Record<string, string | undefined>;

export type SessionScopeResult =
  | { status: "scoped"; userId: string; sessionId: string; baseDatabase: string; database: string }
  | { status: "inactive" }
  | { status: "unsupported-storage"; role: StorageRole; expected: string; actual: string }
  | { status: "missing-database" };

export interface SessionScopeOptions {
  env?: SessionEnv;
  logger?: Logger;
  /** Overrides `config.userId`. */
  userId?: string | null;
  /** Overrides `config.sessionId`. */
  sessionId?: string | null;
}

export const sessionDatabaseName = (userId: string, sessionId: string, baseDatabase: string) =>
  `${userId}_${sessionId}_${baseDatabase}`;

export function isMultiSessionEnabled(config: Pick<SessionConfig, "userId" | "sessionId">, logger: Logger = consoleLogger) {
  if (!config.userId || !config.sessionId) return false;
  logger.info(`Multi-session management enabled for user ${config.userId} in session ${config.sessionId}`, {
    userId: config.userId,
    sessionId: config.sessionId,
  });
  return true;
}

/**
 * Decides which database a user session should use, without side effects.
 * Every outcome other than `scoped` has already been logged as a warning
 * (or, for `inactive`, needs none).
 */
export function resolveSessionDatabase(config: SessionConfig, options: SessionScopeOptions = {}): SessionScopeResult {
  const env = options.env ?? process.env;
  const logger = options.logger ?? consoleLogger;
  const userId = options.userId ?? config.userId;
  const sessionId = options.sessionId ?? config.sessionId;

  if (!isMultiSessionEnabled({ userId, sessionId }, logger) || !userId || !sessionId) {
    return { status: "inactive" };
  }

  for (const { role, key, expected } of SESSION_STORAGE_REQUIREMENTS) {
    const actual = config[key];
    if (actual !== expected) {
      logger.warn(`Session-scoped storage requires ${role} to be ${expected}`, { role, expected, actual });
      return { status: "unsupported-storage", role, expected, actual };
    }
  }

  const baseDatabase = env[DATABASE_ENV_KEY];
  if (!baseDatabase) {
    logger.warn(`Session-scoped storage requires ${DATABASE_ENV_KEY} to be set`);
    return { status: "missing-database" };
  }

  return {
    status: "scoped",
    userId,
    sessionId,
    baseDatabase,
    database: sessionDatabaseName(userId, sessionId, baseDatabase),
  };
}

/**
 * Rewrites `POSTGRES_DATABASE` to the session's database. This mutates
 * process-wide state: it must run before any storage handle is built, and two
 * sessions must not be configured concurrently in one process. Prefer
 * {@link withSessionDatabase}, which restores the previous value.
 */
export function applySessionDatabase(config: SessionConfig, options: SessionScopeOptions = {}): SessionScopeResult {
  const env = options.env ?? process.env;
  const result = resolveSessionDatabase(config, { ...options, env });
  if (result.status === "scoped") {
    env[DATABASE_ENV_KEY] = result.database;
  }
  return result;
}

let sessionWindow: Promise<unknown> = Promise.resolve();

/**
 * Runs `work` with `POSTGRES_DATABASE` pointing at the session's database and
 * restores the previous value afterwards, even when `work` throws. Windows are
 * serialised process-wide, so sessions never observe each other's value.
 */
export function withSessionDatabase<R>(
  config: SessionConfig,
  work: (scope: SessionScopeResult) => Promise<R>,
  options: SessionScopeOptions = {},
): Promise<R> {
  const env = options.env ?? process.env;

  const run = async (): Promise<R> => {
    const previous = env[DATABASE_ENV_KEY];
    const scope = applySessionDatabase(config, { ...options, env });
    try {
      return await work(scope);
    } finally {
      if (scope.status === "scoped") {
        if (previous === undefined) {
          delete env[DATABASE_ENV_KEY];
        } else {
          env[DATABASE_ENV_KEY] = previous;
        }
      }
    }
  };

  const result = sessionWindow.then(run, run);
  // The caller observes failures through `result`; the chain only orders windows.
  sessionWindow = result.then(
    () => undefined,
    () => undefined,
  );
  return result;
}
