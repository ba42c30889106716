import { describe, expect, it, vi } from "vitest";

import {
  applySessionDatabase,
  isMultiSessionEnabled,
  resolveSessionDatabase,
  withSessionDatabase,
  type SessionEnv,
} from "./session";
import { silentLogger } from "./logging";
import { type Logger, type SessionConfig } from "./types";

const postgresSession = (overrides: Partial<SessionConfig> = {}): SessionConfig => ({
  kvStorage: "PGKVStorage",
  vectorStorage: "PGVectorStorage",
  graphStorage: "PGGraphStorage",
  docStatusStorage: "PGDocStatusStorage",
  userId: "alice",
  sessionId: "s1",
  ...overrides,
});

const createLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }) satisfies Logger;

describe("isMultiSessionEnabled", () => {
  it("requires both identifiers", () => {
    expect(isMultiSessionEnabled({ userId: "alice", sessionId: "s1" }, silentLogger)).toBe(true);
    expect(isMultiSessionEnabled({ userId: "alice", sessionId: null }, silentLogger)).toBe(false);
    expect(isMultiSessionEnabled({ userId: "", sessionId: "s1" }, silentLogger)).toBe(false);
  });
});

describe("resolveSessionDatabase", () => {
  it("names the warning for the first mismatched storage role", () => {
    const logger = createLogger();
    const result = resolveSessionDatabase(postgresSession({ graphStorage: "NetworkXStorage" }), {
      env: { POSTGRES_DATABASE: "ragdb" },
      logger,
    });

    expect(result).toEqual({
      status: "unsupported-storage",
      role: "graph_storage",
      expected: "PGGraphStorage",
      actual: "NetworkXStorage",
    });
    expect(logger.warn).toHaveBeenCalledWith("Session-scoped storage requires graph_storage to be PGGraphStorage", {
      role: "graph_storage",
      expected: "PGGraphStorage",
      actual: "NetworkXStorage",
    });
  });

  it("prefers explicit identifiers over the configured ones", () => {
    const result = resolveSessionDatabase(postgresSession(), {
      env: { POSTGRES_DATABASE: "ragdb" },
      logger: silentLogger,
      userId: "bob",
      sessionId: "s9",
    });

    expect(result).toEqual({
      status: "scoped",
      userId: "bob",
      sessionId: "s9",
      baseDatabase: "ragdb",
      database: "bob_s9_ragdb",
    });
  });
});

describe("applySessionDatabase", () => {
  it("rewrites the database name for an eligible session", () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };

    const result = applySessionDatabase(postgresSession(), { env, logger: silentLogger });

    expect(result.status).toBe("scoped");
    expect(env.POSTGRES_DATABASE).toBe("alice_s1_ragdb");
  });

  it("leaves the database name alone when a backend does not match", () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };

    const result = applySessionDatabase(postgresSession({ kvStorage: "JsonKVStorage" }), { env, logger: silentLogger });

    expect(result).toMatchObject({ status: "unsupported-storage", role: "kv_storage" });
    expect(env.POSTGRES_DATABASE).toBe("ragdb");
  });

  it("does nothing without both identifiers", () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };

    expect(applySessionDatabase(postgresSession({ sessionId: null }), { env, logger: silentLogger })).toEqual({
      status: "inactive",
    });
    expect(env.POSTGRES_DATABASE).toBe("ragdb");
  });

  it("warns when no base database is configured", () => {
    const env: SessionEnv = {};
    const logger = createLogger();

    expect(applySessionDatabase(postgresSession(), { env, logger })).toEqual({ status: "missing-database" });
    expect(env).toEqual({});
    expect(logger.warn).toHaveBeenCalledWith("Session-scoped storage requires POSTGRES_DATABASE to be set");
  });
});

describe("withSessionDatabase", () => {
  it("exposes the scoped name inside the window and restores it after", async () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };

    const seen = await withSessionDatabase(postgresSession(), async () => env.POSTGRES_DATABASE, {
      env,
      logger: silentLogger,
    });

    expect(seen).toBe("alice_s1_ragdb");
    expect(env.POSTGRES_DATABASE).toBe("ragdb");
  });

  it("restores the previous value when the work fails", async () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };

    await expect(
      withSessionDatabase(
        postgresSession(),
        async () => {
          throw new Error("storage unavailable");
        },
        { env, logger: silentLogger },
      ),
    ).rejects.toThrow("storage unavailable");

    expect(env.POSTGRES_DATABASE).toBe("ragdb");
  });

  it("serialises overlapping sessions", async () => {
    const env: SessionEnv = { POSTGRES_DATABASE: "ragdb" };
    const seen: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstHeld = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = withSessionDatabase(
      postgresSession(),
      async () => {
        seen.push(`first:${env.POSTGRES_DATABASE}`);
        await firstHeld;
        seen.push(`first:${env.POSTGRES_DATABASE}`);
      },
      { env, logger: silentLogger },
    );
    const second = withSessionDatabase(
      postgresSession({ userId: "bob", sessionId: "s2" }),
      async () => {
        seen.push(`second:${env.POSTGRES_DATABASE}`);
      },
      { env, logger: silentLogger },
    );

    releaseFirst();
    await Promise.all([first, second]);

    expect(seen).toEqual(["first:alice_s1_ragdb", "first:alice_s1_ragdb", "second:bob_s2_ragdb"]);
    expect(env.POSTGRES_DATABASE).toBe("ragdb");
  });

  it("passes the outcome through when the session is not eligible", async () => {
    const env: SessionEnv = {};

    const scope = await withSessionDatabase(postgresSession({ userId: null }), async (result) => result, {
      env,
      logger: silentLogger,
    });

    expect(scope).toEqual({ status: "inactive" });
    expect(env).toEqual({});
  });
});
