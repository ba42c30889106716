import { Pool, type PoolConfig } from "pg";

import {
  type KVStorage,
  type Logger,
  type PostgresConnectionConfig,
  type StoredRecord,
} from "./types";
import { asStoredRecord } from "./utils";

export const RESOURCE_TABLE = "RAGVAULT_RESOURCES";

const CREATE_TABLE_SQL = `CREATE TABLE IF NOT EXISTS ${RESOURCE_TABLE} (
  workspace VARCHAR(255) NOT NULL,
  namespace VARCHAR(255) NOT NULL,
  id VARCHAR(255) NOT NULL,
  data JSONB NOT NULL,
  create_time TIMESTAMP(0) DEFAULT CURRENT_TIMESTAMP,
  update_time TIMESTAMP(0) DEFAULT CURRENT_TIMESTAMP,
  CONSTRAINT ${RESOURCE_TABLE}_PK PRIMARY KEY (workspace, namespace, id)
)`;

const UPSERT_SQL = `INSERT INTO ${RESOURCE_TABLE} (workspace, namespace, id, data)
VALUES ($1, $2, $3, $4::jsonb)
ON CONFLICT (workspace, namespace, id)
DO UPDATE SET data = EXCLUDED.data, update_time = CURRENT_TIMESTAMP`;

const SELECT_BY_IDS_SQL = `SELECT id, data FROM ${RESOURCE_TABLE}
WHERE workspace = $1 AND namespace = $2 AND id = ANY($3)`;

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PgClientLike extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

export type PgPoolFactory = (config: PoolConfig) => PgPoolLike;

const defaultPoolFactory: PgPoolFactory = (config) => new Pool(config);

/**
 * Reference-counted pool shared by the collections of one storage factory.
 * The pool opens on the first acquire and closes when the last holder releases it.
 */
export class PostgresPoolManager {
  private pool: PgPoolLike | null = null;
  private holders = 0;
  private schemaReady: Promise<void> | null = null;

  constructor(
    readonly connection: PostgresConnectionConfig,
    private readonly createPool: PgPoolFactory = defaultPoolFactory,
  ) {}

  acquire(): PgPoolLike {
    if (!this.pool) {
      this.pool = this.createPool({
        host: this.connection.host,
        port: this.connection.port,
        user: this.connection.user,
        password: this.connection.password,
        database: this.connection.database,
        max: this.connection.maxConnections ?? 10,
      });
    }
    this.holders += 1;
    return this.pool;
  }

  async release(): Promise<void> {
    if (!this.pool || this.holders === 0) return;
    this.holders -= 1;
    if (this.holders > 0) return;

    const pool = this.pool;
    this.pool = null;
    this.schemaReady = null;
    await pool.end();
  }

  /**
   * Creates the resource table once per pool. Concurrent `CREATE TABLE IF NOT
   * EXISTS` on a fresh database can fail on the type catalog, so every
   * collection waits on the same statement. A failed attempt is not cached.
   */
  ensureSchema(pool: PgQueryable): Promise<void> {
    if (!this.schemaReady) {
      const pending = pool.query(CREATE_TABLE_SQL).then(() => undefined);
      this.schemaReady = pending;
      void pending.catch(() => {
        if (this.schemaReady === pending) this.schemaReady = null;
      });
    }
    return this.schemaReady;
  }

  get open(): boolean {
    return this.pool !== null;
  }
}

type ResourceRow = { id: string; data: unknown };

const isResourceRow = (row: unknown): row is ResourceRow =>
  row !== null && typeof row === "object" && "id" in row && typeof row.id === "string" && "data" in row;

export class PGKVStorage<T extends StoredRecord = StoredRecord> implements KVStorage<T> {
  private pool: PgPoolLike | null = null;
  private readonly pools: PostgresPoolManager;
  private readonly workspace: string;
  private readonly logger?: Logger;

  constructor(
    readonly namespace: string,
    options: { pools: PostgresPoolManager; workspace?: string; logger?: Logger },
  ) {
    this.pools = options.pools;
    this.workspace = options.workspace || "default";
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    if (this.pool) return;
    const pool = this.pools.acquire();
    try {
      await this.pools.ensureSchema(pool);
    } catch (error) {
      await this.pools.release();
      throw error;
    }
    this.pool = pool;
    this.logger?.debug("PostgreSQL resource storage ready", {
      namespace: this.namespace,
      workspace: this.workspace,
      database: this.pools.connection.database,
    });
  }

  async upsert(data: Record<string, T>): Promise<void> {
    const pool = this.require();
    const entries = Object.entries(data);
    if (!entries.length) return;

    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      for (const [id, record] of entries) {
        await client.query(UPSERT_SQL, [this.workspace, this.namespace, id, JSON.stringify(record)]);
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getById(id: string): Promise<T | null> {
    const [record] = await this.getByIds([id]);
    return record ?? null;
  }

  async getByIds(ids: string[]): Promise<Array<T | null>> {
    if (!ids.length) return [];
    const byId = new Map<string, T>();
    for (const row of await this.selectRows(ids)) {
      const record = asStoredRecord<T>(row.data);
      if (record) byId.set(row.id, record);
    }
    return ids.map((id) => byId.get(id) ?? null);
  }

  async filterKeys(ids: string[]): Promise<Set<string>> {
    if (!ids.length) return new Set();
    const rows = await this.selectRows(ids);
    const found = new Set(rows.map((row) => row.id));
    return new Set(ids.filter((id) => !found.has(id)));
  }

  async finalize(): Promise<void> {
    if (!this.pool) return;
    this.pool = null;
    await this.pools.release();
  }

  isReady(): boolean {
    return this.pool !== null;
  }

  private async selectRows(ids: string[]): Promise<ResourceRow[]> {
    const { rows } = await this.require().query(SELECT_BY_IDS_SQL, [this.workspace, this.namespace, ids]);
    return rows.filter(isResourceRow);
  }

  private require(): PgPoolLike {
    if (!this.pool) {
      throw new Error(`Storage ${this.namespace} is not initialized`);
    }
    return this.pool;
  }
}
