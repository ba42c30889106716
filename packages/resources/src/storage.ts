import fs from "node:fs/promises";
import path from "node:path";

import { PGKVStorage, PostgresPoolManager, type PgPoolFactory } from "./postgres";
import {
  type KVStorage,
  type KVStorageFactory,
  type Logger,
  type PostgresConnectionConfig,
  type ResourceNamespace,
  type StoredRecord,
} from "./types";
import { asStoredRecord, isNotFoundError } from "./utils";

export const SUPPORTED_KV_STORAGES = ["MemoryKVStorage", "JsonKVStorage", "PGKVStorage"] as const;

export type SupportedKVStorage = (typeof SUPPORTED_KV_STORAGES)[number];

export class UnsupportedStorageError extends Error {
  constructor(readonly storage: string) {
    super(`Unsupported KV storage "${storage}". Expected one of: ${SUPPORTED_KV_STORAGES.join(", ")}`);
    this.name = "UnsupportedStorageError";
  }
}

export const isSupportedKVStorage = (name: string): name is SupportedKVStorage =>
  SUPPORTED_KV_STORAGES.some((kind) => kind === name);

export class MemoryKVStorage<T extends StoredRecord = StoredRecord> implements KVStorage<T> {
  private records: Map<string, T> | null = null;

  constructor(readonly namespace: string) {}

  async initialize(): Promise<void> {
    this.records ??= new Map();
  }

  async upsert(data: Record<string, T>): Promise<void> {
    const records = this.require();
    for (const [id, record] of Object.entries(data)) {
      records.set(id, record);
    }
  }

  async getById(id: string): Promise<T | null> {
    return this.require().get(id) ?? null;
  }

  async getByIds(ids: string[]): Promise<Array<T | null>> {
    const records = this.require();
    return ids.map((id) => records.get(id) ?? null);
  }

  async filterKeys(ids: string[]): Promise<Set<string>> {
    const records = this.require();
    return new Set(ids.filter((id) => !records.has(id)));
  }

  async finalize(): Promise<void> {
    this.records = null;
  }

  isReady(): boolean {
    return this.records !== null;
  }

  get size(): number {
    return this.records?.size ?? 0;
  }

  private require(): Map<string, T> {
    if (!this.records) {
      throw new Error(`Storage ${this.namespace} is not initialized`);
    }
    return this.records;
  }
}

/**
 * File-backed storage: one JSON object per namespace, keyed by record id.
 * The whole file is rewritten on every upsert.
 */
export class JsonKVStorage<T extends StoredRecord = StoredRecord> implements KVStorage<T> {
  private records: Map<string, T> | null = null;
  private pendingFlush: Promise<void> = Promise.resolve();
  readonly filePath: string;

  constructor(
    readonly namespace: string,
    options: { workingDir: string; workspace?: string },
  ) {
    const dir = options.workspace ? path.join(options.workingDir, options.workspace) : options.workingDir;
    this.filePath = path.join(dir, `kv_store_${namespace}.json`);
  }

  async initialize(): Promise<void> {
    if (this.records) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const records = new Map<string, T>();
    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }

    if (raw?.trim()) {
      const parsed: unknown = JSON.parse(raw);
      if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
        throw new Error(`KV store file ${this.filePath} does not contain a JSON object`);
      }
      const entries: Array<[string, unknown]> = Object.entries(parsed);
      for (const [id, value] of entries) {
        const record = asStoredRecord<T>(value);
        if (record) records.set(id, record);
      }
    }

    this.records = records;
  }

  async upsert(data: Record<string, T>): Promise<void> {
    const records = this.require();
    const entries = Object.entries(data);
    if (!entries.length) return;

    for (const [id, record] of entries) {
      records.set(id, record);
    }
    await this.flush(records);
  }

  async getById(id: string): Promise<T | null> {
    return this.require().get(id) ?? null;
  }

  async getByIds(ids: string[]): Promise<Array<T | null>> {
    const records = this.require();
    return ids.map((id) => records.get(id) ?? null);
  }

  async filterKeys(ids: string[]): Promise<Set<string>> {
    const records = this.require();
    return new Set(ids.filter((id) => !records.has(id)));
  }

  async finalize(): Promise<void> {
    if (!this.records) return;
    await this.flush(this.records);
    this.records = null;
  }

  isReady(): boolean {
    return this.records !== null;
  }

  /**
   * Writes go through one chain per instance so overlapping upserts never share
   * the temp file. Each write serialises the map as it is when the write starts.
   */
  private flush(records: Map<string, T>): Promise<void> {
    const write = async () => {
      const tmpPath = `${this.filePath}.tmp`;
      await fs.writeFile(tmpPath, JSON.stringify(Object.fromEntries(records), null, 2), "utf8");
      await fs.rename(tmpPath, this.filePath);
    };

    const result = this.pendingFlush.then(write, write);
    this.pendingFlush = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private require(): Map<string, T> {
    if (!this.records) {
      throw new Error(`Storage ${this.namespace} is not initialized`);
    }
    return this.records;
  }
}

export type StorageBackendOptions =
  | { kind: "MemoryKVStorage" }
  | { kind: "JsonKVStorage"; workingDir: string; workspace?: string }
  | {
      kind: "PGKVStorage";
      connection: PostgresConnectionConfig;
      workspace?: string;
      createPool?: PgPoolFactory;
      logger?: Logger;
    };

export function createKVStorageFactory(options: StorageBackendOptions): KVStorageFactory {
  switch (options.kind) {
    case "MemoryKVStorage":
      return <T extends StoredRecord>(namespace: ResourceNamespace): KVStorage<T> =>
        new MemoryKVStorage<T>(namespace);
    case "JsonKVStorage":
      return <T extends StoredRecord>(namespace: ResourceNamespace): KVStorage<T> =>
        new JsonKVStorage<T>(namespace, { workingDir: options.workingDir, workspace: options.workspace });
    case "PGKVStorage": {
      // Collections created by one factory share a single pool.
      const pools = new PostgresPoolManager(options.connection, options.createPool);
      return <T extends StoredRecord>(namespace: ResourceNamespace): KVStorage<T> =>
        new PGKVStorage<T>(namespace, {
          pools,
          workspace: options.workspace,
          logger: options.logger,
        });
    }
    default: {
      const unknownKind: never = options;
      throw new UnsupportedStorageError(String(unknownKind));
    }
  }
}
