import {
  createKVStorageFactory,
  DATABASE_ENV_KEY,
  isSupportedKVStorage,
  ResourceManager,
  UnsupportedStorageError,
  withSessionDatabase,
  type ImportOptions,
  type ImportResult,
  type KVStorage,
  type KVStorageFactory,
  type Logger,
  type ParserOutputReader,
  type PgPoolFactory,
  type PipelineConfig,
  type ResourceNamespace,
  type SessionEnv,
  type SessionScopeResult,
  type StoredRecord,
} from "@ragvault/resources";

import { logger as defaultLogger } from "./logging";

export interface ResourcePipelineOptions {
  config: PipelineConfig;
  logger?: Logger;
  /** Environment holding `POSTGRES_DATABASE`; defaults to `process.env`. */
  env?: SessionEnv;
  createPool?: PgPoolFactory;
  outputReader?: ParserOutputReader;
}

export interface IngestResult {
  filePath: string;
  filesStored: number;
  parsed: ImportResult;
}

export class PipelineNotReadyError extends Error {
  constructor() {
    super("Resource pipeline is not set up. Call setup() first.");
    this.name = "PipelineNotReadyError";
  }
}

/**
 * Hosts one ResourceManager for the process: applies session tenancy,
 * picks the KV backend and exposes ingestion of parsed documents.
 */
export class ResourcePipeline {
  readonly resources: ResourceManager;
  readonly config: PipelineConfig;

  private readonly logger: Logger;
  private readonly env: SessionEnv;
  private readonly createPool?: PgPoolFactory;
  private storageFactory: KVStorageFactory | null = null;
  private setupPromise: Promise<void> | null = null;

  constructor(options: ResourcePipelineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.env = options.env ?? process.env;
    this.createPool = options.createPool;

    const storageFactory: KVStorageFactory = <T extends StoredRecord>(namespace: ResourceNamespace): KVStorage<T> => {
      if (!this.storageFactory) throw new PipelineNotReadyError();
      return this.storageFactory<T>(namespace);
    };

    this.resources = new ResourceManager({
      config: this.config,
      storageFactory,
      logger: this.logger,
      outputReader: options.outputReader,
    });
  }

  setup(): Promise<void> {
    this.setupPromise ??= this.runSetup().catch((error: unknown) => {
      this.setupPromise = null;
      throw error;
    });
    return this.setupPromise;
  }

  async ingest(filePath: string, options: ImportOptions = {}): Promise<IngestResult> {
    await this.setup();
    const filesStored = await this.resources.storeInputFile(filePath);
    const parsed = await this.resources.importParsedResult(filePath, options);
    return { filePath, filesStored, parsed };
  }

  async shutdown(): Promise<void> {
    if (!this.setupPromise) return;
    await this.setupPromise;
    await this.resources.finalizeStorage();
    this.storageFactory = null;
    this.setupPromise = null;
  }

  private async runSetup(): Promise<void> {
    await withSessionDatabase(
      this.config,
      async (scope) => {
        if (this.resources.isEnabled()) {
          this.storageFactory = this.buildStorageFactory(scope);
        }
        await this.resources.activate();
      },
      { env: this.env, logger: this.logger },
    );
  }

  private buildStorageFactory(scope: SessionScopeResult): KVStorageFactory {
    const kind = this.config.kvStorage;
    if (!isSupportedKVStorage(kind)) throw new UnsupportedStorageError(kind);

    switch (kind) {
      case "MemoryKVStorage":
        return createKVStorageFactory({ kind });
      case "JsonKVStorage":
        return createKVStorageFactory({
          kind,
          workingDir: this.config.workingDir,
          workspace: this.config.workspace,
        });
      case "PGKVStorage": {
        const database = scope.status === "scoped" ? scope.database : this.env[DATABASE_ENV_KEY];
        if (!database) {
          throw new Error(`${DATABASE_ENV_KEY} must be set to use PGKVStorage`);
        }
        this.logger.info("Using PostgreSQL resource storage", {
          database,
          workspace: this.config.workspace || "default",
        });
        return createKVStorageFactory({
          kind,
          connection: { ...this.config.postgres, database },
          workspace: this.config.workspace,
          createPool: this.createPool,
          logger: this.logger,
        });
      }
    }
  }
}
