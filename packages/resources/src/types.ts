export type ContentTag = "doc" | "parsed_content" | "parsed_image" | "parsed_markdown";

export type ResourceNamespace = "file_resource" | "parsed_content_list" | "parsed_images" | "parsed_markdown";

export type ResourceCollection = "files" | "contents" | "images" | "markdown";

export interface FileResourceRecord {
  id: string;
  file_name: string;
  file_type: string;
  file_path: string;
  file_content: string;
}

export interface ParsedContentRecord {
  id: string;
  content: unknown;
  file_path: string;
  doc_id: string;
}

export interface ParsedImageRecord {
  id: string;
  image_path: string;
  image_content: string;
  file_path: string;
  doc_id: string;
}

export interface ParsedMarkdownRecord {
  id: string;
  markdown_content: string;
  file_path: string;
  doc_id: string;
}

export interface ResourceRecords {
  files: FileResourceRecord;
  contents: ParsedContentRecord;
  images: ParsedImageRecord;
  markdown: ParsedMarkdownRecord;
}

export type StoredRecord = { id: string };

export interface KVStorage<T extends StoredRecord = StoredRecord> {
  readonly namespace: string;
  initialize(): Promise<void>;
  upsert(data: Record<string, T>): Promise<void>;
  getById(id: string): Promise<T | null>;
  getByIds(ids: string[]): Promise<Array<T | null>>;
  /** Ids from `ids` that are not stored yet. */
  filterKeys(ids: string[]): Promise<Set<string>>;
  finalize(): Promise<void>;
  isReady(): boolean;
}

export type KVStorageFactory = <T extends StoredRecord>(namespace: ResourceNamespace) => KVStorage<T>;

export type LogContext = Record<string, unknown> | undefined;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface ResourceConfig {
  resourceManagement: boolean;
  parser: string;
  parserOutputDir: string;
  parseMethod: string;
}

export interface StorageSelection {
  kvStorage: string;
  vectorStorage: string;
  graphStorage: string;
  docStatusStorage: string;
}

export interface SessionConfig extends StorageSelection {
  userId?: string | null;
  sessionId?: string | null;
}

export interface PostgresConnectionConfig {
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
  maxConnections?: number;
}

export interface PipelineConfig extends ResourceConfig, SessionConfig {
  workingDir: string;
  workspace: string;
  postgres: Omit<PostgresConnectionConfig, "database">;
}

export type ContentListItem = unknown;

export interface ParserOutput {
  contentList: ContentListItem[];
  /** `null` when the parser wrote no markdown file. */
  markdown: string | null;
  /** Directory the artifacts were read from. */
  sourceDir: string;
}

export interface ParserOutputReader {
  readOutput(outputDir: string, fileStem: string, method: string): Promise<ParserOutput>;
}

export interface ImportOptions {
  outputDir?: string;
  parseMethod?: string;
  backend?: string;
}

export type ImportResult =
  | {
      status: "stored";
      docId: string;
      parseMethod: string;
      contentItems: number;
      images: number;
      markdownStored: boolean;
    }
  | { status: "skipped"; reason: "disabled" | "unsupported-parser" };
