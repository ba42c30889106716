import fs from "node:fs/promises";
import path from "node:path";

import { consoleLogger } from "./logging";
import { MineruOutputReader, parsedImagesDir, resolveParseMethod, SUPPORTED_PARSER } from "./parsers";
import {
  type ContentListItem,
  type FileResourceRecord,
  type ImportOptions,
  type ImportResult,
  type KVStorage,
  type KVStorageFactory,
  type Logger,
  type ParsedContentRecord,
  type ParsedImageRecord,
  type ParsedMarkdownRecord,
  type ParserOutputReader,
  type ResourceCollection,
  type ResourceConfig,
  type ResourceNamespace,
  type ResourceRecords,
} from "./types";
import {
  canonicalJson,
  computeContentId,
  describeFile,
  directoryExists,
  isNotFoundError,
} from "./utils";

export const RESOURCE_NAMESPACES = {
  files: "file_resource",
  contents: "parsed_content_list",
  images: "parsed_images",
  markdown: "parsed_markdown",
} as const satisfies Record<ResourceCollection, ResourceNamespace>;

type ResourceStorages = { [K in ResourceCollection]: KVStorage<ResourceRecords[K]> };

export type FileContentReader = (filePath: string) => Promise<string>;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reads a source file as text. Bytes that are not valid UTF-8 are returned
 * base64-encoded instead, so binary inputs still get a stable string form.
 */
export const readFileContent: FileContentReader = async (filePath) => {
  const buffer = await fs.readFile(filePath);
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    return buffer.toString("base64");
  }
};

export class ResourceStorageNotInitializedError extends Error {
  constructor() {
    super("Resource storage not initialized. Call initializeStorage() first.");
    this.name = "ResourceStorageNotInitializedError";
  }
}

export interface ResourceManagerOptions {
  config: ResourceConfig;
  storageFactory: KVStorageFactory;
  logger?: Logger;
  outputReader?: ParserOutputReader;
  readFile?: FileContentReader;
}

/**
 * Persists input files and parser output as content-addressed records in
 * four KV collections. Every operation is a no-op (with a warning) while
 * resource management is disabled in the configuration.
 */
export class ResourceManager {
  private readonly config: ResourceConfig;
  private readonly storageFactory: KVStorageFactory;
  private readonly logger: Logger;
  private readonly outputReader: ParserOutputReader;
  private readonly readFile: FileContentReader;
  private storages: ResourceStorages | null = null;

  constructor(options: ResourceManagerOptions) {
    this.config = options.config;
    this.storageFactory = options.storageFactory;
    this.logger = options.logger ?? consoleLogger;
    this.outputReader = options.outputReader ?? new MineruOutputReader(this.logger);
    this.readFile = options.readFile ?? readFileContent;
  }

  isEnabled(): boolean {
    return this.config.resourceManagement;
  }

  /** Initializes storage at application start and logs the outcome. */
  async activate(): Promise<void> {
    if (!this.ensureEnabled("activate")) return;
    await this.initializeStorage();
    this.logger.info("Resource management initialized", {
      namespaces: Object.values(RESOURCE_NAMESPACES),
    });
  }

  async initializeStorage(): Promise<void> {
    if (!this.ensureEnabled("initializeStorage")) return;
    if (this.storages) return;

    const storages: ResourceStorages = {
      files: this.storageFactory<FileResourceRecord>(RESOURCE_NAMESPACES.files),
      contents: this.storageFactory<ParsedContentRecord>(RESOURCE_NAMESPACES.contents),
      images: this.storageFactory<ParsedImageRecord>(RESOURCE_NAMESPACES.images),
      markdown: this.storageFactory<ParsedMarkdownRecord>(RESOURCE_NAMESPACES.markdown),
    };

    // The collections are independent; initialize them together.
    const pending = Object.values(storages);
    const outcomes = await Promise.allSettled(pending.map((storage) => storage.initialize()));
    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");

    if (failure) {
      // Collections that did open would be unreachable once this call fails.
      await Promise.all(
        pending.filter((_, index) => outcomes[index]?.status === "fulfilled").map((storage) => storage.finalize()),
      );
      throw failure.reason;
    }
    this.storages = storages;
  }

  /** Callers must not have store operations in flight when this runs. */
  async finalizeStorage(): Promise<void> {
    if (!this.ensureEnabled("finalizeStorage")) return;
    const storages = this.storages;
    if (!storages) return;

    await Promise.all(Object.values(storages).map((storage) => storage.finalize()));
    this.storages = null;
  }

  isStorageReady(): boolean {
    if (!this.isEnabled() || !this.storages) return false;
    return Object.values(this.storages).every((storage) => storage.isReady());
  }

  async getRecord<K extends ResourceCollection>(collection: K, id: string): Promise<ResourceRecords[K] | null> {
    const storages = this.requireStorages();
    const storage: KVStorage<ResourceRecords[K]> = storages[collection];
    return storage.getById(id);
  }

  /** @returns Number of records written (0 or 1). */
  async storeInputFile(filePath: string): Promise<number> {
    if (!this.ensureEnabled("storeInputFile")) return 0;
    const { files } = this.requireStorages();

    const fileContent = await this.readFile(filePath);
    const { fileName, fileType } = describeFile(filePath);
    const id = computeContentId(fileContent, "doc");

    await files.upsert({
      [id]: {
        id,
        file_name: fileName,
        file_type: fileType,
        file_path: filePath,
        file_content: fileContent,
      },
    });
    this.logger.debug("Stored input file", { id, filePath });
    return 1;
  }

  /** @returns Number of distinct content records written. */
  async storeParsedContentList(filePath: string, items: ContentListItem[]): Promise<number> {
    if (!this.ensureEnabled("storeParsedContentList")) return 0;
    const { contents } = this.requireStorages();
    const docId = await this.documentId(filePath);
    return this.writeContentList(contents, filePath, docId, items);
  }

  /** @returns Number of image records written; 0 when `imagesDir` does not exist. */
  async storeParsedImages(filePath: string, imagesDir: string): Promise<number> {
    if (!this.ensureEnabled("storeParsedImages")) return 0;
    const { images } = this.requireStorages();

    if (!(await directoryExists(imagesDir))) {
      this.logger.warn("Parsed images directory does not exist", { imagesDir, filePath });
      return 0;
    }

    const docId = await this.documentId(filePath);
    return this.writeImages(images, filePath, docId, imagesDir);
  }

  async storeParsedMarkdown(filePath: string, markdownContent: string): Promise<number> {
    if (!this.ensureEnabled("storeParsedMarkdown")) return 0;
    const { markdown } = this.requireStorages();
    const docId = await this.documentId(filePath);
    return this.writeMarkdown(markdown, filePath, docId, markdownContent);
  }

  /**
   * Stores the content list, images and markdown a parser wrote for
   * `inputFilePath`. The three writes are independent upserts; a failure part
   * way leaves the earlier ones in place, and a retry rewrites the same keys.
   */
  async importParsedResult(inputFilePath: string, options: ImportOptions = {}): Promise<ImportResult> {
    if (!this.ensureEnabled("importParsedResult")) return { status: "skipped", reason: "disabled" };

    const outputDir = options.outputDir ?? this.config.parserOutputDir;
    const parseMethod = resolveParseMethod(options.parseMethod ?? this.config.parseMethod, options.backend);

    if (this.config.parser !== SUPPORTED_PARSER) {
      this.logger.warn(`Storing parsed results is only supported for the '${SUPPORTED_PARSER}' parser`, {
        parser: this.config.parser,
        filePath: inputFilePath,
      });
      return { status: "skipped", reason: "unsupported-parser" };
    }

    const storages = this.requireStorages();
    const { fileName: fileStem } = describeFile(inputFilePath);
    const output = await this.outputReader.readOutput(outputDir, fileStem, parseMethod);
    const docId = await this.documentId(inputFilePath);

    const contentItems = await this.writeContentList(storages.contents, inputFilePath, docId, output.contentList);

    const imagesDir = parsedImagesDir(outputDir, fileStem, parseMethod);
    let images = 0;
    if (await directoryExists(imagesDir)) {
      images = await this.writeImages(storages.images, inputFilePath, docId, imagesDir);
    } else {
      this.logger.warn("Parsed images directory does not exist", { imagesDir, filePath: inputFilePath });
    }

    const markdown =
      output.markdown === null ? 0 : await this.writeMarkdown(storages.markdown, inputFilePath, docId, output.markdown);

    this.logger.info("Stored parsed result", {
      filePath: inputFilePath,
      docId,
      parseMethod,
      contentItems,
      images,
    });
    return { status: "stored", docId, parseMethod, contentItems, images, markdownStored: markdown > 0 };
  }

  private async writeContentList(
    storage: KVStorage<ParsedContentRecord>,
    filePath: string,
    docId: string,
    items: ContentListItem[],
  ): Promise<number> {
    const batch: Record<string, ParsedContentRecord> = {};
    for (const content of items) {
      const id = computeContentId(canonicalJson(content), "parsed_content");
      batch[id] = { id, content, file_path: filePath, doc_id: docId };
    }

    const count = Object.keys(batch).length;
    if (!count) return 0;
    await storage.upsert(batch);
    this.logger.debug("Stored parsed content list", { filePath, docId, count });
    return count;
  }

  private async writeImages(
    storage: KVStorage<ParsedImageRecord>,
    filePath: string,
    docId: string,
    imagesDir: string,
  ): Promise<number> {
    const names = (await fs.readdir(imagesDir)).sort();
    const batch: Record<string, ParsedImageRecord> = {};

    for (const name of names) {
      const imagePath = path.join(imagesDir, name);
      if (!(await isRegularFile(imagePath))) continue;

      const imageContent = (await fs.readFile(imagePath)).toString("base64");
      const id = computeContentId(imageContent, "parsed_image");
      batch[id] = {
        id,
        image_path: imagePath,
        image_content: imageContent,
        file_path: filePath,
        doc_id: docId,
      };
    }

    const count = Object.keys(batch).length;
    if (!count) return 0;
    await storage.upsert(batch);
    this.logger.debug("Stored parsed images", { filePath, docId, count });
    return count;
  }

  private async writeMarkdown(
    storage: KVStorage<ParsedMarkdownRecord>,
    filePath: string,
    docId: string,
    markdownContent: string,
  ): Promise<number> {
    const id = computeContentId(markdownContent, "parsed_markdown");
    await storage.upsert({
      [id]: { id, markdown_content: markdownContent, file_path: filePath, doc_id: docId },
    });
    return 1;
  }

  private async documentId(filePath: string): Promise<string> {
    return computeContentId(await this.readFile(filePath), "doc");
  }

  private ensureEnabled(operation: string): boolean {
    if (this.isEnabled()) return true;
    this.logger.warn("Resource management is not enabled", { operation });
    return false;
  }

  private requireStorages(): ResourceStorages {
    if (!this.storages) throw new ResourceStorageNotInitializedError();
    return this.storages;
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    // dangling symlink
    if (isNotFoundError(error)) return false;
    throw error;
  }
}
