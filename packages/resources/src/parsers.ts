import fs from "node:fs/promises";
import path from "node:path";

import { consoleLogger } from "./logging";
import {
  type ContentListItem,
  type Logger,
  type ParserOutput,
  type ParserOutputReader,
} from "./types";
import { directoryExists, isNotFoundError } from "./utils";

export const SUPPORTED_PARSER = "mineru";
export const VLM_BACKEND_PREFIX = "vlm-";
export const VLM_PARSE_METHOD = "vlm";

const IMAGE_PATH_FIELDS = ["img_path", "table_img_path", "equation_img_path"] as const;

/** VLM backends always write under the `vlm` method directory. */
export function resolveParseMethod(parseMethod: string, backend?: string): string {
  return backend?.startsWith(VLM_BACKEND_PREFIX) ? VLM_PARSE_METHOD : parseMethod;
}

export const parsedArtifactsDir = (outputDir: string, fileStem: string, parseMethod: string) =>
  path.join(outputDir, fileStem, parseMethod);

export const parsedImagesDir = (outputDir: string, fileStem: string, parseMethod: string) =>
  path.join(parsedArtifactsDir(outputDir, fileStem, parseMethod), "images");

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

function absolutizeImagePaths(item: ContentListItem, baseDir: string): ContentListItem {
  if (item === null || typeof item !== "object" || Array.isArray(item)) return item;

  const entries: Array<[string, unknown]> = Object.entries(item);
  return Object.fromEntries(
    entries.map(([key, value]) => {
      const isImageField = IMAGE_PATH_FIELDS.some((field) => field === key);
      if (isImageField && typeof value === "string" && value && !path.isAbsolute(value)) {
        return [key, path.resolve(baseDir, value)];
      }
      return [key, value];
    }),
  );
}

/**
 * Reads the artifacts MinerU leaves on disk for one document:
 * `<stem>_content_list.json` and `<stem>.md`, from `outputDir/<stem>/<method>/`
 * or, for flat layouts, from `outputDir/` itself.
 */
export class MineruOutputReader implements ParserOutputReader {
  constructor(private readonly logger: Logger = consoleLogger) {}

  async readOutput(outputDir: string, fileStem: string, method: string): Promise<ParserOutput> {
    const nestedDir = parsedArtifactsDir(outputDir, fileStem, method);
    const sourceDir = (await directoryExists(nestedDir)) ? nestedDir : outputDir;

    const contentListPath = path.join(sourceDir, `${fileStem}_content_list.json`);
    const markdownPath = path.join(sourceDir, `${fileStem}.md`);

    const rawContentList = await readOptionalFile(contentListPath);
    let contentList: ContentListItem[] = [];
    if (rawContentList === null) {
      this.logger.warn("Parsed content list not found", { path: contentListPath });
    } else {
      const parsed: unknown = JSON.parse(rawContentList);
      if (!Array.isArray(parsed)) {
        throw new Error(`Parsed content list ${contentListPath} is not a JSON array`);
      }
      contentList = parsed.map((item: unknown) => absolutizeImagePaths(item, sourceDir));
    }

    const markdown = await readOptionalFile(markdownPath);
    if (markdown === null) {
      this.logger.warn("Parsed markdown not found", { path: markdownPath });
    }

    return { contentList, markdown, sourceDir };
  }
}
