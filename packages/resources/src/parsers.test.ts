import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MineruOutputReader, parsedImagesDir, resolveParseMethod } from "./parsers";
import { type Logger } from "./types";

const createLogger = (): Logger => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });

describe("resolveParseMethod", () => {
  it("forces the vlm partition for vlm backends", () => {
    expect(resolveParseMethod("auto", "vlm-transformers")).toBe("vlm");
    expect(resolveParseMethod("ocr", "pipeline")).toBe("ocr");
    expect(resolveParseMethod("txt")).toBe("txt");
  });

  it("lays images out under the method directory", () => {
    expect(parsedImagesDir("out", "report", "auto")).toBe(path.join("out", "report", "auto", "images"));
  });
});

describe("MineruOutputReader", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "resources-parser-"));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("reads nested artifacts and resolves relative image paths", async () => {
    const methodDir = path.join(outputDir, "report", "auto");
    await fs.mkdir(methodDir, { recursive: true });
    await fs.writeFile(
      path.join(methodDir, "report_content_list.json"),
      JSON.stringify([
        { type: "image", img_path: "images/fig1.jpg" },
        { type: "table", table_img_path: "/abs/table.jpg" },
        { type: "text", text: "Intro" },
      ]),
    );
    await fs.writeFile(path.join(methodDir, "report.md"), "# Report\n");

    const output = await new MineruOutputReader(createLogger()).readOutput(outputDir, "report", "auto");

    expect(output.sourceDir).toBe(methodDir);
    expect(output.markdown).toBe("# Report\n");
    expect(output.contentList).toEqual([
      { type: "image", img_path: path.resolve(methodDir, "images/fig1.jpg") },
      { type: "table", table_img_path: "/abs/table.jpg" },
      { type: "text", text: "Intro" },
    ]);
  });

  it("falls back to a flat layout", async () => {
    await fs.writeFile(path.join(outputDir, "memo_content_list.json"), '["a"]');

    const logger = createLogger();
    const output = await new MineruOutputReader(logger).readOutput(outputDir, "memo", "auto");

    expect(output.sourceDir).toBe(outputDir);
    expect(output.contentList).toEqual(["a"]);
    expect(output.markdown).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Parsed markdown not found", {
      path: path.join(outputDir, "memo.md"),
    });
  });

  it("warns and returns an empty list when nothing was written", async () => {
    const logger = createLogger();
    const output = await new MineruOutputReader(logger).readOutput(outputDir, "ghost", "auto");

    expect(output.contentList).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Parsed content list not found", {
      path: path.join(outputDir, "ghost_content_list.json"),
    });
  });

  it("returns an empty markdown file as an empty string", async () => {
    await fs.writeFile(path.join(outputDir, "blank.md"), "");

    const output = await new MineruOutputReader(createLogger()).readOutput(outputDir, "blank", "auto");

    expect(output.markdown).toBe("");
  });

  it("rejects a content list that is not an array", async () => {
    await fs.writeFile(path.join(outputDir, "bad_content_list.json"), '{"type":"text"}');

    await expect(new MineruOutputReader(createLogger()).readOutput(outputDir, "bad", "auto")).rejects.toThrow(
      "is not a JSON array",
    );
  });
});
