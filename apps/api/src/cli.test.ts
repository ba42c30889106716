import { silentLogger } from "@ragvault/resources";
import { describe, expect, it, vi } from "vitest";

import { CliUsageError, parseCliArgs, runCli } from "./cli";
import type { IngestResult } from "./pipeline";

describe("parseCliArgs", () => {
  it("collects files and import options", () => {
    expect(parseCliArgs(["--method", "ocr", "a.pdf", "--backend", "vlm-transformers", "b.pdf"])).toEqual({
      files: ["a.pdf", "b.pdf"],
      enqueue: false,
      parseMethod: "ocr",
      backend: "vlm-transformers",
    });
    expect(parseCliArgs(["--enqueue", "--output-dir", "/tmp/out", "a.pdf"])).toEqual({
      files: ["a.pdf"],
      enqueue: true,
      outputDir: "/tmp/out",
    });
  });

  it("rejects missing files, values and unknown flags", () => {
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["--method"])).toThrow("--method expects a value");
    expect(() => parseCliArgs(["--output-dir", "--enqueue", "a.pdf"])).toThrow("--output-dir expects a value");
    expect(() => parseCliArgs(["--force", "a.pdf"])).toThrow("Unknown option --force");
  });
});

describe("runCli", () => {
  const skipped = (filePath: string): IngestResult => ({
    filePath,
    filesStored: 0,
    parsed: { status: "skipped", reason: "disabled" },
  });

  const createPipeline = () => ({
    setup: vi.fn(async () => undefined),
    ingest: vi.fn(async (filePath: string) => skipped(filePath)),
    shutdown: vi.fn(async () => undefined),
  });

  it("ingests each file directly and shuts the pipeline down", async () => {
    const pipeline = createPipeline();
    const enqueue = vi.fn(async () => undefined);

    await runCli({ files: ["a.pdf", "b.pdf"], enqueue: false, parseMethod: "txt" }, { pipeline, enqueue, logger: silentLogger });

    expect(pipeline.setup).toHaveBeenCalledTimes(1);
    expect(pipeline.ingest.mock.calls).toEqual([
      ["a.pdf", { parseMethod: "txt" }],
      ["b.pdf", { parseMethod: "txt" }],
    ]);
    expect(pipeline.shutdown).toHaveBeenCalledTimes(1);
    expect(enqueue).not.toHaveBeenCalled();
  });

  it("shuts down even when an ingest fails", async () => {
    const pipeline = createPipeline();
    pipeline.ingest.mockRejectedValueOnce(new Error("disk full"));

    await expect(
      runCli({ files: ["a.pdf"], enqueue: false }, { pipeline, enqueue: vi.fn(), logger: silentLogger }),
    ).rejects.toThrow("disk full");
    expect(pipeline.shutdown).toHaveBeenCalledTimes(1);
  });

  it("queues jobs without touching storage in enqueue mode", async () => {
    const pipeline = createPipeline();
    const enqueue = vi.fn(async () => undefined);

    await runCli({ files: ["a.pdf"], enqueue: true, backend: "pipeline" }, { pipeline, enqueue, logger: silentLogger });

    expect(enqueue).toHaveBeenCalledWith({ filePath: "a.pdf", backend: "pipeline" });
    expect(pipeline.setup).not.toHaveBeenCalled();
  });
});
