import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  asStoredRecord,
  canonicalJson,
  checksum,
  computeContentId,
  describeFile,
  directoryExists,
} from "./utils";

describe("computeContentId", () => {
  it("prefixes the tag and appends an md5 hex digest", () => {
    const id = computeContentId("hello world", "doc");

    expect(id).toMatch(/^doc_[0-9a-f]{32}$/);
    expect(id).toBe(`doc_${checksum(Buffer.from("doc_hello world"), "md5")}`);
  });

  it("is stable for equal payloads", () => {
    expect(computeContentId("same bytes", "parsed_markdown")).toBe(computeContentId("same bytes", "parsed_markdown"));
  });

  it("separates entity classes for the same payload", () => {
    const doc = computeContentId("payload", "doc");
    const image = computeContentId("payload", "parsed_image");

    expect(doc.slice("doc_".length)).not.toBe(image.slice("parsed_image_".length));
  });
});

describe("canonicalJson", () => {
  it("sorts keys at every depth and keeps array order", () => {
    const value = { b: 1, a: { d: 2, c: [3, { f: 1, e: 2 }] } };

    expect(canonicalJson(value)).toBe('{"a":{"c":[3,{"e":2,"f":1}],"d":2},"b":1}');
  });

  it("gives the same text for objects built in different key order", () => {
    expect(canonicalJson({ type: "text", text: "Hi", page_idx: 0 })).toBe(
      canonicalJson({ page_idx: 0, text: "Hi", type: "text" }),
    );
  });

  it("serialises scalars and drops undefined members", () => {
    expect(canonicalJson("a")).toBe('"a"');
    expect(canonicalJson(undefined)).toBe("null");
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
    expect(canonicalJson([undefined, 1])).toBe("[null,1]");
  });
});

describe("asStoredRecord", () => {
  it("accepts payloads with a string id and rejects the rest", () => {
    const record = { id: "doc_1", file_name: "a" };

    expect(asStoredRecord(record)).toBe(record);
    expect(asStoredRecord({ id: 7 })).toBeNull();
    expect(asStoredRecord(null)).toBeNull();
    expect(asStoredRecord("doc_1")).toBeNull();
  });
});

describe("describeFile", () => {
  it("splits the stem from the last extension", () => {
    expect(describeFile("/data/in/report.final.pdf")).toEqual({ fileName: "report.final", fileType: "pdf" });
  });

  it("returns an empty type for files without an extension", () => {
    expect(describeFile("notes/README")).toEqual({ fileName: "README", fileType: "" });
  });
});

describe("directoryExists", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "resources-utils-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("distinguishes directories from files and missing paths", async () => {
    const file = path.join(root, "file.txt");
    await fs.writeFile(file, "x");

    expect(await directoryExists(root)).toBe(true);
    expect(await directoryExists(file)).toBe(false);
    expect(await directoryExists(path.join(root, "missing"))).toBe(false);
    expect(await directoryExists(path.join(file, "child"))).toBe(false);
  });
});
