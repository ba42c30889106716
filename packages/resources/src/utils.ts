import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { type ContentTag, type StoredRecord } from "./types";

export function checksum(buffer: Buffer, algorithm: "sha256" | "md5" = "sha256") {
  return createHash(algorithm).update(buffer).digest("hex");
}

/**
 * Content address for a payload within one entity class. The tag is both the
 * visible prefix and part of the hashed bytes, so classes never share ids.
 */
export function computeContentId(payload: string, tag: ContentTag): string {
  const prefix = `${tag}_`;
  return `${prefix}${checksum(Buffer.from(`${prefix}${payload}`, "utf8"), "md5")}`;
}

/**
 * JSON with object keys sorted at every depth. Array order is significant and kept.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? "null";
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : sortKeys(item)));
  }
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    const sorted: Record<string, unknown> = {};
    for (const [key, member] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (member === undefined) continue;
      sorted[key] = sortKeys(member);
    }
    return sorted;
  }
  return value;
}

export function describeFile(filePath: string): { fileName: string; fileType: string } {
  const extension = path.extname(filePath);
  return {
    fileName: path.basename(filePath, extension),
    fileType: extension.replace(/^\./, ""),
  };
}

export const isNotFoundError = (error: unknown) =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

export const isStoredRecord = (value: unknown): value is StoredRecord =>
  value !== null && typeof value === "object" && "id" in value && typeof value.id === "string";

/**
 * Trust boundary for payloads read back from a KV backend. Only `id` is
 * checked; the rest of the shape is whatever `upsert` wrote for the collection.
 */
export function asStoredRecord<T extends StoredRecord>(value: unknown): T | null {
  return isStoredRecord(value) ? (value as T) : null;
}
