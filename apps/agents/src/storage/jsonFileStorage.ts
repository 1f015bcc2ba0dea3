import { promises as fs } from "node:fs";
import { createHash } from "node:crypto";
import path from "node:path";
import { z } from "zod";

/**
 * JSON storage helpers.
 * - Atomic writes: readers never observe a half-written artifact.
 * - Keys are sorted at serialization time, so output bytes do not depend on
 *   object insertion order (integer-like keys included).
 * - Fingerprints hash the compact canonical form, not the pretty file bytes.
 */

// Ensure a directory exists, creates it if doesn't.
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

// Reads JSON from disk and validates it against the provided Zod schema.
export async function readJson<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return schema.parse(JSON.parse(raw));
}

// Reads a JSON file whose top-level value must be an object; shape is left to the caller.
export async function readJsonObject(filePath: string): Promise<Record<string, unknown>> {
  const raw = await fs.readFile(filePath, "utf8");
  const value: unknown = JSON.parse(raw);
  if (!isJsonObject(value)) {
    throw new Error(`Expected a JSON object at ${filePath}`);
  }
  return value;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Writes a file via temp + rename so updates are atomic (prevents partial writes).
async function atomicWriteFile(filePath: string, contents: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, contents, "utf8");

  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows can fail renaming over an existing file.
    const code = isJsonObject(err) ? err.code : undefined;
    if (code === "EEXIST" || code === "EPERM" || code === "EACCES") {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}

// Writes JSON with sorted keys, 2-space indent and a trailing newline.
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await atomicWriteFile(filePath, stableStringify(value, 2) + "\n");
}

// Atomically writes plain text (raw model output); a trailing newline is added when missing.
export async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  const payload = text && !text.endsWith("\n") ? `${text}\n` : text;
  await atomicWriteFile(filePath, payload);
}

/**
 * JSON.stringify with recursively sorted object keys. Without `indent` the
 * output has no whitespace at all, which is the form fingerprints are taken over.
 */
export function stableStringify(value: unknown, indent = 0): string {
  return serialize(value, indent, 0) ?? "null";
}

function serialize(value: unknown, indent: number, depth: number): string | undefined {
  if (value === null) return "null";
  if (value === undefined || typeof value === "function" || typeof value === "symbol") {
    return undefined;
  }
  if (typeof value === "string" || typeof value === "boolean" || typeof value === "number") {
    return JSON.stringify(value);
  }
  const pad = indent > 0 ? "\n" + " ".repeat(indent * (depth + 1)) : "";
  const closePad = indent > 0 ? "\n" + " ".repeat(indent * depth) : "";
  const colon = indent > 0 ? ": " : ":";

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => serialize(item, indent, depth + 1) ?? "null");
    return `[${pad}${items.join(`,${pad}`)}${closePad}]`;
  }

  if (value instanceof Map) {
    return serialize(Object.fromEntries(value), indent, depth);
  }

  if (isJsonObject(value)) {
    const entries: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const serialized = serialize(value[key], indent, depth + 1);
      if (serialized !== undefined) {
        entries.push(`${JSON.stringify(key)}${colon}${serialized}`);
      }
    }
    if (entries.length === 0) return "{}";
    return `{${pad}${entries.join(`,${pad}`)}${closePad}}`;
  }

  return undefined;
}

// Computes a SHA-256 hex digest for content integrity checks and stable artifact fingerprints.
export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

// SHA-256 over the canonical (sorted-key, whitespace-free) JSON of a value.
export function fingerprintJson(value: unknown): string {
  return sha256Hex(stableStringify(value));
}
