import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { BINARY_EXTENSIONS, type RepoIndex } from "@archlens/shared";

import { isJsonObject } from "../storage/jsonFileStorage";

const BINARY_EXTENSION_SET: ReadonlySet<string> = new Set<string>(BINARY_EXTENSIONS);

/** Paths of every file record in the index, in index order, first occurrence wins. */
export function repoIndexPaths(repoIndex: RepoIndex): string[] {
  const seen = new Set<string>();
  const paths: string[] = [];
  for (const record of repoIndex.files) {
    if (!isJsonObject(record)) continue;
    const filePath = record.path;
    if (typeof filePath !== "string" || !filePath || seen.has(filePath)) continue;
    seen.add(filePath);
    paths.push(filePath);
  }
  return paths;
}

function resolveInsideRepo(repoDir: string, relPath: string): string | null {
  const root = path.resolve(repoDir);
  const absolute = path.resolve(root, relPath);
  const relative = path.relative(root, absolute);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return absolute;
}

/**
 * Reads one repo file as text. Returns null for anything that cannot be used
 * as evidence: missing, not a regular file, binary extension, or unreadable.
 * Bytes past maxBytes are cut before decoding; invalid UTF-8 becomes U+FFFD.
 */
export async function readRepoFileText(
  repoDir: string,
  relPath: string,
  maxBytes: number
): Promise<string | null> {
  const absolute = resolveInsideRepo(repoDir, relPath);
  if (!absolute) return null;
  if (BINARY_EXTENSION_SET.has(path.extname(absolute).toLowerCase())) return null;

  let handle: FileHandle | undefined;
  try {
    // Opening a FIFO or device blocks, so only regular files get opened.
    if (!(await fs.stat(absolute)).isFile()) return null;
    handle = await fs.open(absolute, "r");
    const stat = await handle.stat();
    if (!stat.isFile()) return null;

    const length = maxBytes > 0 ? Math.min(stat.size, maxBytes) : stat.size;
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead).toString("utf8");
  } catch {
    // Missing or unreadable files only shrink the evidence available.
    return null;
  } finally {
    await handle?.close();
  }
}

// Builds path -> text for every readable, non-empty file listed in the index.
export async function buildFileContentsMap(
  repoDir: string,
  repoIndex: RepoIndex,
  maxFileBytes: number
): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  for (const relPath of repoIndexPaths(repoIndex)) {
    const text = await readRepoFileText(repoDir, relPath, maxFileBytes);
    if (text) {
      contents.set(relPath, text);
    }
  }
  return contents;
}
