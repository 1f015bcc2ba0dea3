import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import {
  fingerprintJson,
  readJson,
  readJsonObject,
  sha256Hex,
  stableStringify,
  writeJsonAtomic,
  writeTextAtomic,
} from "./jsonFileStorage";

describe("stableStringify", () => {
  it("sorts keys recursively and drops undefined members", () => {
    expect(stableStringify({ b: 1, a: { d: [2, undefined], c: undefined } })).toBe('{"a":{"d":[2,null]},"b":1}');
  });

  it("indents like JSON.stringify when asked", () => {
    const value = { b: [1, { z: true, y: null }], a: "x", e: {}, f: [] };
    expect(stableStringify(value, 2)).toBe(
      JSON.stringify({ a: "x", b: [1, { y: null, z: true }], e: {}, f: [] }, null, 2)
    );
  });

  it("serializes maps as objects", () => {
    expect(stableStringify(new Map([["b", "2"], ["a", "1"]]))).toBe('{"a":"1","b":"2"}');
  });
});

describe("fingerprintJson", () => {
  it("ignores key order", () => {
    expect(fingerprintJson({ a: 1, b: [1, 2] })).toBe(fingerprintJson({ b: [1, 2], a: 1 }));
    expect(fingerprintJson({ a: 1 })).toBe(sha256Hex('{"a":1}'));
  });

  it("changes when a value changes", () => {
    expect(fingerprintJson({ files: { "a.ts": "x" } })).not.toBe(fingerprintJson({ files: { "a.ts": "y" } }));
  });
});

describe("atomic writes", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "archlens-storage-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes sorted pretty JSON with a trailing newline and no temp file", async () => {
    const target = path.join(dir, "nested", "out.json");
    await writeJsonAtomic(target, { b: 1, a: 2 });

    expect(await fs.readFile(target, "utf8")).toBe('{\n  "a": 2,\n  "b": 1\n}\n');
    expect(await fs.readdir(path.join(dir, "nested"))).toEqual(["out.json"]);
    expect(await readJson(target, z.object({ a: z.number(), b: z.number() }))).toEqual({ a: 2, b: 1 });
  });

  it("replaces an existing file", async () => {
    const target = path.join(dir, "out.json");
    await writeJsonAtomic(target, { v: 1 });
    await writeJsonAtomic(target, { v: 2 });
    expect(await readJsonObject(target)).toEqual({ v: 2 });
  });

  it("adds a trailing newline to text only when missing", async () => {
    await writeTextAtomic(path.join(dir, "a.txt"), "raw");
    await writeTextAtomic(path.join(dir, "b.txt"), "raw\n");
    await writeTextAtomic(path.join(dir, "c.txt"), "");
    expect(await fs.readFile(path.join(dir, "a.txt"), "utf8")).toBe("raw\n");
    expect(await fs.readFile(path.join(dir, "b.txt"), "utf8")).toBe("raw\n");
    expect(await fs.readFile(path.join(dir, "c.txt"), "utf8")).toBe("");
  });

  it("rejects a top-level value that is not an object", async () => {
    const target = path.join(dir, "list.json");
    await fs.writeFile(target, "[1]");
    await expect(readJsonObject(target)).rejects.toThrow(`Expected a JSON object at ${target}`);
  });
});
