import { execFileSync } from "node:child_process";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RepoIndexSchema } from "@archlens/shared";

import { buildFileContentsMap, repoIndexPaths } from "./repoContent";

describe("buildFileContentsMap", () => {
  let root: string;
  let repoDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "archlens-content-"));
    repoDir = path.join(root, "repo");
    await fs.mkdir(path.join(repoDir, "src"), { recursive: true });
    await fs.mkdir(path.join(repoDir, "sub"));
    await fs.writeFile(path.join(repoDir, "src/a.ts"), "export const a = 1;\n");
    await fs.writeFile(path.join(repoDir, "logo.png"), "not really a png");
    await fs.writeFile(path.join(repoDir, "empty.txt"), "");
    await fs.writeFile(path.join(repoDir, "big.txt"), "x".repeat(100));
    await fs.writeFile(path.join(repoDir, "utf.txt"), Buffer.from([0x68, 0x69, 0xff]));
    await fs.writeFile(path.join(root, "outside.txt"), "secret");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const index = RepoIndexSchema.parse({
    schema_version: "pass1_repo_index.v1",
    job: { resolved_commit: "abc123" },
    read_plan: { closure_seeds: [], candidates: [] },
    files: [
      { path: "src/a.ts" },
      { path: "logo.png" },
      { path: "empty.txt" },
      { path: "big.txt" },
      { path: "utf.txt" },
      { path: "sub" },
      { path: "missing.ts" },
      { path: "../outside.txt" },
      { path: "src/a.ts" },
      "junk",
    ],
  });

  it("lists each indexed path once, in index order", () => {
    expect(repoIndexPaths(index)).toEqual([
      "src/a.ts",
      "logo.png",
      "empty.txt",
      "big.txt",
      "utf.txt",
      "sub",
      "missing.ts",
      "../outside.txt",
    ]);
  });

  it("reads usable text files and silently omits the rest", async () => {
    const contents = await buildFileContentsMap(repoDir, index, 50);
    expect(Object.fromEntries(contents)).toEqual({
      "src/a.ts": "export const a = 1;\n",
      "big.txt": "x".repeat(50),
      "utf.txt": "hi\uFFFD",
    });
  });

  it.skipIf(process.platform === "win32")("skips a named pipe without opening it", async () => {
    execFileSync("mkfifo", [path.join(repoDir, "pipe.txt")]);
    const withPipe = RepoIndexSchema.parse({
      schema_version: "pass1_repo_index.v1",
      job: { resolved_commit: "abc123" },
      read_plan: { closure_seeds: [], candidates: [] },
      files: [{ path: "src/a.ts" }, { path: "pipe.txt" }],
    });

    const contents = await buildFileContentsMap(repoDir, withPipe, 50);
    expect([...contents.keys()]).toEqual(["src/a.ts"]);
  });
});
