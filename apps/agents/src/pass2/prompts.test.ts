import { describe, expect, it } from "vitest";
import { RepoIndexSchema } from "@archlens/shared";

import { extractDependencies } from "./dependencies";
import { buildJsonRepairPrompt, buildSystemPrompt, buildUserPrompt, samplePack } from "./prompts";

const repoMeta = { repo_url: "https://example.com/acme/shop.git", resolved_commit: "abc123" };

function makeIndex(fileCount: number) {
  return RepoIndexSchema.parse({
    schema_version: "pass1_repo_index.v1",
    job: { resolved_commit: "abc123" },
    read_plan: { closure_seeds: [], candidates: [] },
    signals: { entrypoints: [{ path: "f00.ts" }] },
    resolver_inputs: { tsconfig_paths: { "@/*": ["src/*"] } },
    files: Array.from({ length: fileCount }, (_, n) => ({
      path: `f${String(n).padStart(2, "0")}.ts`,
      language: "typescript",
      flags: ["g", "f", "e", "d", "c", "b", "a"],
      deps: {
        import_edges: ["z", "y", "x", "w", "v", "u"].map((name) => ({
          spec: `./${name}`,
          resolved_path: `${name}.ts`,
          is_external: false,
        })),
        internal_unresolved_specs: [],
      },
    })),
  });
}

describe("buildSystemPrompt", () => {
  it("asks for the timestamp sentinel and forbids caps", () => {
    const prompt = buildSystemPrompt();
    expect(prompt).toContain("use the exact string 'ISO8601'");
    expect(prompt).toContain("Do not include a 'caps' field.");
  });
});

describe("buildUserPrompt", () => {
  const index = makeIndex(55);
  const archFiles = new Map(
    Array.from({ length: 12 }, (_, n): [string, string] => [`a${String(n).padStart(2, "0")}.ts`, "x".repeat(1200)])
  );
  const supportFiles = new Map(
    Array.from({ length: 7 }, (_, n): [string, string] => [`doc${n}.md`, "short"])
  );
  const prompt = buildUserPrompt({
    repoMeta,
    repoIndex: index,
    dependencies: extractDependencies(index),
    archFiles,
    supportFiles,
  });
  const payload = JSON.parse(prompt);

  it("serializes with sorted keys and 2-space indent", () => {
    expect(Object.keys(payload)).toEqual([
      "arch_pack_sample",
      "deps_summary",
      "pass1_resolver_inputs",
      "pass1_signals",
      "repo_meta",
      "rules",
      "schema",
      "support_pack_sample",
    ]);
    expect(prompt.startsWith('{\n  "arch_pack_sample": {\n    "a00.ts": ')).toBe(true);
  });

  it("samples the packs instead of sending them whole", () => {
    expect(Object.keys(payload.arch_pack_sample)).toHaveLength(10);
    expect(payload.arch_pack_sample["a00.ts"]).toBe(`${"x".repeat(1000)}...`);
    expect(Object.keys(payload.support_pack_sample)).toEqual(["doc0.md", "doc1.md", "doc2.md", "doc3.md", "doc4.md"]);
  });

  it("caps the dependency summary", () => {
    expect(Object.keys(payload.deps_summary)).toHaveLength(50);
    expect(payload.deps_summary["f00.ts"]).toEqual({
      flags: ["a", "b", "c", "d", "e"],
      internal_unresolved_specs: [],
      language: "typescript",
      resolved_internal_count: 6,
      resolved_internal_sample: ["u.ts", "v.ts", "w.ts", "x.ts", "y.ts"],
      top_level_defs: [],
    });
    expect(payload.deps_summary["f50.ts"]).toBeUndefined();
  });

  it("passes signals and resolver inputs through and keeps caps out of the schema", () => {
    expect(payload.pass1_signals).toEqual({ entrypoints: [{ path: "f00.ts" }] });
    expect(payload.pass1_resolver_inputs).toEqual({ tsconfig_paths: { "@/*": ["src/*"] } });
    expect(payload.repo_meta).toEqual(repoMeta);
    expect(payload.schema.generated_at).toBe("ISO8601");
    expect("caps" in payload.schema).toBe(false);
    expect(payload.rules).toContain("DO NOT include a 'caps' field in your output.");
  });
});

describe("buildJsonRepairPrompt", () => {
  it("embeds the bad text verbatim at the end", () => {
    const bad = '{"summary": {"key_components": ["a",]}';
    const prompt = buildJsonRepairPrompt(bad);
    expect(prompt.endsWith(`INPUT (verbatim):\n${bad}`)).toBe(true);
    expect(prompt.startsWith("You are a JSON repair tool.\n")).toBe(true);
  });
});

describe("samplePack", () => {
  it("does not split a surrogate pair at the sample cut", () => {
    const content = "x".repeat(999) + "\u{1F600}" + "tail";
    expect(samplePack(new Map([["a.ts", content]]), 10)).toEqual({ "a.ts": `${"x".repeat(999)}...` });
  });
});
