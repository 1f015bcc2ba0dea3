import { describe, expect, it } from "vitest";
import { RepoIndexSchema } from "@archlens/shared";

import { Pass2ContractError } from "../errors";
import { extractDependencies } from "./dependencies";
import {
  TRUNCATION_MARKER,
  buildArchitectureFiles,
  expandSeedsByDependencies,
  readPlanCandidates,
  selectArchitectureOrder,
  selectSupportingFiles,
  signalEntrypoints,
  sliceHead,
  sliceTail,
  truncateWithTail,
} from "./packSelection";

function makeIndex(extra: Record<string, unknown> = {}) {
  return RepoIndexSchema.parse({
    schema_version: "pass1_repo_index.v1",
    job: { resolved_commit: "abc123" },
    read_plan: { closure_seeds: [], candidates: [] },
    files: [],
    ...extra,
  });
}

const edge = (resolvedPath: string) => ({ spec: resolvedPath, resolved_path: resolvedPath, is_external: false });

describe("truncateWithTail", () => {
  it("leaves short text and non-positive budgets alone", () => {
    expect(truncateWithTail("hello", 10)).toBe("hello");
    expect(truncateWithTail("hello", 0)).toBe("hello");
  });

  it("keeps 75% head and the rest as tail, marker included in the budget", () => {
    const text = "a".repeat(600) + "b".repeat(600);
    const result = truncateWithTail(text, 1000);
    expect(result).toBe("a".repeat(600) + "b".repeat(135) + TRUNCATION_MARKER + "b".repeat(246));
    expect(result.length).toBe(1000);
  });

  it("cuts from the head when the tail would be under 200 chars", () => {
    const text = "0123456789".repeat(50);
    expect(truncateWithTail(text, 300)).toBe(text.slice(0, 300));
  });

  it("never splits a surrogate pair at either cut", () => {
    const text = "a".repeat(734) + "\u{1F600}" + "b".repeat(400) + "\u{1F600}" + "c".repeat(245);
    // head 735 ends on a high half and tail 246 starts on a low half.
    expect(truncateWithTail(text, 1000)).toBe("a".repeat(734) + TRUNCATION_MARKER + "c".repeat(245));
    expect(truncateWithTail("x".repeat(299) + "\u{1F600}" + "y".repeat(200), 300)).toBe("x".repeat(299));
  });
});

describe("sliceHead and sliceTail", () => {
  it("step back from a split pair and leave whole text alone", () => {
    expect(sliceHead("ab\u{1F600}", 3)).toBe("ab");
    expect(sliceHead("ab\u{1F600}", 4)).toBe("ab\u{1F600}");
    expect(sliceTail("\u{1F600}ab", 3)).toBe("ab");
    expect(sliceTail("\u{1F600}ab", 4)).toBe("\u{1F600}ab");
    expect(sliceTail("abc", 0)).toBe("");
  });
});

describe("seed lists", () => {
  it("reads candidates from records and bare strings, trimmed and unique", () => {
    const index = makeIndex({
      read_plan: {
        closure_seeds: [],
        candidates: [{ path: " a.ts " }, "b.ts", { path: "" }, 3, { path: "a.ts" }],
      },
    });
    expect(readPlanCandidates(index)).toEqual(["a.ts", "b.ts"]);
  });

  it("keeps only available entrypoints, sorted", () => {
    const index = makeIndex({
      signals: { entrypoints: [{ path: "z.ts" }, { path: " a.ts " }, { path: "missing.ts" }, "x"] },
    });
    expect(signalEntrypoints(index, new Set(["a.ts", "z.ts"]))).toEqual(["a.ts", "z.ts"]);
  });
});

describe("expandSeedsByDependencies", () => {
  const outEdges = new Map([
    ["a", new Set(["d", "c", "b"])],
    ["b", new Set(["e"])],
  ]);

  it("adds sorted targets per hop, capped per file", () => {
    expect(expandSeedsByDependencies(["a"], outEdges, 1, 2)).toEqual(["a", "b", "c"]);
    expect(expandSeedsByDependencies(["a"], outEdges, 2, 2)).toEqual(["a", "b", "c", "e"]);
  });

  it("adds nothing with zero hops or a zero edge cap", () => {
    expect(expandSeedsByDependencies(["a"], outEdges, 0, 12)).toEqual(["a"]);
    expect(expandSeedsByDependencies(["a"], outEdges, 3, 0)).toEqual(["a"]);
  });
});

describe("selectArchitectureOrder", () => {
  const index = makeIndex({
    signals: { entrypoints: [{ path: "backend/main.py" }] },
    files: [
      {
        path: "backend/main.py",
        language: "python",
        deps: { import_edges: [edge("backend/routers/orders.py")], internal_unresolved_specs: [] },
      },
      { path: "backend/routers/orders.py", language: "python" },
      { path: "scripts/tool.sh", language: "shell" },
      { path: "README.md", language: "markdown" },
    ],
  });
  const dependencies = extractDependencies(index);
  const caps = { pack_dep_hops: 1, pack_max_dep_edges_per_file: 12 };

  it("puts expanded seeds first, then the scored ranking", () => {
    const contents = new Map([
      ["scripts/tool.sh", "echo hi"],
      ["README.md", "# Shop"],
      ["backend/routers/orders.py", "def list_orders(): ..."],
      ["backend/main.py", "from backend.routers import orders"],
    ]);
    const { ordered, selectionDebug } = selectArchitectureOrder(contents, index, dependencies, caps);

    expect(ordered).toEqual(["backend/main.py", "README.md", "backend/routers/orders.py", "scripts/tool.sh"]);
    expect(selectionDebug).toEqual({
      available_files: 4,
      closure_seeds_count: 0,
      read_plan_count: 0,
      entrypoints_count: 1,
      spines_count: 2,
      dep_hops: 1,
      dep_edges_per_file: 12,
      expanded_count: 3,
    });
  });

  it("does not depend on map insertion order", () => {
    const entries: [string, string][] = [
      ["backend/main.py", "main"],
      ["backend/routers/orders.py", "orders"],
      ["scripts/tool.sh", "tool"],
      ["README.md", "readme"],
    ];
    const first = selectArchitectureOrder(new Map(entries), index, dependencies, caps);
    const second = selectArchitectureOrder(new Map([...entries].reverse()), index, dependencies, caps);
    expect(second.ordered).toEqual(first.ordered);
  });

  it("refuses an empty contents map", () => {
    expect(() => selectArchitectureOrder(new Map(), index, dependencies, caps)).toThrow(Pass2ContractError);
  });
});

describe("buildArchitectureFiles", () => {
  it("stops at the character budget and truncates the file that crosses it", () => {
    const contents = new Map([
      ["a.ts", "a".repeat(5000)],
      ["b.ts", "b".repeat(5000)],
      ["c.ts", "c".repeat(5000)],
    ]);
    const files = buildArchitectureFiles(["a.ts", "b.ts", "c.ts"], contents, {
      max_arch_files: 5,
      max_arch_input_chars: 7000,
      max_arch_chars_per_file: 4000,
    });

    expect([...files.keys()]).toEqual(["a.ts", "b.ts"]);
    expect(files.get("a.ts")?.length).toBe(4000);
    expect(files.get("b.ts")?.length).toBe(3000);
    expect(files.get("b.ts")?.endsWith("b".repeat(746))).toBe(true);
  });

  it("truncates a single oversized file instead of dropping it", () => {
    const files = buildArchitectureFiles(["big.ts"], new Map([["big.ts", "x".repeat(50000)]]), {
      max_arch_files: 120,
      max_arch_input_chars: 240000,
      max_arch_chars_per_file: 9000,
    });
    expect(files.get("big.ts")?.length).toBe(9000);
  });

  it("never exceeds the file cap", () => {
    const contents = new Map(["a", "b", "c", "d"].map((name): [string, string] => [name, name]));
    const files = buildArchitectureFiles(["a", "b", "c", "d"], contents, {
      max_arch_files: 2,
      max_arch_input_chars: 10000,
      max_arch_chars_per_file: 500,
    });
    expect([...files.keys()]).toEqual(["a", "b"]);
  });
});

describe("selectSupportingFiles", () => {
  it("walks spines first and then favours docs and manifests", () => {
    const contents = new Map([
      ["src/app.ts", "export const app = 1;"],
      ["docs/guide.md", "# Guide"],
      ["README.md", "# Readme"],
      ["package.json", "{}"],
    ]);
    const files = selectSupportingFiles(contents, makeIndex(), {
      max_support_files: 3,
      max_support_chars: 120000,
      max_support_chars_per_file: 9000,
    });
    expect([...files.keys()]).toEqual(["package.json", "README.md", "docs/guide.md"]);
  });
});

// Small deterministic PRNG so the randomized cases are reproducible.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("pack budgets", () => {
  const random = seededRandom(20260119);
  const between = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));
  const perFileCap = () => (random() < 0.3 ? between(200, 240) : between(1, 3000));

  function randomContents(): Map<string, string> {
    const contents = new Map<string, string>();
    const count = between(1, 40);
    for (let i = 0; i < count; i += 1) {
      const name = random() < 0.2 ? `docs/note${i}.md` : `src/file${i}.ts`;
      contents.set(name, "x".repeat(between(1, 4000)));
    }
    return contents;
  }

  const totalChars = (files: ReadonlyMap<string, string>) =>
    [...files.values()].reduce((sum, text) => sum + text.length, 0);

  it("keeps both packs within their file and character caps", () => {
    for (let round = 0; round < 500; round += 1) {
      const contents = randomContents();

      const archCaps = {
        max_arch_files: between(1, 30),
        max_arch_input_chars: random() < 0.2 ? between(1, 18) : between(1, 20000),
        max_arch_chars_per_file: perFileCap(),
      };
      const arch = buildArchitectureFiles([...contents.keys()].sort(), contents, archCaps);
      expect(arch.size).toBeLessThanOrEqual(archCaps.max_arch_files);
      expect(totalChars(arch)).toBeLessThanOrEqual(archCaps.max_arch_input_chars);

      const supportCaps = {
        max_support_files: between(1, 30),
        max_support_chars: random() < 0.2 ? between(1, 18) : between(1, 20000),
        max_support_chars_per_file: perFileCap(),
      };
      const support = selectSupportingFiles(contents, makeIndex(), supportCaps);
      expect(support.size).toBeLessThanOrEqual(supportCaps.max_support_files);
      expect(totalChars(support)).toBeLessThanOrEqual(supportCaps.max_support_chars);
    }
  });

  it("fills a pack whose budget is smaller than the truncation marker by a hard cut", () => {
    const files = selectSupportingFiles(new Map([["README.md", "r".repeat(500)]]), makeIndex(), {
      max_support_files: 5,
      max_support_chars: TRUNCATION_MARKER.length - 4,
      max_support_chars_per_file: 219,
    });
    expect(Object.fromEntries(files)).toEqual({ "README.md": "r".repeat(15) });
  });
});
