import type { ArchPackCaps, RepoIndex, SelectionDebug, SupportPackCaps } from "@archlens/shared";

import { Pass2ContractError } from "../errors";
import { isJsonObject } from "../storage/jsonFileStorage";
import type { DependencyMap } from "./dependencies";

/*
 * Evidence pack selection.
 *
 * Both packs are built from the same file contents map in two steps: an
 * ordering (seed lists, dependency expansion, then a scored ranking of every
 * available path) and a materialization walk that stops at the pack's file
 * and character caps. Everything here is a pure function of its inputs; every
 * ordering ends in an explicit sort so Map/Set iteration order never leaks out.
 */

export const TRUNCATION_MARKER = "\n/* …TRUNCATED… */\n";
const HEAD_SHARE = 0.75;
const MIN_TAIL_CHARS = 200;

const ARCH_BREADTH_FLOOR = 12;
const ARCH_BREADTH_TOP_UP = 24;

const SPINE_ROOT_PREFIXES = ["", "frontend/", "apps/web/", "apps/frontend/"] as const;
const SPINE_ROOT_FILES = [
  "middleware.ts",
  "middleware.js",
  "app/layout.tsx",
  "app/layout.ts",
  "app/page.tsx",
  "app/page.ts",
  "next.config.ts",
  "next.config.js",
  "package.json",
  "tsconfig.json",
  "jsconfig.json",
] as const;
const SPINE_MANIFESTS = [
  "pyproject.toml",
  "uv.lock",
  "alembic.ini",
  "package.json",
  "tsconfig.json",
  "README.md",
  "readme.md",
] as const;
const SPINE_BACKEND_FILES = [
  "backend/main.py",
  "backend/app.py",
  "backend/server.py",
  "backend/security.py",
  "backend/config.py",
] as const;

const FIRST_CLASS_LANGUAGES: ReadonlySet<string> = new Set(["python", "typescript", "javascript"]);

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** First `count` UTF-16 units of `text`, one shorter if the cut would split a surrogate pair. */
export function sliceHead(text: string, count: number): string {
  const end = count > 0 && count < text.length && isHighSurrogate(text.charCodeAt(count - 1)) ? count - 1 : count;
  return text.slice(0, end);
}

/** Last `count` UTF-16 units of `text`, one shorter if the cut would split a surrogate pair. */
export function sliceTail(text: string, count: number): string {
  if (count <= 0) return "";
  const start = Math.max(0, text.length - count);
  return text.slice(start > 0 && isLowSurrogate(text.charCodeAt(start)) ? start + 1 : start);
}

/**
 * Caps `text` at `maxChars`, keeping 75% of the budget from the head and the
 * rest from the tail, joined by TRUNCATION_MARKER (which counts against the
 * budget). When the tail would get fewer than 200 chars the text is simply
 * cut at `maxChars`. A non-positive budget means no limit.
 */
export function truncateWithTail(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) {
    return text;
  }
  const available = maxChars - TRUNCATION_MARKER.length;
  const head = Math.floor(available * HEAD_SHARE);
  const tail = available - head;
  if (tail < MIN_TAIL_CHARS) {
    return sliceHead(text, maxChars);
  }
  return sliceHead(text, head) + TRUNCATION_MARKER + sliceTail(text, tail);
}

/* ------------------------------- Seed lists ------------------------------- */

function pushUnique(target: string[], seen: Set<string>, value: string): void {
  if (!seen.has(value)) {
    seen.add(value);
    target.push(value);
  }
}

export function readPlanClosureSeeds(repoIndex: RepoIndex): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const seed of repoIndex.read_plan.closure_seeds) {
    if (typeof seed === "string" && seed) pushUnique(out, seen, seed);
  }
  return out;
}

// Candidates are `{ path }` records; bare strings are accepted too.
export function readPlanCandidates(repoIndex: RepoIndex): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const candidate of repoIndex.read_plan.candidates) {
    const raw = isJsonObject(candidate) ? candidate.path : candidate;
    if (typeof raw === "string" && raw.trim()) pushUnique(out, seen, raw.trim());
  }
  return out;
}

export function signalEntrypoints(repoIndex: RepoIndex, available: ReadonlySet<string>): string[] {
  const entrypoints = repoIndex.signals.entrypoints;
  if (!Array.isArray(entrypoints)) return [];

  const found = new Set<string>();
  for (const item of entrypoints) {
    if (!isJsonObject(item) || typeof item.path !== "string") continue;
    const entry = item.path.trim();
    if (entry && available.has(entry)) found.add(entry);
  }
  return [...found].sort();
}

// Well-known framework entry files and manifests that are present, in a fixed order.
export function knownSpines(available: ReadonlySet<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  const add = (candidate: string) => {
    if (available.has(candidate)) pushUnique(out, seen, candidate);
  };

  for (const prefix of SPINE_ROOT_PREFIXES) {
    for (const file of SPINE_ROOT_FILES) add(`${prefix}${file}`);
  }
  SPINE_MANIFESTS.forEach(add);
  SPINE_BACKEND_FILES.forEach(add);
  return out;
}

/* ---------------------------- Dependency graph ---------------------------- */

export type DependencyGraph = {
  outEdges: ReadonlyMap<string, ReadonlySet<string>>;
  inEdges: ReadonlyMap<string, ReadonlySet<string>>;
};

// Adjacency restricted to available paths on both ends.
export function buildDependencyGraph(
  available: ReadonlySet<string>,
  dependencies: DependencyMap
): DependencyGraph {
  const outEdges = new Map<string, Set<string>>();
  const inEdges = new Map<string, Set<string>>();
  for (const filePath of available) {
    outEdges.set(filePath, new Set());
    inEdges.set(filePath, new Set());
  }

  for (const filePath of available) {
    const targets = dependencies.get(filePath)?.resolvedInternal ?? new Set<string>();
    for (const target of targets) {
      if (!available.has(target)) continue;
      outEdges.get(filePath)?.add(target);
      inEdges.get(target)?.add(filePath);
    }
  }
  return { outEdges, inEdges };
}

/**
 * Breadth-first expansion from `seeds` for exactly `hops` rounds. Each frontier
 * file contributes at most `maxEdgesPerFile` targets, taken in sorted order
 * before visited ones are skipped. Seeds come first in the result.
 */
export function expandSeedsByDependencies(
  seeds: readonly string[],
  outEdges: ReadonlyMap<string, ReadonlySet<string>>,
  hops: number,
  maxEdgesPerFile: number
): string[] {
  const order: string[] = [];
  const seen = new Set<string>();
  for (const seed of seeds) pushUnique(order, seen, seed);
  if (hops <= 0) return order;

  let frontier = [...order];
  for (let round = 0; round < hops && frontier.length > 0; round += 1) {
    const next: string[] = [];
    for (const filePath of frontier) {
      const targets = [...(outEdges.get(filePath) ?? [])].sort().slice(0, Math.max(0, maxEdgesPerFile));
      for (const target of targets) {
        if (seen.has(target)) continue;
        pushUnique(order, seen, target);
        next.push(target);
      }
    }
    frontier = next;
  }
  return order;
}

/* -------------------------------- Scoring -------------------------------- */

type SeedSignals = {
  closureSeeds: ReadonlySet<string>;
  readPlan: ReadonlySet<string>;
  entrypoints: ReadonlySet<string>;
  spines: ReadonlySet<string>;
};

function endsWithAny(value: string, suffixes: readonly string[]): boolean {
  return suffixes.some((suffix) => value.endsWith(suffix));
}

function startsWithAny(value: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => value.startsWith(prefix));
}

export function architectureScore(
  filePath: string,
  signals: SeedSignals,
  graph: DependencyGraph,
  language: string | null
): number {
  const lower = filePath.toLowerCase();
  let score = 0;

  if (signals.closureSeeds.has(filePath)) score += 1200;
  if (signals.readPlan.has(filePath)) score += 900;
  if (signals.entrypoints.has(filePath)) score += 800;
  if (signals.spines.has(filePath)) score += 650;

  if (endsWithAny(lower, ["main.py", "app.py", "server.py"])) score += 240;
  if (endsWithAny(lower, ["/route.ts", "/route.js", "/page.tsx", "/layout.tsx"])) score += 220;
  if (endsWithAny(lower, ["middleware.ts", "middleware.js"])) score += 240;
  if (lower.includes("security") || lower.includes("auth")) score += 220;

  score += Math.min(80, 10 * (graph.inEdges.get(filePath)?.size ?? 0));
  score += Math.min(40, 5 * (graph.outEdges.get(filePath)?.size ?? 0));

  if (lower.startsWith("backend/routers/")) score += 220;
  if (lower.startsWith("backend/")) score += 60;
  if (lower.includes("/app/api/") && endsWithAny(lower, ["/route.ts", "/route.js"])) score += 180;

  if (startsWithAny(lower, ["frontend/lib/", "apps/web/lib/", "apps/frontend/lib/"])) score += 140;
  if (startsWithAny(lower, ["frontend/components/", "apps/web/components/", "apps/frontend/components/"])) {
    score += 120;
  }

  if (lower.endsWith("readme.md")) score += 200;
  if (lower.startsWith("docs/")) score += 120;
  if (endsWithAny(lower, ["pyproject.toml", "alembic.ini", "package.json", "next.config.ts", "next.config.js"])) {
    score += 160;
  }

  if (language && FIRST_CLASS_LANGUAGES.has(language)) score += 10;
  return score;
}

export function supportScore(filePath: string, signals: SeedSignals): number {
  const lower = filePath.toLowerCase();
  let score = 0;

  if (signals.closureSeeds.has(filePath)) score += 1100;
  if (signals.readPlan.has(filePath)) score += 900;
  if (signals.entrypoints.has(filePath)) score += 800;
  if (signals.spines.has(filePath)) score += 650;

  if (lower.endsWith("readme.md")) score += 260;
  if (lower.startsWith("docs/") || lower.includes("/docs/")) score += 200;
  if (lower.endsWith(".md")) score += 150;
  if (endsWithAny(lower, ["pyproject.toml", "alembic.ini", "uv.lock"])) score += 140;
  if (lower.includes("next.config") || lower.includes("eslint")) score += 110;
  if (endsWithAny(lower, ["package.json", "tsconfig.json", "jsconfig.json"])) score += 85;
  if (endsWithAny(lower, [".ts", ".tsx", ".py"])) score += 10;
  return score;
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

// Sorts by descending score, then ascending path.
function rankByScore(paths: Iterable<string>, score: (filePath: string) => number): string[] {
  const scored = [...paths].map((filePath) => ({ filePath, score: score(filePath) }));
  scored.sort((a, b) => b.score - a.score || comparePaths(a.filePath, b.filePath));
  return scored.map((entry) => entry.filePath);
}

function mergeUnique(...lists: readonly (readonly string[])[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const list of lists) {
    for (const value of list) pushUnique(out, seen, value);
  }
  return out;
}

/* ------------------------------ Seed assembly ----------------------------- */

type SeedLists = {
  closureSeeds: string[];
  readPlan: string[];
  entrypoints: string[];
  spines: string[];
};

function collectSeedLists(repoIndex: RepoIndex, available: ReadonlySet<string>): SeedLists {
  return {
    closureSeeds: readPlanClosureSeeds(repoIndex).filter((p) => available.has(p)),
    readPlan: readPlanCandidates(repoIndex).filter((p) => available.has(p)),
    entrypoints: signalEntrypoints(repoIndex, available),
    spines: knownSpines(available),
  };
}

function toSignals(lists: SeedLists): SeedSignals {
  return {
    closureSeeds: new Set(lists.closureSeeds),
    readPlan: new Set(lists.readPlan),
    entrypoints: new Set(lists.entrypoints),
    spines: new Set(lists.spines),
  };
}

function availablePaths(contents: ReadonlyMap<string, string>): Set<string> {
  const available = new Set(contents.keys());
  if (available.size === 0) {
    throw new Pass2ContractError("pass2: file contents map is empty; cannot build an evidence pack.");
  }
  return available;
}

export type ArchitectureOrder = {
  ordered: string[];
  selectionDebug: SelectionDebug;
};

/**
 * Full architecture ordering: dependency-expanded seeds first, then every
 * available path ranked by architectureScore.
 */
export function selectArchitectureOrder(
  contents: ReadonlyMap<string, string>,
  repoIndex: RepoIndex,
  dependencies: DependencyMap,
  caps: Pick<ArchPackCaps, "pack_dep_hops" | "pack_max_dep_edges_per_file">
): ArchitectureOrder {
  const available = availablePaths(contents);
  const lists = collectSeedLists(repoIndex, available);
  const seeds = mergeUnique(lists.closureSeeds, lists.readPlan, lists.entrypoints, lists.spines);

  const graph = buildDependencyGraph(available, dependencies);
  const expanded = expandSeedsByDependencies(
    seeds,
    graph.outEdges,
    caps.pack_dep_hops,
    caps.pack_max_dep_edges_per_file
  );

  const signals = toSignals(lists);
  const ranked = rankByScore(available, (filePath) =>
    architectureScore(filePath, signals, graph, dependencies.get(filePath)?.language ?? null)
  );

  return {
    ordered: mergeUnique(expanded, ranked),
    selectionDebug: {
      available_files: available.size,
      closure_seeds_count: lists.closureSeeds.length,
      read_plan_count: lists.readPlan.length,
      entrypoints_count: lists.entrypoints.length,
      spines_count: lists.spines.length,
      dep_hops: caps.pack_dep_hops,
      dep_edges_per_file: caps.pack_max_dep_edges_per_file,
      expanded_count: expanded.length,
    },
  };
}

/* ----------------------------- Materialization ---------------------------- */

type PackBudget = {
  maxFiles: number;
  maxTotalChars: number;
  maxCharsPerFile: number;
};

/**
 * Walks `ordered` adding truncated contents to `files` until the file cap or
 * the character budget runs out. Returns the new character total.
 */
function fillPack(
  files: Map<string, string>,
  ordered: readonly string[],
  contents: ReadonlyMap<string, string>,
  budget: PackBudget,
  startTotal: number
): number {
  let total = startTotal;
  for (const filePath of ordered) {
    if (files.size >= budget.maxFiles) break;
    const content = contents.get(filePath);
    if (!content) continue;

    const remaining = budget.maxTotalChars - total;
    if (remaining <= 0) break;

    let clipped = truncateWithTail(content, budget.maxCharsPerFile);
    if (clipped.length > remaining) {
      clipped = truncateWithTail(clipped, remaining);
    }
    if (!clipped) continue;

    files.set(filePath, clipped);
    total += clipped.length;
  }
  return total;
}

export function buildArchitectureFiles(
  ordered: readonly string[],
  contents: ReadonlyMap<string, string>,
  caps: Pick<ArchPackCaps, "max_arch_files" | "max_arch_input_chars" | "max_arch_chars_per_file">
): Map<string, string> {
  const files = new Map<string, string>();
  let total = fillPack(
    files,
    ordered,
    contents,
    {
      maxFiles: caps.max_arch_files,
      maxTotalChars: caps.max_arch_input_chars,
      maxCharsPerFile: caps.max_arch_chars_per_file,
    },
    0
  );

  // Breadth top-up when the first walk came back short. The walk above already
  // stops on the same limits, so this is only a safety net.
  if (files.size >= Math.min(ARCH_BREADTH_FLOOR, caps.max_arch_files)) {
    return files;
  }
  const topUpLimit = Math.min(ARCH_BREADTH_TOP_UP, caps.max_arch_files);
  for (const filePath of ordered) {
    if (files.size >= topUpLimit) break;
    if (files.has(filePath)) continue;
    const content = contents.get(filePath);
    if (!content) continue;

    const remaining = caps.max_arch_input_chars - total;
    if (remaining <= 0) break;

    const clipped = truncateWithTail(content, Math.min(caps.max_arch_chars_per_file, remaining));
    if (!clipped) continue;
    files.set(filePath, clipped);
    total += clipped.length;
  }
  return files;
}

/**
 * Supporting pack for gaps and onboarding: closure seeds, read plan and spines
 * first, then every path ranked by supportScore (docs and manifests first).
 */
export function selectSupportingFiles(
  contents: ReadonlyMap<string, string>,
  repoIndex: RepoIndex,
  caps: SupportPackCaps
): Map<string, string> {
  const available = availablePaths(contents);
  const lists = collectSeedLists(repoIndex, available);
  const signals = toSignals(lists);
  const ranked = rankByScore(available, (filePath) => supportScore(filePath, signals));
  const ordered = mergeUnique(lists.closureSeeds, lists.readPlan, lists.spines, ranked);

  const files = new Map<string, string>();
  fillPack(
    files,
    ordered,
    contents,
    {
      maxFiles: caps.max_support_files,
      maxTotalChars: caps.max_support_chars,
      maxCharsPerFile: caps.max_support_chars_per_file,
    },
    0
  );
  return files;
}
