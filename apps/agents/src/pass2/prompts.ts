import {
  GENERATED_AT_SENTINEL,
  PASS2_SEMANTIC_SCHEMA_VERSION,
  type RepoIndex,
  type RepoMeta,
} from "@archlens/shared";

import { stableStringify } from "../storage/jsonFileStorage";
import type { DependencyMap } from "./dependencies";
import { sliceHead } from "./packSelection";

const DEPS_SUMMARY_MAX_FILES = 50;
const DEPS_SUMMARY_SAMPLE = 5;
const DEPS_SUMMARY_MAX_DEFS = 10;
const ARCH_SAMPLE_FILES = 10;
const SUPPORT_SAMPLE_FILES = 5;
const SAMPLE_MAX_CHARS = 1000;

export const JSON_REPAIR_SYSTEM_PROMPT = "You are a JSON repair tool. Output JSON only.";

// Shape the model must fill. Deliberately has no caps block.
export const OUTPUT_SCHEMA_TEMPLATE = {
  schema_version: PASS2_SEMANTIC_SCHEMA_VERSION,
  generated_at: GENERATED_AT_SENTINEL,
  repo: { repo_url: "string|null", resolved_commit: "string" },
  summary: {
    primary_stack: "string|null",
    architecture_overview: "string",
    key_components: ["string"],
    data_flows: ["string"],
    auth_and_routing_notes: ["string"],
    risks_or_gaps: ["string"],
  },
  evidence: {
    arch_pack_paths: ["string"],
    support_pack_paths: ["string"],
    notable_files: [{ path: "string", why: "string" }],
  },
} as const;

const OUTPUT_RULES = [
  "Output JSON only - no markdown, no commentary.",
  "Reference only files present in the packs (arch_pack_paths and support_pack_paths).",
  `For 'generated_at', use exactly '${GENERATED_AT_SENTINEL}' (do not replace it with a timestamp).`,
  "DO NOT include a 'caps' field in your output.",
  "Be concise: key_components, data_flows and the other lists hold short bullet-style strings.",
  "Focus on architecture, data flows, auth/routing patterns, and risks/gaps.",
  "Use the provided repo metadata for the 'repo' field.",
] as const;

export function buildSystemPrompt(): string {
  return [
    "You are a senior software architect producing a semantic summary of a code repository.",
    "Return exactly one JSON object.",
    "Do not use markdown.",
    "Do not add explanatory text.",
    "The JSON must follow the requested schema strictly.",
    "",
    "Critical rules:",
    `1. For 'generated_at', use the exact string '${GENERATED_AT_SENTINEL}'.`,
    "2. Do not include a 'caps' field.",
    "3. For 'repo', use the provided repo metadata.",
    "4. Reference only files present in the provided packs.",
    "",
    "When unsure, use null and empty arrays, but keep every required key present.",
  ].join("\n");
}

type DependencySummaryEntry = {
  resolved_internal_count: number;
  resolved_internal_sample: string[];
  internal_unresolved_specs: string[];
  flags: string[];
  language: string | null;
  top_level_defs: string[];
};

// First 50 paths in sorted order, each with short samples of its edges.
export function buildDependencySummary(dependencies: DependencyMap): Record<string, DependencySummaryEntry> {
  const summary: Record<string, DependencySummaryEntry> = {};
  const paths = [...dependencies.keys()].sort().slice(0, DEPS_SUMMARY_MAX_FILES);
  for (const filePath of paths) {
    const record = dependencies.get(filePath);
    if (!record) continue;
    summary[filePath] = {
      resolved_internal_count: record.resolvedInternal.size,
      resolved_internal_sample: [...record.resolvedInternal].sort().slice(0, DEPS_SUMMARY_SAMPLE),
      internal_unresolved_specs: record.internalUnresolvedSpecs.slice(0, DEPS_SUMMARY_SAMPLE),
      flags: [...record.flags].sort().slice(0, DEPS_SUMMARY_SAMPLE),
      language: record.language,
      top_level_defs: record.topLevelDefs.slice(0, DEPS_SUMMARY_MAX_DEFS),
    };
  }
  return summary;
}

export function samplePack(files: ReadonlyMap<string, string>, maxFiles: number): Record<string, string> {
  const sample: Record<string, string> = {};
  for (const [filePath, content] of [...files].slice(0, maxFiles)) {
    sample[filePath] = content.length > SAMPLE_MAX_CHARS ? `${sliceHead(content, SAMPLE_MAX_CHARS)}...` : content;
  }
  return sample;
}

export type UserPromptInput = {
  repoMeta: RepoMeta;
  repoIndex: RepoIndex;
  dependencies: DependencyMap;
  archFiles: ReadonlyMap<string, string>;
  supportFiles: ReadonlyMap<string, string>;
};

/**
 * User message: sorted-key, 2-space JSON. Packs go in as samples only; the
 * full packs live on disk next to the semantic artifact.
 */
export function buildUserPrompt(input: UserPromptInput): string {
  const payload = {
    repo_meta: input.repoMeta,
    schema: OUTPUT_SCHEMA_TEMPLATE,
    pass1_signals: input.repoIndex.signals,
    pass1_resolver_inputs: input.repoIndex.resolver_inputs,
    deps_summary: buildDependencySummary(input.dependencies),
    arch_pack_sample: samplePack(input.archFiles, ARCH_SAMPLE_FILES),
    support_pack_sample: samplePack(input.supportFiles, SUPPORT_SAMPLE_FILES),
    rules: OUTPUT_RULES,
  };
  return stableStringify(payload, 2);
}

export function buildJsonRepairPrompt(badText: string): string {
  return [
    "You are a JSON repair tool.",
    "You will be given text that is meant to be a single JSON object but may contain minor JSON syntax errors.",
    "Output ONLY a valid JSON object that keeps the same structure and content as closely as possible.",
    "Rules:",
    "- Output JSON only. No markdown, no commentary.",
    "- Do not change top-level keys or semantics.",
    "- Only fix syntax (missing commas, quotes, escaping, trailing commas).",
    "",
    "INPUT (verbatim):",
    badText,
  ].join("\n");
}
