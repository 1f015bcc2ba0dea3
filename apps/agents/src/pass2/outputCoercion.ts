import { z } from "zod";
import {
  DENIED_LLM_OUTPUT_KEYS,
  GENERATED_AT_SENTINEL,
  PASS2_SEMANTIC_SCHEMA_VERSION,
  type NotableFile,
  type Pass2LlmOutput,
  type RepoMeta,
} from "@archlens/shared";

import { isJsonObject } from "../storage/jsonFileStorage";

export const SUMMARY_LIST_LIMIT = 50;
export const EVIDENCE_PATH_LIMIT = 100;
export const NOTABLE_FILES_LIMIT = 50;
export const NOTABLE_WHY_MAX_CHARS = 500;

function isNonBlankString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

const asObject = (value: unknown): Record<string, unknown> => (isJsonObject(value) ? value : {});

// Non-blank strings kept as written; anything else (or a non-list) is dropped.
const stringList = (limit: number) =>
  z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter(isNonBlankString).slice(0, limit));

const notableFiles = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.slice(0, NOTABLE_FILES_LIMIT).flatMap((item): NotableFile[] => {
      if (!isJsonObject(item) || !isNonBlankString(item.path) || !isNonBlankString(item.why)) {
        return [];
      }
      return [{ path: item.path.trim(), why: item.why.trim().slice(0, NOTABLE_WHY_MAX_CHARS) }];
    })
  );

/*
 * The coercion table. Every field falls back to a safe default, so parsing
 * any object succeeds. Unknown keys are stripped.
 */
const CoercedSummarySchema = z.object({
  primary_stack: z.string().nullable().catch(null),
  architecture_overview: z
    .string()
    .catch("")
    .transform((value) => value.trim()),
  key_components: stringList(SUMMARY_LIST_LIMIT),
  data_flows: stringList(SUMMARY_LIST_LIMIT),
  auth_and_routing_notes: stringList(SUMMARY_LIST_LIMIT),
  risks_or_gaps: stringList(SUMMARY_LIST_LIMIT),
});

const CoercedEvidenceSchema = z.object({
  arch_pack_paths: stringList(EVIDENCE_PATH_LIMIT),
  support_pack_paths: stringList(EVIDENCE_PATH_LIMIT),
  notable_files: notableFiles,
});

const CoercedOutputSchema = z.object({
  summary: z.preprocess(asObject, CoercedSummarySchema),
  evidence: z.preprocess(asObject, CoercedEvidenceSchema),
});

export function omitDeniedKeys(value: Record<string, unknown>): Record<string, unknown> {
  const denied: ReadonlySet<string> = new Set<string>(DENIED_LLM_OUTPUT_KEYS);
  return Object.fromEntries(Object.entries(value).filter(([key]) => !denied.has(key)));
}

/**
 * Turns whatever object survived recovery into a schema-conformant llm_output.
 * Never throws. schema_version, generated_at and repo always come from the
 * pipeline; caps never do.
 */
export function coerceLlmOutput(value: unknown, repo: RepoMeta): Pass2LlmOutput {
  const coerced = CoercedOutputSchema.parse(omitDeniedKeys(asObject(value)));
  return {
    schema_version: PASS2_SEMANTIC_SCHEMA_VERSION,
    generated_at: GENERATED_AT_SENTINEL,
    repo: { repo_url: repo.repo_url, resolved_commit: repo.resolved_commit },
    summary: coerced.summary,
    evidence: coerced.evidence,
  };
}
