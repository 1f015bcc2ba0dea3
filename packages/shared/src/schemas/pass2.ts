// packages/shared/src/schemas/pass2.ts
import { z } from "zod";
import {
  GENERATED_AT_SENTINEL,
  PASS2_ARCH_PACK_SCHEMA_VERSION,
  PASS2_LLM_RAW_FILENAME,
  PASS2_LLM_REPAIRED_FILENAME,
  PASS2_SEMANTIC_SCHEMA_VERSION,
  PASS2_SUPPORT_PACK_SCHEMA_VERSION,
  PASS1_REPO_INDEX_SCHEMA_VERSION,
} from "../constants";
import { NonBlankStringSchema, ResolvedCommitSchema } from "./repoIndex";

const Sha256Schema = z.string().regex(/^[0-9a-f]{64}$/, "must be a lowercase sha256 hex digest");

/* ------------------------------ Semantic caps ----------------------------- */

/**
 * Bounds for one pass-2 invocation. Resolved by the pipeline from the job,
 * never from the environment and never from the model.
 */
export const SemanticCapsSchema = z
  .object({
    onboarding_enabled: z.boolean(),
    model: z.string().min(1),
    max_output_tokens: z.int(),

    // input caps
    max_arch_input_chars: z.int(),
    max_arch_files: z.int(),
    max_arch_chars_per_file: z.int(),

    // supporting pack caps (gaps + onboarding)
    max_support_files: z.int(),
    max_support_chars: z.int(),
    max_support_chars_per_file: z.int(),

    // dependency expansion
    pack_dep_hops: z.int(),
    pack_max_dep_edges_per_file: z.int(),
  })
  .strict();

export type SemanticCaps = z.infer<typeof SemanticCapsSchema>;

export const RepoMetaSchema = z
  .object({
    repo_url: z.string().nullable(),
    resolved_commit: ResolvedCommitSchema,
  })
  .strict();

export type RepoMeta = z.infer<typeof RepoMetaSchema>;

/* ------------------------------ Evidence packs ---------------------------- */

export const ArchPackCapsSchema = SemanticCapsSchema.pick({
  max_arch_files: true,
  max_arch_input_chars: true,
  max_arch_chars_per_file: true,
  pack_dep_hops: true,
  pack_max_dep_edges_per_file: true,
});

export type ArchPackCaps = z.infer<typeof ArchPackCapsSchema>;

export const SupportPackCapsSchema = SemanticCapsSchema.pick({
  max_support_files: true,
  max_support_chars: true,
  max_support_chars_per_file: true,
});

export type SupportPackCaps = z.infer<typeof SupportPackCapsSchema>;

// How the architecture order was assembled; informational, never fingerprinted.
export const SelectionDebugSchema = z
  .object({
    available_files: z.int().nonnegative(),
    closure_seeds_count: z.int().nonnegative(),
    read_plan_count: z.int().nonnegative(),
    entrypoints_count: z.int().nonnegative(),
    spines_count: z.int().nonnegative(),
    dep_hops: z.int(),
    dep_edges_per_file: z.int(),
    expanded_count: z.int().nonnegative(),
  })
  .strict();

export type SelectionDebug = z.infer<typeof SelectionDebugSchema>;

const PackFilesSchema = z.record(z.string().min(1), z.string());

export const ArchPackSchema = z
  .object({
    schema_version: z.literal(PASS2_ARCH_PACK_SCHEMA_VERSION),
    generated_at: z.iso.datetime({ offset: true }),
    repo: RepoMetaSchema,
    caps: ArchPackCapsSchema,
    selection_debug: SelectionDebugSchema,
    files: PackFilesSchema,
    fingerprint_sha256: Sha256Schema,
  })
  .strict()
  .superRefine((pack, ctx) => {
    const paths = Object.keys(pack.files);
    if (paths.length > pack.caps.max_arch_files) {
      ctx.addIssue({
        code: "custom",
        path: ["files"],
        message: `holds ${paths.length} files, cap is ${pack.caps.max_arch_files}`,
      });
    }
    const chars = Object.values(pack.files).reduce((sum, content) => sum + content.length, 0);
    if (chars > pack.caps.max_arch_input_chars) {
      ctx.addIssue({
        code: "custom",
        path: ["files"],
        message: `holds ${chars} chars, cap is ${pack.caps.max_arch_input_chars}`,
      });
    }
  });

export type ArchPack = z.infer<typeof ArchPackSchema>;

export const SupportPackSchema = z
  .object({
    schema_version: z.literal(PASS2_SUPPORT_PACK_SCHEMA_VERSION),
    generated_at: z.iso.datetime({ offset: true }),
    repo: RepoMetaSchema,
    caps: SupportPackCapsSchema,
    files: PackFilesSchema,
    fingerprint_sha256: Sha256Schema,
  })
  .strict()
  .superRefine((pack, ctx) => {
    const paths = Object.keys(pack.files);
    if (paths.length > pack.caps.max_support_files) {
      ctx.addIssue({
        code: "custom",
        path: ["files"],
        message: `holds ${paths.length} files, cap is ${pack.caps.max_support_files}`,
      });
    }
    const chars = Object.values(pack.files).reduce((sum, content) => sum + content.length, 0);
    if (chars > pack.caps.max_support_chars) {
      ctx.addIssue({
        code: "custom",
        path: ["files"],
        message: `holds ${chars} chars, cap is ${pack.caps.max_support_chars}`,
      });
    }
  });

export type SupportPack = z.infer<typeof SupportPackSchema>;

/* ------------------------------- LLM output ------------------------------- */

export const Pass2SummarySchema = z
  .object({
    primary_stack: z.string().nullable(),
    architecture_overview: z.string(),
    key_components: z.array(z.string()),
    data_flows: z.array(z.string()),
    auth_and_routing_notes: z.array(z.string()),
    risks_or_gaps: z.array(z.string()),
  })
  .strict();

export type Pass2Summary = z.infer<typeof Pass2SummarySchema>;

export const NotableFileSchema = z
  .object({
    path: NonBlankStringSchema,
    why: NonBlankStringSchema,
  })
  .strict();

export type NotableFile = z.infer<typeof NotableFileSchema>;

export const Pass2EvidenceSchema = z
  .object({
    arch_pack_paths: z.array(z.string()),
    support_pack_paths: z.array(z.string()),
    notable_files: z.array(NotableFileSchema),
  })
  .strict();

export type Pass2Evidence = z.infer<typeof Pass2EvidenceSchema>;

// Model response after coercion. No caps key: strict() rejects one.
export const Pass2LlmOutputSchema = z
  .object({
    schema_version: z.literal(PASS2_SEMANTIC_SCHEMA_VERSION),
    generated_at: z.literal(GENERATED_AT_SENTINEL),
    repo: RepoMetaSchema,
    summary: Pass2SummarySchema,
    evidence: Pass2EvidenceSchema,
  })
  .strict();

export type Pass2LlmOutput = z.infer<typeof Pass2LlmOutputSchema>;

/* ---------------------------- Semantic artifact --------------------------- */

export const Pass2InputsSchema = z
  .object({
    pass1_repo_index_schema_version: z.literal(PASS1_REPO_INDEX_SCHEMA_VERSION),
    pass1_repo_index_fingerprint_sha256: Sha256Schema,
    arch_pack_fingerprint_sha256: Sha256Schema,
    support_pack_fingerprint_sha256: Sha256Schema,
  })
  .strict();

export type Pass2Inputs = z.infer<typeof Pass2InputsSchema>;

export const Pass2SemanticSchema = z
  .object({
    schema_version: z.literal(PASS2_SEMANTIC_SCHEMA_VERSION),
    generated_at: z.iso.datetime({ offset: true }),
    repo: RepoMetaSchema,
    caps: SemanticCapsSchema,
    inputs: Pass2InputsSchema,
    llm_output: Pass2LlmOutputSchema,
    llm_raw_paths: z
      .object({
        raw_text: z.literal(PASS2_LLM_RAW_FILENAME),
        repaired_text: z.literal(PASS2_LLM_REPAIRED_FILENAME).nullable(),
      })
      .strict(),
    fingerprint_sha256: Sha256Schema,
  })
  .strict();

export type Pass2Semantic = z.infer<typeof Pass2SemanticSchema>;

/* ------------------------------- Job config ------------------------------- */

// Job file as handed to the pass-2 CLI. Cap overrides stay loosely typed; the caps resolver coerces them.
export const Pass2JobSchema = z.looseObject({
  repo_url: z.string().nullable().optional(),
  limits: z
    .looseObject({
      max_file_bytes: z.number().nullable().optional(),
    })
    .nullable()
    .optional(),
  pass2: z.record(z.string(), z.unknown()).nullable().optional(),
});

export type Pass2JobConfig = z.infer<typeof Pass2JobSchema>;
