// packages/shared/src/schemas/repoIndex.ts
import { z } from "zod";
import { PASS1_REPO_INDEX_SCHEMA_VERSION, UNKNOWN_COMMIT } from "../constants";

/* ------------------------------ Primitives ------------------------------- */

export const NonBlankStringSchema = z
  .string()
  .refine((value) => value.trim().length > 0, "must be a non-empty string");

export const ResolvedCommitSchema = z
  .string()
  .trim()
  .min(1, "must be a non-empty string")
  .refine((value) => value !== UNKNOWN_COMMIT, `must not be "${UNKNOWN_COMMIT}"`);

/**
 * Upstream lists are only advisory: anything that is not a non-blank string is
 * dropped, survivors are trimmed. A non-list becomes [].
 */
export const CleanStringListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => (typeof item === "string" && item.trim() ? [item.trim()] : []))
  );

/* ------------------------- Repo index (pass 1) --------------------------- */

// One internal import edge. Edges that are external, unresolved or lack a spec never parse.
export const ImportEdgeSchema = z.looseObject({
  spec: z.string().trim().min(1),
  resolved_path: z.string().trim().min(1),
  is_external: z.literal(false),
});

export type ImportEdge = z.infer<typeof ImportEdgeSchema>;

export const RepoIndexFileDepsSchema = z.looseObject({
  import_edges: z.array(z.unknown()).catch([]),
  internal_unresolved_specs: CleanStringListSchema,
});

/**
 * A single file record. Records without a path, or whose deps block is present
 * but not an object, fail to parse and are skipped by consumers.
 */
export const RepoIndexFileSchema = z.looseObject({
  path: z.string().min(1),
  language: z.string().trim().nullable().catch(null),
  deps: RepoIndexFileDepsSchema.default({ import_edges: [], internal_unresolved_specs: [] }),
  flags: CleanStringListSchema,
  top_level_defs: CleanStringListSchema,
});

export type RepoIndexFile = z.infer<typeof RepoIndexFileSchema>;

/**
 * The slice of PASS1_REPO_INDEX.json that pass 2 depends on. Parsed once at the
 * pipeline boundary; a failure here is an upstream contract violation.
 */
export const RepoIndexSchema = z.looseObject({
  schema_version: z.literal(PASS1_REPO_INDEX_SCHEMA_VERSION),
  job: z.looseObject({
    resolved_commit: ResolvedCommitSchema,
    repo_url: z.string().nullable().optional(),
  }),
  read_plan: z.looseObject({
    closure_seeds: z.array(z.unknown()).catch([]),
    candidates: z.array(z.unknown()).catch([]),
  }),
  signals: z.record(z.string(), z.unknown()).catch({}),
  resolver_inputs: z.record(z.string(), z.unknown()).catch({}),
  files: z.array(z.unknown()),
});

export type RepoIndex = z.infer<typeof RepoIndexSchema>;

/* ------------------- Repo index (artifact validation) -------------------- */

const CountSchema = z.int();

// Stricter shape used by the post-run validator: every file record must be well formed.
export const RepoIndexArtifactSchema = z.looseObject({
  schema_version: z.literal(PASS1_REPO_INDEX_SCHEMA_VERSION),
  job: z.looseObject({
    resolved_commit: ResolvedCommitSchema,
  }),
  counts: z.looseObject({
    files_scanned: CountSchema,
    files_included: CountSchema,
    files_skipped: CountSchema,
    total_bytes_included: CountSchema,
  }),
  read_plan: z.looseObject({
    closure_seeds: z.array(z.unknown()),
    candidates: z.array(z.unknown()),
  }),
  files: z.array(
    z.looseObject({
      path: z.string().min(1),
      deps: z.looseObject({
        import_edges: z.array(z.unknown()),
      }),
    })
  ),
});

export type RepoIndexArtifact = z.infer<typeof RepoIndexArtifactSchema>;
