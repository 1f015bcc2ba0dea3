// packages/shared/src/schemas/siblings.ts
import { z } from "zod";
import {
  ARCHITECTURE_SNAPSHOT_SCHEMA_VERSION,
  GAPS_SCHEMA_VERSION,
  HALLUCINATED_SUMMARY_KEYS,
  MANIFEST_CORE_ARTIFACTS,
} from "../constants";
import { NonBlankStringSchema } from "./repoIndex";

/**
 * Artifacts produced by sibling passes. Pass 2 never writes these; the
 * post-run validator reads them to check the run as a whole.
 */

const NonNegativeCountSchema = z.int().nonnegative();
const NonBlankStringListSchema = z.array(NonBlankStringSchema);

/* -------------------------- Architecture snapshot ------------------------- */

export const ArchitectureModuleSchema = z.looseObject({
  name: NonBlankStringSchema,
  type: NonBlankStringSchema,
  evidence_paths: NonBlankStringListSchema.min(1),
  responsibilities: NonBlankStringListSchema.min(1),
  dependencies: z.array(z.unknown()),
});

export const UncertaintySchema = z.looseObject({
  type: NonBlankStringSchema,
  description: NonBlankStringSchema,
  files_involved: z.array(z.unknown()),
  suggested_questions: z.array(z.unknown()),
});

export const ArchitectureSnapshotSchema = z
  .looseObject({
    schema_version: z.literal(ARCHITECTURE_SNAPSHOT_SCHEMA_VERSION),
    generated_at: NonBlankStringSchema,
    repo: z.looseObject({
      repo_url: NonBlankStringSchema,
      resolved_commit: NonBlankStringSchema,
      job_id: NonBlankStringSchema,
    }),
    summary: z.looseObject({
      architecture_overview: NonBlankStringSchema,
      key_components: z.array(z.unknown()),
      data_flows: z.array(z.unknown()),
      auth_and_routing_notes: z.array(z.unknown()),
      risks_or_gaps: z.array(z.unknown()),
    }),
    modules: z.array(ArchitectureModuleSchema),
    uncertainties: z.array(UncertaintySchema),
    coverage: z.looseObject({
      files_scanned: NonNegativeCountSchema,
      files_read: NonNegativeCountSchema,
      files_not_read: NonNegativeCountSchema,
      files_included_from_pass1: NonNegativeCountSchema,
    }),
    files_read: z.array(
      z.looseObject({
        path: NonBlankStringSchema,
        chars: NonNegativeCountSchema,
        truncated: z.boolean(),
      })
    ),
    files_not_read: z.array(
      z.looseObject({
        path: NonBlankStringSchema,
        reason: NonBlankStringSchema,
      })
    ),
    evidence: z
      .looseObject({
        arch_pack_paths: NonBlankStringListSchema.optional(),
        support_pack_paths: NonBlankStringListSchema.optional(),
        notable_files: z
          .array(z.looseObject({ path: NonBlankStringSchema, why: NonBlankStringSchema }))
          .optional(),
      })
      .optional(),
  })
  .superRefine((snapshot, ctx) => {
    for (const key of HALLUCINATED_SUMMARY_KEYS) {
      if (key in snapshot.summary) {
        ctx.addIssue({
          code: "custom",
          path: ["summary", key],
          message: "configuration key in summary (model-hallucinated cap)",
        });
      }
    }
    if (snapshot.modules.length === 0 && snapshot.uncertainties.length === 0) {
      ctx.addIssue({
        code: "custom",
        path: ["modules"],
        message: "must be non-empty, or uncertainties must explain why it is empty",
      });
    }
  });

export type ArchitectureSnapshot = z.infer<typeof ArchitectureSnapshotSchema>;

/* ----------------------------------- Gaps --------------------------------- */

export const GapsSchema = z.looseObject({
  schema_version: z.literal(GAPS_SCHEMA_VERSION),
  generated_at: NonBlankStringSchema,
  repo: z.looseObject({
    repo_url: NonBlankStringSchema,
    resolved_commit: NonBlankStringSchema,
  }),
  risks_or_gaps: NonBlankStringListSchema,
});

export type Gaps = z.infer<typeof GapsSchema>;

/* ---------------------------- Artifact manifest --------------------------- */

export const ArtifactManifestSchema = z
  .looseObject({
    items: z.array(z.unknown()),
    stable_fingerprints: z.record(z.string(), z.unknown()),
    run_fingerprint_sha256: NonBlankStringSchema,
  })
  .superRefine((manifest, ctx) => {
    for (const name of MANIFEST_CORE_ARTIFACTS) {
      if (!(name in manifest.stable_fingerprints)) {
        ctx.addIssue({
          code: "custom",
          path: ["stable_fingerprints", name],
          message: "missing fingerprint for core artifact",
        });
      }
    }
  });

export type ArtifactManifest = z.infer<typeof ArtifactManifestSchema>;
