// packages/shared/src/constants.ts

/** Artifact contract versions. Matched exactly; no ranges, no back-compat. */
export const PASS1_REPO_INDEX_SCHEMA_VERSION = "pass1_repo_index.v1" as const;
export const PASS2_SEMANTIC_SCHEMA_VERSION = "pass2_semantic.v1" as const;
export const PASS2_ARCH_PACK_SCHEMA_VERSION = "pass2_arch_pack.v1" as const;
export const PASS2_SUPPORT_PACK_SCHEMA_VERSION = "pass2_support_pack.v1" as const;
export const ARCHITECTURE_SNAPSHOT_SCHEMA_VERSION = "architecture_snapshot.v1" as const;
export const GAPS_SCHEMA_VERSION = "gaps.v1" as const;

/** Output file names written by pass 2. */
export const PASS2_SEMANTIC_FILENAME = "PASS2_SEMANTIC.json";
export const PASS2_ARCH_PACK_FILENAME = "PASS2_ARCH_PACK.json";
export const PASS2_SUPPORT_PACK_FILENAME = "PASS2_SUPPORT_PACK.json";
export const PASS2_LLM_RAW_FILENAME = "PASS2_LLM_RAW.txt";
export const PASS2_LLM_REPAIRED_FILENAME = "PASS2_LLM_REPAIRED.txt";

/** Sentinel the model must echo for generated_at; the pipeline stamps the real time. */
export const GENERATED_AT_SENTINEL = "ISO8601";

/** resolved_commit value upstream passes emit when git metadata was unavailable. */
export const UNKNOWN_COMMIT = "unknown";

/** Used when the job does not carry a usable limits.max_file_bytes. */
export const DEFAULT_MAX_FILE_BYTES = 512_000;

/** Extensions never read into evidence packs. */
export const BINARY_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
  ".pdf",
  ".zip",
  ".gz",
  ".bz2",
  ".xz",
  ".7z",
  ".mp4",
  ".mov",
  ".mp3",
  ".wav",
  ".ttf",
  ".otf",
  ".woff",
  ".woff2",
] as const;

/** Semantic cap fields, in the order they are documented and serialized. */
export const SEMANTIC_CAP_FIELDS = [
  "onboarding_enabled",
  "model",
  "max_output_tokens",
  "max_arch_input_chars",
  "max_arch_files",
  "max_arch_chars_per_file",
  "max_support_files",
  "max_support_chars",
  "max_support_chars_per_file",
  "pack_dep_hops",
  "pack_max_dep_edges_per_file",
] as const;

/** Keys that only the pipeline may write; dropped from model output. */
export const DENIED_LLM_OUTPUT_KEYS = ["caps"] as const;

/** Config-looking keys that must never appear inside a semantic summary block. */
export const HALLUCINATED_SUMMARY_KEYS = [
  "model",
  "max_output_tokens",
  "max_arch_files",
  "max_support_files",
] as const;

/** Fingerprints every artifact manifest must carry. */
export const MANIFEST_CORE_ARTIFACTS = [
  "pass1_repo_index",
  "dependency_graph",
  "architecture_snapshot",
  "gaps",
  "onboarding",
  "pass2_semantic",
] as const;

/** Minimum trimmed length of ONBOARDING.md. */
export const MIN_ONBOARDING_CHARS = 50;
