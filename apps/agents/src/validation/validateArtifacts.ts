import { promises as fs } from "node:fs";
import type { z } from "zod";
import {
  ArchPackSchema,
  ArchitectureSnapshotSchema,
  ArtifactManifestSchema,
  DENIED_LLM_OUTPUT_KEYS,
  GapsSchema,
  MIN_ONBOARDING_CHARS,
  Pass2SemanticSchema,
  RepoIndexArtifactSchema,
  SupportPackSchema,
  UNKNOWN_COMMIT,
  type ArchPack,
  type Pass2Semantic,
  type SupportPack,
} from "@archlens/shared";

import { ArtifactValidationError } from "../errors";
import { fingerprintPack, fingerprintSemantic } from "../pass2/fingerprints";
import { isJsonObject, readJsonObject } from "../storage/jsonFileStorage";

export const REQUIRED_ARTIFACT_KEYS = [
  "repo_index",
  "artifact_manifest",
  "architecture_snapshot",
  "gaps",
  "onboarding",
  "pass2_semantic",
] as const;

export const OPTIONAL_ARTIFACT_KEYS = ["pass2_arch_pack", "pass2_support_pack"] as const;

export type ArtifactKey = (typeof REQUIRED_ARTIFACT_KEYS)[number] | (typeof OPTIONAL_ARTIFACT_KEYS)[number];

export type ArtifactPaths = Partial<Record<ArtifactKey, string>>;

export type ValidateArtifactsOptions = {
  onWarning?: (message: string) => void;
};

export type ValidationReport = {
  validated: ArtifactKey[];
  warnings: string[];
};

type DeclaredValue = { artifact: string; value: string };

async function assertFileExists(key: ArtifactKey, filePath: string | undefined): Promise<string> {
  if (filePath === undefined) {
    throw new ArtifactValidationError(key, "", "missing required path");
  }
  if (!filePath.trim()) {
    throw new ArtifactValidationError(key, "", "empty path");
  }
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat?.isFile()) {
    throw new ArtifactValidationError(key, "", `file does not exist: ${filePath}`);
  }
  return filePath;
}

async function loadObject(key: ArtifactKey, filePath: string): Promise<Record<string, unknown>> {
  try {
    return await readJsonObject(filePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ArtifactValidationError(key, "", `unreadable JSON object: ${detail}`);
  }
}

// Parses against `schema`; the first issue becomes the error, localized to its field path.
function parseArtifact<T>(key: ArtifactKey, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const fieldPath = issue ? issue.path.map(String).join(".") : "";
  throw new ArtifactValidationError(key, fieldPath, issue?.message ?? "invalid artifact");
}

function validatePass2Semantic(raw: Record<string, unknown>): Pass2Semantic {
  const llmOutput = raw.llm_output;
  if (isJsonObject(llmOutput)) {
    for (const key of DENIED_LLM_OUTPUT_KEYS) {
      if (key in llmOutput) {
        throw new ArtifactValidationError(
          "pass2_semantic",
          `llm_output.${key}`,
          "model-supplied key must not reach the artifact"
        );
      }
    }
  }

  const artifact = parseArtifact("pass2_semantic", Pass2SemanticSchema, raw);
  const expected = fingerprintSemantic(artifact);
  if (artifact.fingerprint_sha256 !== expected) {
    throw new ArtifactValidationError(
      "pass2_semantic",
      "fingerprint_sha256",
      `recorded ${artifact.fingerprint_sha256}, recomputed ${expected}`
    );
  }
  return artifact;
}

function checkPackFingerprint(
  key: "pass2_arch_pack" | "pass2_support_pack",
  pack: ArchPack | SupportPack,
  recordedInSemantic: string
): void {
  const expected = fingerprintPack(pack);
  if (pack.fingerprint_sha256 !== expected) {
    throw new ArtifactValidationError(
      key,
      "fingerprint_sha256",
      `recorded ${pack.fingerprint_sha256}, recomputed ${expected}`
    );
  }
  if (pack.fingerprint_sha256 !== recordedInSemantic) {
    throw new ArtifactValidationError(
      key,
      "fingerprint_sha256",
      `does not match pass2_semantic.inputs (${recordedInSemantic})`
    );
  }
}

async function validateOnboarding(filePath: string): Promise<void> {
  const content = (await fs.readFile(filePath, "utf8")).trim();
  if (content.length < MIN_ONBOARDING_CHARS) {
    throw new ArtifactValidationError(
      "onboarding",
      "",
      `too short (${content.length} chars), minimum ${MIN_ONBOARDING_CHARS}`
    );
  }
}

function declared(artifact: string, value: unknown, ignore: readonly string[] = []): DeclaredValue[] {
  if (typeof value !== "string") return [];
  const trimmed = value.trim();
  if (!trimmed || ignore.includes(trimmed)) return [];
  return [{ artifact, value: trimmed }];
}

/**
 * Every artifact declaring `field` must agree. The message lists each
 * artifact=value pair so the mixed-up run is easy to spot.
 */
export function assertConsistent(field: string, values: readonly DeclaredValue[]): void {
  const distinct = new Set(values.map((entry) => entry.value));
  if (distinct.size <= 1) return;
  const pairs = values.map((entry) => `${entry.artifact}=${entry.value}`).join(", ");
  throw new ArtifactValidationError("cross_artifact", field, `mismatch across artifacts: ${pairs}`);
}

function riskDivergence(gapsRisks: readonly string[], semanticRisks: readonly string[]): string | null {
  const gapsSet = new Set(gapsRisks.map((risk) => risk.trim()).filter(Boolean));
  const semanticSet = new Set(semanticRisks.map((risk) => risk.trim()).filter(Boolean));
  const onlyInGaps = [...gapsSet].filter((risk) => !semanticSet.has(risk)).length;
  const onlyInSemantic = [...semanticSet].filter((risk) => !gapsSet.has(risk)).length;
  if (onlyInGaps === 0 && onlyInSemantic === 0) return null;
  return (
    "gaps.risks_or_gaps differs from pass2_semantic.llm_output.summary.risks_or_gaps " +
    `(${onlyInGaps} only in gaps, ${onlyInSemantic} only in pass2_semantic)`
  );
}

/**
 * Post-run validator. Re-reads every artifact of a run, checks each against its
 * schema and then checks repo identity across all of them. The first
 * violation throws ArtifactValidationError; risk-list divergence between gaps
 * and pass2_semantic is only reported through `onWarning`.
 */
export async function validateArtifacts(
  localPaths: ArtifactPaths,
  options: ValidateArtifactsOptions = {}
): Promise<ValidationReport> {
  const onWarning = options.onWarning ?? ((message: string) => console.warn(`[validate] warning: ${message}`));
  const warnings: string[] = [];

  const paths = {
    repo_index: await assertFileExists("repo_index", localPaths.repo_index),
    artifact_manifest: await assertFileExists("artifact_manifest", localPaths.artifact_manifest),
    architecture_snapshot: await assertFileExists("architecture_snapshot", localPaths.architecture_snapshot),
    gaps: await assertFileExists("gaps", localPaths.gaps),
    onboarding: await assertFileExists("onboarding", localPaths.onboarding),
    pass2_semantic: await assertFileExists("pass2_semantic", localPaths.pass2_semantic),
  };

  const repoIndex = parseArtifact(
    "repo_index",
    RepoIndexArtifactSchema,
    await loadObject("repo_index", paths.repo_index)
  );
  const snapshot = parseArtifact(
    "architecture_snapshot",
    ArchitectureSnapshotSchema,
    await loadObject("architecture_snapshot", paths.architecture_snapshot)
  );
  const semantic = validatePass2Semantic(await loadObject("pass2_semantic", paths.pass2_semantic));
  const gaps = parseArtifact("gaps", GapsSchema, await loadObject("gaps", paths.gaps));
  parseArtifact(
    "artifact_manifest",
    ArtifactManifestSchema,
    await loadObject("artifact_manifest", paths.artifact_manifest)
  );
  await validateOnboarding(paths.onboarding);

  const validated: ArtifactKey[] = [...REQUIRED_ARTIFACT_KEYS];
  const repoUrls: DeclaredValue[] = [
    ...declared("repo_index", repoIndex.job.repo_url),
    ...declared("architecture_snapshot", snapshot.repo.repo_url),
    ...declared("pass2_semantic", semantic.repo.repo_url),
    ...declared("gaps", gaps.repo.repo_url),
  ];
  const commits: DeclaredValue[] = [
    ...declared("repo_index", repoIndex.job.resolved_commit, [UNKNOWN_COMMIT]),
    ...declared("architecture_snapshot", snapshot.repo.resolved_commit, [UNKNOWN_COMMIT]),
    ...declared("pass2_semantic", semantic.repo.resolved_commit, [UNKNOWN_COMMIT]),
    ...declared("gaps", gaps.repo.resolved_commit, [UNKNOWN_COMMIT]),
  ];

  if (localPaths.pass2_arch_pack !== undefined) {
    const filePath = await assertFileExists("pass2_arch_pack", localPaths.pass2_arch_pack);
    const pack = parseArtifact("pass2_arch_pack", ArchPackSchema, await loadObject("pass2_arch_pack", filePath));
    checkPackFingerprint("pass2_arch_pack", pack, semantic.inputs.arch_pack_fingerprint_sha256);
    repoUrls.push(...declared("pass2_arch_pack", pack.repo.repo_url));
    commits.push(...declared("pass2_arch_pack", pack.repo.resolved_commit, [UNKNOWN_COMMIT]));
    validated.push("pass2_arch_pack");
  }
  if (localPaths.pass2_support_pack !== undefined) {
    const filePath = await assertFileExists("pass2_support_pack", localPaths.pass2_support_pack);
    const pack = parseArtifact(
      "pass2_support_pack",
      SupportPackSchema,
      await loadObject("pass2_support_pack", filePath)
    );
    checkPackFingerprint("pass2_support_pack", pack, semantic.inputs.support_pack_fingerprint_sha256);
    repoUrls.push(...declared("pass2_support_pack", pack.repo.repo_url));
    commits.push(...declared("pass2_support_pack", pack.repo.resolved_commit, [UNKNOWN_COMMIT]));
    validated.push("pass2_support_pack");
  }

  assertConsistent("repo_url", repoUrls);
  assertConsistent("resolved_commit", commits);

  const divergence = riskDivergence(gaps.risks_or_gaps, semantic.llm_output.summary.risks_or_gaps);
  if (divergence) {
    warnings.push(divergence);
    onWarning(divergence);
  }

  return { validated, warnings };
}
