import path from "node:path";
import {
  PASS2_ARCH_PACK_FILENAME,
  PASS2_ARCH_PACK_SCHEMA_VERSION,
  PASS2_LLM_RAW_FILENAME,
  PASS2_LLM_REPAIRED_FILENAME,
  PASS2_SEMANTIC_FILENAME,
  PASS2_SEMANTIC_SCHEMA_VERSION,
  PASS2_SUPPORT_PACK_FILENAME,
  PASS2_SUPPORT_PACK_SCHEMA_VERSION,
  RepoIndexSchema,
  type ArchPack,
  type RepoIndex,
  type RepoMeta,
  type Pass2Semantic,
  type SupportPack,
} from "@archlens/shared";

import { Pass2ContractError, Pass2LlmOutputError, summarizeZodIssues } from "../errors";
import {
  callJsonWithRecovery,
  type JsonCompletionClient,
  type RecoveredJson,
} from "../providers/jsonRecovery";
import { OpenAiResponsesClient } from "../providers/openAiResponsesClient";
import { ensureDir, fingerprintJson, writeJsonAtomic, writeTextAtomic } from "../storage/jsonFileStorage";
import { resolveMaxFileBytes, resolveRepoUrl, resolveSemanticCaps, type Pass2Job } from "./caps";
import { extractDependencies } from "./dependencies";
import { fingerprintPack, fingerprintSemantic } from "./fingerprints";
import { coerceLlmOutput } from "./outputCoercion";
import { buildArchitectureFiles, selectArchitectureOrder, selectSupportingFiles } from "./packSelection";
import { buildSystemPrompt, buildUserPrompt } from "./prompts";
import { buildFileContentsMap } from "./repoContent";

export type RunPass2SemanticOptions = {
  repoDir: string;
  job: Pass2Job;
  outDir: string;
  /** PASS1_REPO_INDEX.json as loaded; validated here. */
  repoIndex: unknown;
  repoUrl?: string | null;
  client?: JsonCompletionClient;
  now?: () => Date;
  log?: (message: string) => void;
};

export type Pass2SemanticResult = {
  pass2SemanticPath: string;
  pass2ArchPackPath: string;
  pass2SupportPackPath: string;
  pass2Semantic: Pass2Semantic;
  archPack: ArchPack;
  supportPack: SupportPack;
};

export function parseRepoIndex(value: unknown): RepoIndex {
  const parsed = RepoIndexSchema.safeParse(value);
  if (!parsed.success) {
    throw new Pass2ContractError(
      `pass1 contract violation: ${summarizeZodIssues(parsed.error).join("; ")}`,
      parsed.error
    );
  }
  return parsed.data;
}

// Packs are written with files in path order.
function sortedFiles(files: ReadonlyMap<string, string>): Map<string, string> {
  return new Map([...files].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

async function writeLlmText(outDir: string, rawText: string, repairedText: string | null): Promise<void> {
  await writeTextAtomic(path.join(outDir, PASS2_LLM_RAW_FILENAME), rawText);
  if (repairedText !== null) {
    await writeTextAtomic(path.join(outDir, PASS2_LLM_REPAIRED_FILENAME), repairedText);
  }
}

/**
 * Pass 2 entrypoint: selects both evidence packs, asks the model for a
 * semantic summary and writes every pass-2 artifact under `outDir`.
 * Runs sequentially; any error aborts the run.
 */
export async function runPass2Semantic(options: RunPass2SemanticOptions): Promise<Pass2SemanticResult> {
  const log = options.log ?? ((message: string) => console.log(message));
  const now = options.now ?? (() => new Date());

  const repoIndex = parseRepoIndex(options.repoIndex);
  await ensureDir(options.outDir);

  const caps = resolveSemanticCaps(options.job);
  const repo: RepoMeta = {
    repo_url: resolveRepoUrl(options.repoUrl, options.job),
    resolved_commit: repoIndex.job.resolved_commit,
  };

  const dependencies = extractDependencies(repoIndex);
  const contents = await buildFileContentsMap(options.repoDir, repoIndex, resolveMaxFileBytes(options.job));
  log(`[pass2] read ${contents.size} files from ${options.repoDir}`);

  const { ordered, selectionDebug } = selectArchitectureOrder(contents, repoIndex, dependencies, caps);
  const archFiles = sortedFiles(buildArchitectureFiles(ordered, contents, caps));
  const supportFiles = sortedFiles(selectSupportingFiles(contents, repoIndex, caps));

  const archCaps = {
    max_arch_files: caps.max_arch_files,
    max_arch_input_chars: caps.max_arch_input_chars,
    max_arch_chars_per_file: caps.max_arch_chars_per_file,
    pack_dep_hops: caps.pack_dep_hops,
    pack_max_dep_edges_per_file: caps.pack_max_dep_edges_per_file,
  };
  const archFilesRecord = Object.fromEntries(archFiles);
  const archPack: ArchPack = {
    schema_version: PASS2_ARCH_PACK_SCHEMA_VERSION,
    generated_at: now().toISOString(),
    repo,
    caps: archCaps,
    selection_debug: selectionDebug,
    files: archFilesRecord,
    fingerprint_sha256: fingerprintPack({ repo, caps: archCaps, files: archFilesRecord }),
  };

  const supportCaps = {
    max_support_files: caps.max_support_files,
    max_support_chars: caps.max_support_chars,
    max_support_chars_per_file: caps.max_support_chars_per_file,
  };
  const supportFilesRecord = Object.fromEntries(supportFiles);
  const supportPack: SupportPack = {
    schema_version: PASS2_SUPPORT_PACK_SCHEMA_VERSION,
    generated_at: now().toISOString(),
    repo,
    caps: supportCaps,
    files: supportFilesRecord,
    fingerprint_sha256: fingerprintPack({ repo, caps: supportCaps, files: supportFilesRecord }),
  };

  const pass2ArchPackPath = path.join(options.outDir, PASS2_ARCH_PACK_FILENAME);
  const pass2SupportPackPath = path.join(options.outDir, PASS2_SUPPORT_PACK_FILENAME);
  await writeJsonAtomic(pass2ArchPackPath, archPack);
  await writeJsonAtomic(pass2SupportPackPath, supportPack);
  log(`[pass2] packs written: ${archFiles.size} architecture files, ${supportFiles.size} supporting files`);

  const client = options.client ?? new OpenAiResponsesClient();
  let recovered: RecoveredJson;
  try {
    recovered = await callJsonWithRecovery({
      client,
      model: caps.model,
      maxOutputTokens: caps.max_output_tokens,
      system: buildSystemPrompt(),
      prompt: buildUserPrompt({ repoMeta: repo, repoIndex, dependencies, archFiles, supportFiles }),
      log,
    });
  } catch (err) {
    // Keep whatever the model said for diagnosis before failing the run.
    if (err instanceof Pass2LlmOutputError) {
      await writeLlmText(options.outDir, err.rawText, err.repairedText);
    }
    throw err;
  }
  await writeLlmText(options.outDir, recovered.rawText, recovered.repairedText);

  const inputs = {
    pass1_repo_index_schema_version: repoIndex.schema_version,
    pass1_repo_index_fingerprint_sha256: fingerprintJson(options.repoIndex),
    arch_pack_fingerprint_sha256: archPack.fingerprint_sha256,
    support_pack_fingerprint_sha256: supportPack.fingerprint_sha256,
  };
  const llmOutput = coerceLlmOutput(recovered.value, repo);
  const semanticCaps = { ...caps };

  const pass2Semantic: Pass2Semantic = {
    schema_version: PASS2_SEMANTIC_SCHEMA_VERSION,
    generated_at: now().toISOString(),
    repo,
    caps: semanticCaps,
    inputs,
    llm_output: llmOutput,
    llm_raw_paths: {
      raw_text: PASS2_LLM_RAW_FILENAME,
      repaired_text: recovered.repairedText === null ? null : PASS2_LLM_REPAIRED_FILENAME,
    },
    fingerprint_sha256: fingerprintSemantic({ repo, caps: semanticCaps, inputs, llm_output: llmOutput }),
  };

  const pass2SemanticPath = path.join(options.outDir, PASS2_SEMANTIC_FILENAME);
  await writeJsonAtomic(pass2SemanticPath, pass2Semantic);
  log(`[pass2] wrote ${pass2SemanticPath}${recovered.repairedText === null ? "" : " (after JSON repair)"}`);

  return { pass2SemanticPath, pass2ArchPackPath, pass2SupportPackPath, pass2Semantic, archPack, supportPack };
}
