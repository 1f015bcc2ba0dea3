import { fingerprintJson } from "../storage/jsonFileStorage";

type PackFingerprintInput = {
  repo: unknown;
  caps: unknown;
  files: unknown;
};

type SemanticFingerprintInput = {
  repo: unknown;
  caps: unknown;
  inputs: unknown;
  llm_output: unknown;
};

// Packs are fingerprinted over {repo, caps, files}; selection_debug and timestamps stay out.
export function fingerprintPack(pack: PackFingerprintInput): string {
  return fingerprintJson({ repo: pack.repo, caps: pack.caps, files: pack.files });
}

export function fingerprintSemantic(artifact: SemanticFingerprintInput): string {
  return fingerprintJson({
    repo: artifact.repo,
    caps: artifact.caps,
    inputs: artifact.inputs,
    llm_output: artifact.llm_output,
  });
}
