import { validateArtifacts } from "../validation/validateArtifacts";
import { readFlag, requireFlag } from "./args";

const USAGE =
  "npm run -w @archlens/agents validate -- --repo-index=<path> --manifest=<path> --snapshot=<path> " +
  "--gaps=<path> --onboarding=<path> --semantic=<path> [--arch-pack=<path>] [--support-pack=<path>]";

async function main() {
  const argv = process.argv.slice(2);
  const report = await validateArtifacts({
    repo_index: requireFlag(argv, "repo-index", USAGE),
    artifact_manifest: requireFlag(argv, "manifest", USAGE),
    architecture_snapshot: requireFlag(argv, "snapshot", USAGE),
    gaps: requireFlag(argv, "gaps", USAGE),
    onboarding: requireFlag(argv, "onboarding", USAGE),
    pass2_semantic: requireFlag(argv, "semantic", USAGE),
    pass2_arch_pack: readFlag(argv, "arch-pack"),
    pass2_support_pack: readFlag(argv, "support-pack"),
  });
  console.log(`[validate] ok: ${report.validated.join(", ")}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
