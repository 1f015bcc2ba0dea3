import { Pass2JobSchema } from "@archlens/shared";

import { loadEnvFile } from "../config/env";
import { runPass2Semantic } from "../pass2/runPass2Semantic";
import { readJson, readJsonObject } from "../storage/jsonFileStorage";
import { readFlag, requireFlag } from "./args";

const USAGE =
  "npm run -w @archlens/agents pass2 -- --repo-dir=<dir> --repo-index=<PASS1_REPO_INDEX.json> " +
  "--out-dir=<dir> [--job=<job.json>] [--repo-url=<url>]";

async function main() {
  const argv = process.argv.slice(2);
  const envPath = loadEnvFile();
  if (envPath) console.log(`[pass2] loaded environment from ${envPath}`);

  const jobPath = readFlag(argv, "job");
  const job = jobPath ? await readJson(jobPath, Pass2JobSchema) : {};

  const result = await runPass2Semantic({
    repoDir: requireFlag(argv, "repo-dir", USAGE),
    outDir: requireFlag(argv, "out-dir", USAGE),
    repoIndex: await readJsonObject(requireFlag(argv, "repo-index", USAGE)),
    repoUrl: readFlag(argv, "repo-url"),
    job,
  });
  console.log(`[pass2] fingerprint ${result.pass2Semantic.fingerprint_sha256}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
