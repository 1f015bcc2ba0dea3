export * from "./errors";
export { loadEnvFile, readOptionalEnv, readRequiredEnv } from "./config/env";
export * from "./storage/jsonFileStorage";
export * from "./providers/jsonRecovery";
export * from "./providers/openAiResponsesClient";
export * from "./pass2/caps";
export * from "./pass2/repoContent";
export * from "./pass2/dependencies";
export * from "./pass2/packSelection";
export * from "./pass2/prompts";
export * from "./pass2/outputCoercion";
export * from "./pass2/fingerprints";
export * from "./pass2/runPass2Semantic";
export * from "./validation/validateArtifacts";
