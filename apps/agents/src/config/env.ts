import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";

import { Pass2SemanticError } from "../errors";

let dotenvLoaded = false;

// Loads the first .env found from the working directory upwards. Existing variables win.
export function loadEnvFile(cwd: string = process.cwd()): string | null {
  if (dotenvLoaded) return null;
  dotenvLoaded = true;

  const candidates = [resolve(cwd, ".env"), resolve(cwd, "../../.env"), resolve(cwd, "../../../.env")];
  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      loadDotenv({ path: candidate, override: false });
      return candidate;
    }
  }
  return null;
}

export function readRequiredEnv(name: string): string {
  loadEnvFile();
  const value = process.env[name]?.trim();
  if (!value) {
    throw new Pass2SemanticError(`${name} is required.`);
  }
  return value;
}

export function readOptionalEnv(name: string, fallback: string): string {
  loadEnvFile();
  return process.env[name]?.trim() || fallback;
}
