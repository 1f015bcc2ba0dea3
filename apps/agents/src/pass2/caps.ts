import { DEFAULT_MAX_FILE_BYTES, type SemanticCaps } from "@archlens/shared";

export type SemanticCapName = keyof SemanticCaps;

/**
 * Caller-supplied overrides. Values are unknown on purpose: jobs are often
 * loaded from YAML or JSON, so "120" and 120 must both work.
 */
export type Pass2CapOverrides = Partial<Record<SemanticCapName, unknown>>;

export type Pass2Job = {
  repo_url?: string | null;
  limits?: { max_file_bytes?: number | null } | null;
  pass2?: Pass2CapOverrides | null;
};

type BoolRule = { kind: "bool"; default: boolean };
type StringRule = { kind: "string"; default: string };
type IntRule = { kind: "int"; default: number; min: number; max: number };

export const CAP_RULES = {
  onboarding_enabled: { kind: "bool", default: true },
  model: { kind: "string", default: "gpt-4.1-mini" },
  max_output_tokens: { kind: "int", default: 2000, min: 256, max: 20000 },

  max_arch_files: { kind: "int", default: 120, min: 1, max: 240 },
  max_arch_input_chars: { kind: "int", default: 240000, min: 10000, max: 500000 },
  max_arch_chars_per_file: { kind: "int", default: 9000, min: 500, max: 60000 },

  max_support_files: { kind: "int", default: 28, min: 1, max: 120 },
  max_support_chars: { kind: "int", default: 120000, min: 5000, max: 300000 },
  max_support_chars_per_file: { kind: "int", default: 9000, min: 500, max: 60000 },

  pack_dep_hops: { kind: "int", default: 1, min: 0, max: 4 },
  pack_max_dep_edges_per_file: { kind: "int", default: 12, min: 0, max: 100 },
} as const satisfies Record<SemanticCapName, BoolRule | StringRule | IntRule>;

const TRUE_STRINGS = new Set(["true", "1", "yes", "on"]);
const FALSE_STRINGS = new Set(["false", "0", "no", "off"]);
const INTEGER_STRING = /^\s*[-+]?\d+\s*$/;

function clamp(value: number, rule: IntRule): number {
  return Math.min(rule.max, Math.max(rule.min, value));
}

function resolveInt(value: unknown, rule: IntRule): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return clamp(Math.trunc(value), rule);
  }
  if (typeof value === "string" && INTEGER_STRING.test(value)) {
    return clamp(Number.parseInt(value, 10), rule);
  }
  return clamp(rule.default, rule);
}

function resolveBool(value: unknown, rule: BoolRule): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  return rule.default;
}

function resolveString(value: unknown, rule: StringRule): string {
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return rule.default;
}

/**
 * Merges job overrides with CAP_RULES defaults and clamps every numeric field.
 * Malformed overrides fall back to the default; this never throws.
 */
export function resolveSemanticCaps(job: Pass2Job): Readonly<SemanticCaps> {
  const overrides: Pass2CapOverrides = job.pass2 ?? {};

  return Object.freeze({
    onboarding_enabled: resolveBool(overrides.onboarding_enabled, CAP_RULES.onboarding_enabled),
    model: resolveString(overrides.model, CAP_RULES.model),
    max_output_tokens: resolveInt(overrides.max_output_tokens, CAP_RULES.max_output_tokens),
    max_arch_input_chars: resolveInt(overrides.max_arch_input_chars, CAP_RULES.max_arch_input_chars),
    max_arch_files: resolveInt(overrides.max_arch_files, CAP_RULES.max_arch_files),
    max_arch_chars_per_file: resolveInt(
      overrides.max_arch_chars_per_file,
      CAP_RULES.max_arch_chars_per_file
    ),
    max_support_files: resolveInt(overrides.max_support_files, CAP_RULES.max_support_files),
    max_support_chars: resolveInt(overrides.max_support_chars, CAP_RULES.max_support_chars),
    max_support_chars_per_file: resolveInt(
      overrides.max_support_chars_per_file,
      CAP_RULES.max_support_chars_per_file
    ),
    pack_dep_hops: resolveInt(overrides.pack_dep_hops, CAP_RULES.pack_dep_hops),
    pack_max_dep_edges_per_file: resolveInt(
      overrides.pack_max_dep_edges_per_file,
      CAP_RULES.pack_max_dep_edges_per_file
    ),
  });
}

export function resolveMaxFileBytes(job: Pass2Job): number {
  const value = job.limits?.max_file_bytes;
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  return DEFAULT_MAX_FILE_BYTES;
}

// An explicit URL wins; blank strings count as absent.
export function resolveRepoUrl(explicit: string | null | undefined, job: Pass2Job): string | null {
  const fromCaller = explicit?.trim();
  if (fromCaller) return fromCaller;
  return job.repo_url?.trim() || null;
}
