import type { z } from "zod";

/**
 * Error types raised by pass 2 and the artifact validator.
 * Every one of them is fatal for the run; nothing in this package retries.
 */

export class Pass2SemanticError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "Pass2SemanticError";
  }
}

// Upstream input does not honour its contract (bug in an earlier pass, not a transient failure).
export class Pass2ContractError extends Pass2SemanticError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "Pass2ContractError";
  }
}

export class LlmTransportError extends Pass2SemanticError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = "LlmTransportError";
  }
}

export type LlmOutputFailureKind = "truncated" | "repair_failed" | "unrepairable";

/**
 * The model answered but its text is not a usable JSON object.
 * rawText is always the first response; repairedText is set once a repair call returned.
 */
export class Pass2LlmOutputError extends Pass2SemanticError {
  public readonly kind: LlmOutputFailureKind;
  public readonly rawText: string;
  public readonly repairedText: string | null;

  constructor(input: {
    kind: LlmOutputFailureKind;
    message: string;
    rawText: string;
    repairedText?: string | null;
    cause?: unknown;
  }) {
    super(input.message, input.cause);
    this.name = "Pass2LlmOutputError";
    this.kind = input.kind;
    this.rawText = input.rawText;
    this.repairedText = input.repairedText ?? null;
  }
}

export class ArtifactValidationError extends Error {
  constructor(
    public readonly artifact: string,
    public readonly fieldPath: string,
    detail: string
  ) {
    super(`validation: ${fieldPath ? `${artifact}.${fieldPath}` : artifact}: ${detail}`);
    this.name = "ArtifactValidationError";
  }
}

// Formats zod issues as "path: message", one per issue.
export function summarizeZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}
