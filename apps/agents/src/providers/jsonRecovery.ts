import { LlmTransportError, Pass2LlmOutputError } from "../errors";
import { buildJsonRepairPrompt, JSON_REPAIR_SYSTEM_PROMPT } from "../pass2/prompts";
import { isJsonObject } from "../storage/jsonFileStorage";

export type JsonCompletionRequest = {
  model: string;
  system: string;
  prompt: string;
  maxOutputTokens: number;
};

/** One request/response round trip asking the model for a JSON object. Resolves to the raw text. */
export interface JsonCompletionClient {
  completeJson(request: JsonCompletionRequest): Promise<string>;
}

export type ParseOutcome =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

export type RecoveredJson = {
  value: Record<string, unknown>;
  rawText: string;
  repairedText: string | null;
};

const PREVIEW_CHARS = 400;

function preview(text: string): string {
  return text.slice(0, PREVIEW_CHARS);
}

/**
 * Scans `text` tracking string literals and escapes. Calls `onBrace` for every
 * brace outside a string; stops early when it returns true.
 */
function scanBraces(text: string, onBrace: (brace: "{" | "}", index: number) => boolean): void {
  let inString = false;
  let escaped = false;
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if ((char === "{" || char === "}") && onBrace(char, index)) {
      return;
    }
  }
}

/**
 * True when the text was probably cut off: it does not end with "}" or its
 * braces (ignoring those inside strings) do not balance. Blank text is not truncated.
 */
export function looksTruncated(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;
  if (!trimmed.endsWith("}")) return true;

  let depth = 0;
  scanBraces(trimmed, (brace) => {
    depth += brace === "{" ? 1 : -1;
    return false;
  });
  return depth !== 0;
}

// First balanced {...} span, string-literal aware; null when none closes.
export function extractFirstJsonObjectSpan(text: string): string | null {
  let start = -1;
  let depth = 0;
  let span: string | null = null;

  scanBraces(text, (brace, index) => {
    if (brace === "{") {
      if (start < 0) start = index;
      depth += 1;
      return false;
    }
    if (start < 0) return false;
    depth -= 1;
    if (depth === 0) {
      span = text.slice(start, index + 1);
      return true;
    }
    return false;
  });
  return span;
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

/** Direct parse first, then the first balanced object span inside the text. */
export function parseJsonObject(text: string): ParseOutcome {
  const trimmed = text.trim();
  if (!trimmed) {
    return { ok: false, reason: "response was empty; expected a JSON object" };
  }

  const direct = parseObject(trimmed);
  if (direct) return { ok: true, value: direct };

  const span = extractFirstJsonObjectSpan(trimmed);
  if (!span) {
    return { ok: false, reason: "response is not valid JSON and holds no complete JSON object" };
  }
  const salvaged = parseObject(span);
  if (!salvaged) {
    return { ok: false, reason: "salvaged JSON object span does not parse" };
  }
  return { ok: true, value: salvaged };
}

export type CallJsonOptions = JsonCompletionRequest & {
  client: JsonCompletionClient;
  log?: (message: string) => void;
};

type RecoveryStep =
  | { state: "call" }
  | { state: "parse"; rawText: string }
  | { state: "repair"; rawText: string; reason: string };

async function callModel(client: JsonCompletionClient, request: JsonCompletionRequest): Promise<string> {
  try {
    return await client.completeJson(request);
  } catch (err) {
    if (err instanceof LlmTransportError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new LlmTransportError(`pass2: model call failed: ${message}`, undefined, err);
  }
}

/**
 * CALL -> PARSE -> SUCCESS | TRUNCATED_FAIL | REPAIR -> SUCCESS | REPAIR_FAIL.
 *
 * Truncated output fails immediately: a repair call could invent a closing
 * structure. Any other unparseable output gets exactly one repair call.
 */
export async function callJsonWithRecovery(options: CallJsonOptions): Promise<RecoveredJson> {
  const { client, log = () => undefined, ...request } = options;
  let step: RecoveryStep = { state: "call" };

  for (;;) {
    switch (step.state) {
      case "call": {
        step = { state: "parse", rawText: await callModel(client, request) };
        break;
      }

      case "parse": {
        const outcome = parseJsonObject(step.rawText);
        if (outcome.ok) {
          return { value: outcome.value, rawText: step.rawText, repairedText: null };
        }
        if (looksTruncated(step.rawText)) {
          throw new Pass2LlmOutputError({
            kind: "truncated",
            message:
              "pass2: model returned truncated JSON (likely hit max_output_tokens); " +
              `raise pass2.max_output_tokens and retry. First ${PREVIEW_CHARS} chars:\n${preview(step.rawText)}`,
            rawText: step.rawText,
          });
        }
        step = { state: "repair", rawText: step.rawText, reason: outcome.reason };
        break;
      }

      case "repair": {
        const { rawText, reason } = step;
        log(`[pass2] model output unusable (${reason}); requesting a JSON repair`);

        let repairedText: string;
        try {
          repairedText = await callModel(client, {
            model: request.model,
            maxOutputTokens: request.maxOutputTokens,
            system: JSON_REPAIR_SYSTEM_PROMPT,
            prompt: buildJsonRepairPrompt(rawText),
          });
        } catch (err) {
          throw new Pass2LlmOutputError({
            kind: "repair_failed",
            message: `pass2: JSON repair call failed. Original first ${PREVIEW_CHARS} chars:\n${preview(rawText)}`,
            rawText,
            cause: err,
          });
        }

        const repaired = parseJsonObject(repairedText);
        if (repaired.ok) {
          return { value: repaired.value, rawText, repairedText };
        }
        throw new Pass2LlmOutputError({
          kind: "unrepairable",
          message:
            `pass2: model output is not a JSON object, even after repair (${repaired.reason}). ` +
            `Original first ${PREVIEW_CHARS} chars:\n${preview(rawText)}`,
          rawText,
          repairedText,
        });
      }
    }
  }
}
