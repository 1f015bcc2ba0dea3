import { readOptionalEnv, readRequiredEnv } from "../config/env";
import { LlmTransportError } from "../errors";
import { isJsonObject } from "../storage/jsonFileStorage";
import type { JsonCompletionClient, JsonCompletionRequest } from "./jsonRecovery";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

// HTTP 400 bodies that reject a request parameter rather than the request itself.
const PARAMETER_REJECTION = /unsupported[_ ]parameter|unknown[_ ]parameter|unrecognized[_ ]request[_ ]argument/i;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type OpenAiResponsesClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

/**
 * Pulls the text out of a Responses API body: `output_text` when it is set,
 * otherwise every `output[].content[].text` joined in order.
 */
export function extractResponseText(body: unknown): string {
  if (!isJsonObject(body)) return "";
  if (typeof body.output_text === "string" && body.output_text.trim()) {
    return body.output_text;
  }
  if (!Array.isArray(body.output)) return "";

  const chunks: string[] = [];
  for (const item of body.output) {
    if (!isJsonObject(item) || !Array.isArray(item.content)) continue;
    for (const part of item.content) {
      if (!isJsonObject(part)) continue;
      if (typeof part.text === "string" && part.text) {
        chunks.push(part.text);
      } else if (isJsonObject(part.text)) {
        chunks.push(JSON.stringify(part.text));
      }
    }
  }
  return chunks.join("");
}

/**
 * Request bodies to try, most specific first. Later shapes exist for models
 * and gateways that reject `temperature` or `max_output_tokens`.
 */
export function buildRequestVariants(request: JsonCompletionRequest): Record<string, unknown>[] {
  const base = {
    model: request.model,
    input: [
      { role: "system", content: request.system },
      { role: "user", content: request.prompt },
    ],
    text: { format: { type: "json_object" } },
  };
  return [
    { ...base, max_output_tokens: request.maxOutputTokens, temperature: 0 },
    { ...base, max_output_tokens: request.maxOutputTokens },
    { ...base, max_tokens: request.maxOutputTokens },
  ];
}

export class OpenAiResponsesClient implements JsonCompletionClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAiResponsesClientOptions = {}) {
    this.apiKey = options.apiKey ?? readRequiredEnv("OPENAI_API_KEY");
    this.baseUrl = (options.baseUrl ?? readOptionalEnv("OPENAI_BASE_URL", DEFAULT_OPENAI_BASE_URL)).replace(
      /\/+$/,
      ""
    );
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async completeJson(request: JsonCompletionRequest): Promise<string> {
    const variants = buildRequestVariants(request);

    for (const [index, body] of variants.entries()) {
      const response = await this.post(body);
      if (response.ok) {
        return extractResponseText(await response.json());
      }

      const detail = await response.text();
      const isLastVariant = index === variants.length - 1;
      if (response.status === 400 && PARAMETER_REJECTION.test(detail) && !isLastVariant) {
        continue;
      }
      throw new LlmTransportError(
        `pass2: OpenAI request failed with ${response.status}: ${detail || response.statusText}`,
        response.status
      );
    }

    throw new LlmTransportError("pass2: OpenAI request was not attempted.");
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.baseUrl}/responses`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new LlmTransportError(`pass2: OpenAI request failed: ${message}`, undefined, err);
    }
  }
}
