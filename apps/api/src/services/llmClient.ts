import { z } from "zod";
import type { AIProvider, ResponseFormat } from "@postflow/shared";
import { config } from "../config.js";
import { GenerationProviderError, GenerationTimeoutError, errorMessage } from "./errors.js";
import { asRecord } from "./normalizers.js";

export interface CompletionInput {
  prompt: string;
  systemPrompt?: string;
  responseFormat: ResponseFormat;
  temperature: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface ProviderConfig {
  provider: AIProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  headers: Record<string, string>;
}

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number())
      })
    )
    .min(1)
});

function pickStringFromUnknown(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (Array.isArray(value)) {
    const parts = value
      .map((item) => pickStringFromUnknown(item))
      .filter((item): item is string => Boolean(item));
    return parts.length > 0 ? parts.join("\n").trim() : null;
  }

  const record = asRecord(value);
  if (!record) {
    return null;
  }

  return pickStringFromUnknown(record.text) ?? pickStringFromUnknown(record.content) ?? null;
}

function firstChoice(responseJson: Record<string, unknown>): Record<string, unknown> | null {
  const choices = Array.isArray(responseJson.choices) ? responseJson.choices : [];
  return asRecord(choices[0]);
}

function extractChoiceErrorMessage(responseJson: Record<string, unknown>): string | null {
  const choiceError = asRecord(firstChoice(responseJson)?.error);
  if (!choiceError) {
    return null;
  }

  const message = pickStringFromUnknown(choiceError.message);
  const code = pickStringFromUnknown(choiceError.code);
  if (message && code) {
    return `Choice error (${code}): ${message}`;
  }
  return message ? `Choice error: ${message}` : "Choice error without message";
}

function extractAssistantContent(responseJson: Record<string, unknown>): string | null {
  const message = asRecord(firstChoice(responseJson)?.message);
  if (!message) {
    return null;
  }
  return pickStringFromUnknown(message.content) ?? pickStringFromUnknown(message.output_text);
}

function extractJsonText(content: string): string {
  const trimmed = content.trim();

  if (trimmed.startsWith("```")) {
    return trimmed
      .replace(/^```(?:json)?\s*/i, "")
      .replace(/\s*```$/, "")
      .trim();
  }

  const firstBrace = trimmed.indexOf("{");
  const lastBrace = trimmed.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    return trimmed.slice(firstBrace, lastBrace + 1).trim();
  }

  return trimmed;
}

function normalizeJsonCandidate(content: string): string {
  return content
    .replace(/\r\n/g, "\n")
    .replace(/[“”]/g, "\"")
    .replace(/[‘’]/g, "'")
    .replace(/^\uFEFF/, "")
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, "")
    .replace(/\t/g, " ")
    .trim();
}

function escapeRawNewlinesInsideStrings(text: string): string {
  let result = "";
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString && escaped) {
      escaped = false;
    } else if (inString && ch === "\\") {
      escaped = true;
    } else if (ch === "\"") {
      inString = !inString;
    } else if (inString && ch === "\n") {
      result += "\\n";
      continue;
    }
    result += ch;
  }

  return result;
}

function stripTrailingCommas(content: string): string {
  return content.replace(/,\s*([}\]])/g, "$1");
}

/**
 * Walks the text from the first "{" and either returns the first balanced
 * object or, when the output was cut off, closes the open string and brackets.
 */
function closeJsonStructure(content: string): string | null {
  const start = content.indexOf("{");
  if (start === -1) {
    return null;
  }

  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  let result = "";

  for (const ch of content.slice(start)) {
    if (inString) {
      result += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push(ch);
    } else if (ch === "}" || ch === "]") {
      const expected = ch === "}" ? "{" : "[";
      if (stack[stack.length - 1] !== expected) {
        continue;
      }
      stack.pop();
      if (stack.length === 0) {
        return result + ch;
      }
    }
    result += ch;
  }

  if (inString) {
    result = result.replace(/\\+$/, "") + "\"";
  }
  result = result.replace(/,\s*"[^"]*"\s*:?\s*$/, "").replace(/,\s*$/, "");
  for (let index = stack.length - 1; index >= 0; index -= 1) {
    result += stack[index] === "{" ? "}" : "]";
  }
  return result;
}

export function parseJsonContent(content: string): Record<string, unknown> {
  const normalized = normalizeJsonCandidate(content);
  const extracted = normalizeJsonCandidate(extractJsonText(content));
  const candidates = new Set<string>();

  for (const base of [normalized, extracted]) {
    const escaped = escapeRawNewlinesInsideStrings(base);
    candidates.add(base);
    candidates.add(escaped);
    candidates.add(stripTrailingCommas(escaped));
    const closed = closeJsonStructure(escaped);
    if (closed) {
      candidates.add(closed);
      candidates.add(stripTrailingCommas(closed));
    }
  }

  let lastError = "Invalid JSON output";
  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }

    try {
      const parsed: unknown = JSON.parse(candidate);
      const record = asRecord(parsed);
      if (!record) {
        lastError = "JSON root is not an object";
        continue;
      }
      return record;
    } catch (error) {
      lastError = errorMessage(error, "Invalid JSON output");
    }
  }

  throw new Error(`Invalid JSON output: ${lastError}`);
}

function getProviderConfig(provider: AIProvider = config.ai.provider): ProviderConfig {
  if (provider === "openai") {
    return {
      provider,
      apiKey: config.ai.openai.apiKey,
      baseUrl: config.ai.openai.baseUrl,
      model: config.ai.openai.model,
      headers: {}
    };
  }

  const headers: Record<string, string> = {};
  if (config.ai.openrouter.httpReferer) {
    headers["HTTP-Referer"] = config.ai.openrouter.httpReferer;
  }
  if (config.ai.openrouter.appName) {
    headers["X-Title"] = config.ai.openrouter.appName;
  }

  return {
    provider,
    apiKey: config.ai.openrouter.apiKey,
    baseUrl: config.ai.openrouter.baseUrl,
    model: config.ai.openrouter.model,
    headers
  };
}

export function isGenerationConfigured(): boolean {
  return getProviderConfig().apiKey.length > 0;
}

function shouldSendTemperature(providerConfig: ProviderConfig): boolean {
  // Some reasoning variants reject explicit temperature in chat/completions.
  return !(providerConfig.provider === "openai" && /^(gpt-5|o\d)/i.test(providerConfig.model));
}

interface RawResponse {
  ok: boolean;
  status: number;
  text: string;
}

/**
 * Runs a request under its own deadline, linked to the caller's signal. Our own
 * deadline surfaces as GenerationTimeoutError; a caller abort rethrows its reason.
 */
async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  request: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  parent?.throwIfAborted();
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await request(controller.signal);
  } catch (error) {
    if (parent?.aborted) {
      throw parent.reason;
    }
    if (timedOut) {
      throw new GenerationTimeoutError(timeoutMs);
    }
    if (error instanceof GenerationProviderError) {
      throw error;
    }
    throw new GenerationProviderError(errorMessage(error, "LLM request failed"));
  } finally {
    clearTimeout(timeout);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

async function postJson(
  providerConfig: ProviderConfig,
  endpoint: string,
  payload: Record<string, unknown>,
  signal: AbortSignal
): Promise<RawResponse> {
  const response = await fetch(`${providerConfig.baseUrl}${endpoint}`, {
    method: "POST",
    signal,
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${providerConfig.apiKey}`,
      ...providerConfig.headers
    },
    body: JSON.stringify(payload)
  });

  return { ok: response.ok, status: response.status, text: await response.text() };
}

function parseEnvelope(raw: RawResponse): Record<string, unknown> {
  if (!raw.ok) {
    throw new GenerationProviderError(
      `LLM request failed (${raw.status}): ${raw.text.slice(0, 500)}`,
      raw.status
    );
  }

  try {
    const record = asRecord(JSON.parse(raw.text));
    if (!record) {
      throw new Error("envelope is not an object");
    }
    return record;
  } catch (error) {
    throw new GenerationProviderError(
      `LLM request succeeded but returned invalid JSON envelope: ${errorMessage(error, "invalid json response")}`,
      raw.status
    );
  }
}

export async function generateCompletion(input: CompletionInput): Promise<string> {
  const providerConfig = getProviderConfig();
  if (!providerConfig.apiKey) {
    throw new GenerationProviderError(`Missing API key for provider: ${providerConfig.provider}`);
  }

  const payload: Record<string, unknown> = {
    model: providerConfig.model,
    messages: [
      ...(input.systemPrompt ? [{ role: "system", content: input.systemPrompt }] : []),
      { role: "user", content: input.prompt }
    ]
  };
  if (input.responseFormat === "json") {
    payload.response_format = { type: "json_object" };
  }
  if (Number.isFinite(input.temperature) && shouldSendTemperature(providerConfig)) {
    payload.temperature = input.temperature;
  }
  if (typeof input.maxTokens === "number" && Number.isFinite(input.maxTokens)) {
    payload.max_tokens = input.maxTokens;
  }

  return withDeadline(input.timeoutMs ?? config.ai.requestTimeoutMs, input.signal, async (signal) => {
    let raw = await postJson(providerConfig, "/chat/completions", payload, signal);

    const errorLower = raw.text.toLowerCase();
    const unsupportedParameter =
      raw.status === 400 &&
      (errorLower.includes("unsupported_parameter") || errorLower.includes("unsupported_value")) &&
      (errorLower.includes("temperature") || errorLower.includes("max_tokens"));
    if (unsupportedParameter) {
      const { temperature: _temperature, max_tokens: _maxTokens, ...retryPayload } = payload;
      raw = await postJson(providerConfig, "/chat/completions", retryPayload, signal);
    }

    const json = parseEnvelope(raw);
    const choiceErrorMessage = extractChoiceErrorMessage(json);
    if (choiceErrorMessage) {
      throw new GenerationProviderError(choiceErrorMessage, raw.status);
    }

    const content = extractAssistantContent(json);
    if (!content) {
      throw new GenerationProviderError("LLM returned empty content", raw.status);
    }
    return content;
  });
}

export async function createEmbedding(
  text: string,
  options: { signal?: AbortSignal; timeoutMs?: number } = {}
): Promise<number[]> {
  const providerConfig = getProviderConfig("openai");
  if (!providerConfig.apiKey) {
    throw new GenerationProviderError("Missing API key for embeddings");
  }

  return withDeadline(options.timeoutMs ?? config.ai.requestTimeoutMs, options.signal, async (signal) => {
    const raw = await postJson(
      providerConfig,
      "/embeddings",
      { model: config.ai.openai.embeddingModel, input: text.slice(0, 8000) },
      signal
    );
    const parsed = embeddingResponseSchema.safeParse(parseEnvelope(raw));
    if (!parsed.success) {
      throw new GenerationProviderError("Embedding response did not contain a vector", raw.status);
    }
    return parsed.data.data[0]?.embedding ?? [];
  });
}
