import type { ResponseFormat, SearchProvider } from "@postflow/shared";
import { createEmbedding, generateCompletion, isGenerationConfigured } from "./llmClient.js";
import { GenerationProviderError, GenerationTimeoutError, ProviderUnavailableError } from "./errors.js";
import { searchWithProvider } from "./searchProviders.js";
import { createRetryPolicy, type RetryPolicy, type SleepFn } from "./retryPolicy.js";

export interface CallOptions {
  signal?: AbortSignal;
}

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface GenerationCapability {
  generate(
    prompt: string,
    responseFormat: ResponseFormat,
    temperature: number,
    options?: CallOptions
  ): Promise<string>;
}

export interface SearchCapability {
  search(query: string, provider: SearchProvider, options?: CallOptions): Promise<SearchResult[]>;
}

export interface EmbeddingCapability {
  embed(text: string, options?: CallOptions): Promise<number[]>;
}

export interface CapabilityPolicies {
  generation: RetryPolicy;
  search: RetryPolicy;
  embedding: RetryPolicy;
}

const SYSTEM_PROMPT =
  "You are a careful social media editor. Follow the output format exactly and never invent facts.";

export const llmGeneration: GenerationCapability = {
  async generate(prompt, responseFormat, temperature, options = {}) {
    if (!isGenerationConfigured()) {
      throw new GenerationProviderError("No generation provider configured");
    }
    return generateCompletion({
      prompt,
      systemPrompt: SYSTEM_PROMPT,
      responseFormat,
      temperature,
      signal: options.signal
    });
  }
};

export const webSearch: SearchCapability = {
  search(query, provider, options = {}) {
    return searchWithProvider(provider, query, options.signal);
  }
};

export const llmEmbedding: EmbeddingCapability = {
  embed(text, options = {}) {
    return createEmbedding(text, { signal: options.signal });
  }
};

function isMissingConfiguration(error: unknown): boolean {
  return (
    (error instanceof GenerationProviderError && /missing api key|no generation provider/i.test(error.message)) ||
    (error instanceof ProviderUnavailableError && /not configured/i.test(error.message))
  );
}

export function createCapabilityPolicies(sleep?: SleepFn): CapabilityPolicies {
  const shared = { sleep, isRetryable: (error: unknown) => !isMissingConfiguration(error) };
  return {
    generation: createRetryPolicy({
      ...shared,
      createTimeoutError: (timeoutMs) => new GenerationTimeoutError(timeoutMs)
    }),
    search: createRetryPolicy(shared),
    embedding: createRetryPolicy(shared)
  };
}

export async function generateWithPolicy(
  capability: GenerationCapability,
  policy: RetryPolicy,
  request: { prompt: string; responseFormat: ResponseFormat; temperature: number },
  signal?: AbortSignal
): Promise<string> {
  return policy.run(
    (attempt) =>
      capability.generate(request.prompt, request.responseFormat, request.temperature, {
        signal: attempt.signal
      }),
    signal
  );
}

export async function embedWithPolicy(
  capability: EmbeddingCapability,
  policy: RetryPolicy,
  text: string,
  signal?: AbortSignal
): Promise<number[]> {
  return policy.run((attempt) => capability.embed(text, { signal: attempt.signal }), signal);
}
