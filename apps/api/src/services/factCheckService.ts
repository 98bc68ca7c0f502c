import pLimit from "p-limit";
import type { Claim, SearchProvider } from "@postflow/shared";
import { config } from "../config.js";
import type { StageContext } from "../types/domain.js";
import { embedWithPolicy, type SearchCapability, type SearchResult } from "./capabilities.js";
import { ProviderUnavailableError, errorMessage } from "./errors.js";
import {
  clamp,
  contentWords,
  cosineSimilarity,
  extractNumbers,
  roundScore,
  stripTrailingPunctuation,
  truncateAtWord
} from "./normalizers.js";
import { FallbackExhaustedError, type ProviderFailure, type RetryPolicy } from "./retryPolicy.js";
import { SEARCH_PROVIDERS, resolveProviderChain } from "./searchProviders.js";
import { credibilityScore } from "./sourceCredibility.js";

const MAX_SOURCES = 8;
const MAX_EMBEDDED_RESULTS = 5;
const SIMILARITY_THRESHOLD = 0.8;
const DOMAIN_WEIGHT = 0.25;

export type ConfidenceBand = "pass" | "note" | "flag";

export interface ConfidenceBreakdown {
  base: number;
  domain: number;
  similarity: number;
  title: number;
  confidence: number;
}

export function confidenceBand(confidence: number): ConfidenceBand {
  if (confidence >= 0.7) {
    return "pass";
  }
  return confidence >= 0.3 ? "note" : "flag";
}

function quotedPhrases(text: string): string[] {
  return [...text.matchAll(/["“]([^"”]{4,})["”]/g)]
    .map((match) => (match[1] ?? "").trim().toLowerCase())
    .filter((item) => item.length > 0);
}

export function titleCorroborates(claimText: string, results: SearchResult[]): boolean {
  const numbers = extractNumbers(claimText);
  const phrases = quotedPhrases(claimText);
  if (numbers.length === 0 && phrases.length === 0) {
    return false;
  }

  return results.some((result) => {
    const titleNumbers = new Set(extractNumbers(result.title));
    const title = result.title.toLowerCase();
    return numbers.some((value) => titleNumbers.has(value)) || phrases.some((phrase) => title.includes(phrase));
  });
}

/**
 * Combines result count, source credibility, semantic agreement and title
 * corroboration into a confidence in [0, 1]. No results means no confidence.
 */
export function scoreClaimConfidence(
  claimText: string,
  results: SearchResult[],
  maxSimilarity: number
): ConfidenceBreakdown {
  if (results.length === 0) {
    return { base: 0, domain: 0, similarity: 0, title: 0, confidence: 0 };
  }

  const base = Math.min(1, 0.25 + 0.15 * results.length);
  const domain = results.reduce((sum, result) => sum + credibilityScore(result.url), 0) / results.length;
  const similarity = maxSimilarity > SIMILARITY_THRESHOLD ? 0.3 : 0;
  const title = titleCorroborates(claimText, results) ? 0.2 : 0;

  return {
    base,
    domain,
    similarity,
    title,
    confidence: roundScore(clamp(base + domain * DOMAIN_WEIGHT + similarity + title, 0, 1))
  };
}

/** Literal text, an entity/number focused form and a year-qualified form. */
export function buildQueryVariants(claimText: string, runYear: number): string[] {
  const literal = truncateAtWord(stripTrailingPunctuation(claimText), 200);
  const entities = (claimText.match(/\b\p{Lu}[\p{L}&.-]*(?:\s+\p{Lu}[\p{L}&.-]*)*/gu) ?? []).slice(0, 3);
  const numbers = (claimText.match(/\d+(?:[.,]\d+)?\s?%?/g) ?? []).map((item) => item.trim()).slice(0, 3);
  const keywords = contentWords(claimText).slice(0, 5);
  const focused = [...new Set([...entities, ...numbers, ...keywords])].join(" ").trim();

  const year = claimText.match(/\b(?:19|20)\d{2}\b/)?.[0];
  const temporal = year ? `${focused || literal} ${year} report` : `${focused || literal} ${runYear}`;

  return [...new Set([literal, focused, temporal].filter((item) => item.length > 0))].slice(0, 3);
}

function isSearchProvider(value: unknown): value is SearchProvider {
  return SEARCH_PROVIDERS.some((provider) => provider === value);
}

function isOutage(error: unknown): boolean {
  return error instanceof ProviderUnavailableError && error.outage;
}

export interface GatewaySearchOptions {
  signal?: AbortSignal;
  /** Providers spent for the current claim; query-level failures are added here. */
  exhausted?: Set<SearchProvider>;
}

/**
 * Per-run entry point to search. A provider that is down or unconfigured is
 * skipped for the rest of the run; any other failure only takes it out for
 * the claim that hit it.
 */
export class SearchGateway {
  private readonly capability: SearchCapability;
  private readonly policy: RetryPolicy;
  private readonly chain: SearchProvider[];
  private readonly unavailable = new Set<SearchProvider>();

  constructor(capability: SearchCapability, policy: RetryPolicy, chain: SearchProvider[]) {
    this.capability = capability;
    this.policy = policy;
    this.chain = chain;
  }

  hasProviderFor(exhausted: ReadonlySet<SearchProvider>): boolean {
    return this.chain.some((provider) => !this.unavailable.has(provider) && !exhausted.has(provider));
  }

  async search(
    query: string,
    options: GatewaySearchOptions = {}
  ): Promise<{ results: SearchResult[]; provider: SearchProvider }> {
    const exhausted = options.exhausted ?? new Set<SearchProvider>();
    const chain = this.chain.filter((provider) => !this.unavailable.has(provider) && !exhausted.has(provider));
    if (chain.length === 0) {
      const runWide = this.chain.every((provider) => this.unavailable.has(provider));
      throw new ProviderUnavailableError(
        "all",
        runWide ? "every provider failed earlier in this run" : "every provider failed for this claim"
      );
    }

    try {
      const outcome = await this.policy.runWithFallback(
        chain,
        (provider, attempt) => this.capability.search(query, provider, { signal: attempt.signal }),
        options.signal
      );
      this.recordFailures(outcome.failures, exhausted);
      return { results: outcome.value, provider: outcome.provider };
    } catch (error) {
      if (error instanceof FallbackExhaustedError) {
        this.recordFailures(error.failures, exhausted);
        throw new ProviderUnavailableError("all", error.message);
      }
      throw error;
    }
  }

  private recordFailures(failures: ProviderFailure<unknown>[], exhausted: Set<SearchProvider>): void {
    for (const { provider, error } of failures) {
      if (!isSearchProvider(provider)) {
        continue;
      }
      if (!isOutage(error)) {
        exhausted.add(provider);
        continue;
      }
      if (!this.unavailable.has(provider)) {
        console.warn(`[factcheck] search provider ${provider} disabled for this run`);
      }
      this.unavailable.add(provider);
    }
  }
}

export interface FactCheckOptions {
  runYear: number;
  chain?: SearchProvider[];
  concurrency?: number;
}

class FactChecker {
  private readonly ctx: StageContext;
  private readonly gateway: SearchGateway;
  private readonly runYear: number;
  private embeddingDisabled = false;

  constructor(ctx: StageContext, options: FactCheckOptions) {
    this.ctx = ctx;
    this.runYear = options.runYear;
    this.gateway = new SearchGateway(ctx.search, ctx.policies.search, options.chain ?? resolveProviderChain());
  }

  async verify(claim: Claim): Promise<void> {
    const merged = new Map<string, SearchResult>();
    let succeeded = 0;
    let lastError = "no query variants";
    const exhausted = new Set<SearchProvider>();

    for (const query of buildQueryVariants(claim.text, this.runYear)) {
      try {
        const { results } = await this.gateway.search(query, { signal: this.ctx.signal, exhausted });
        succeeded += 1;
        for (const result of results) {
          if (result.url && !merged.has(result.url)) {
            merged.set(result.url, result);
          }
        }
      } catch (error) {
        if (this.ctx.signal?.aborted) {
          throw error;
        }
        lastError = errorMessage(error);
        if (!this.gateway.hasProviderFor(exhausted)) {
          break;
        }
      }
    }

    if (succeeded === 0) {
      claim.confidence = 0;
      claim.sources = [];
      this.ctx.recordError(`Fact check failed for claim "${truncateAtWord(claim.text, 80)}": ${lastError}`);
      return;
    }

    const results = [...merged.values()].slice(0, MAX_SOURCES);
    const maxSimilarity = await this.maxSimilarity(claim.text, results);
    claim.confidence = scoreClaimConfidence(claim.text, results, maxSimilarity).confidence;
    claim.sources = results.map((result) => ({
      title: result.title,
      url: result.url,
      credibility: credibilityScore(result.url)
    }));
  }

  private async maxSimilarity(claimText: string, results: SearchResult[]): Promise<number> {
    if (results.length === 0 || this.embeddingDisabled) {
      return 0;
    }

    try {
      const { embedding, policies, signal } = this.ctx;
      const claimVector = await embedWithPolicy(embedding, policies.embedding, claimText, signal);
      let best = 0;
      for (const result of results.slice(0, MAX_EMBEDDED_RESULTS)) {
        const vector = await embedWithPolicy(embedding, policies.embedding, `${result.title}. ${result.snippet}`, signal);
        best = Math.max(best, cosineSimilarity(claimVector, vector));
      }
      return best;
    } catch (error) {
      if (this.ctx.signal?.aborted) {
        throw error;
      }
      if (this.embeddingDisabled) {
        return 0;
      }
      this.embeddingDisabled = true;
      this.ctx.recordError(`Semantic similarity unavailable during fact check: ${errorMessage(error)}`);
      return 0;
    }
  }
}

/** Enriches every claim in place; claims are checked concurrently. */
export async function verifyClaims(claims: Claim[], ctx: StageContext, options: FactCheckOptions): Promise<void> {
  const checker = new FactChecker(ctx, options);
  const limit = pLimit(Math.max(1, options.concurrency ?? config.factCheck.concurrency));
  await Promise.all(claims.map((claim) => limit(() => checker.verify(claim))));
}
