import { z } from "zod";
import type { SearchProvider } from "@postflow/shared";
import { config } from "../config.js";
import { ProviderUnavailableError, errorMessage } from "./errors.js";
import type { SearchResult } from "./capabilities.js";

export const SEARCH_PROVIDERS: readonly SearchProvider[] = ["duckduckgo", "wikipedia", "premium"];

const DUCKDUCKGO_BASE = "https://api.duckduckgo.com/";
const SERPAPI_BASE = "https://serpapi.com/search.json";

// Rejected credentials and quota; other statuses may depend on the query.
const OUTAGE_STATUSES = new Set([401, 403, 429]);

interface DuckDuckGoTopic {
  Text?: string;
  FirstURL?: string;
  Topics?: DuckDuckGoTopic[];
}

const duckTopicSchema: z.ZodType<DuckDuckGoTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(duckTopicSchema).optional()
  })
);

const duckDuckGoSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  RelatedTopics: z.array(duckTopicSchema).optional()
});

const wikipediaSchema = z.object({
  query: z
    .object({
      search: z.array(
        z.object({
          title: z.string(),
          snippet: z.string().optional()
        })
      )
    })
    .optional()
});

const serpApiSchema = z.object({
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional()
      })
    )
    .optional()
});

function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/&quot;/g, "\"")
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

async function fetchJson(provider: SearchProvider, url: string, signal?: AbortSignal): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      signal,
      headers: { Accept: "application/json", "User-Agent": "postflow-factcheck/0.1" }
    });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    throw new ProviderUnavailableError(provider, errorMessage(error, "network error"), { outage: true });
  }

  if (!response.ok) {
    throw new ProviderUnavailableError(provider, `HTTP ${response.status}`, {
      outage: OUTAGE_STATUSES.has(response.status)
    });
  }

  try {
    const payload: unknown = await response.json();
    return payload;
  } catch (error) {
    throw new ProviderUnavailableError(provider, `invalid JSON (${errorMessage(error)})`);
  }
}

function flattenTopics(topics: DuckDuckGoTopic[]): DuckDuckGoTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

async function searchDuckDuckGo(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
  const params = new URLSearchParams({ q: query, format: "json", no_html: "1", skip_disambig: "1" });
  const parsed = duckDuckGoSchema.safeParse(await fetchJson("duckduckgo", `${DUCKDUCKGO_BASE}?${params.toString()}`, signal));
  if (!parsed.success) {
    throw new ProviderUnavailableError("duckduckgo", "unexpected response shape");
  }

  const results: SearchResult[] = [];
  const data = parsed.data;
  if (data.AbstractURL && data.AbstractText) {
    results.push({ title: data.Heading || data.AbstractText.slice(0, 80), url: data.AbstractURL, snippet: data.AbstractText });
  }

  for (const topic of flattenTopics(data.RelatedTopics ?? [])) {
    if (!topic.FirstURL || !topic.Text) {
      continue;
    }
    results.push({ title: topic.Text.split(" - ")[0] ?? topic.Text, url: topic.FirstURL, snippet: topic.Text });
  }

  return results.slice(0, config.search.maxResults);
}

async function searchWikipedia(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
  const lang = config.search.wikipediaLang;
  const params = new URLSearchParams({
    action: "query",
    list: "search",
    srsearch: query,
    srlimit: String(config.search.maxResults),
    format: "json",
    utf8: "1"
  });
  const parsed = wikipediaSchema.safeParse(
    await fetchJson("wikipedia", `https://${lang}.wikipedia.org/w/api.php?${params.toString()}`, signal)
  );
  if (!parsed.success) {
    throw new ProviderUnavailableError("wikipedia", "unexpected response shape");
  }

  return (parsed.data.query?.search ?? []).map((item) => ({
    title: item.title,
    url: `https://${lang}.wikipedia.org/wiki/${encodeURIComponent(item.title.replace(/ /g, "_"))}`,
    snippet: stripHtml(item.snippet ?? "")
  }));
}

async function searchPremium(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
  const apiKey = config.search.serpApiKey;
  if (!apiKey) {
    throw new ProviderUnavailableError("premium", "SERPAPI_API_KEY not configured", { outage: true });
  }

  const params = new URLSearchParams({
    engine: "google",
    q: query,
    num: String(config.search.maxResults),
    api_key: apiKey
  });
  const parsed = serpApiSchema.safeParse(await fetchJson("premium", `${SERPAPI_BASE}?${params.toString()}`, signal));
  if (!parsed.success) {
    throw new ProviderUnavailableError("premium", "unexpected response shape");
  }

  const results: SearchResult[] = [];
  for (const item of parsed.data.organic_results ?? []) {
    if (!item.link || !item.title) {
      continue;
    }
    results.push({ title: item.title, url: item.link, snippet: item.snippet ?? "" });
  }
  return results;
}

/** Single dispatch point for every search backend. */
export function searchWithProvider(
  provider: SearchProvider,
  query: string,
  signal?: AbortSignal
): Promise<SearchResult[]> {
  switch (provider) {
    case "duckduckgo":
      return searchDuckDuckGo(query, signal);
    case "wikipedia":
      return searchWikipedia(query, signal);
    case "premium":
      return searchPremium(query, signal);
  }
}

/**
 * Configured provider first, then the remaining ones in fixed order. The
 * premium backend only joins the chain when it has credentials.
 */
export function resolveProviderChain(
  primary: SearchProvider = config.search.provider,
  premiumAvailable: boolean = config.search.serpApiKey.length > 0
): SearchProvider[] {
  const ordered = [primary, ...SEARCH_PROVIDERS.filter((item) => item !== primary)];
  return ordered.filter((item) => item !== "premium" || premiumAvailable);
}
