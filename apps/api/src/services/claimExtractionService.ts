import { z } from "zod";
import type { Claim, ClaimSeverity, Platform, PlatformPost } from "@postflow/shared";
import { config } from "../config.js";
import type { StageContext } from "../types/domain.js";
import { generateWithPolicy } from "./capabilities.js";
import { errorMessage } from "./errors.js";
import { parseJsonContent } from "./llmClient.js";
import { contentWords, extractNumbers, normalizeWhitespace, splitSentences, stripTrailingPunctuation } from "./normalizers.js";
import { renderPrompt } from "./promptTemplateService.js";


const SEVERITY_RANK: Record<ClaimSeverity, number> = { high: 3, medium: 2, low: 1 };

const PERCENT_PATTERN = /\d+(?:\.\d+)?\s?(?:%|percent\b)/i;
const CURRENCY_PATTERN = /[$€£]\s?\d|\b\d+(?:\.\d+)?\s?(?:usd|eur|gbp|dollars|euros)\b/i;
const MAGNITUDE_PATTERN = /\b\d+(?:[.,]\d+)?\s?(?:thousand|million|billion|trillion|k|m|bn)\b/i;
const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/;
const DATE_PATTERN =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:tember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+\d{1,2}\b/i;
const ENTITY_NUMBER_PATTERN = /\b\p{Lu}[\p{L}.&-]+(?:\s+\p{Lu}[\p{L}.&-]+)*\s+(?:\w+\s+){0,3}\d{2,}|\b\d{2,}\s+(?:\w+\s+){0,3}\p{Lu}[\p{L}&-]+/u;
const ATTRIBUTION_PATTERN =
  /\b(according to|reported by|reports?|survey(?:ed)?|study|studies|research(?:ers)?|data from|found that|analysis by|published|census|poll|estimates?)\b/i;

const claimResponseSchema = z.object({
  claims: z.array(
    z.union([
      z.string(),
      z.object({
        text: z.string(),
        severity: z.string().optional()
      })
    ])
  )
});

/** Dedup key: case-folded, trailing punctuation stripped, percentages rounded. */
export function normalizeClaimText(text: string): string {
  return stripTrailingPunctuation(
    text
      .toLowerCase()
      .replace(/\s+/g, " ")
      .replace(/(\d+(?:\.\d+)?)\s?percent\b/g, "$1%")
      .replace(/(\d+(?:\.\d+)?)\s?%/g, (_full, value: string) => `${Math.round(Number(value))}%`)
      .trim()
  );
}

function hasStatistic(text: string): boolean {
  return PERCENT_PATTERN.test(text) || CURRENCY_PATTERN.test(text) || MAGNITUDE_PATTERN.test(text);
}

function isNumericExpression(text: string): boolean {
  return (
    hasStatistic(text) ||
    YEAR_PATTERN.test(text) ||
    DATE_PATTERN.test(text) ||
    ENTITY_NUMBER_PATTERN.test(text)
  );
}

export function assignSeverity(text: string): ClaimSeverity {
  if (hasStatistic(text) && ATTRIBUTION_PATTERN.test(text)) {
    return "high";
  }
  if (extractNumbers(text).length > 0 || isNumericExpression(text)) {
    return "medium";
  }
  return "low";
}

export function extractPatternClaims(text: string): string[] {
  return splitSentences(text, 12)
    .filter((sentence) => isNumericExpression(sentence))
    .map((sentence) => normalizeWhitespace(sentence));
}

export function parseClaimResponse(raw: string): string[] {
  const parsed = claimResponseSchema.safeParse(parseJsonContent(raw));
  if (!parsed.success) {
    throw new Error("Claim response did not match the expected shape");
  }
  return parsed.data.claims
    .map((item) => normalizeWhitespace(typeof item === "string" ? item : item.text))
    .filter((item) => item.length >= 8);
}

/**
 * Merges candidates in order, drops duplicates by normalized form, assigns
 * severity and keeps the strongest claims up to the per-run cap.
 */
export function mergeClaims(candidates: string[], limit = config.factCheck.maxClaims): Claim[] {
  const seen = new Set<string>();
  const unique: Array<{ claim: Claim; index: number }> = [];

  for (const text of candidates) {
    const key = normalizeClaimText(text);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push({
      claim: { text, severity: assignSeverity(text), confidence: 0, sources: [] },
      index: unique.length
    });
  }

  return unique
    .sort((a, b) => SEVERITY_RANK[b.claim.severity] - SEVERITY_RANK[a.claim.severity] || a.index - b.index)
    .slice(0, limit)
    .map((item) => item.claim);
}

export function collectClaimText(sourceText: string, drafts: Partial<Record<Platform, PlatformPost>>): string {
  const parts = [sourceText];
  for (const draft of Object.values(drafts)) {
    if (!draft) {
      continue;
    }
    parts.push(draft.primaryText, ...(draft.thread ?? []));
  }
  return parts.join("\n\n");
}

export async function extractClaims(
  sourceText: string,
  drafts: Partial<Record<Platform, PlatformPost>>,
  ctx: StageContext
): Promise<Claim[]> {
  const text = collectClaimText(sourceText, drafts);
  const patternClaims = extractPatternClaims(text);
  let generatedClaims: string[] = [];

  try {
    const raw = await generateWithPolicy(
      ctx.generation,
      ctx.policies.generation,
      { prompt: renderPrompt("claims", { text: text.slice(0, 12_000) }), responseFormat: "json", temperature: 0.2 },
      ctx.signal
    );
    generatedClaims = parseClaimResponse(raw);
  } catch (error) {
    if (ctx.signal?.aborted) {
      throw error;
    }
    ctx.recordError(`Claim extraction kept pattern matches only: ${errorMessage(error)}`);
  }

  return mergeClaims([...patternClaims, ...generatedClaims]);
}

function claimMatchesDraft(claim: Claim, draftText: string): boolean {
  const draftNumbers = new Set(extractNumbers(draftText));
  if (extractNumbers(claim.text).some((value) => draftNumbers.has(value))) {
    return true;
  }

  const words = [...new Set(contentWords(claim.text))];
  if (words.length === 0) {
    return false;
  }
  const draftWords = new Set(contentWords(draftText));
  const hits = words.filter((word) => draftWords.has(word)).length;
  return hits / words.length >= 0.5;
}

/** Attaches each run claim (by reference) to every draft it relates to. */
export function attachClaimsToDrafts(
  claims: Claim[],
  drafts: Partial<Record<Platform, PlatformPost>>
): Partial<Record<Platform, Claim[]>> {
  const attached: Partial<Record<Platform, Claim[]>> = {};
  for (const draft of Object.values(drafts)) {
    if (!draft) {
      continue;
    }
    const draftText = [draft.primaryText, ...(draft.thread ?? [])].join("\n");
    attached[draft.platform] = claims.filter((claim) => claimMatchesDraft(claim, draftText));
  }
  return attached;
}
