import { z } from "zod";
import type { KeyPoint } from "@postflow/shared";
import { config } from "../config.js";
import type { StageContext } from "../types/domain.js";
import { generateWithPolicy } from "./capabilities.js";
import { InputTooShortError, errorMessage } from "./errors.js";
import { parseJsonContent } from "./llmClient.js";
import {
  charLength,
  clamp,
  contentWords,
  normalizeForComparison,
  normalizeWhitespace,
  roundScore,
  splitSentences,
  tokenize
} from "./normalizers.js";
import { renderPrompt, type PromptTask } from "./promptTemplateService.js";

const MAX_KEY_POINTS = 8;
const FALLBACK_KEY_POINTS = 6;
const SOURCE_PROMPT_CHARS = 12_000;

const keyPointResponseSchema = z.object({
  key_points: z
    .array(
      z.object({
        text: z.string(),
        importance: z.unknown().optional()
      })
    )
    .min(1)
});

export function assertSourceLength(sourceText: string, minChars = config.pipeline.minSourceChars): void {
  const length = charLength(sourceText.trim());
  if (length < minChars) {
    throw new InputTooShortError(length, minChars);
  }
}

function toImportance(value: unknown): number {
  const number = typeof value === "number" ? value : Number(value);
  return Number.isFinite(number) ? clamp(number, 0, 1) : 0.5;
}

/** Trims, deduplicates by normalized text, orders by importance and caps the list. */
export function cleanKeyPoints(points: KeyPoint[], limit = MAX_KEY_POINTS): KeyPoint[] {
  const seen = new Set<string>();
  const result: KeyPoint[] = [];

  for (const point of points) {
    const text = normalizeWhitespace(point.text);
    const key = normalizeForComparison(text);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push({ text, importance: roundScore(clamp(point.importance, 0, 1)) });
  }

  return result
    .map((point, index) => ({ point, index }))
    .sort((a, b) => b.point.importance - a.point.importance || a.index - b.index)
    .slice(0, limit)
    .map((item) => item.point);
}

export function parseKeyPointResponse(raw: string): KeyPoint[] {
  const record = parseJsonContent(raw);
  const parsed = keyPointResponseSchema.safeParse({
    key_points: record.key_points ?? record.keyPoints ?? record.points
  });
  if (!parsed.success) {
    throw new Error("Key point response did not match the expected shape");
  }

  const points = cleanKeyPoints(
    parsed.data.key_points.map((item) => ({
      text: item.text,
      importance: toImportance(item.importance)
    }))
  );
  if (points.length === 0) {
    throw new Error("Key point response contained no usable entries");
  }
  return points;
}

/**
 * Sentence ranking used when generation is unavailable: longer sentences that
 * reuse the document's frequent keywords score higher, and sentences carrying
 * a figure get a bonus.
 */
export function rankSentencesForKeyPoints(sourceText: string, limit = FALLBACK_KEY_POINTS): KeyPoint[] {
  const sentences = splitSentences(sourceText, 20);
  if (sentences.length === 0) {
    const text = normalizeWhitespace(sourceText);
    return text ? [{ text, importance: 1 }] : [];
  }

  const frequency = new Map<string, number>();
  for (const word of contentWords(sourceText)) {
    frequency.set(word, (frequency.get(word) ?? 0) + 1);
  }
  const keywords = new Set(
    [...frequency.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, 15)
      .map(([word]) => word)
  );

  const scored = sentences.map((sentence, index) => {
    const words = tokenize(sentence);
    const keywordHits = words.filter((word) => keywords.has(word)).length;
    const lengthScore = Math.min(1, words.length / 25);
    const density = words.length > 0 ? keywordHits / words.length : 0;
    const numericBonus = /\d/.test(sentence) ? 0.5 : 0;
    return { sentence, index, score: lengthScore * 0.4 + density * 2 + numericBonus };
  });

  const ranked = scored.sort((a, b) => b.score - a.score || a.index - b.index);
  const topScore = ranked[0]?.score ?? 0;

  return cleanKeyPoints(
    ranked.map((item) => ({
      text: item.sentence,
      importance: topScore > 0 ? item.score / topScore : 0
    })),
    limit
  );
}

export async function extractKeyPoints(
  sourceText: string,
  topicHint: string | undefined,
  ctx: StageContext
): Promise<KeyPoint[]> {
  assertSourceLength(sourceText);

  const variables = {
    source_text: sourceText.slice(0, SOURCE_PROMPT_CHARS),
    topic_line: topicHint ? `Topic: ${topicHint}` : ""
  };
  const tasks: PromptTask[] = ["key_points", "key_points_strict"];
  let lastReason = "no attempt made";

  for (const task of tasks) {
    try {
      const raw = await generateWithPolicy(
        ctx.generation,
        ctx.policies.generation,
        { prompt: renderPrompt(task, variables), responseFormat: "json", temperature: 0.3 },
        ctx.signal
      );
      return parseKeyPointResponse(raw);
    } catch (error) {
      if (ctx.signal?.aborted) {
        throw error;
      }
      lastReason = errorMessage(error);
    }
  }

  console.warn(`[keypoints] falling back to sentence ranking: ${lastReason}`);
  ctx.recordError(`Key point extraction used sentence ranking fallback: ${lastReason}`);
  return rankSentencesForKeyPoints(sourceText);
}
