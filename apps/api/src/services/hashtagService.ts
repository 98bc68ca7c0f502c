import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { PLATFORM_RULES, type Platform } from "@postflow/shared";
import { config } from "../config.js";
import { roundScore } from "./normalizers.js";

const hashtagDataSchema = z.object({
  generic: z.array(z.string()),
  topics: z.record(
    z.object({
      keywords: z.array(z.string()),
      hashtags: z.array(z.string())
    })
  )
});

type HashtagData = z.infer<typeof hashtagDataSchema>;

let cachedData: HashtagData | null = null;

function loadHashtagData(): HashtagData {
  if (!cachedData) {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(config.dataDir, "hashtags.json"), "utf8"));
    cachedData = hashtagDataSchema.parse(raw);
  }
  return cachedData;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function normalizeHashtag(tag: string): string | null {
  const normalized = tag.trim().replace(/^#+/, "").replace(/[^\p{L}\p{N}_]/gu, "");

  if (normalized.length < 3 || normalized.length > 24) {
    return null;
  }

  if (/^\d+$/.test(normalized)) {
    return null;
  }

  return `#${normalized}`;
}

export function isGenericHashtag(tag: string): boolean {
  const generic = new Set(loadHashtagData().generic.map((item) => item.toLowerCase()));
  return generic.has(tag.toLowerCase());
}

/** Longer compound tags with internal capitals or digits are treated as more specific. */
export function hashtagSpecificity(tag: string): number {
  const body = tag.replace(/^#/, "");
  let score = Math.min(1, body.length / 15);
  if (/\p{Ll}\p{Lu}|\p{Lu}\p{N}|\p{N}\p{Lu}|^\p{Lu}\p{N}?\p{Lu}/u.test(body)) {
    score += 0.5;
  }
  if (/\d/.test(body)) {
    score += 0.2;
  }
  return roundScore(score);
}

export function detectTopicDomains(text: string): string[] {
  const lower = text.toLowerCase();
  return Object.entries(loadHashtagData().topics)
    .filter(([, topic]) =>
      topic.keywords.some((keyword) => new RegExp(`\\b${escapeRegExp(keyword)}`, "i").test(lower))
    )
    .map(([name]) => name);
}

export function targetedHashtags(text: string): string[] {
  const topics = loadHashtagData().topics;
  return detectTopicDomains(text).flatMap((name) => topics[name]?.hashtags.slice(0, 2) ?? []);
}

/**
 * Drops generic tags, adds domain tags inferred from the topic hint and post
 * text, ranks by specificity and applies the platform cap.
 */
export function optimizeHashtags(
  tags: string[],
  input: { platform: Platform; topicHint?: string; text: string }
): string[] {
  const targeted = targetedHashtags(`${input.topicHint ?? ""} ${input.text}`);
  const seen = new Set<string>();
  const candidates: Array<{ tag: string; index: number; score: number }> = [];

  for (const source of [...tags, ...targeted]) {
    const tag = normalizeHashtag(source);
    if (!tag || isGenericHashtag(tag) || seen.has(tag.toLowerCase())) {
      continue;
    }
    seen.add(tag.toLowerCase());
    candidates.push({ tag, index: candidates.length, score: hashtagSpecificity(tag) });
  }

  return candidates
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, PLATFORM_RULES[input.platform].maxHashtags)
    .map((item) => item.tag);
}
