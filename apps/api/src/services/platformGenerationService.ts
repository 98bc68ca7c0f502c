import { z } from "zod";
import { PLATFORM_RULES, type KeyPoint, type Platform, type PlatformPost } from "@postflow/shared";
import type { StageContext } from "../types/domain.js";
import { generateWithPolicy } from "./capabilities.js";
import { ValidationError, errorMessage } from "./errors.js";
import { optimizeHashtags } from "./hashtagService.js";
import { parseJsonContent } from "./llmClient.js";
import { charLength, fitToLength, normalizeWhitespace } from "./normalizers.js";
import { renderPrompt } from "./promptTemplateService.js";

const MAX_GENERATION_ATTEMPTS = 3;

const PLATFORM_LABELS: Record<Platform, string> = {
  x: "X (Twitter)",
  linkedin: "LinkedIn",
  instagram: "Instagram"
};

const PLATFORM_PROMPT_RULES: Record<Platform, string[]> = {
  x: [
    "- primary_text: at most 280 characters, one strong hook with the most concrete fact.",
    "- thread: optional. When used, 3 to 5 follow-up items of at most 280 characters each.",
    "- hashtags: at most 3 specific tags."
  ],
  linkedin: [
    "- primary_text: between 500 and 1200 characters, short paragraphs, professional tone.",
    "- thread: always an empty list.",
    "- hashtags: up to 5 specific tags."
  ],
  instagram: [
    "- primary_text: between 125 and 2200 characters, an engaging caption.",
    "- Include exactly one call to action (for example \"Save this post\" or \"Link in bio\").",
    "- thread: always an empty list.",
    "- hashtags: up to 10 specific tags."
  ]
};

const CTA_PATTERN =
  /\b(link in (?:our )?bio|comment below|let us know|tell us|share this|save this|tag a (?:friend|colleague)|follow (?:us|for)|sign up|learn more|read more|dm us|tap the link|click the link|subscribe)\b/gi;

/** Handles we are allowed to tag; anything else is rewritten to a plain name. */
export const VERIFIED_HANDLES: Record<string, string> = {
  "@deloitte": "Deloitte",
  "@fda": "FDA",
  "@who": "World Health Organization",
  "@cdc": "CDC",
  "@gartner_inc": "Gartner",
  "@bookingcom": "Booking.com",
  "@buffer": "Buffer",
  "@statista": "Statista"
};

const draftResponseSchema = z.object({
  primary_text: z.string().min(1),
  thread: z.array(z.string()).optional(),
  hashtags: z.array(z.string()).optional(),
  mentions: z.array(z.string()).optional()
});

type DraftResponse = z.infer<typeof draftResponseSchema>;

export function countCallsToAction(text: string): number {
  return text.match(CTA_PATTERN)?.length ?? 0;
}

export function parseDraftResponse(raw: string): DraftResponse {
  const record = parseJsonContent(raw);
  const parsed = draftResponseSchema.safeParse({
    primary_text: record.primary_text ?? record.primaryText ?? record.text ?? record.post,
    thread: record.thread ?? undefined,
    hashtags: record.hashtags ?? undefined,
    mentions: record.mentions ?? undefined
  });
  if (!parsed.success) {
    throw new Error("Draft response did not match the expected shape");
  }
  return parsed.data;
}

/**
 * Keeps verified mentions and turns every other @handle in the text into the
 * bare name, so the post never tags an account we cannot vouch for.
 */
export function filterMentions(
  text: string,
  mentions: string[]
): { text: string; mentions: string[]; dropped: string[] } {
  const kept = new Set<string>();
  const dropped = new Set<string>();

  const candidates = [...mentions, ...(text.match(/@[A-Za-z0-9_]{2,30}/g) ?? [])];
  for (const candidate of candidates) {
    const handle = `@${candidate.trim().replace(/^@+/, "").toLowerCase()}`;
    if (handle.length < 3) {
      continue;
    }
    if (handle in VERIFIED_HANDLES) {
      kept.add(handle);
    } else {
      dropped.add(handle);
    }
  }

  const cleaned = text.replace(/@([A-Za-z0-9_]{2,30})/g, (full, name: string) =>
    `@${name.toLowerCase()}` in VERIFIED_HANDLES ? full : name
  );

  return { text: cleaned, mentions: [...kept], dropped: [...dropped] };
}

function normalizeThread(platform: Platform, thread: string[] | undefined): string[] | undefined {
  const rules = PLATFORM_RULES[platform];
  if (!rules.allowsThread || !thread) {
    return undefined;
  }

  const items = thread
    .map((item) => fitToLength(item, rules.maxChars))
    .filter((item) => item.length > 0)
    .slice(0, rules.maxThreadItems);
  return items.length >= rules.minThreadItems ? items : undefined;
}

export function buildPost(
  platform: Platform,
  response: DraftResponse,
  context: { topicHint?: string; source: "generated" | "heuristic"; attempts: number }
): PlatformPost {
  const mentionResult = filterMentions(normalizeWhitespace(response.primary_text), response.mentions ?? []);
  const thread = normalizeThread(platform, response.thread);

  const post: PlatformPost = {
    platform,
    primaryText: mentionResult.text,
    hashtags: optimizeHashtags(response.hashtags ?? [], {
      platform,
      topicHint: context.topicHint,
      text: mentionResult.text
    }),
    mentions: mentionResult.mentions,
    metadata: {
      attempts: context.attempts,
      source: context.source
    }
  };
  if (thread) {
    post.thread = thread;
  }
  if (mentionResult.dropped.length > 0) {
    post.metadata.droppedMentions = mentionResult.dropped;
  }
  return post;
}

export function validatePost(post: PlatformPost): string[] {
  const rules = PLATFORM_RULES[post.platform];
  const violations: string[] = [];
  const length = charLength(post.primaryText);

  if (length < rules.minChars || length > rules.maxChars) {
    violations.push(`primary text is ${length} characters, must be between ${rules.minChars} and ${rules.maxChars}`);
  }
  if (post.thread && !rules.allowsThread) {
    violations.push("threads are not allowed on this platform");
  }
  if (post.thread?.some((item) => charLength(item) > rules.maxChars)) {
    violations.push(`every thread item must be at most ${rules.maxChars} characters`);
  }
  if (post.hashtags.length > rules.maxHashtags) {
    violations.push(`at most ${rules.maxHashtags} hashtags allowed`);
  }
  if (rules.requiresSingleCta) {
    const ctaCount = countCallsToAction(post.primaryText);
    if (ctaCount !== 1) {
      violations.push(`found ${ctaCount} calls to action, exactly one is required`);
    }
  }

  return violations;
}

function violationDistance(post: PlatformPost): number {
  const rules = PLATFORM_RULES[post.platform];
  const length = charLength(post.primaryText);
  let distance = Math.max(0, rules.minChars - length) + Math.max(0, length - rules.maxChars);
  if (rules.requiresSingleCta && countCallsToAction(post.primaryText) !== 1) {
    distance += 50;
  }
  return distance;
}

/** Deterministic draft assembled from key points when generation is unavailable. */
export function buildHeuristicDraft(
  platform: Platform,
  keyPoints: KeyPoint[],
  topicHint?: string
): PlatformPost {
  const texts = keyPoints.map((point) => point.text);
  const lead = texts[0] ?? topicHint ?? "";
  const rules = PLATFORM_RULES[platform];

  let primaryText: string;
  let thread: string[] | undefined;

  if (platform === "x") {
    primaryText = fitToLength(lead, rules.maxChars);
    thread = texts.length >= 4 ? texts.slice(1, 6) : undefined;
  } else if (platform === "linkedin") {
    const intro = topicHint ? `A few takeaways on ${topicHint}:` : "A few takeaways worth sharing:";
    const closing = "What has your experience been? I would like to hear your perspective.";
    const bullets = texts.map((text) => `- ${text}`);
    while (bullets.length > 1 && charLength([intro, ...bullets, closing].join("\n\n")) > rules.maxChars) {
      bullets.pop();
    }
    primaryText = fitToLength([intro, ...bullets, closing].join("\n\n"), rules.maxChars);
  } else {
    const body = texts.slice(0, 4).join("\n\n");
    const cta = "Save this post for later.";
    primaryText = `${fitToLength(body, rules.maxChars - cta.length - 2)}\n\n${cta}`;
  }

  return buildPost(
    platform,
    { primary_text: primaryText, thread, hashtags: [], mentions: [] },
    { topicHint, source: "heuristic", attempts: 0 }
  );
}

function buildAdjustment(violations: string[]): string {
  if (violations.length === 0) {
    return "";
  }
  return `Your previous draft was rejected: ${violations.join("; ")}. Fix these problems in this version.`;
}

export async function generatePlatformDraft(
  platform: Platform,
  keyPoints: KeyPoint[],
  topicHint: string | undefined,
  ctx: StageContext
): Promise<PlatformPost> {
  let best: PlatformPost | null = null;
  let bestViolations: string[] = [];
  let violations: string[] = [];
  let generationFailure: string | null = null;

  for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt += 1) {
    const prompt = renderPrompt("platform_post", {
      platform_label: PLATFORM_LABELS[platform],
      platform_rules: PLATFORM_PROMPT_RULES[platform].join("\n"),
      org_line: ctx.orgName ? `- Write on behalf of ${ctx.orgName}.` : "",
      adjustment: buildAdjustment(violations),
      topic_line: topicHint ? `Topic: ${topicHint}` : "",
      key_points: keyPoints.map((point) => `- ${point.text}`).join("\n")
    });

    let raw: string;
    try {
      raw = await generateWithPolicy(
        ctx.generation,
        ctx.policies.generation,
        { prompt, responseFormat: "json", temperature: 0.7 },
        ctx.signal
      );
    } catch (error) {
      if (ctx.signal?.aborted) {
        throw error;
      }
      generationFailure = errorMessage(error);
      break;
    }

    try {
      const post = buildPost(platform, parseDraftResponse(raw), { topicHint, source: "generated", attempts: attempt });
      violations = validatePost(post);
      if (!best || violationDistance(post) < violationDistance(best)) {
        best = post;
        bestViolations = violations;
      }
      if (violations.length > 0) {
        throw new ValidationError(platform, violations);
      }
      post.metadata.validation = "passed";
      return post;
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        violations = [`response could not be parsed (${errorMessage(error)})`];
      }
    }
  }

  if (best) {
    best.metadata.validation = "failed";
    ctx.recordError(
      `Draft for ${platform} failed validation after ${MAX_GENERATION_ATTEMPTS} attempts (${bestViolations.join("; ")}); best draft kept`
    );
    return best;
  }

  const reason = generationFailure ?? violations.join("; ");
  console.warn(`[drafts] ${platform} using heuristic draft: ${reason}`);
  ctx.recordError(`Generation for ${platform} failed (${reason}); heuristic draft used`);

  const fallback = buildHeuristicDraft(platform, keyPoints, topicHint);
  const fallbackViolations = validatePost(fallback);
  fallback.metadata.validation = fallbackViolations.length === 0 ? "passed" : "failed";
  if (fallbackViolations.length > 0) {
    ctx.recordError(`Heuristic draft for ${platform} failed validation (${fallbackViolations.join("; ")})`);
  }
  return fallback;
}
