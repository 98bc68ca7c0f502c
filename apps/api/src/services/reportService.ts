import { PLATFORMS, type Claim, type Platform, type ReviewStatus, type WorkflowResult } from "@postflow/shared";
import { confidenceBand, type ConfidenceBand } from "./factCheckService.js";

const RULE = "-".repeat(40);
const HEAVY_RULE = "=".repeat(60);

const PLATFORM_NAMES: Record<Platform, string> = {
  x: "X",
  linkedin: "LinkedIn",
  instagram: "Instagram"
};

const STATUS_ICONS: Record<ReviewStatus, string> = {
  pass: "✅",
  flag: "⚠️",
  block: "⛔"
};

const BAND_LABELS: Record<ConfidenceBand, string> = {
  pass: "verified",
  note: "needs hedging",
  flag: "unverified"
};

function section(title: string, lines: string[]): string[] {
  return [title, RULE, ...(lines.length > 0 ? lines : ["(none)"]), ""];
}

/** Unique claims across all platforms, in platform order. */
export function uniqueClaims(result: WorkflowResult): Claim[] {
  const seen = new Set<string>();
  const claims: Claim[] = [];
  for (const platform of PLATFORMS) {
    for (const claim of result.claims[platform] ?? []) {
      if (!seen.has(claim.text)) {
        seen.add(claim.text);
        claims.push(claim);
      }
    }
  }
  return claims;
}

function renderPosts(result: WorkflowResult): string[] {
  const lines: string[] = [];
  for (const platform of PLATFORMS) {
    const draft = result.drafts[platform];
    if (!draft) {
      continue;
    }

    if (lines.length > 0) {
      lines.push("");
    }
    const review = result.reviews[platform];
    const status = review ? `${STATUS_ICONS[review.status]} ${review.status.toUpperCase()}` : "NOT REVIEWED";
    lines.push(`[${PLATFORM_NAMES[platform]}] ${status}`, draft.primaryText);

    if (draft.thread && draft.thread.length > 0) {
      const total = draft.thread.length;
      lines.push("Thread:", ...draft.thread.map((item, index) => `  ${index + 1}/${total} ${item}`));
    }
    if (draft.hashtags.length > 0) {
      lines.push(`Hashtags: ${draft.hashtags.join(" ")}`);
    }
    if (draft.mentions.length > 0) {
      lines.push(`Mentions: ${draft.mentions.join(" ")}`);
    }
    if (typeof draft.metadata.alignmentScore === "number") {
      lines.push(`Alignment: ${draft.metadata.alignmentScore.toFixed(2)}`);
    }
    for (const issue of review?.issues ?? []) {
      lines.push(`  - [${issue.severity}] ${issue.message}. ${issue.suggestion}`);
    }
    if (draft.notes) {
      lines.push(`Notes: ${draft.notes}`);
    }
  }
  return lines;
}

function renderClaims(claims: Claim[]): string[] {
  return claims.flatMap((claim, index) => [
    `${index + 1}. ${claim.text}`,
    `   Severity: ${claim.severity} | Confidence: ${claim.confidence.toFixed(2)} (${BAND_LABELS[confidenceBand(claim.confidence)]})`,
    ...claim.sources.map(
      (source) => `   - ${source.title} (${source.url}) credibility ${source.credibility.toFixed(2)}`
    )
  ]);
}

function renderQuality(result: WorkflowResult): string[] {
  const analysis = result.qualityAnalysis;
  if (!analysis) {
    return [];
  }
  if (analysis.error) {
    return [`Unavailable: ${analysis.error}`];
  }

  const lines: string[] = [];
  for (const platform of PLATFORMS) {
    const score = analysis.alignmentScores?.[platform];
    if (typeof score === "number") {
      lines.push(`${PLATFORM_NAMES[platform]} alignment: ${score.toFixed(2)}`);
    }
  }
  for (const [pair, value] of Object.entries(analysis.crossPlatformSimilarity ?? {})) {
    lines.push(`Similarity ${pair}: ${value.toFixed(2)}`);
  }
  for (const gap of analysis.contentGaps ?? []) {
    lines.push(`Gap (${PLATFORM_NAMES[gap.platform]}): ${gap.issue}`);
  }
  return lines;
}

function renderSummary(result: WorkflowResult, claims: Claim[]): string[] {
  const reviews = PLATFORMS.flatMap((platform) => {
    const review = result.reviews[platform];
    return review ? [review] : [];
  });
  const countStatus = (status: ReviewStatus) => reviews.filter((review) => review.status === status).length;
  const countBand = (band: ConfidenceBand) => claims.filter((claim) => confidenceBand(claim.confidence) === band).length;
  const averageConfidence =
    claims.length > 0 ? claims.reduce((sum, claim) => sum + claim.confidence, 0) / claims.length : 0;

  return [
    `Posts: ${Object.keys(result.drafts).length} (pass ${countStatus("pass")}, flag ${countStatus("flag")}, block ${countStatus("block")})`,
    `Claims checked: ${claims.length} (verified ${countBand("pass")}, needs hedging ${countBand("note")}, unverified ${countBand("flag")})`,
    `Average confidence: ${averageConfidence.toFixed(2)}`,
    `Errors recorded: ${result.errors.length}`
  ];
}

/** Plain-text report of a finished run. Same input, same output. */
export function renderWorkflowReport(result: WorkflowResult, options: { generatedAt: string }): string {
  const claims = uniqueClaims(result);
  const sources = [...new Set(claims.flatMap((claim) => claim.sources.map((source) => source.url)))];

  const lines = [
    "SOCIAL MEDIA CONTENT PLAN",
    `Generated: ${options.generatedAt}`,
    ...(result.topicHint ? [`Topic: ${result.topicHint}`] : []),
    HEAVY_RULE,
    "",
    ...section(
      "KEY INSIGHTS",
      result.keyPoints.map((point, index) => `${index + 1}. ${point.text} (importance ${point.importance.toFixed(2)})`)
    ),
    ...section("POSTS", renderPosts(result)),
    ...section("FACT-CHECK RESULTS", renderClaims(claims)),
    ...section("QUALITY ANALYSIS", renderQuality(result)),
    ...section(
      "POSTING SCHEDULE",
      result.timings.flatMap((timing) => [
        `${PLATFORM_NAMES[timing.platform]}: ${timing.localDatetime}`,
        `   ${timing.rationale}`
      ])
    ),
    ...section("SUMMARY", renderSummary(result, claims)),
    ...section("SOURCES", sources.map((url) => `- ${url}`)),
    ...section("ERRORS", result.errors.map((error) => `- ${error}`))
  ];

  return `${lines.join("\n").trimEnd()}\n`;
}
