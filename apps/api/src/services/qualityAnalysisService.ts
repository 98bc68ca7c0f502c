import { PLATFORMS, type ContentGap, type KeyPoint, type Platform, type PlatformPost, type QualityAnalysis } from "@postflow/shared";
import type { StageContext } from "../types/domain.js";
import { embedWithPolicy } from "./capabilities.js";
import { cosineSimilarity, roundScore, tokenize } from "./normalizers.js";

const SOURCE_WEIGHT = 0.3;
const KEY_POINT_WEIGHT = 0.7;

export function alignmentScore(sourceSimilarity: number, keyPointSimilarity: number): number {
  return roundScore(SOURCE_WEIGHT * sourceSimilarity + KEY_POINT_WEIGHT * keyPointSimilarity);
}

export function detectContentGaps(
  alignmentScores: Partial<Record<Platform, number>>,
  drafts: Partial<Record<Platform, PlatformPost>>
): ContentGap[] {
  const gaps: ContentGap[] = [];
  for (const platform of PLATFORMS) {
    const score = alignmentScores[platform];
    const draft = drafts[platform];
    if (score === undefined || !draft) {
      continue;
    }
    if (score < 0.4) {
      gaps.push({ platform, issue: "Very low alignment with the key messages" });
    } else if (score < 0.6) {
      gaps.push({ platform, issue: "Low alignment with the key messages" });
    }
    if (tokenize(draft.primaryText).length < 10) {
      gaps.push({ platform, issue: "Post may be too brief to carry the message" });
    }
  }
  return gaps;
}

/**
 * Embeds the source, the joined key points and every draft, then scores how
 * well each draft carries the key messages and how similar the drafts are.
 */
export async function analyzeContentQuality(
  sourceText: string,
  keyPoints: KeyPoint[],
  drafts: Partial<Record<Platform, PlatformPost>>,
  ctx: StageContext
): Promise<QualityAnalysis> {
  const embed = (text: string) => embedWithPolicy(ctx.embedding, ctx.policies.embedding, text, ctx.signal);

  const sourceVector = await embed(sourceText);
  const keyPointVector = await embed(keyPoints.map((point) => point.text).join(" "));

  const vectors: Partial<Record<Platform, number[]>> = {};
  const alignmentScores: Partial<Record<Platform, number>> = {};
  for (const platform of PLATFORMS) {
    const draft = drafts[platform];
    if (!draft) {
      continue;
    }
    const vector = await embed(draft.primaryText);
    vectors[platform] = vector;
    alignmentScores[platform] = alignmentScore(
      cosineSimilarity(sourceVector, vector),
      cosineSimilarity(keyPointVector, vector)
    );
    draft.metadata.alignmentScore = alignmentScores[platform];
  }

  const crossPlatformSimilarity: Record<string, number> = {};
  PLATFORMS.forEach((left, index) => {
    for (const right of PLATFORMS.slice(index + 1)) {
      const a = vectors[left];
      const b = vectors[right];
      if (a && b) {
        crossPlatformSimilarity[`${left}_vs_${right}`] = roundScore(cosineSimilarity(a, b));
      }
    }
  });

  return {
    alignmentScores,
    crossPlatformSimilarity,
    contentGaps: detectContentGaps(alignmentScores, drafts)
  };
}
