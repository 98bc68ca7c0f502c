import test from "node:test";
import assert from "node:assert/strict";
import type { Claim, WorkflowResult } from "@postflow/shared";
import { renderWorkflowReport, uniqueClaims } from "../services/reportService.js";

const GENERATED_AT = "2026-10-19T08:00:00.000Z";

function buildResult(): WorkflowResult {
  const claim: Claim = {
    text: "Meetings fell 30%",
    severity: "medium",
    confidence: 0.84,
    sources: [{ title: "BLS study", url: "https://www.bls.gov/study", credibility: 0.95 }]
  };

  return {
    sourceText: "Source text",
    topicHint: "remote work",
    keyPoints: [{ text: "Written updates cut meetings", importance: 0.9 }],
    drafts: {
      x: {
        platform: "x",
        primaryText: "Meetings fell 30% after written updates.",
        hashtags: ["#RemoteWork"],
        mentions: [],
        metadata: { alignmentScore: 0.82 }
      }
    },
    claims: { x: [claim] },
    reviews: { x: { status: "pass", issues: [], claims: [claim] } },
    timings: [
      {
        platform: "x",
        localDatetime: "2026-10-19T12:00:00-04:00",
        rationale: "General content: Lunch break browsing peak (Monday 12:00), America/New_York."
      }
    ],
    errors: [],
    qualityAnalysis: { alignmentScores: { x: 0.82 }, crossPlatformSimilarity: {}, contentGaps: [] }
  };
}

test("renderWorkflowReport lays out every section", () => {
  const rule = "-".repeat(40);
  const expected = [
    "SOCIAL MEDIA CONTENT PLAN",
    `Generated: ${GENERATED_AT}`,
    "Topic: remote work",
    "=".repeat(60),
    "",
    "KEY INSIGHTS",
    rule,
    "1. Written updates cut meetings (importance 0.90)",
    "",
    "POSTS",
    rule,
    "[X] ✅ PASS",
    "Meetings fell 30% after written updates.",
    "Hashtags: #RemoteWork",
    "Alignment: 0.82",
    "",
    "FACT-CHECK RESULTS",
    rule,
    "1. Meetings fell 30%",
    "   Severity: medium | Confidence: 0.84 (verified)",
    "   - BLS study (https://www.bls.gov/study) credibility 0.95",
    "",
    "QUALITY ANALYSIS",
    rule,
    "X alignment: 0.82",
    "",
    "POSTING SCHEDULE",
    rule,
    "X: 2026-10-19T12:00:00-04:00",
    "   General content: Lunch break browsing peak (Monday 12:00), America/New_York.",
    "",
    "SUMMARY",
    rule,
    "Posts: 1 (pass 1, flag 0, block 0)",
    "Claims checked: 1 (verified 1, needs hedging 0, unverified 0)",
    "Average confidence: 0.84",
    "Errors recorded: 0",
    "",
    "SOURCES",
    rule,
    "- https://www.bls.gov/study",
    "",
    "ERRORS",
    rule,
    "(none)"
  ].join("\n");

  assert.equal(renderWorkflowReport(buildResult(), { generatedAt: GENERATED_AT }), `${expected}\n`);
});

test("renderWorkflowReport is deterministic and shows issues and failures", () => {
  const result = buildResult();
  result.reviews.x = {
    status: "flag",
    issues: [
      {
        ruleId: "absolute_claims",
        severity: "minor",
        message: 'Absolute claim: "always"',
        suggestion: "Qualify the statement."
      }
    ],
    claims: []
  };
  result.qualityAnalysis = { error: "Missing API key for embeddings" };
  result.errors = ["Quality analysis unavailable: Missing API key for embeddings"];

  const report = renderWorkflowReport(result, { generatedAt: GENERATED_AT });
  const lines = report.split("\n");

  assert.equal(report, renderWorkflowReport(result, { generatedAt: GENERATED_AT }));
  assert.ok(lines.includes("[X] ⚠️ FLAG"));
  assert.ok(lines.includes('  - [minor] Absolute claim: "always". Qualify the statement.'));
  assert.ok(lines.includes("Unavailable: Missing API key for embeddings"));
  assert.ok(lines.includes("Posts: 1 (pass 0, flag 1, block 0)"));
  assert.ok(lines.includes("- Quality analysis unavailable: Missing API key for embeddings"));
});

test("uniqueClaims returns each shared claim once", () => {
  const result = buildResult();
  const shared = result.claims.x?.[0];
  assert.ok(shared);
  result.claims.linkedin = [shared];

  assert.equal(uniqueClaims(result).length, 1);
});
