import test from "node:test";
import assert from "node:assert/strict";
import { InputTooShortError } from "../services/errors.js";
import { formatStageSummary, runWorkflow } from "../services/workflowService.js";
import {
  FakeGeneration,
  FakeSearch,
  WORKFLOW_SOURCE,
  failingEmbedding,
  noSleep,
  offlineSearch,
  scriptedDependencies,
  scriptedGeneration,
  unconfiguredGeneration
} from "./fakes.js";

test("runWorkflow rejects input below the minimum length", async () => {
  await assert.rejects(runWorkflow("Too short to plan.", undefined, scriptedDependencies()), InputTooShortError);
});

test("runWorkflow produces drafts, checked claims, reviews and a schedule", async () => {
  const result = await runWorkflow(WORKFLOW_SOURCE, "remote work", scriptedDependencies());

  assert.deepEqual(result.errors, []);
  assert.equal(result.topicHint, "remote work");
  assert.deepEqual(
    result.keyPoints.map((point) => point.text),
    ["Written updates cut status meetings by 30%", "Teams reported calmer calendars and faster decisions"]
  );
  assert.deepEqual(Object.keys(result.drafts).sort(), ["instagram", "linkedin", "x"]);
  assert.equal(result.drafts.x?.metadata.validation, "passed");
  assert.equal(result.claims.x?.length, 3);
  assert.ok(result.claims.x?.every((claim) => claim.confidence >= 0.7 && claim.sources.length === 2));
  assert.deepEqual(
    [result.reviews.x?.status, result.reviews.linkedin?.status, result.reviews.instagram?.status],
    ["pass", "pass", "pass"]
  );
  assert.deepEqual(Object.keys(result.qualityAnalysis?.alignmentScores ?? {}).sort(), ["instagram", "linkedin", "x"]);
  assert.equal(result.timings.length, 3);
});

test("runWorkflow completes without any provider by falling back at every stage", async () => {
  const result = await runWorkflow(WORKFLOW_SOURCE, undefined, {
    generation: unconfiguredGeneration,
    search: offlineSearch(),
    embedding: failingEmbedding,
    sleep: noSleep,
    now: () => new Date("2026-10-19T08:00:00Z"),
    searchChain: ["duckduckgo", "wikipedia"],
    defaultTimeZone: "America/New_York"
  });

  assert.ok(result.keyPoints.length > 0);
  assert.deepEqual(Object.keys(result.drafts).sort(), ["instagram", "linkedin", "x"]);
  assert.deepEqual(Object.keys(result.reviews).sort(), ["instagram", "linkedin", "x"]);
  assert.equal(result.timings.length, 3);
  assert.deepEqual(result.qualityAnalysis, { error: "Missing API key for embeddings" });
  assert.equal(result.errors[0], "Key point extraction used sentence ranking fallback: No generation provider configured");
  assert.ok(result.errors.includes("Generation for x failed (No generation provider configured); heuristic draft used"));
  assert.ok(result.errors.includes("Quality analysis unavailable: Missing API key for embeddings"));
  assert.ok(result.errors.includes("Claim extraction kept pattern matches only: No generation provider configured"));
  assert.ok(result.errors.some((error) => error.startsWith("Fact check failed for claim")));

  const claims = Object.values(result.claims).flatMap((list) => list ?? []);
  assert.ok((result.claims.x ?? []).length > 0);
  assert.ok(claims.every((claim) => claim.confidence === 0 && claim.sources.length === 0));
  assert.ok(Object.values(result.drafts).every((draft) => (draft?.primaryText.length ?? 0) > 0));
});

const STATISTIC = "According to the Bureau of Labor Statistics, 42% of employees now work remotely at least one day a week";

test("runWorkflow carries a government-backed statistic through to a passing post", async () => {
  const deps = {
    ...scriptedDependencies(),
    generation: scriptedGeneration({
      keyPoints: JSON.stringify({
        key_points: [{ text: "42% of employees now work remotely at least one day a week", importance: 0.9 }]
      }),
      drafts: { x: JSON.stringify({ primary_text: `${STATISTIC}.` }) },
      claims: JSON.stringify({ claims: [STATISTIC] })
    }),
    search: new FakeSearch(() => [
      { title: "42% of employees work remotely", url: "https://www.bls.gov/remote-work", snippet: "Labour statistics" },
      { title: "Remote work study", url: "https://news.harvard.edu/remote", snippet: "Research summary" }
    ])
  };

  const result = await runWorkflow(
    `${STATISTIC}. Managers say written updates replaced most status meetings across distributed teams.`,
    undefined,
    deps
  );

  assert.ok(result.keyPoints.some((point) => point.text.includes("42%")));
  const statistic = result.claims.x?.find((claim) => claim.severity === "high");
  assert.ok(statistic);
  assert.ok(statistic.confidence >= 0.7);
  assert.equal(result.reviews.x?.status, "pass");
});

test("runWorkflow stops at the time budget and returns the partial state", async () => {
  const result = await runWorkflow(WORKFLOW_SOURCE, undefined, {
    generation: new FakeGeneration(() => new Promise<string>(() => {})),
    search: offlineSearch(),
    embedding: failingEmbedding,
    sleep: noSleep,
    runTimeoutMs: 50
  });

  assert.deepEqual(result.keyPoints, []);
  assert.deepEqual(result.drafts, {});
  assert.deepEqual(result.timings, []);
  assert.deepEqual(result.errors, [
    "Pipeline exceeded its 50ms time budget during key_points; remaining stages skipped"
  ]);
});

test("formatStageSummary lists each stage with its outcome", () => {
  assert.equal(
    formatStageSummary([
      { stage: "key_points", status: "completed", durationMs: 12 },
      { stage: "drafts", status: "failed", durationMs: 40 },
      { stage: "quality_analysis", status: "skipped", durationMs: 0 }
    ]),
    "key_points:completed(12ms) drafts:failed(40ms) quality_analysis:skipped"
  );
});
