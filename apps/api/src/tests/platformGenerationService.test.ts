import test from "node:test";
import assert from "node:assert/strict";
import type { KeyPoint } from "@postflow/shared";
import {
  buildHeuristicDraft,
  buildPost,
  countCallsToAction,
  filterMentions,
  generatePlatformDraft,
  validatePost
} from "../services/platformGenerationService.js";
import { FakeGeneration, createTestContext } from "./fakes.js";

const KEY_POINTS: KeyPoint[] = [
  { text: "Teams that write weekly updates spend fewer hours in status meetings.", importance: 0.9 },
  { text: "Async check-ins give people in other time zones a fair say.", importance: 0.7 },
  { text: "Short written summaries make decisions easier to find later.", importance: 0.6 },
  { text: "Managers reported calmer calendars within a month.", importance: 0.5 }
];

const LINKEDIN_TEXT = Array.from(
  { length: 12 },
  (_, index) => `Point ${index + 1}: written updates kept the team aligned without extra meetings.`
).join(" ");

test("filterMentions keeps verified handles and unlinks the rest", () => {
  const result = filterMentions("Thanks @Deloitte and @randomguy for the data", ["@someone"]);

  assert.equal(result.text, "Thanks @Deloitte and randomguy for the data");
  assert.deepEqual(result.mentions, ["@deloitte"]);
  assert.deepEqual(result.dropped, ["@someone", "@randomguy"]);
});

test("countCallsToAction counts every call to action", () => {
  assert.equal(countCallsToAction("Save this post. Link in bio!"), 2);
  assert.equal(countCallsToAction("Nothing to do here."), 0);
});

test("validatePost reports length and call-to-action problems", () => {
  const post = buildPost("instagram", { primary_text: "Short caption" }, { source: "generated", attempts: 1 });

  assert.deepEqual(validatePost(post), [
    "primary text is 13 characters, must be between 125 and 2200",
    "found 0 calls to action, exactly one is required"
  ]);
});

test("buildPost drops threads that are too short or not allowed", () => {
  const x = buildPost("x", { primary_text: "Hook", thread: ["one", "two"] }, { source: "generated", attempts: 1 });
  const linkedin = buildPost(
    "linkedin",
    { primary_text: LINKEDIN_TEXT, thread: ["one", "two", "three"] },
    { source: "generated", attempts: 1 }
  );

  assert.equal(x.thread, undefined);
  assert.equal(linkedin.thread, undefined);
});

test("buildHeuristicDraft turns key points into an X thread", () => {
  const post = buildHeuristicDraft("x", KEY_POINTS);

  assert.equal(post.primaryText, KEY_POINTS[0]?.text);
  assert.deepEqual(
    post.thread,
    KEY_POINTS.slice(1).map((point) => point.text)
  );
  assert.equal(post.metadata.source, "heuristic");
  assert.deepEqual(validatePost(post), []);
});

test("generatePlatformDraft feeds violations back into the next attempt", async () => {
  const generation = new FakeGeneration((_prompt, index) =>
    JSON.stringify({ primary_text: index === 0 ? "Too short for LinkedIn." : LINKEDIN_TEXT, hashtags: [] })
  );
  const ctx = createTestContext({ generation });

  const post = await generatePlatformDraft("linkedin", KEY_POINTS, undefined, ctx);

  assert.equal(post.primaryText, LINKEDIN_TEXT);
  assert.equal(post.metadata.attempts, 2);
  assert.equal(post.metadata.validation, "passed");
  assert.equal(generation.calls[0]?.temperature, 0.7);
  assert.match(
    generation.calls[1]?.prompt ?? "",
    /Your previous draft was rejected: primary text is 23 characters, must be between 500 and 1200\./
  );
  assert.deepEqual(ctx.errors, []);
});

test("generatePlatformDraft keeps the best draft after three failed validations", async () => {
  const generation = new FakeGeneration(() => JSON.stringify({ primary_text: "x".repeat(400) }));
  const ctx = createTestContext({ generation });

  const post = await generatePlatformDraft("x", KEY_POINTS, undefined, ctx);

  assert.equal(generation.calls.length, 3);
  assert.equal(post.metadata.validation, "failed");
  assert.deepEqual(ctx.errors, [
    "Draft for x failed validation after 3 attempts (primary text is 400 characters, must be between 1 and 280); best draft kept"
  ]);
});

test("generatePlatformDraft falls back to a heuristic draft without a provider", async () => {
  const ctx = createTestContext();

  const post = await generatePlatformDraft("instagram", KEY_POINTS, undefined, ctx);

  assert.equal(post.metadata.source, "heuristic");
  assert.equal(post.metadata.validation, "passed");
  assert.ok(post.primaryText.endsWith("\n\nSave this post for later."));
  assert.deepEqual(ctx.errors, [
    "Generation for instagram failed (No generation provider configured); heuristic draft used"
  ]);
});
