import test from "node:test";
import assert from "node:assert/strict";
import type { PlatformPost } from "@postflow/shared";
import {
  classifyContentType,
  detectAudienceRegion,
  suggestPostingTimes,
  type ScheduleInput
} from "../services/scheduleService.js";

function draft(platform: PlatformPost["platform"]): PlatformPost {
  return { platform, primaryText: "Post body", hashtags: [], mentions: [], metadata: {} };
}

const ALL_DRAFTS = { x: draft("x"), linkedin: draft("linkedin"), instagram: draft("instagram") };
const NEUTRAL_TEXT = "Our team tried something new with weekly notes and liked it.";

function input(overrides: Partial<ScheduleInput>): ScheduleInput {
  return {
    drafts: ALL_DRAFTS,
    claims: {},
    reviews: {},
    sourceText: NEUTRAL_TEXT,
    now: new Date("2026-10-19T08:00:00Z"),
    staggerWindowMinutes: 30,
    defaultTimeZone: "America/New_York",
    ...overrides
  };
}

test("classifyContentType lets breaking cues win and otherwise counts cues", () => {
  assert.equal(classifyContentType("Breaking: new data from the survey"), "breaking_news");
  assert.equal(classifyContentType("A survey and research report with data"), "analytical");
  assert.equal(classifyContentType("Leadership lessons for hiring managers"), "professional");
  assert.equal(classifyContentType("Our favourite travel food photos"), "visual_lifestyle");
  assert.equal(classifyContentType(NEUTRAL_TEXT), "generic");
});

test("detectAudienceRegion checks regions in order", () => {
  assert.equal(detectAudienceRegion("Fans in Copenhagen and across Europe"), "nordics");
  assert.equal(detectAudienceRegion("Startups in Bengaluru"), "india");
  assert.equal(detectAudienceRegion(NEUTRAL_TEXT), null);
});

test("suggestPostingTimes picks the next preferred slot per platform", () => {
  const timings = suggestPostingTimes(input({}));

  assert.deepEqual(
    timings.map((timing) => [timing.platform, timing.localDatetime]),
    [
      ["x", "2026-10-19T12:00:00-04:00"],
      ["instagram", "2026-10-19T18:00:00-04:00"],
      ["linkedin", "2026-10-20T09:00:00-04:00"]
    ]
  );
  assert.equal(
    timings[0]?.rationale,
    "General content: Lunch break browsing peak (Monday 12:00), America/New_York."
  );
});

test("suggestPostingTimes rolls over to the next day once today's slot has passed", () => {
  const timings = suggestPostingTimes(input({ now: new Date("2026-10-19T20:00:00Z") }));

  assert.deepEqual(
    timings.map((timing) => [timing.platform, timing.localDatetime]),
    [
      ["instagram", "2026-10-19T18:00:00-04:00"],
      ["linkedin", "2026-10-20T09:00:00-04:00"],
      ["x", "2026-10-20T12:00:00-04:00"]
    ]
  );
});

test("suggestPostingTimes publishes breaking news now and staggers platforms", () => {
  const timings = suggestPostingTimes(
    input({ sourceText: "Breaking: the city council just announced a new transit plan for London." })
  );

  assert.deepEqual(
    timings.map((timing) => [timing.platform, timing.localDatetime]),
    [
      ["x", "2026-10-19T09:05:00+01:00"],
      ["linkedin", "2026-10-19T09:35:00+01:00"],
      ["instagram", "2026-10-19T10:05:00+01:00"]
    ]
  );
  assert.equal(
    timings[1]?.rationale,
    "Breaking news content: publish immediately while the story is fresh, Europe/London. Shifted to keep 30 minutes between platforms."
  );
});

test("suggestPostingTimes notes reviews and weak claims in the rationale", () => {
  const timings = suggestPostingTimes(
    input({
      sourceText: "A new survey and research report shows data on remote teams in the United States.",
      now: new Date("2026-10-20T08:00:00Z"),
      reviews: { x: { status: "flag", issues: [], claims: [] } },
      claims: { linkedin: [{ text: "Remote teams grew 45%", severity: "medium", confidence: 0.1, sources: [] }] }
    })
  );

  assert.deepEqual(
    timings.map((timing) => [timing.platform, timing.localDatetime]),
    [
      ["x", "2026-10-20T12:00:00-04:00"],
      ["linkedin", "2026-10-20T12:30:00-04:00"],
      ["instagram", "2026-10-20T19:00:00-04:00"]
    ]
  );
  assert.equal(
    timings[0]?.rationale,
    "Analytical content: Lunch break browsing peak (Tuesday 12:00), America/New_York. Flagged by compliance review; publish after manual approval."
  );
  assert.equal(
    timings[1]?.rationale,
    "Analytical content: Lunch break browsing peak (Tuesday 12:00), America/New_York. Shifted to keep 30 minutes between platforms. Contains claims below 0.3 confidence; verify before posting."
  );
});

test("suggestPostingTimes only schedules platforms that have a draft", () => {
  const timings = suggestPostingTimes(input({ drafts: { linkedin: draft("linkedin") } }));

  assert.deepEqual(
    timings.map((timing) => timing.platform),
    ["linkedin"]
  );
});

test("suggestPostingTimes returns the same plan for the same input", () => {
  const scheduleInput = input({ sourceText: "A survey and research report with data from teams in Berlin" });

  assert.deepEqual(suggestPostingTimes(scheduleInput), suggestPostingTimes(scheduleInput));
});
