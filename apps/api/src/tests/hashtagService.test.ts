import test from "node:test";
import assert from "node:assert/strict";
import {
  detectTopicDomains,
  hashtagSpecificity,
  isGenericHashtag,
  normalizeHashtag,
  optimizeHashtags
} from "../services/hashtagService.js";

test("normalizeHashtag strips symbols and rejects short or numeric tags", () => {
  assert.equal(normalizeHashtag("##Data-Driven"), "#DataDriven");
  assert.equal(normalizeHashtag("FutureOfWork"), "#FutureOfWork");
  assert.equal(normalizeHashtag("#42"), null);
  assert.equal(normalizeHashtag("#ab"), null);
});

test("isGenericHashtag matches case-insensitively", () => {
  assert.equal(isGenericHashtag("#AI"), true);
  assert.equal(isGenericHashtag("#GenerativeAI"), false);
});

test("hashtagSpecificity rewards length, compound capitals and digits", () => {
  assert.equal(hashtagSpecificity("#tips"), 0.267);
  assert.equal(hashtagSpecificity("#ContentStrategy"), 1.5);
  assert.equal(hashtagSpecificity("#B2BMarketing"), 1.5);
});

test("optimizeHashtags drops generic tags and ranks by specificity", () => {
  const tags = optimizeHashtags(["#ai", "#ContentStrategy", "#tips", "#B2BMarketing"], {
    platform: "x",
    text: "Hello there"
  });

  assert.deepEqual(tags, ["#ContentStrategy", "#B2BMarketing", "#tips"]);
});

test("optimizeHashtags adds domain tags and dedupes case-insensitively", () => {
  const tags = optimizeHashtags(["#travel", "#TRAVEL"], {
    platform: "linkedin",
    text: "Summer travel demand is rising"
  });

  assert.deepEqual(tags, ["#SustainableTravel", "#TravelTrends", "#travel"]);
});

test("optimizeHashtags applies the platform cap", () => {
  const tags = optimizeHashtags(["#RemoteWork", "#FutureOfWork", "#HybridTeams", "#AsyncFirst", "#DeepWork"], {
    platform: "x",
    text: "Hello there"
  });

  assert.equal(tags.length, 3);
});

test("detectTopicDomains reads keywords from the topic and text", () => {
  assert.deepEqual(detectTopicDomains("A clinical trial at the hospital"), ["healthcare"]);
});
