import test from "node:test";
import assert from "node:assert/strict";
import { InputTooShortError } from "../services/errors.js";
import {
  assertSourceLength,
  cleanKeyPoints,
  extractKeyPoints,
  parseKeyPointResponse,
  rankSentencesForKeyPoints
} from "../services/keyPointService.js";
import { FakeGeneration, createTestContext } from "./fakes.js";

const SOURCE =
  "Remote teams shipped features faster this year. Remote teams reported 38% fewer meetings after adopting written updates. Lunch was served.";

test("assertSourceLength rejects text under the minimum after trimming", () => {
  assert.throws(
    () => assertSourceLength(`   ${"a".repeat(99)}   `, 100),
    (error: unknown) => error instanceof InputTooShortError && error.length === 99 && error.minLength === 100
  );
  assert.doesNotThrow(() => assertSourceLength("a".repeat(100), 100));
});

test("parseKeyPointResponse accepts alternate keys, dedupes and orders by importance", () => {
  const points = parseKeyPointResponse(
    JSON.stringify({
      points: [
        { text: "B point", importance: 0.4 },
        { text: "A point", importance: "0.9" },
        { text: "a point.", importance: 0.2 },
        { text: "C point" }
      ]
    })
  );

  assert.deepEqual(points, [
    { text: "A point", importance: 0.9 },
    { text: "C point", importance: 0.5 },
    { text: "B point", importance: 0.4 }
  ]);
});

test("parseKeyPointResponse rejects payloads without key points", () => {
  assert.throws(() => parseKeyPointResponse('{"summary": "nothing here"}'), /expected shape/);
});

test("cleanKeyPoints clamps importance and caps the list", () => {
  const points = cleanKeyPoints(
    [
      { text: "first", importance: 1.7 },
      { text: "second", importance: -0.2 },
      { text: "third", importance: 0.5 }
    ],
    2
  );

  assert.deepEqual(points, [
    { text: "first", importance: 1 },
    { text: "third", importance: 0.5 }
  ]);
});

test("rankSentencesForKeyPoints favours keyword-dense sentences with figures", () => {
  assert.deepEqual(rankSentencesForKeyPoints(SOURCE), [
    { text: "Remote teams reported 38% fewer meetings after adopting written updates.", importance: 1 },
    { text: "Remote teams shipped features faster this year.", importance: 0.808 }
  ]);
});

test("extractKeyPoints retries with the strict prompt after an unparsable answer", async () => {
  const generation = new FakeGeneration((_prompt, index) =>
    index === 0 ? "I could not do that" : '{"key_points": [{"text": "Written updates cut meetings", "importance": 0.8}]}'
  );
  const ctx = createTestContext({ generation });

  const points = await extractKeyPoints(SOURCE, "remote work", ctx);

  assert.deepEqual(points, [{ text: "Written updates cut meetings", importance: 0.8 }]);
  assert.equal(generation.calls.length, 2);
  assert.match(generation.calls[0]?.prompt ?? "", /^Read the document/);
  assert.match(generation.calls[1]?.prompt ?? "", /^Your previous answer could not be parsed/);
  assert.equal(generation.calls[0]?.temperature, 0.3);
  assert.deepEqual(ctx.errors, []);
});

test("extractKeyPoints falls back to sentence ranking without a generation provider", async () => {
  const ctx = createTestContext();

  const points = await extractKeyPoints(SOURCE, undefined, ctx);

  assert.equal(points.length, 2);
  assert.equal(points[0]?.importance, 1);
  assert.deepEqual(ctx.errors, [
    "Key point extraction used sentence ranking fallback: No generation provider configured"
  ]);
});
