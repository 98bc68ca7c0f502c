import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { AddressInfo } from "node:net";
import { setTimeout as delay } from "node:timers/promises";
import { createApp } from "../app.js";
import { asRecord } from "../services/normalizers.js";
import { InMemoryStore } from "../storage/inMemoryStore.js";
import { WORKFLOW_SOURCE, scriptedDependencies } from "./fakes.js";

async function withServer(run: (baseUrl: string) => Promise<void>): Promise<void> {
  const app = createApp({ store: new InMemoryStore(), workflow: scriptedDependencies() });
  const server = app.listen(0);
  await once(server, "listening");
  const address: string | AddressInfo | null = server.address();
  const port = address && typeof address === "object" ? address.port : 0;

  try {
    await run(`http://127.0.0.1:${port}`);
  } finally {
    server.close();
  }
}

async function readJson(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  const record = asRecord(body);
  assert.ok(record, "expected a JSON object");
  return record;
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("GET /health reports the active features", async () => {
  await withServer(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await readJson(response);

    assert.equal(response.status, 200);
    assert.equal(body.ok, true);
    assert.equal(body.service, "postflow-api");
    assert.deepEqual(asRecord(body.features)?.searchProviders, ["wikipedia"]);
    assert.equal(asRecord(body.features)?.complianceMode, "standard");
  });
});

test("POST /v1/plan validates the payload and the source length", async () => {
  await withServer(async (baseUrl) => {
    const invalid = await postJson(`${baseUrl}/v1/plan`, { topic_hint: "remote work" });
    assert.equal(invalid.status, 400);
    assert.equal((await readJson(invalid)).error, "Invalid payload");

    const short = await postJson(`${baseUrl}/v1/plan`, { text: "Too short to plan." });
    const body = await readJson(short);
    assert.equal(short.status, 400);
    assert.equal(body.error, "Source text is too short: 18 characters, at least 100 required");
    assert.equal(body.minLength, 100);
  });
});

test("POST /v1/plan returns the full workflow result", async () => {
  await withServer(async (baseUrl) => {
    const response = await postJson(`${baseUrl}/v1/plan`, { text: WORKFLOW_SOURCE, topic_hint: "remote work" });
    const body = await readJson(response);

    assert.equal(response.status, 200);
    assert.deepEqual(body.errors, []);
    assert.equal(body.topicHint, "remote work");
    assert.deepEqual(Object.keys(asRecord(body.drafts) ?? {}).sort(), ["instagram", "linkedin", "x"]);
    assert.ok(Array.isArray(body.timings) && body.timings.length === 3);
  });
});

test("POST /v1/export returns a plain-text report", async () => {
  await withServer(async (baseUrl) => {
    const response = await postJson(`${baseUrl}/v1/export`, { text: WORKFLOW_SOURCE });
    const report = await response.text();

    assert.equal(response.status, 200);
    assert.match(response.headers.get("content-type") ?? "", /^text\/plain/);
    assert.ok(report.startsWith("SOCIAL MEDIA CONTENT PLAN\nGenerated: 2026-10-19T08:00:00.000Z\n"));
    assert.ok(report.endsWith("ERRORS\n" + "-".repeat(40) + "\n(none)\n"));
  });
});

test("POST /v1/runs queues a run that can be polled and reported", async () => {
  await withServer(async (baseUrl) => {
    const created = await postJson(`${baseUrl}/v1/runs`, { text: WORKFLOW_SOURCE });
    const createdBody = await readJson(created);
    assert.equal(created.status, 202);
    assert.equal(createdBody.status, "queued");
    const runId = String(createdBody.runId);

    let status = "queued";
    for (let attempt = 0; attempt < 200 && (status === "queued" || status === "running"); attempt += 1) {
      await delay(10);
      status = String((await readJson(await fetch(`${baseUrl}/v1/runs/${runId}`))).status);
    }
    assert.equal(status, "succeeded");

    const report = await fetch(`${baseUrl}/v1/runs/${runId}/report`);
    assert.equal(report.status, 200);
    assert.ok((await report.text()).startsWith("SOCIAL MEDIA CONTENT PLAN\n"));

    const list = await readJson(await fetch(`${baseUrl}/v1/runs`));
    assert.ok(Array.isArray(list.runs));
    const [summary] = list.runs;
    const entry = asRecord(summary);
    assert.equal(entry?.id, runId);
    assert.equal(entry?.status, "succeeded");
    assert.equal(entry?.result, undefined);
  });
});

test("run lookups answer 404 for unknown ids and reject short sources", async () => {
  await withServer(async (baseUrl) => {
    assert.equal((await fetch(`${baseUrl}/v1/runs/missing`)).status, 404);
    assert.equal((await fetch(`${baseUrl}/v1/runs/missing/report`)).status, 404);
    assert.equal((await postJson(`${baseUrl}/v1/runs`, { text: "Too short to plan." })).status, 400);
  });
});
