import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import http from "node:http";
import { z } from "zod";
import { makeApp } from "./app.js";
import { createQueue } from "../plugin/createQueue.js";
import { MemoryStore } from "../store/memory.js";
import { makeSubmit, silentLogger } from "../testing/helpers.js";

const API_KEY = "test-key";

const Json = z.record(z.unknown());
const RequestBody = z.object({
  ok: z.literal(true),
  request: z.object({ id: z.string(), status: z.string(), processorId: z.string().nullable() })
});

describe("queue api", () => {
  const store = new MemoryStore();
  const queue = createQueue({ store, logger: silentLogger });
  const app = makeApp({
    queue,
    sweeps: { store, logger: silentLogger },
    config: { apiKey: API_KEY, maxProcessingMinutes: 30, retentionDays: 30, rateLimitWindowMs: 60_000, rateLimitMax: 1000 },
    logger: silentLogger
  });

  let server: http.Server;
  let baseUrl = "";

  before(async () => {
    server = await new Promise<http.Server>((resolve) => {
      const s = app.listen(0, () => resolve(s));
    });
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function call(method: string, path: string, body?: unknown, headers: Record<string, string> = { "x-queue-key": API_KEY }) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json", ...headers },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
  }

  it("serves the liveness probe without a key", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), { ok: true });
  });

  it("requires the queue key on every other route", async () => {
    const missing = await call("GET", "/api/requests", undefined, {});
    assert.strictEqual(missing.status, 401);
    assert.deepStrictEqual(await missing.json(), { ok: false, error: "missing_queue_key" });

    const wrong = await call("GET", "/api/requests", undefined, { "x-queue-key": "nope" });
    assert.strictEqual(wrong.status, 401);
    assert.deepStrictEqual(await wrong.json(), { ok: false, error: "invalid_queue_key" });

    const bearer = await call("GET", "/api/requests", undefined, { authorization: `Bearer ${API_KEY}` });
    assert.strictEqual(bearer.status, 200);
  });

  it("walks a request from submission to completion", async () => {
    const created = await call("POST", "/api/requests", makeSubmit({ branchName: "config/http" }));
    assert.strictEqual(created.status, 201);
    const { requestId } = z.object({ requestId: z.string() }).parse(await created.json());

    const dup = await call("POST", "/api/requests", makeSubmit({ branchName: "config/http" }));
    assert.strictEqual(dup.status, 409);
    assert.strictEqual(Json.parse(await dup.json()).error, "duplicate_active_request");

    const claimed = await call("POST", "/api/requests/claim", { processorId: "worker-http" });
    assert.strictEqual(claimed.status, 200);
    const claim = RequestBody.parse(await claimed.json());
    assert.strictEqual(claim.request.id, requestId);
    assert.strictEqual(claim.request.processorId, "worker-http");

    const empty = await call("POST", "/api/requests/claim", { processorId: "worker-http" });
    assert.strictEqual(empty.status, 204);

    const done = await call("POST", `/api/requests/${requestId}/status`, {
      status: "completed",
      prUrl: "https://git.example/pull/3",
      prNumber: 3,
      processorId: "worker-http"
    });
    assert.strictEqual(done.status, 200);
    assert.strictEqual(RequestBody.parse(await done.json()).request.status, "completed");

    const again = await call("POST", `/api/requests/${requestId}/status`, { status: "completed" });
    assert.strictEqual(again.status, 409);
    assert.strictEqual(Json.parse(await again.json()).error, "invalid_transition");

    const byId = await call("GET", `/api/requests/${requestId}`);
    assert.strictEqual(RequestBody.parse(await byId.json()).request.status, "completed");

    const byBranch = await call("GET", "/api/requests?branch=config%2Fhttp");
    assert.strictEqual(RequestBody.parse(await byBranch.json()).request.id, requestId);

    const events = await call("GET", `/api/requests/${requestId}/events`);
    const trail = z.object({ events: z.array(z.object({ message: z.string() })) }).parse(await events.json());
    assert.deepStrictEqual(trail.events.map((e) => e.message), [
      "request submitted",
      "duplicate submission rejected for branch config/http",
      "request picked up for processing",
      "status changed from processing to completed",
      "rejected completed update: request is completed"
    ]);
  });

  it("maps domain failures to http statuses", async () => {
    const invalid = await call("POST", "/api/requests", makeSubmit({ branchName: "config/bad", priority: 42 }));
    assert.strictEqual(invalid.status, 400);
    assert.strictEqual(Json.parse(await invalid.json()).error, "invalid_parameter");

    const unknown = await call("POST", "/api/requests/missing/status", { status: "failed" });
    assert.strictEqual(unknown.status, 404);
    assert.strictEqual(Json.parse(await unknown.json()).error, "unknown_request");

    const badStatus = await call("POST", "/api/requests/missing/status", { status: "processing" });
    assert.strictEqual(badStatus.status, 400);

    const notFound = await call("GET", "/api/requests/missing");
    assert.strictEqual(notFound.status, 404);
    assert.strictEqual(Json.parse(await notFound.json()).error, "not_found");

    const badQuery = await call("GET", "/api/requests?limit=lots");
    assert.strictEqual(badQuery.status, 400);
  });

  it("lists requests and the weekly summary", async () => {
    await call("POST", "/api/requests", makeSubmit({ branchName: "config/listed" }));

    const listed = await call("GET", "/api/requests?status=pending");
    const items = z.object({ items: z.array(z.object({ branchName: z.string() })) }).parse(await listed.json()).items;
    assert.deepStrictEqual(items.map((i) => i.branchName), ["config/listed"]);

    const summary = await call("GET", "/api/requests/summary");
    const counts = z.object({ counts: z.record(z.number()) }).parse(await summary.json()).counts;
    assert.strictEqual(counts.pending, 1);
    assert.strictEqual(counts.completed, 1);
  });

  it("runs maintenance sweeps on demand", async () => {
    const reclaim = await call("POST", "/api/maintenance/reclaim");
    assert.strictEqual(reclaim.status, 200);
    assert.strictEqual(Json.parse(await reclaim.json()).reset, 0);

    const health = await call("POST", "/api/maintenance/health");
    assert.strictEqual(health.status, 200);
    assert.strictEqual(Json.parse(await health.json()).ok, true);

    const retention = await call("POST", "/api/maintenance/retention", { daysToKeep: 30 });
    assert.strictEqual(retention.status, 200);
    assert.deepStrictEqual(await retention.json(), { ok: true, deletedRequests: 0, deletedLogs: 0, daysKept: 30 });

    const badRetention = await call("POST", "/api/maintenance/retention", { daysToKeep: -1 });
    assert.strictEqual(badRetention.status, 400);
  });
});
