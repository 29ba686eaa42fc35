import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { runHealthCheck } from "./health.js";
import { Store } from "../store/store.js";
import { makeAudit } from "../audit/audit.js";
import { makeClock, makeRequest, silentLogger, storeFactories } from "../testing/helpers.js";

for (const factory of storeFactories) {
  describe(`runHealthCheck (${factory.name})`, () => {
    let store: Store;
    const time = makeClock("2024-05-01T12:00:00.000Z");

    beforeEach(async () => {
      store = await factory.create();
    });

    afterEach(async () => {
      await store.close();
    });

    it("reports a healthy queue at info level", async () => {
      await store.insertRequest(makeRequest({ id: "new", createdAt: "2024-05-01T11:45:00.000Z" }));

      const out = await runHealthCheck({ store, logger: silentLogger, clock: time.clock });
      assert.deepStrictEqual(out, {
        ok: true,
        level: "info",
        message: "queue healthy",
        oldPending: 0,
        highRetry: 0,
        recentErrors: 0
      });

      const logged = await store.listAudit({ requestId: null });
      assert.strictEqual(logged.length, 1);
      assert.strictEqual(logged[0]?.level, "info");
      assert.strictEqual(logged[0]?.message, "queue healthy");
      assert.strictEqual(logged[0]?.processorId, "maintenance.health");
      assert.deepStrictEqual(logged[0]?.details, { oldPending: 0, highRetry: 0, recentErrors: 0 });
    });

    it("flags requests pending for over an hour as an error", async () => {
      await store.insertRequest(makeRequest({ id: "old", createdAt: "2024-05-01T10:30:00.000Z" }));

      const out = await runHealthCheck({ store, logger: silentLogger, clock: time.clock });
      assert.ok(out.ok);
      if (!out.ok) return;
      assert.strictEqual(out.level, "error");
      assert.strictEqual(out.message, "queue health issues detected");
      assert.strictEqual(out.oldPending, 1);
    });

    it("warns about active requests that keep retrying", async () => {
      await store.insertRequest(makeRequest({
        id: "flaky",
        status: "processing",
        processorId: "worker-1",
        processedAt: "2024-05-01T11:55:00.000Z",
        retryCount: 2,
        createdAt: "2024-05-01T09:00:00.000Z"
      }));

      const out = await runHealthCheck({ store, logger: silentLogger, clock: time.clock });
      assert.ok(out.ok);
      if (!out.ok) return;
      assert.strictEqual(out.level, "warn");
      assert.strictEqual(out.message, "queue performance degraded");
      assert.strictEqual(out.highRetry, 1);
      assert.strictEqual(out.oldPending, 0);
    });

    it("counts error entries from the last hour only", async () => {
      for (const at of ["2024-05-01T10:30:00.000Z", "2024-05-01T11:30:00.000Z", "2024-05-01T11:40:00.000Z"]) {
        await store.appendAudit(makeAudit({ requestId: null, level: "error", message: "boom", at: new Date(at) }));
      }

      const out = await runHealthCheck({ store, logger: silentLogger, clock: time.clock });
      assert.ok(out.ok);
      if (!out.ok) return;
      assert.strictEqual(out.recentErrors, 2);
      assert.strictEqual(out.level, "warn");
    });

    it("escalates to error past five recent errors", async () => {
      for (let i = 0; i < 6; i++) {
        await store.appendAudit(makeAudit({
          requestId: null,
          level: "error",
          message: `failure ${i}`,
          at: new Date(`2024-05-01T11:3${i}:00.000Z`)
        }));
      }

      const out = await runHealthCheck({ store, logger: silentLogger, clock: time.clock });
      assert.ok(out.ok);
      if (out.ok) assert.strictEqual(out.level, "error");
    });
  });
}
