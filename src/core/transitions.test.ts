import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { canTransition, isTerminal, resolveFailure, shouldRetry } from "./transitions.js";
import { Status } from "../types/contracts.js";

describe("canTransition", () => {
  const allStatuses: Status[] = ["pending", "processing", "completed", "failed", "cancelled"];

  const allowedTransitions: Record<Status, Status[]> = {
    pending: ["processing"],
    processing: ["pending", "completed", "failed", "cancelled"],
    completed: [],
    failed: [],
    cancelled: []
  };

  it("should allow valid transitions", () => {
    for (const from of allStatuses) {
      for (const to of allowedTransitions[from]) {
        assert.equal(canTransition(from, to), true, `Transition from ${from} to ${to} should be allowed`);
      }
    }
  });

  it("should disallow invalid transitions", () => {
    for (const from of allStatuses) {
      const allowed = allowedTransitions[from];
      for (const to of allStatuses) {
        if (!allowed.includes(to)) {
          assert.equal(canTransition(from, to), false, `Transition from ${from} to ${to} should be disallowed`);
        }
      }
    }
  });

  it("should disallow self-transitions", () => {
    for (const status of allStatuses) {
      assert.equal(canTransition(status, status), false, `Self-transition for ${status} should be disallowed`);
    }
  });

  it("treats completed, failed and cancelled as terminal", () => {
    assert.deepEqual(allStatuses.filter(isTerminal), ["completed", "failed", "cancelled"]);
  });
});

describe("shouldRetry", () => {
  it("retries while the counter is below the budget", () => {
    assert.equal(shouldRetry(0, 3), true);
    assert.equal(shouldRetry(2, 3), true);
  });

  it("stops once the budget is spent", () => {
    assert.equal(shouldRetry(3, 3), false);
    assert.equal(shouldRetry(0, 0), false);
  });
});

describe("resolveFailure", () => {
  it("sends a retryable failure back to pending with the counter bumped", () => {
    assert.deepEqual(resolveFailure(1, 3), { status: "pending", retryCount: 2 });
  });

  it("keeps an exhausted failure terminal without touching the counter", () => {
    assert.deepEqual(resolveFailure(2, 2), { status: "failed", retryCount: 2 });
  });
});
