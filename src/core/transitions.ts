import { Status } from "../types/contracts.js";

const allowed: Record<Status, Status[]> = {
  pending: ["processing"],
  processing: ["pending", "completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: []
};

export function canTransition(from: Status, to: Status): boolean {
  return allowed[from].includes(to);
}

export function isTerminal(status: Status): boolean {
  return allowed[status].length === 0;
}

export function shouldRetry(retryCount: number, maxRetries: number): boolean {
  return retryCount < maxRetries;
}

/**
 * Where a failed attempt lands: back in the pending pool with one more retry
 * on the counter, or terminally failed once the budget is spent.
 */
export function resolveFailure(retryCount: number, maxRetries: number): { status: Status; retryCount: number } {
  if (shouldRetry(retryCount, maxRetries)) {
    return { status: "pending", retryCount: retryCount + 1 };
  }
  return { status: "failed", retryCount };
}
