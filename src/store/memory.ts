import {
  AuditLevel,
  AuditLogEntry,
  StatusCounts,
  TERMINAL_STATUSES,
  WorkRequest
} from "../types/contracts.js";
import {
  AuditQuery,
  DEFAULT_AUDIT_LIMIT,
  DEFAULT_LIST_LIMIT,
  emptyCounts,
  MAX_AUDIT_LIMIT,
  MAX_LIST_LIMIT,
  PurgeResult,
  RequestPatch,
  RequestQuery,
  Store,
  TransitionGuard
} from "./store.js";

function isActive(r: WorkRequest) {
  return r.status === "pending" || r.status === "processing";
}

function claimOrder(a: WorkRequest, b: WorkRequest) {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function newestFirst(a: WorkRequest, b: WorkRequest) {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * In-process store. Each method runs to completion without awaiting, so
 * concurrent callers on the event loop observe every step as atomic.
 */
export class MemoryStore implements Store {
  private requests = new Map<string, WorkRequest>();
  private audit: AuditLogEntry[] = [];

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async insertRequest(request: WorkRequest): Promise<boolean> {
    for (const r of this.requests.values()) {
      if (r.branchName === request.branchName && isActive(r)) return false;
    }
    this.requests.set(request.id, { ...request });
    return true;
  }

  async getRequest(id: string): Promise<WorkRequest | null> {
    const r = this.requests.get(id);
    return r ? { ...r } : null;
  }

  async findLatestByBranch(branchName: string): Promise<WorkRequest | null> {
    const matches = [...this.requests.values()].filter((r) => r.branchName === branchName).sort(newestFirst);
    return matches[0] ? { ...matches[0] } : null;
  }

  async listRequests(q: RequestQuery): Promise<WorkRequest[]> {
    const limit = Math.min(q.limit ?? DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    const offset = q.offset ?? 0;

    return [...this.requests.values()]
      .filter((r) => {
        if (q.status && r.status !== q.status) return false;
        if (q.branchName && r.branchName !== q.branchName) return false;
        return true;
      })
      .sort(newestFirst)
      .slice(offset, offset + limit)
      .map((r) => ({ ...r }));
  }

  async claimNext(processorId: string, now: string): Promise<WorkRequest | null> {
    const next = [...this.requests.values()]
      .filter((r) => r.status === "pending" && r.retryCount <= r.maxRetries)
      .sort(claimOrder)[0];
    if (!next) return null;

    const claimed: WorkRequest = { ...next, status: "processing", processorId, processedAt: now };
    this.requests.set(claimed.id, claimed);
    return { ...claimed };
  }

  async transition(id: string, guard: TransitionGuard, patch: RequestPatch): Promise<WorkRequest | null> {
    const cur = this.requests.get(id);
    if (!cur || cur.status !== guard.status) return null;
    if (guard.processorId !== undefined && cur.processorId !== guard.processorId) return null;

    const updated: WorkRequest = { ...cur, ...patch };
    this.requests.set(id, updated);
    return { ...updated };
  }

  async resetStale(cutoff: string, note: string): Promise<WorkRequest[]> {
    const reset: WorkRequest[] = [];
    for (const r of this.requests.values()) {
      if (r.status !== "processing" || r.processedAt === null || r.processedAt >= cutoff) continue;
      const updated: WorkRequest = { ...r, status: "pending", processorId: null, errorMessage: note };
      this.requests.set(r.id, updated);
      reset.push({ ...updated });
    }
    return reset;
  }

  async countOldPending(createdBefore: string): Promise<number> {
    return [...this.requests.values()].filter((r) => r.status === "pending" && r.createdAt < createdBefore).length;
  }

  async countHighRetryActive(minRetryCount: number, createdSince: string): Promise<number> {
    return [...this.requests.values()]
      .filter((r) => isActive(r) && r.retryCount >= minRetryCount && r.createdAt >= createdSince)
      .length;
  }

  async countAudit(level: AuditLevel, since: string): Promise<number> {
    return this.audit.filter((e) => e.level === level && e.timestamp >= since).length;
  }

  async summarize(createdSince: string): Promise<StatusCounts> {
    const counts = emptyCounts();
    for (const r of this.requests.values()) {
      if (r.createdAt >= createdSince) counts[r.status] += 1;
    }
    return counts;
  }

  async appendAudit(entry: AuditLogEntry): Promise<void> {
    if (entry.requestId !== null && !this.requests.has(entry.requestId)) {
      throw new Error(`audit entry references unknown request ${entry.requestId}`);
    }
    this.audit.push({ ...entry, details: { ...entry.details } });
  }

  async listAudit(q: AuditQuery): Promise<AuditLogEntry[]> {
    const limit = Math.min(q.limit ?? DEFAULT_AUDIT_LIMIT, MAX_AUDIT_LIMIT);
    const matches = this.audit.filter((e) => {
      if (q.requestId !== undefined && e.requestId !== q.requestId) return false;
      if (q.level && e.level !== q.level) return false;
      return true;
    });
    return matches.slice(Math.max(0, matches.length - limit)).map((e) => ({ ...e }));
  }

  async purgeTerminal(cutoff: string): Promise<PurgeResult> {
    const doomed = new Set<string>();
    for (const r of this.requests.values()) {
      if (TERMINAL_STATUSES.includes(r.status) && r.createdAt < cutoff) doomed.add(r.id);
    }

    const before = this.audit.length;
    this.audit = this.audit.filter((e) => e.requestId === null || !doomed.has(e.requestId));
    for (const id of doomed) this.requests.delete(id);

    return { deletedRequests: doomed.size, deletedLogs: before - this.audit.length };
  }
}
