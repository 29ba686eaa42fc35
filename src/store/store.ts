import { AuditLevel, AuditLogEntry, Status, StatusCounts, WorkRequest } from "../types/contracts.js";

export type RequestPatch = Partial<Pick<WorkRequest,
  | "status"
  | "retryCount"
  | "processorId"
  | "processedAt"
  | "errorMessage"
  | "githubBranchUrl"
  | "githubPrUrl"
  | "githubPrNumber"
>>;

export type TransitionGuard = {
  status: Status;
  processorId?: string;
};

export type RequestQuery = {
  status?: Status;
  branchName?: string;
  limit?: number;
  offset?: number;
};

export type AuditQuery = {
  requestId?: string | null;
  level?: AuditLevel;
  limit?: number;
};

export type PurgeResult = {
  deletedRequests: number;
  deletedLogs: number;
};

/**
 * Durable home of work requests and their audit trail.
 *
 * Every method is one atomic step against the backing store. Callers never
 * read a row and write it back: state changes go through `claimNext`,
 * `transition` and `resetStale`, which check the current status at write time.
 * Timestamps are ISO strings supplied by the caller.
 */
export interface Store {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Returns `false` without inserting when an active request already holds the branch. */
  insertRequest(request: WorkRequest): Promise<boolean>;
  getRequest(id: string): Promise<WorkRequest | null>;
  findLatestByBranch(branchName: string): Promise<WorkRequest | null>;
  listRequests(q: RequestQuery): Promise<WorkRequest[]>;

  /**
   * Moves the best pending request (priority desc, createdAt asc, id asc) to
   * processing in one conditional update.
   */
  claimNext(processorId: string, now: string): Promise<WorkRequest | null>;
  /** Compare-and-swap: applies the patch only while the row still matches the guard. */
  transition(id: string, guard: TransitionGuard, patch: RequestPatch): Promise<WorkRequest | null>;
  /** Returns processing rows claimed before the cutoff to pending without consuming a retry. */
  resetStale(cutoff: string, note: string): Promise<WorkRequest[]>;

  countOldPending(createdBefore: string): Promise<number>;
  countHighRetryActive(minRetryCount: number, createdSince: string): Promise<number>;
  countAudit(level: AuditLevel, since: string): Promise<number>;
  summarize(createdSince: string): Promise<StatusCounts>;

  appendAudit(entry: AuditLogEntry): Promise<void>;
  listAudit(q: AuditQuery): Promise<AuditLogEntry[]>;

  /**
   * Deletes terminal requests created before the cutoff together with their
   * audit entries (entries first), plus queue-wide entries older than the cutoff.
   */
  purgeTerminal(cutoff: string): Promise<PurgeResult>;
}

export function emptyCounts(): StatusCounts {
  return { pending: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
}

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;
export const DEFAULT_AUDIT_LIMIT = 200;
export const MAX_AUDIT_LIMIT = 1000;
