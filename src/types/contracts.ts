export type RequestType = "create_pr";
export type Status = "pending" | "processing" | "completed" | "failed" | "cancelled";
export type AuditLevel = "info" | "warn" | "error";

export const ACTIVE_STATUSES: readonly Status[] = ["pending", "processing"];
export const TERMINAL_STATUSES: readonly Status[] = ["completed", "failed", "cancelled"];

export interface WorkRequest {
  id: string;
  createdAt: string; // ISO
  createdBy: string;
  requestType: RequestType;
  status: Status;
  branchName: string;
  prTitle: string;
  prDescription: string;
  targetBranch: string;
  fileName: string;
  payload: string;
  stagePath: string;
  priority: number; // 1..10
  retryCount: number;
  maxRetries: number;
  processorId: string | null;
  processedAt: string | null; // ISO
  errorMessage: string | null;
  githubBranchUrl: string | null;
  githubPrUrl: string | null;
  githubPrNumber: number | null;
}

export interface AuditLogEntry {
  id: string;
  requestId: string | null; // null = queue-wide event
  level: AuditLevel;
  message: string;
  details: Record<string, unknown>;
  processorId: string;
  timestamp: string; // ISO
}

export interface SubmitInput {
  branchName: string;
  prTitle: string;
  prDescription?: string;
  targetBranch?: string;
  fileName: string;
  payload: string;
  createdBy: string;
  priority?: number;
  maxRetries?: number;
}

export type OutcomeStatus = "completed" | "failed" | "cancelled";

export interface StatusUpdate {
  branchUrl?: string;
  prUrl?: string;
  prNumber?: number;
  errorMessage?: string;
  processorId?: string;
}

export type QueueErrorCode =
  | "invalid_parameter"
  | "duplicate_active_request"
  | "unknown_request"
  | "invalid_transition"
  | "not_found";

export type QueueFailure<E extends QueueErrorCode = QueueErrorCode> = {
  ok: false;
  error: E;
  message: string;
};

export type HealthCounters = {
  oldPending: number;
  highRetry: number;
  recentErrors: number;
};

export type StatusCounts = Record<Status, number>;
