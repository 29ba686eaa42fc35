import { z } from "zod";
import pino, { type Logger } from "pino";
import { Store, RequestQuery } from "../store/store.js";
import { buildWorkRequest, SubmitSchema } from "../core/request.js";
import { canTransition, resolveFailure } from "../core/transitions.js";
import { makeAudit } from "../audit/audit.js";
import { clampStr, DAY_MS, errorMessage, isoBefore } from "../lib/_util.js";
import {
  AuditLevel,
  AuditLogEntry,
  OutcomeStatus,
  QueueErrorCode,
  QueueFailure,
  StatusCounts,
  StatusUpdate,
  WorkRequest
} from "../types/contracts.js";

export type Clock = () => Date;

export const DEFAULT_MAX_RETRIES = 3;
export const SUMMARY_WINDOW_MS = 7 * DAY_MS;

const OutcomeSchema = z.enum(["completed", "failed", "cancelled"]);

const UpdateSchema = z.object({
  branchUrl: z.string().min(1).optional(),
  prUrl: z.string().min(1).optional(),
  prNumber: z.number().int().positive().optional(),
  errorMessage: z.string().optional(),
  processorId: z.string().min(1).optional()
});

const ProcessorIdSchema = z.string().refine((s) => s.trim().length > 0, { message: "processorId cannot be empty" });

export type SubmitResult =
  | { ok: true; requestId: string; request: WorkRequest }
  | QueueFailure<"invalid_parameter" | "duplicate_active_request">;

export type ClaimResult =
  | { ok: true; request: WorkRequest | null }
  | QueueFailure<"invalid_parameter">;

export type UpdateResult =
  | { ok: true; request: WorkRequest; retried: boolean }
  | QueueFailure<"invalid_parameter" | "unknown_request" | "invalid_transition">;

export type StatusResult =
  | { ok: true; request: WorkRequest }
  | QueueFailure<"invalid_parameter" | "not_found">;

export type EventsResult =
  | { ok: true; events: AuditLogEntry[] }
  | QueueFailure<"not_found">;

export type StatusQuery = { requestId?: string; branchName?: string };

export type Queue = ReturnType<typeof createQueue>;

function fail<E extends QueueErrorCode>(error: E, message: string): QueueFailure<E> {
  return { ok: false, error, message };
}

function issuesOf(err: z.ZodError): string {
  return err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/**
 * Queue manager: the only writer of request state besides the stale reclaimer.
 *
 * Domain failures come back as `{ ok: false, error }` results and are written
 * to the audit log first. Anything unexpected is logged at error level, both
 * to the audit log and pino, and rethrown.
 */
export function createQueue(args: {
  store: Store;
  defaultMaxRetries?: number;
  logger?: Logger;
  clock?: Clock;
}) {
  const store = args.store;
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const clock = args.clock ?? (() => new Date());
  const defaultMaxRetries = args.defaultMaxRetries ?? DEFAULT_MAX_RETRIES;

  async function audit(entry: {
    requestId: string | null;
    level: AuditLevel;
    message: string;
    processorId?: string | null;
    details?: Record<string, unknown>;
  }) {
    await store.appendAudit(makeAudit({ ...entry, at: clock() }));
  }

  // Records an unexpected failure before it propagates. A broken audit log
  // must not mask the original error, so its own failure only goes to pino.
  async function auditCrash(requestId: string | null, processorId: string, context: string, err: unknown) {
    log.error({ err, requestId }, `${context}: unexpected failure`);
    try {
      await audit({
        requestId,
        level: "error",
        message: `${context} failed: ${clampStr(errorMessage(err), 500)}`,
        processorId
      });
    } catch (auditErr) {
      log.error({ err: auditErr, requestId }, "audit: append failed");
    }
  }

  async function submit(raw: unknown): Promise<SubmitResult> {
    const parsed = SubmitSchema.safeParse(raw);
    if (!parsed.success) {
      const message = issuesOf(parsed.error);
      await audit({
        requestId: null,
        level: "warn",
        message: "submission rejected: invalid parameter",
        processorId: "queue.submit",
        details: { error: "invalid_parameter", issues: message }
      });
      log.info({ issues: message }, "submit: invalid_parameter");
      return fail("invalid_parameter", message);
    }

    const input = parsed.data;
    const candidate = buildWorkRequest(input, { now: clock(), defaultMaxRetries });
    let inserted = false;

    try {
      inserted = await store.insertRequest(candidate);
      if (!inserted) {
        const existing = await store.findLatestByBranch(input.branchName);
        const active = existing && (existing.status === "pending" || existing.status === "processing") ? existing : null;
        await audit({
          requestId: active?.id ?? null,
          level: "warn",
          message: `duplicate submission rejected for branch ${input.branchName}`,
          processorId: "queue.submit",
          details: { branchName: input.branchName, createdBy: input.createdBy }
        });
        log.info({ branchName: input.branchName, requestId: active?.id }, "submit: duplicate_active_request");
        return fail(
          "duplicate_active_request",
          `a request for branch "${input.branchName}" is already pending or processing`
        );
      }

      await audit({
        requestId: candidate.id,
        level: "info",
        message: "request submitted",
        processorId: "queue.submit",
        details: { branchName: candidate.branchName, priority: candidate.priority, createdBy: candidate.createdBy }
      });
    } catch (err) {
      await auditCrash(inserted ? candidate.id : null, "queue.submit", "submit", err);
      throw err;
    }

    log.info({ requestId: candidate.id, branchName: candidate.branchName }, "request: submitted");
    return { ok: true, requestId: candidate.id, request: candidate };
  }

  async function claimNext(processorId: string): Promise<ClaimResult> {
    const parsed = ProcessorIdSchema.safeParse(processorId);
    if (!parsed.success) {
      const message = issuesOf(parsed.error);
      await audit({
        requestId: null,
        level: "warn",
        message: "claim rejected: invalid parameter",
        processorId: "queue.claim",
        details: { issues: message }
      });
      return fail("invalid_parameter", message);
    }

    try {
      const claimed = await store.claimNext(processorId, clock().toISOString());
      if (!claimed) return { ok: true, request: null };

      await audit({
        requestId: claimed.id,
        level: "info",
        message: "request picked up for processing",
        processorId,
        details: { priority: claimed.priority, retryCount: claimed.retryCount }
      });
      log.info({ requestId: claimed.id, processorId }, "request: claimed");
      return { ok: true, request: claimed };
    } catch (err) {
      await auditCrash(null, processorId, "claim", err);
      throw err;
    }
  }

  async function updateStatus(requestId: string, status: OutcomeStatus, update: StatusUpdate = {}): Promise<UpdateResult> {
    const outcome = OutcomeSchema.safeParse(status);
    const fields = UpdateSchema.safeParse(update);
    if (!outcome.success || !fields.success) {
      const message = fields.success ? "status must be one of completed, failed, cancelled" : issuesOf(fields.error);
      await audit({
        requestId: null,
        level: "warn",
        message: "status update rejected: invalid parameter",
        processorId: "queue.update",
        details: { requestId, status, issues: message }
      });
      return fail("invalid_parameter", message);
    }

    const next = outcome.data;
    const u = fields.data;
    let current: WorkRequest | null = null;

    try {
      current = await store.getRequest(requestId);
      if (!current) {
        await audit({
          requestId: null,
          level: "warn",
          message: `status update for unknown request ${requestId}`,
          processorId: u.processorId ?? "queue.update",
          details: { requestId, status: next }
        });
        return fail("unknown_request", `request ${requestId} does not exist`);
      }

      const actor = u.processorId ?? current.processorId ?? "unknown";
      const reject = async (message: string) => {
        await audit({
          requestId,
          level: "warn",
          message,
          processorId: actor,
          details: { from: current?.status, to: next }
        });
        log.warn({ requestId, status: next }, "update: invalid_transition");
        return fail("invalid_transition", message);
      };

      if (!canTransition(current.status, next)) {
        return await reject(`rejected ${next} update: request is ${current.status}`);
      }
      if (u.processorId !== undefined && u.processorId !== current.processorId) {
        return await reject(`rejected ${next} update: request is held by ${current.processorId ?? "nobody"}`);
      }

      const now = clock().toISOString();
      const results = {
        githubBranchUrl: u.branchUrl ?? current.githubBranchUrl,
        githubPrUrl: u.prUrl ?? current.githubPrUrl,
        githubPrNumber: u.prNumber ?? current.githubPrNumber
      };
      const lastError = u.errorMessage !== undefined ? clampStr(u.errorMessage) : current.errorMessage;

      let resolved: { status: WorkRequest["status"]; retryCount: number } = { status: next, retryCount: current.retryCount };
      if (next === "failed") resolved = resolveFailure(current.retryCount, current.maxRetries);
      const retried = resolved.status === "pending";

      const updated = await store.transition(
        requestId,
        { status: "processing", processorId: current.processorId ?? undefined },
        {
          ...results,
          status: resolved.status,
          retryCount: resolved.retryCount,
          processorId: null,
          processedAt: now,
          errorMessage: next === "completed" ? null : lastError
        }
      );
      if (!updated) {
        return await reject(`rejected ${next} update: request changed concurrently`);
      }

      const level: AuditLevel = retried ? "warn" : next === "failed" ? "error" : "info";
      const to = retried ? `pending (retry ${updated.retryCount} of ${updated.maxRetries})` : updated.status;
      const details: Record<string, unknown> = { from: current.status, to: updated.status, retryCount: updated.retryCount };
      if (u.errorMessage !== undefined) details.error = lastError;
      if (u.prUrl !== undefined) { details.prUrl = u.prUrl; details.prNumber = u.prNumber ?? null; }
      if (u.branchUrl !== undefined) details.branchUrl = u.branchUrl;

      await audit({ requestId, level, message: `status changed from processing to ${to}`, processorId: actor, details });
      log.info({ requestId, status: updated.status, retryCount: updated.retryCount }, retried ? "request: retry scheduled" : "request: status changed");

      return { ok: true, request: updated, retried };
    } catch (err) {
      await auditCrash(current ? requestId : null, u.processorId ?? "queue.update", "status update", err);
      throw err;
    }
  }

  async function getStatus(q: StatusQuery): Promise<StatusResult> {
    let request: WorkRequest | null;
    if (q.requestId) request = await store.getRequest(q.requestId);
    else if (q.branchName) request = await store.findLatestByBranch(q.branchName);
    else return fail("invalid_parameter", "either requestId or branchName must be provided");

    if (!request) return fail("not_found", "no request found with the provided criteria");
    return { ok: true, request };
  }

  async function listEvents(requestId: string, limit?: number): Promise<EventsResult> {
    const request = await store.getRequest(requestId);
    if (!request) return fail("not_found", `request ${requestId} does not exist`);
    return { ok: true, events: await store.listAudit({ requestId, limit }) };
  }

  async function listRequests(q: RequestQuery = {}): Promise<WorkRequest[]> {
    return store.listRequests(q);
  }

  async function summary(windowMs = SUMMARY_WINDOW_MS): Promise<{ since: string; counts: StatusCounts }> {
    const since = isoBefore(clock(), windowMs);
    return { since, counts: await store.summarize(since) };
  }

  return { submit, claimNext, updateStatus, getStatus, listEvents, listRequests, summary };
}
