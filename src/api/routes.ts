import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import type { Logger } from "pino";
import { Queue } from "../plugin/createQueue.js";
import { SweepContext } from "../maintenance/sweep.js";
import { runReclaim } from "../maintenance/reclaim.js";
import { runHealthCheck } from "../maintenance/health.js";
import { runRetention } from "../maintenance/retention.js";
import { QueueErrorCode } from "../types/contracts.js";

const httpStatus: Record<QueueErrorCode | "sweep_failed", number> = {
  invalid_parameter: 400,
  duplicate_active_request: 409,
  unknown_request: 404,
  invalid_transition: 409,
  not_found: 404,
  sweep_failed: 500
};

const StatusEnum = z.enum(["pending", "processing", "completed", "failed", "cancelled"]);

const ListQuery = z.object({
  status: StatusEnum.optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

const UpdateBody = z.object({
  status: z.enum(["completed", "failed", "cancelled"]),
  branchUrl: z.string().optional(),
  prUrl: z.string().optional(),
  prNumber: z.number().int().optional(),
  errorMessage: z.string().optional(),
  processorId: z.string().optional()
});

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler.
const h = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

function sendResult(res: Response, out: { ok: true } | { ok: false; error: QueueErrorCode | "sweep_failed"; message: string }, okStatus = 200) {
  if (out.ok) {
    res.status(okStatus).json(out);
    return;
  }
  res.status(httpStatus[out.error]).json(out);
}

export function makeRoutes(args: {
  queue: Queue;
  sweeps: SweepContext;
  maxProcessingMinutes: number;
  retentionDays: number;
}) {
  const r = Router();
  const { queue } = args;

  r.post("/requests", h(async (req, res) => {
    const out = await queue.submit(req.body);
    sendResult(res, out, 201);
  }));

  r.post("/requests/claim", h(async (req, res) => {
    const processorId = typeof req.body?.processorId === "string" ? req.body.processorId : "";
    const out = await queue.claimNext(processorId);
    if (out.ok && !out.request) {
      res.status(204).end();
      return;
    }
    sendResult(res, out);
  }));

  r.get("/requests", h(async (req, res) => {
    if (typeof req.query.branch === "string") {
      sendResult(res, await queue.getStatus({ branchName: req.query.branch }));
      return;
    }
    const q = ListQuery.parse(req.query);
    const items = await queue.listRequests(q);
    res.json({ ok: true, items });
  }));

  r.get("/requests/summary", h(async (_req, res) => {
    const s = await queue.summary();
    res.json({ ok: true, ...s });
  }));

  r.get("/requests/:id", h(async (req, res) => {
    sendResult(res, await queue.getStatus({ requestId: req.params.id }));
  }));

  r.post("/requests/:id/status", h(async (req, res) => {
    const parsed = UpdateBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: "invalid_parameter", message: parsed.error.issues[0]?.message ?? "invalid body" });
      return;
    }
    const { status, ...update } = parsed.data;
    sendResult(res, await queue.updateStatus(req.params.id, status, update));
  }));

  r.get("/requests/:id/events", h(async (req, res) => {
    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(1000).parse(req.query.limit)
      : 200;
    sendResult(res, await queue.listEvents(req.params.id, limit));
  }));

  r.post("/maintenance/reclaim", h(async (_req, res) => {
    sendResult(res, await runReclaim({ ...args.sweeps, maxProcessingMinutes: args.maxProcessingMinutes }));
  }));

  r.post("/maintenance/health", h(async (_req, res) => {
    sendResult(res, await runHealthCheck(args.sweeps));
  }));

  r.post("/maintenance/retention", h(async (req, res) => {
    const days = req.body?.daysToKeep === undefined
      ? args.retentionDays
      : z.number().int().min(0).parse(req.body.daysToKeep);
    sendResult(res, await runRetention(args.sweeps, days));
  }));

  return r;
}

export function makeErrorHandler(log: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof z.ZodError) {
      res.status(400).json({ ok: false, error: "invalid_parameter", message: err.issues[0]?.message ?? "invalid request" });
      return;
    }
    log.error({ err }, "api: unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  };
}
