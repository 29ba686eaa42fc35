import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";

function getKeyFromReq(req: Request): string {
  const h = (req.header("x-queue-key") || "").trim();
  if (h) return h;

  const a = (req.header("authorization") || "").trim();
  return a.toLowerCase().startsWith("bearer ") ? a.slice(7).trim() : "";
}

function sameKey(given: string, expected: string): boolean {
  const a = crypto.createHash("sha256").update(given).digest();
  const b = crypto.createHash("sha256").update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function checkQueueKey(req: Request, expected: string | undefined) {
  if (!expected) return { ok: true as const, status: 200 };

  const key = getKeyFromReq(req);
  if (!key) return { ok: false as const, status: 401, error: "missing_queue_key" as const };
  if (!sameKey(key, expected)) return { ok: false as const, status: 401, error: "invalid_queue_key" as const };
  return { ok: true as const, status: 200 };
}

/** Guards a router with a shared key; a no-op when no key is configured. */
export function requireQueueKey(expected: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    const out = checkQueueKey(req, expected);
    if (!out.ok) {
      res.status(out.status).json({ ok: false, error: out.error });
      return;
    }
    next();
  };
}
