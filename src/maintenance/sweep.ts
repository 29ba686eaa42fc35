import pino, { type Logger } from "pino";
import { Store } from "../store/store.js";
import { makeAudit } from "../audit/audit.js";
import { Clock } from "../plugin/createQueue.js";
import { clampStr, errorMessage } from "../lib/_util.js";
import { AuditLevel } from "../types/contracts.js";

export type SweepContext = {
  store: Store;
  logger?: Logger;
  clock?: Clock;
};

export type SweepFailure = { ok: false; error: "sweep_failed"; message: string };

export type SweepTools = {
  store: Store;
  log: Logger;
  now: Date;
  audit: (entry: { requestId?: string | null; level: AuditLevel; message: string; details?: Record<string, unknown> }) => Promise<void>;
};

/**
 * Runs one maintenance pass. Failures are logged at error level to pino and
 * the audit log and returned as a result, so a scheduler can keep ticking.
 */
export async function sweep<T>(
  ctx: SweepContext,
  name: string,
  fn: (tools: SweepTools) => Promise<T>
): Promise<T | SweepFailure> {
  const log = ctx.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const clock = ctx.clock ?? (() => new Date());
  const processorId = `maintenance.${name}`;
  const now = clock();

  const audit: SweepTools["audit"] = async (entry) => {
    await ctx.store.appendAudit(makeAudit({
      requestId: entry.requestId ?? null,
      level: entry.level,
      message: entry.message,
      details: entry.details,
      processorId,
      at: clock()
    }));
  };

  try {
    return await fn({ store: ctx.store, log, now, audit });
  } catch (err) {
    const message = clampStr(errorMessage(err), 500);
    log.error({ err }, `${name}: sweep failed`);
    try {
      await audit({ level: "error", message: `${name} sweep failed: ${message}` });
    } catch (auditErr) {
      log.error({ err: auditErr }, "audit: append failed");
    }
    return { ok: false, error: "sweep_failed", message };
  }
}
