import { sweep, SweepContext, SweepFailure } from "./sweep.js";
import {
  classifyHealth,
  healthMessage,
  HIGH_RETRY_MIN,
  HIGH_RETRY_WINDOW_MS,
  OLD_PENDING_AFTER_MS,
  RECENT_ERRORS_WINDOW_MS
} from "../core/health.js";
import { isoBefore } from "../lib/_util.js";
import { AuditLevel, HealthCounters } from "../types/contracts.js";

export type HealthResult = { ok: true; level: AuditLevel; message: string } & HealthCounters;

export function runHealthCheck(ctx: SweepContext): Promise<HealthResult | SweepFailure> {
  return sweep(ctx, "health", async ({ store, log, now, audit }) => {
    const counters: HealthCounters = {
      oldPending: await store.countOldPending(isoBefore(now, OLD_PENDING_AFTER_MS)),
      highRetry: await store.countHighRetryActive(HIGH_RETRY_MIN, isoBefore(now, HIGH_RETRY_WINDOW_MS)),
      recentErrors: await store.countAudit("error", isoBefore(now, RECENT_ERRORS_WINDOW_MS))
    };
    const level = classifyHealth(counters);
    const message = healthMessage(level);

    await audit({ level, message, details: { ...counters } });
    log[level](counters, `health: ${message}`);

    return { ok: true as const, level, message, ...counters };
  });
}
