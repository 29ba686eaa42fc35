import { sweep, SweepContext, SweepFailure } from "./sweep.js";
import { DAY_MS, isoBefore, MINUTE_MS } from "../lib/_util.js";

export type ReclaimResult = {
  ok: true;
  reset: number;
  requestIds: string[];
  cutoff: string;
};

export function staleNote(maxProcessingMinutes: number): string {
  return `Reset from stale processing state after ${maxProcessingMinutes} minutes`;
}

/**
 * Returns claims older than `maxProcessingMinutes` to the pending pool. The
 * holder is presumed crashed, so the attempt does not count as a retry.
 */
export function runReclaim(ctx: SweepContext & { maxProcessingMinutes: number }): Promise<ReclaimResult | SweepFailure> {
  return sweep(ctx, "reclaim", async ({ store, log, now, audit }) => {
    const cutoff = isoBefore(now, ctx.maxProcessingMinutes * MINUTE_MS);
    // Counts describe the queue as the sweep found it.
    const counts = await store.summarize(isoBefore(now, DAY_MS));
    const reset = await store.resetStale(cutoff, staleNote(ctx.maxProcessingMinutes));

    for (const r of reset) {
      await audit({
        requestId: r.id,
        level: "warn",
        message: "stale claim reset to pending",
        details: { maxProcessingMinutes: ctx.maxProcessingMinutes, retryCount: r.retryCount }
      });
    }

    await audit({
      level: "info",
      message: `reclaim sweep reset ${reset.length} stale requests`,
      details: {
        staleReset: reset.length,
        maxProcessingMinutes: ctx.maxProcessingMinutes,
        pending: counts.pending,
        processing: counts.processing,
        failed: counts.failed
      }
    });

    if (reset.length) log.warn({ reset: reset.length, cutoff }, "reclaim: stale claims reset");
    else log.debug({ cutoff }, "reclaim: nothing stale");

    return { ok: true as const, reset: reset.length, requestIds: reset.map((r) => r.id), cutoff };
  });
}
