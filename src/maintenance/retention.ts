import { sweep, SweepContext, SweepFailure } from "./sweep.js";
import { DAY_MS, isoBefore } from "../lib/_util.js";
import { QueueFailure } from "../types/contracts.js";

export const DEFAULT_RETENTION_DAYS = 30;

export type RetentionResult = {
  ok: true;
  deletedRequests: number;
  deletedLogs: number;
  daysKept: number;
};

export async function runRetention(
  ctx: SweepContext,
  daysToKeep = DEFAULT_RETENTION_DAYS
): Promise<RetentionResult | SweepFailure | QueueFailure<"invalid_parameter">> {
  if (!Number.isInteger(daysToKeep) || daysToKeep < 0) {
    return { ok: false, error: "invalid_parameter", message: "daysToKeep must be a non-negative integer" };
  }

  return sweep(ctx, "retention", async ({ store, log, now, audit }) => {
    const out = await store.purgeTerminal(isoBefore(now, daysToKeep * DAY_MS));

    await audit({
      level: "info",
      message: "retention sweep completed",
      details: { ...out, daysKept: daysToKeep }
    });
    log.info({ ...out, daysKept: daysToKeep }, "retention: sweep completed");

    return { ok: true as const, ...out, daysKept: daysToKeep };
  });
}
