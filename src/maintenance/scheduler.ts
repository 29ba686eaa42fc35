import pino, { type Logger } from "pino";
import { Store } from "../store/store.js";
import { Clock } from "../plugin/createQueue.js";
import { MINUTE_MS } from "../lib/_util.js";
import { runReclaim } from "./reclaim.js";
import { runHealthCheck } from "./health.js";
import { runRetention } from "./retention.js";

export type SchedulerConfig = {
  reclaimIntervalMinutes: number;
  maxProcessingMinutes: number;
  healthIntervalMinutes: number;
  retentionIntervalMinutes: number;
  retentionDays: number;
};

export type InFlightState = { inFlight: boolean };

type Task = {
  name: "reclaim" | "health" | "retention";
  intervalMs: number;
  run: () => Promise<{ ok: boolean }>;
};

/**
 * Runs `fn` unless a previous run sharing `state` is still going.
 *
 * @returns `false` when the run was skipped.
 */
export async function runWithInFlightGuard(state: InFlightState, fn: () => Promise<unknown>): Promise<boolean> {
  if (state.inFlight) return false;
  state.inFlight = true;
  try {
    await fn();
    return true;
  } finally {
    state.inFlight = false;
  }
}

export function startScheduler(args: {
  store: Store;
  config: SchedulerConfig;
  logger?: Logger;
  clock?: Clock;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const ctx = { store: args.store, logger: log, clock: args.clock };
  const c = args.config;

  const tasks: Task[] = [
    {
      name: "reclaim",
      intervalMs: c.reclaimIntervalMinutes * MINUTE_MS,
      run: () => runReclaim({ ...ctx, maxProcessingMinutes: c.maxProcessingMinutes })
    },
    { name: "health", intervalMs: c.healthIntervalMinutes * MINUTE_MS, run: () => runHealthCheck(ctx) },
    { name: "retention", intervalMs: c.retentionIntervalMinutes * MINUTE_MS, run: () => runRetention(ctx, c.retentionDays) }
  ];

  const timers = tasks.map((task) => {
    const state: InFlightState = { inFlight: false };
    const tick = async () => {
      const didRun = await runWithInFlightGuard(state, async () => {
        const out = await task.run();
        if (!out.ok) log.warn({ task: task.name }, "scheduler: sweep reported failure");
      });
      if (!didRun) log.info({ task: task.name }, "scheduler: tick skipped, previous run still in flight");
    };

    return setInterval(() => {
      tick().catch((err) => {
        log.error({ err, task: task.name }, "scheduler: tick failed");
      });
    }, task.intervalMs);
  });

  log.info(
    {
      reclaimIntervalMinutes: c.reclaimIntervalMinutes,
      maxProcessingMinutes: c.maxProcessingMinutes,
      healthIntervalMinutes: c.healthIntervalMinutes,
      retentionIntervalMinutes: c.retentionIntervalMinutes,
      retentionDays: c.retentionDays
    },
    "scheduler: started"
  );

  return {
    stop() {
      for (const t of timers) clearInterval(t);
      log.info("scheduler: stopped");
    }
  };
}
