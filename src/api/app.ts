import express from "express";
import type { Logger } from "pino";
import { Queue } from "../plugin/createQueue.js";
import { SweepContext } from "../maintenance/sweep.js";
import { AppConfig } from "../config.js";
import { makeErrorHandler, makeRoutes } from "./routes.js";
import { requireQueueKey } from "./queue-key.js";
import { makeRateLimiter } from "./rate-limit.js";

export function makeApp(args: {
  queue: Queue;
  sweeps: SweepContext;
  config: Pick<AppConfig, "apiKey" | "maxProcessingMinutes" | "retentionDays" | "rateLimitWindowMs" | "rateLimitMax">;
  logger: Logger;
}) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(
    "/api",
    makeRateLimiter({ windowMs: args.config.rateLimitWindowMs, max: args.config.rateLimitMax }),
    requireQueueKey(args.config.apiKey),
    makeRoutes({
      queue: args.queue,
      sweeps: args.sweeps,
      maxProcessingMinutes: args.config.maxProcessingMinutes,
      retentionDays: args.config.retentionDays
    })
  );

  app.use(makeErrorHandler(args.logger));
  return app;
}
