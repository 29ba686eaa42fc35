export { createQueue, DEFAULT_MAX_RETRIES } from "./plugin/createQueue.js";
export type { Queue, Clock, SubmitResult, ClaimResult, UpdateResult, StatusResult, EventsResult } from "./plugin/createQueue.js";
export { canTransition, isTerminal, shouldRetry, resolveFailure } from "./core/transitions.js";
export { classifyHealth } from "./core/health.js";
export { runReclaim } from "./maintenance/reclaim.js";
export { runHealthCheck } from "./maintenance/health.js";
export { runRetention } from "./maintenance/retention.js";
export { startScheduler } from "./maintenance/scheduler.js";
export { runWorkerOnce, buildPullRequestBody } from "./worker/worker.js";
export type { PullRequestPublisher, PublishResult, WorkerRunStats } from "./worker/worker.js";
export { makeApp } from "./api/app.js";
export { makeRoutes } from "./api/routes.js";
export { MemoryStore } from "./store/memory.js";
export { SqliteStore } from "./store/sqlite.js";
export type { Store } from "./store/store.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export type {
  WorkRequest,
  AuditLogEntry,
  AuditLevel,
  Status,
  RequestType,
  SubmitInput,
  StatusUpdate,
  OutcomeStatus,
  QueueErrorCode
} from "./types/contracts.js";
