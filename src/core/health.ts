import { AuditLevel, HealthCounters } from "../types/contracts.js";
import { DAY_MS, HOUR_MS } from "../lib/_util.js";

export const OLD_PENDING_AFTER_MS = HOUR_MS;
export const HIGH_RETRY_MIN = 2;
export const HIGH_RETRY_WINDOW_MS = DAY_MS;
export const RECENT_ERRORS_WINDOW_MS = HOUR_MS;

const messages: Record<AuditLevel, string> = {
  error: "queue health issues detected",
  warn: "queue performance degraded",
  info: "queue healthy"
};

export function classifyHealth(c: HealthCounters): AuditLevel {
  if (c.oldPending > 0 || c.highRetry > 3 || c.recentErrors > 5) return "error";
  if (c.highRetry > 0 || c.recentErrors > 0) return "warn";
  return "info";
}

export function healthMessage(level: AuditLevel): string {
  return messages[level];
}
