export function safeJsonParse<T>(s: string): T | null {
  try { return JSON.parse(s) as T; } catch { return null; }
}

export function clampStr(s: unknown, max = 4000): string {
  const v = String(s ?? "");
  return v.length > max ? v.slice(0, max) + "…" : v;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isoBefore(now: Date, ms: number): string {
  return new Date(now.getTime() - ms).toISOString();
}

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
