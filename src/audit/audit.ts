import { nanoid } from "nanoid";
import { AuditLevel, AuditLogEntry } from "../types/contracts.js";

export function makeAudit(args: {
  requestId: string | null;
  level: AuditLevel;
  message: string;
  processorId?: string | null;
  details?: Record<string, unknown>;
  at: Date;
}): AuditLogEntry {
  return {
    id: nanoid(),
    requestId: args.requestId,
    level: args.level,
    message: args.message,
    details: args.details ?? {},
    processorId: args.processorId ?? "system",
    timestamp: args.at.toISOString()
  };
}
