import sqlite3 from "sqlite3";
import {
  AuditLevel,
  AuditLogEntry,
  Status,
  StatusCounts,
  WorkRequest
} from "../types/contracts.js";
import {
  AuditQuery,
  DEFAULT_AUDIT_LIMIT,
  DEFAULT_LIST_LIMIT,
  emptyCounts,
  MAX_AUDIT_LIMIT,
  MAX_LIST_LIMIT,
  PurgeResult,
  RequestPatch,
  RequestQuery,
  Store,
  TransitionGuard
} from "./store.js";
import { safeJsonParse } from "../lib/_util.js";

type Param = string | number | null;

type RequestRow = WorkRequest;

type AuditRow = {
  id: string;
  requestId: string | null;
  level: AuditLevel;
  message: string;
  detailsJson: string;
  processorId: string;
  timestamp: string;
};

const TERMINAL_SQL = `('completed', 'failed', 'cancelled')`;

function run(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}
function close(db: sqlite3.Database) {
  return new Promise<void>((resolve, reject) => {
    db.close((err) => (err ? reject(err) : resolve()));
  });
}

function isActiveBranchConflict(error: unknown): boolean {
  return error instanceof Error && error.message.includes("UNIQUE constraint failed: requests.branchName");
}

/**
 * SQLite-backed store. Several processes may share one database file: the
 * claim, the compare-and-swap transition and the stale reset are each a single
 * `update ... returning` statement, and the active-branch guard is a partial
 * unique index.
 *
 * Within one process every statement goes through `serial`, so a statement
 * issued while a transaction is open waits for its commit or rollback instead
 * of landing inside it.
 */
export class SqliteStore implements Store {
  protected db: sqlite3.Database;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    await this.exec(`pragma journal_mode = wal;`);
    await this.exec(`pragma busy_timeout = 5000;`);
    await this.exec(`pragma foreign_keys = on;`);
    await this.exec(`
      create table if not exists requests (
        id text primary key,
        createdAt text not null,
        createdBy text not null,
        requestType text not null,
        status text not null,
        branchName text not null,
        prTitle text not null,
        prDescription text not null,
        targetBranch text not null,
        fileName text not null,
        payload text not null,
        stagePath text not null,
        priority integer not null check (priority between 1 and 10),
        retryCount integer not null default 0,
        maxRetries integer not null,
        processorId text,
        processedAt text,
        errorMessage text,
        githubBranchUrl text,
        githubPrUrl text,
        githubPrNumber integer,
        check (retryCount >= 0 and retryCount <= maxRetries)
      );
    `);
    await this.exec(`
      create unique index if not exists idx_requests_active_branch
      on requests(branchName) where status in ('pending', 'processing');
    `);
    await this.exec(`create index if not exists idx_requests_claim on requests(status, priority desc, createdAt, id);`);
    await this.exec(`create index if not exists idx_requests_branch_created on requests(branchName, createdAt);`);

    await this.exec(`
      create table if not exists audit_log (
        id text primary key,
        requestId text references requests(id),
        level text not null,
        message text not null,
        detailsJson text not null,
        processorId text not null,
        timestamp text not null
      );
    `);
    await this.exec(`create index if not exists idx_audit_request on audit_log(requestId, timestamp);`);
    await this.exec(`create index if not exists idx_audit_level on audit_log(level, timestamp);`);
  }

  async close(): Promise<void> {
    await this.serial(() => close(this.db));
  }

  async insertRequest(r: WorkRequest): Promise<boolean> {
    try {
      await this.exec(`
        insert into requests (
          id, createdAt, createdBy, requestType, status, branchName, prTitle,
          prDescription, targetBranch, fileName, payload, stagePath, priority,
          retryCount, maxRetries, processorId, processedAt, errorMessage,
          githubBranchUrl, githubPrUrl, githubPrNumber
        ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?)
      `, [
        r.id, r.createdAt, r.createdBy, r.requestType, r.status, r.branchName, r.prTitle,
        r.prDescription, r.targetBranch, r.fileName, r.payload, r.stagePath, r.priority,
        r.retryCount, r.maxRetries, r.processorId, r.processedAt, r.errorMessage,
        r.githubBranchUrl, r.githubPrUrl, r.githubPrNumber
      ]);
      return true;
    } catch (err) {
      if (isActiveBranchConflict(err)) return false;
      throw err;
    }
  }

  async getRequest(id: string): Promise<WorkRequest | null> {
    const row = await this.one<RequestRow>(`select * from requests where id=?`, [id]);
    return row ? this.rowToRequest(row) : null;
  }

  async findLatestByBranch(branchName: string): Promise<WorkRequest | null> {
    const row = await this.one<RequestRow>(`
      select * from requests
      where branchName=?
      order by createdAt desc, id desc
      limit 1
    `, [branchName]);
    return row ? this.rowToRequest(row) : null;
  }

  async listRequests(q: RequestQuery): Promise<WorkRequest[]> {
    const limit = Math.min(q.limit ?? DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    const offset = q.offset ?? 0;

    const where: string[] = [];
    const params: Param[] = [];
    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.branchName) { where.push(`branchName = ?`); params.push(q.branchName); }

    const sql = `
      select * from requests
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by createdAt desc, id desc
      limit ? offset ?
    `;
    params.push(limit, offset);
    const rows = await this.many<RequestRow>(sql, params);
    return rows.map((r) => this.rowToRequest(r));
  }

  async claimNext(processorId: string, now: string): Promise<WorkRequest | null> {
    // The outer status check makes the write conditional: a row another
    // connection claimed between the subselect and the update is left alone.
    const row = await this.one<RequestRow>(`
      update requests
      set status = 'processing', processorId = ?, processedAt = ?
      where id = (
        select id from requests
        where status = 'pending' and retryCount <= maxRetries
        order by priority desc, createdAt asc, id asc
        limit 1
      )
        and status = 'pending'
      returning *
    `, [processorId, now]);
    return row ? this.rowToRequest(row) : null;
  }

  async transition(id: string, guard: TransitionGuard, patch: RequestPatch): Promise<WorkRequest | null> {
    const sets: string[] = [];
    const params: Param[] = [];
    for (const [column, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      params.push(value);
    }
    if (!sets.length) return null;

    const where = [`id = ?`, `status = ?`];
    params.push(id, guard.status);
    if (guard.processorId !== undefined) {
      where.push(`processorId = ?`);
      params.push(guard.processorId);
    }

    const row = await this.one<RequestRow>(`
      update requests set ${sets.join(", ")}
      where ${where.join(" and ")}
      returning *
    `, params);
    return row ? this.rowToRequest(row) : null;
  }

  async resetStale(cutoff: string, note: string): Promise<WorkRequest[]> {
    const rows = await this.many<RequestRow>(`
      update requests
      set status = 'pending', processorId = null, errorMessage = ?
      where status = 'processing' and processedAt < ?
      returning *
    `, [note, cutoff]);
    return rows.map((r) => this.rowToRequest(r));
  }

  async countOldPending(createdBefore: string): Promise<number> {
    const row = await this.one<{ n: number }>(`
      select count(*) as n from requests where status = 'pending' and createdAt < ?
    `, [createdBefore]);
    return row?.n ?? 0;
  }

  async countHighRetryActive(minRetryCount: number, createdSince: string): Promise<number> {
    const row = await this.one<{ n: number }>(`
      select count(*) as n from requests
      where retryCount >= ? and status in ('pending', 'processing') and createdAt >= ?
    `, [minRetryCount, createdSince]);
    return row?.n ?? 0;
  }

  async countAudit(level: AuditLevel, since: string): Promise<number> {
    const row = await this.one<{ n: number }>(`
      select count(*) as n from audit_log where level = ? and timestamp >= ?
    `, [level, since]);
    return row?.n ?? 0;
  }

  async summarize(createdSince: string): Promise<StatusCounts> {
    const rows = await this.many<{ status: Status; n: number }>(`
      select status, count(*) as n from requests
      where createdAt >= ?
      group by status
    `, [createdSince]);
    const counts = emptyCounts();
    for (const r of rows) counts[r.status] = r.n;
    return counts;
  }

  async appendAudit(ev: AuditLogEntry): Promise<void> {
    await this.exec(`
      insert into audit_log (id, requestId, level, message, detailsJson, processorId, timestamp)
      values (?,?,?,?,?,?,?)
    `, [ev.id, ev.requestId, ev.level, ev.message, JSON.stringify(ev.details), ev.processorId, ev.timestamp]);
  }

  async listAudit(q: AuditQuery): Promise<AuditLogEntry[]> {
    const limit = Math.min(q.limit ?? DEFAULT_AUDIT_LIMIT, MAX_AUDIT_LIMIT);
    const where: string[] = [];
    const params: Param[] = [];

    if (q.requestId === null) where.push(`requestId is null`);
    else if (q.requestId !== undefined) { where.push(`requestId = ?`); params.push(q.requestId); }
    if (q.level) { where.push(`level = ?`); params.push(q.level); }
    params.push(limit);

    const rows = await this.many<AuditRow>(`
      select * from audit_log
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by timestamp desc, rowid desc
      limit ?
    `, params);

    return rows.reverse().map((r) => ({
      id: r.id,
      requestId: r.requestId,
      level: r.level,
      message: r.message,
      details: safeJsonParse<Record<string, unknown>>(r.detailsJson) ?? {},
      processorId: r.processorId,
      timestamp: r.timestamp
    }));
  }

  async purgeTerminal(cutoff: string): Promise<PurgeResult> {
    return this.inTransaction(async () => {
      const deletedLogs = await run(this.db, `
        delete from audit_log
        where requestId in (
          select id from requests where createdAt < ? and status in ${TERMINAL_SQL}
        )
      `, [cutoff]);
      const deletedRequests = await run(this.db, `
        delete from requests where createdAt < ? and status in ${TERMINAL_SQL}
      `, [cutoff]);
      return { deletedRequests, deletedLogs };
    });
  }

  private serial<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.pending.then(fn);
    this.pending = next.catch(() => undefined);
    return next;
  }

  private exec(sql: string, params: Param[] = []) {
    return this.serial(() => run(this.db, sql, params));
  }

  private one<T>(sql: string, params: Param[] = []) {
    return this.serial(() => get<T>(this.db, sql, params));
  }

  private many<T>(sql: string, params: Param[] = []) {
    return this.serial(() => all<T>(this.db, sql, params));
  }

  private inTransaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.serial(async () => {
      await run(this.db, `begin immediate`);
      try {
        const out = await fn();
        await run(this.db, `commit`);
        return out;
      } catch (err) {
        await run(this.db, `rollback`);
        throw err;
      }
    });
  }

  private rowToRequest(r: RequestRow): WorkRequest {
    return {
      id: r.id,
      createdAt: r.createdAt,
      createdBy: r.createdBy,
      requestType: r.requestType,
      status: r.status,
      branchName: r.branchName,
      prTitle: r.prTitle,
      prDescription: r.prDescription,
      targetBranch: r.targetBranch,
      fileName: r.fileName,
      payload: r.payload,
      stagePath: r.stagePath,
      priority: r.priority,
      retryCount: r.retryCount,
      maxRetries: r.maxRetries,
      processorId: r.processorId ?? null,
      processedAt: r.processedAt ?? null,
      errorMessage: r.errorMessage ?? null,
      githubBranchUrl: r.githubBranchUrl ?? null,
      githubPrUrl: r.githubPrUrl ?? null,
      githubPrNumber: r.githubPrNumber ?? null
    };
  }
}
