import pino from "pino";
import { MemoryStore } from "../store/memory.js";
import { SqliteStore } from "../store/sqlite.js";
import { Store } from "../store/store.js";
import { SubmitInput, WorkRequest } from "../types/contracts.js";

export const silentLogger = pino({ level: "silent" });

export const storeFactories: Array<{ name: string; create: () => Promise<Store> }> = [
  {
    name: "MemoryStore",
    create: async () => {
      const s = new MemoryStore();
      await s.init();
      return s;
    }
  },
  {
    name: "SqliteStore",
    create: async () => {
      const s = new SqliteStore(":memory:");
      await s.init();
      return s;
    }
  }
];

export function makeClock(startIso: string) {
  let t = Date.parse(startIso);
  return {
    clock: () => new Date(t),
    advance(ms: number) {
      t += ms;
    },
    iso: () => new Date(t).toISOString()
  };
}

export function makeSubmit(overrides: Partial<SubmitInput> = {}): SubmitInput {
  return {
    branchName: "config/add-analyst-role",
    prTitle: "Add analyst role",
    prDescription: "Grants read access to the reporting schema.",
    targetBranch: "main",
    fileName: "roles.yaml",
    payload: "roles:\n  analyst:\n    grants: [read]\n",
    createdBy: "dev@example.com",
    ...overrides
  };
}

export function makeRequest(overrides: Partial<WorkRequest> = {}): WorkRequest {
  const id = overrides.id ?? "req-1";
  return {
    id,
    createdAt: "2024-05-01T10:00:00.000Z",
    createdBy: "dev@example.com",
    requestType: "create_pr",
    status: "pending",
    branchName: `config/${id}`,
    prTitle: "Update config",
    prDescription: "",
    targetBranch: "main",
    fileName: "config.yaml",
    payload: "key: value\n",
    stagePath: `pending/${id}/config.yaml`,
    priority: 5,
    retryCount: 0,
    maxRetries: 3,
    processorId: null,
    processedAt: null,
    errorMessage: null,
    githubBranchUrl: null,
    githubPrUrl: null,
    githubPrNumber: null,
    ...overrides
  };
}
