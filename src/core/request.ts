import { nanoid } from "nanoid";
import { z } from "zod";
import { SubmitInput, WorkRequest } from "../types/contracts.js";

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;
export const DEFAULT_PRIORITY = 5;
export const DEFAULT_TARGET_BRANCH = "main";

const required = (field: string) =>
  z.string({ required_error: `${field} is required` })
    .refine((s) => s.trim().length > 0, { message: `${field} cannot be empty` });

export const SubmitSchema = z.object({
  branchName: required("branchName"),
  prTitle: required("prTitle"),
  prDescription: z.string().optional(),
  targetBranch: required("targetBranch").optional(),
  fileName: required("fileName"),
  payload: required("payload"),
  createdBy: required("createdBy"),
  priority: z.number().int().min(MIN_PRIORITY, "priority must be between 1 and 10")
    .max(MAX_PRIORITY, "priority must be between 1 and 10").optional(),
  maxRetries: z.number().int().min(0, "maxRetries cannot be negative").optional()
});

export function stagePathFor(id: string, fileName: string): string {
  return `pending/${id}/${fileName}`;
}

export function buildWorkRequest(
  input: SubmitInput,
  opts: { now: Date; defaultMaxRetries: number }
): WorkRequest {
  const id = nanoid();
  return {
    id,
    createdAt: opts.now.toISOString(),
    createdBy: input.createdBy,
    requestType: "create_pr",
    status: "pending",
    branchName: input.branchName,
    prTitle: input.prTitle,
    prDescription: input.prDescription ?? "",
    targetBranch: input.targetBranch ?? DEFAULT_TARGET_BRANCH,
    fileName: input.fileName,
    payload: input.payload,
    stagePath: stagePathFor(id, input.fileName),
    priority: input.priority ?? DEFAULT_PRIORITY,
    retryCount: 0,
    maxRetries: input.maxRetries ?? opts.defaultMaxRetries,
    processorId: null,
    processedAt: null,
    errorMessage: null,
    githubBranchUrl: null,
    githubPrUrl: null,
    githubPrNumber: null
  };
}
