import pino, { type Logger } from "pino";
import { Queue } from "../plugin/createQueue.js";
import { errorMessage } from "../lib/_util.js";
import { WorkRequest } from "../types/contracts.js";

/**
 * What a publisher reports back after creating the branch and pull request.
 */
export interface PublishResult {
  branchUrl: string;
  prUrl: string;
  prNumber: number;
}

/**
 * External side effect for one claimed request: create the branch, commit the
 * payload as `fileName`, open the pull request against `targetBranch`.
 *
 * Implementations may be called more than once for the same request (after a
 * reclaim or retry), so they should treat `request.id` as an idempotency key.
 */
export interface PullRequestPublisher {
  publish(request: WorkRequest, body: string): Promise<PublishResult>;
}

export type WorkerRunStats = {
  processed: number;
  succeeded: number;
  failed: number;
  errors: string[];
};

export function buildPullRequestBody(request: WorkRequest): string {
  const description = request.prDescription.trim() || "Automated configuration update";
  return [
    description,
    "",
    "---",
    "**Automated PR details:**",
    `- Created by: ${request.createdBy}`,
    `- Request ID: \`${request.id}\``,
    `- Priority: ${request.priority}`,
    `- Created: ${request.createdAt}`,
    `- File: \`${request.fileName}\``
  ].join("\n");
}

/**
 * Claims and publishes requests until the queue has nothing eligible left.
 * A publisher failure is reported as a failed attempt and the drain goes on.
 */
export async function runWorkerOnce(args: {
  queue: Queue;
  publisher: PullRequestPublisher;
  processorId: string;
  maxRequests?: number;
  logger?: Logger;
}): Promise<WorkerRunStats> {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const stats: WorkerRunStats = { processed: 0, succeeded: 0, failed: 0, errors: [] };
  const limit = args.maxRequests ?? Number.POSITIVE_INFINITY;

  while (stats.processed < limit) {
    const claim = await args.queue.claimNext(args.processorId);
    if (!claim.ok) throw new Error(`claim rejected: ${claim.message}`);
    const request = claim.request;
    if (!request) break;

    stats.processed += 1;
    log.info({ requestId: request.id, title: request.prTitle }, "worker: processing");

    let published: PublishResult;
    try {
      published = await args.publisher.publish(request, buildPullRequestBody(request));
    } catch (err) {
      const message = errorMessage(err);
      stats.failed += 1;
      stats.errors.push(`request ${request.id}: ${message}`);
      log.error({ err, requestId: request.id }, "worker: publish failed");

      const out = await args.queue.updateStatus(request.id, "failed", {
        errorMessage: message,
        processorId: args.processorId
      });
      if (!out.ok) log.warn({ requestId: request.id, error: out.error }, "worker: failure report rejected");
      continue;
    }

    const out = await args.queue.updateStatus(request.id, "completed", {
      branchUrl: published.branchUrl,
      prUrl: published.prUrl,
      prNumber: published.prNumber,
      processorId: args.processorId
    });
    if (out.ok) {
      stats.succeeded += 1;
    } else {
      stats.failed += 1;
      stats.errors.push(`request ${request.id}: ${out.message}`);
      log.warn({ requestId: request.id, error: out.error }, "worker: completion report rejected");
    }
  }

  return stats;
}
