import { rm } from "node:fs/promises";
import path from "node:path";

import {
  CHANNEL_PATH,
  ChannelErrorCode,
  JobPhase,
  downloadUrlFor,
  newJobId,
  type JobId,
  type JobStatusV1,
  type JobV1,
  type SubmissionResultV1,
} from "@rendercache/shared";

import { ContractViolationError } from "../contracts/render_contract.js";
import type { LoggerLike } from "../observability/traceContext.js";
import { traced } from "../observability/traceContext.js";
import { atomicWriteFile } from "../storage/atomicWrite.js";
import type { CorrelationRegistry } from "./correlationRegistry.js";
import type { DedupCache } from "./dedupCache.js";
import { deriveFingerprint, type Fingerprint } from "./fingerprint.js";
import type { JobTable } from "./jobTable.js";
import { CloseCode, type NotificationChannel } from "./notificationChannel.js";
import { QueueClosedError, type BoundedQueue } from "./workQueue.js";

export interface RenderServiceDeps {
  cache: DedupCache;
  queue: BoundedQueue<JobV1>;
  registry: CorrelationRegistry<NotificationChannel>;
  jobs: JobTable;
  uploadDir: string;
  logger: LoggerLike;
}

export type SubscribeOutcome =
  | { ok: true; phase: JobPhase; activated: boolean }
  | { ok: false; reason_code: ChannelErrorCode; reason: string };

export function inputRefFor(fingerprint: Fingerprint): string {
  return `input-${fingerprint}.stl`;
}

export function outputRefFor(fingerprint: Fingerprint): string {
  return `output-${fingerprint}.png`;
}

/** Removes a job's stored input unless a live job still shares its fingerprint. Never rejects. */
export async function discardInput(
  jobs: JobTable,
  uploadDir: string,
  job: JobV1,
  logger: LoggerLike,
): Promise<boolean> {
  if (jobs.hasFingerprint(job.fingerprint)) return false;
  try {
    await rm(path.join(uploadDir, job.input_ref), { force: true });
    return true;
  } catch (err) {
    logger.warn(
      {
        event: "input.discard_failed",
        job_id: job.job_id,
        input_ref: job.input_ref,
        err_message: err instanceof Error ? err.message : String(err),
      },
      "stored input could not be removed",
    );
    return false;
  }
}

/**
 * Process-wide entry point for submissions and channel subscriptions.
 * Fresh content yields a ticket; the job behind it is enqueued only when a
 * channel subscribes to it, so a channel can always register before the
 * worker can see the job.
 */
export class RenderService {
  private readonly deps: RenderServiceDeps;

  constructor(deps: RenderServiceDeps) {
    this.deps = deps;
  }

  async submit(content: Buffer): Promise<SubmissionResultV1> {
    const { cache, jobs, uploadDir, logger } = this.deps;
    const fingerprint = deriveFingerprint(content);

    const cached = cache.lookup(fingerprint);
    if (cached) {
      logger.info(traced({ event: "submission.cached", fingerprint, output_ref: cached }));
      return {
        status: "cached",
        fingerprint,
        output_ref: cached,
        download_url: downloadUrlFor(cached),
      };
    }

    const input_ref = inputRefFor(fingerprint);
    const job: JobV1 = {
      job_id: newJobId(),
      fingerprint,
      input_ref,
      output_ref: outputRefFor(fingerprint),
    };
    // listed before the write so a concurrent discard keeps the shared input
    jobs.add(job);
    try {
      await atomicWriteFile(path.join(uploadDir, input_ref), content);
    } catch (err) {
      jobs.remove(job.job_id);
      throw new ContractViolationError("input_unwritable", "failed to save uploaded content", {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    logger.info(traced({ event: "submission.accepted", job_id: job.job_id, fingerprint, bytes: content.length }));

    return {
      status: "accepted",
      job_id: job.job_id,
      fingerprint,
      output_ref: job.output_ref,
      channel_path: CHANNEL_PATH,
    };
  }

  status(jobId: JobId): JobStatusV1 | null {
    return this.deps.jobs.status(jobId);
  }

  /**
   * Binds `channel` to `jobId` and, for a ticket that has not been activated
   * yet, enqueues its job. The enqueue waits for queue space, so a saturated
   * queue holds this call open until the worker drains a slot.
   */
  async subscribe(jobId: JobId, channel: NotificationChannel): Promise<SubscribeOutcome> {
    const { jobs, registry, queue, logger } = this.deps;

    const job = jobs.get(jobId);
    const phase = jobs.phase(jobId);
    if (!job || !phase) {
      return { ok: false, reason_code: ChannelErrorCode.UnknownJob, reason: `no active job ${jobId}` };
    }

    channel.bind(jobId);
    const replaced = registry.register(jobId, channel);
    if (replaced) {
      replaced.close(CloseCode.Superseded, "superseded by a newer channel");
      logger.info({ event: "channel.superseded", job_id: jobId, channel_id: replaced.channel_id });
    }
    logger.info({ event: "channel.registered", job_id: jobId, channel_id: channel.channel_id, phase });

    const activated = phase === JobPhase.Pending;
    const ackPhase = activated ? JobPhase.Queued : phase;
    channel.acknowledge({ type: "job.subscribed", job_id: jobId, phase: ackPhase });
    if (!activated) return { ok: true, phase: ackPhase, activated };

    jobs.setPhase(jobId, JobPhase.Queued);
    try {
      await queue.enqueue(job);
    } catch (err) {
      if (!(err instanceof QueueClosedError)) throw err;
      jobs.remove(jobId);
      registry.sinkFor(jobId).notify({ type: "job.failed", job_id: jobId, reason: "service is shutting down" });
      logger.warn({ event: "job.enqueue.rejected", job_id: jobId }, "queue closed before job was enqueued");
      return { ok: true, phase: ackPhase, activated: false };
    }
    logger.info({ event: "job.enqueued", job_id: jobId, queue_depth: queue.size });
    return { ok: true, phase: ackPhase, activated };
  }

  /** Drops tickets nobody subscribed to within `ttlMs`, with their stored inputs. */
  async sweepExpiredTickets(ttlMs: number): Promise<number> {
    const { jobs, uploadDir, logger } = this.deps;
    const expired = jobs.expirePending(ttlMs);
    for (const job of expired) {
      const discarded = await discardInput(jobs, uploadDir, job, logger);
      logger.info({ event: "ticket.expired", job_id: job.job_id, fingerprint: job.fingerprint, input_discarded: discarded });
    }
    return expired.length;
  }
}
