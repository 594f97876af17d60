import { stat } from "node:fs/promises";
import path from "node:path";

import { JobPhase, downloadUrlFor, type JobNotificationV1, type JobV1 } from "@rendercache/shared";

import type { LoggerLike } from "../observability/traceContext.js";
import { runWithTraceContext, traced } from "../observability/traceContext.js";
import type { CorrelationRegistry } from "../pipeline/correlationRegistry.js";
import type { DedupCache } from "../pipeline/dedupCache.js";
import { deriveFingerprintFromFile } from "../pipeline/fingerprint.js";
import type { JobTable } from "../pipeline/jobTable.js";
import { discardInput } from "../pipeline/renderService.js";
import type { BoundedQueue } from "../pipeline/workQueue.js";
import { TransformError, type Transformer } from "../render/transformer.js";

const GENERIC_FAILURE_REASON = "Failed to render file. Please try again.";

export interface RenderWorkerStats {
  processed: number;
  completed: number;
  failed: number;
  cache_hits: number;
  busy: boolean;
}

export interface RenderWorkerDeps {
  queue: BoundedQueue<JobV1>;
  cache: DedupCache;
  registry: Pick<CorrelationRegistry, "sinkFor">;
  jobs: JobTable;
  transformer: Transformer;
  uploadDir: string;
  outputDir: string;
  logger: LoggerLike;
  stats?: RenderWorkerStats;
}

export type ProcessJobResult = "completed" | "cache_hit" | "failed";

export function newRenderWorkerStats(): RenderWorkerStats {
  return { processed: 0, completed: 0, failed: 0, cache_hits: 0, busy: false };
}

function notify(deps: RenderWorkerDeps, msg: JobNotificationV1): void {
  // looked up per message: the channel may register, or be replaced, mid-job
  const delivered = deps.registry.sinkFor(msg.job_id).notify(msg);
  if (!delivered) {
    deps.logger.debug(traced({ event: "worker.notify.dropped", type: msg.type }), "no channel for job");
  }
}

function failureReason(err: unknown): string {
  return err instanceof TransformError ? err.message : GENERIC_FAILURE_REASON;
}

async function transformJob(deps: RenderWorkerDeps, job: JobV1): Promise<void> {
  const input_path = path.join(deps.uploadDir, job.input_ref);
  const output_path = path.join(deps.outputDir, job.output_ref);

  let actual: string;
  try {
    actual = await deriveFingerprintFromFile(input_path);
  } catch (err) {
    throw new TransformError("input file is no longer readable", { cause: err });
  }
  if (actual !== job.fingerprint) {
    throw new TransformError("input file content does not match its fingerprint");
  }

  await deps.transformer.transform({ job, input_path, output_path });

  try {
    const info = await stat(output_path);
    if (!info.isFile()) throw new Error("output path is not a file");
  } catch (err) {
    throw new TransformError("transformer reported success but wrote no output", { cause: err });
  }
}

/**
 * Runs one job to a terminal outcome. Never throws: failures become a
 * `job.failed` notification and the job is dropped without retry, along with
 * its stored input when no other live job shares the fingerprint.
 */
export async function processRenderJob(deps: RenderWorkerDeps, job: JobV1): Promise<ProcessJobResult> {
  const stats = deps.stats;
  const startedAt = Date.now();
  deps.jobs.setPhase(job.job_id, JobPhase.Processing);
  if (stats) stats.busy = true;

  try {
    deps.logger.info(traced({ event: "worker.job.started", fingerprint: job.fingerprint }));
    notify(deps, { type: "job.processing", job_id: job.job_id });

    const cached = deps.cache.lookup(job.fingerprint);
    if (cached) {
      if (stats) stats.cache_hits += 1;
      deps.logger.info(traced({ event: "worker.job.cache_hit", output_ref: cached }));
      notify(deps, {
        type: "job.completed",
        job_id: job.job_id,
        output_ref: cached,
        download_url: downloadUrlFor(cached),
        cached: true,
      });
      return "cache_hit";
    }

    try {
      await transformJob(deps, job);
    } catch (err) {
      if (stats) stats.failed += 1;
      deps.logger.error(
        traced({
          event: "worker.job.failed",
          transformer: deps.transformer.name,
          err_name: err instanceof Error ? err.name : "Error",
          err_message: err instanceof Error ? err.message : String(err),
        }),
        "render failed",
      );
      notify(deps, { type: "job.failed", job_id: job.job_id, reason: failureReason(err) });
      deps.jobs.remove(job.job_id);
      await discardInput(deps.jobs, deps.uploadDir, job, deps.logger);
      return "failed";
    }

    try {
      await deps.cache.record(job.fingerprint, job.output_ref);
    } catch (err) {
      deps.logger.warn(
        traced({
          event: "worker.cache.persist_failed",
          err_message: err instanceof Error ? err.message : String(err),
        }),
        "dedup cache entry kept in memory only",
      );
    }

    if (stats) stats.completed += 1;
    deps.logger.info(
      traced({ event: "worker.job.completed", output_ref: job.output_ref, duration_ms: Date.now() - startedAt }),
    );
    notify(deps, {
      type: "job.completed",
      job_id: job.job_id,
      output_ref: job.output_ref,
      download_url: downloadUrlFor(job.output_ref),
      cached: false,
    });
    return "completed";
  } finally {
    deps.jobs.remove(job.job_id);
    if (stats) {
      stats.processed += 1;
      stats.busy = false;
    }
  }
}

/** The single consumer of the work queue; resolves once the queue is closed and drained. */
export async function runRenderWorker(deps: RenderWorkerDeps): Promise<void> {
  deps.logger.info({ event: "worker.started", transformer: deps.transformer.name, capacity: deps.queue.capacity });
  for (;;) {
    const job = await deps.queue.dequeue();
    if (!job) break;
    await runWithTraceContext(
      { request_id: `job_run_${job.job_id}`, correlation_id: job.job_id, job_id: job.job_id, source: "worker" },
      () => processRenderJob(deps, job),
    );
  }
  deps.logger.info({ event: "worker.stopped" });
}
