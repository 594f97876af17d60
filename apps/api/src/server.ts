import websocket from "@fastify/websocket";
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";

import type { JobV1 } from "@rendercache/shared";

import type { AppConfig } from "./config.js";
import {
  buildContractError,
  httpStatusForReasonCode,
  type ContractReasonCode,
} from "./contracts/render_contract.js";
import { registerTraceHooks } from "./observability/registerTraceHooks.js";
import { CorrelationRegistry } from "./pipeline/correlationRegistry.js";
import type { DedupCache } from "./pipeline/dedupCache.js";
import { JobTable } from "./pipeline/jobTable.js";
import type { NotificationChannel } from "./pipeline/notificationChannel.js";
import { RenderService } from "./pipeline/renderService.js";
import { BoundedQueue } from "./pipeline/workQueue.js";
import type { Transformer } from "./render/transformer.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerV1Routes } from "./routes/v1/index.js";
import { newRenderWorkerStats, runRenderWorker } from "./runtime/renderWorker.js";

export interface BuildContext {
  config: AppConfig;
  cache: DedupCache;
  transformer: Transformer;
}

function reasonCodeForStatus(statusCode: number): ContractReasonCode {
  if (statusCode === 413) return "payload_too_large";
  if (statusCode === 415) return "invalid_content_type";
  if (statusCode >= 400 && statusCode < 500) return "invalid_input";
  return "internal_error";
}

export async function buildServer(ctx: BuildContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: ctx.config.logLevel } });

  const queue = new BoundedQueue<JobV1>(ctx.config.queueCapacity);
  const registry = new CorrelationRegistry<NotificationChannel>();
  const jobs = new JobTable();
  const workerStats = newRenderWorkerStats();
  const service = new RenderService({
    cache: ctx.cache,
    queue,
    registry,
    jobs,
    uploadDir: ctx.config.uploadDir,
    logger: app.log,
  });

  let worker: Promise<void> | null = null;
  let sweepTimer: NodeJS.Timeout | undefined;

  registerTraceHooks(app);
  await app.register(websocket);

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    const reason_code = reasonCodeForStatus(statusCode);
    if (reason_code === "internal_error") {
      req.log.error({ event: "http.unhandled_error", err_name: err.name, err_message: err.message });
    }
    return reply
      .code(httpStatusForReasonCode(reason_code))
      .send(buildContractError(reason_code, { code: err.code }, err.message));
  });

  await registerHealthRoutes(app, { queue, cache: ctx.cache, registry, jobs, worker: workerStats });
  await registerV1Routes(app, service, registry, ctx.config);

  app.addHook("onReady", async () => {
    worker = runRenderWorker({
      queue,
      cache: ctx.cache,
      registry,
      jobs,
      transformer: ctx.transformer,
      uploadDir: ctx.config.uploadDir,
      outputDir: ctx.config.outputDir,
      logger: app.log,
      stats: workerStats,
    }).catch((err: unknown) => {
      app.log.error(
        { event: "worker.crashed", err_message: err instanceof Error ? err.message : String(err) },
        "render worker stopped unexpectedly",
      );
    });

    sweepTimer = setInterval(() => {
      void service.sweepExpiredTickets(ctx.config.ticketTtlMs);
    }, ctx.config.ticketSweepMs);
    sweepTimer.unref();
  });

  // Keep process lifecycle explicit.
  app.addHook("onClose", async () => {
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = undefined;
    }
    queue.close();
    if (worker) await worker;
    worker = null;
  });

  return app;
}
