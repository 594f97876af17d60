import type { FastifyInstance } from "fastify";

import type { JobV1 } from "@rendercache/shared";

import type { CorrelationRegistry } from "../pipeline/correlationRegistry.js";
import type { DedupCache } from "../pipeline/dedupCache.js";
import type { JobTable } from "../pipeline/jobTable.js";
import type { BoundedQueue } from "../pipeline/workQueue.js";
import type { RenderWorkerStats } from "../runtime/renderWorker.js";

export interface HealthSources {
  queue: BoundedQueue<JobV1>;
  cache: DedupCache;
  registry: Pick<CorrelationRegistry, "size">;
  jobs: JobTable;
  worker: RenderWorkerStats;
}

export async function registerHealthRoutes(app: FastifyInstance, sources: HealthSources): Promise<void> {
  app.get("/health", async () => {
    const { queue, cache, registry, jobs, worker } = sources;
    return {
      ok: !queue.isClosed,
      queue: {
        depth: queue.size,
        capacity: queue.capacity,
        blocked_producers: queue.blockedProducers,
        closed: queue.isClosed,
      },
      jobs: jobs.countByPhase(),
      cache: { entries: cache.size },
      registry: { channels: registry.size },
      worker: { ...worker },
    };
  });
}
