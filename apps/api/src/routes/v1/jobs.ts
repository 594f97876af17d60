import type { FastifyInstance } from "fastify";

import { isJobId } from "@rendercache/shared";

import { buildContractError, httpStatusForReasonCode } from "../../contracts/render_contract.js";
import type { RenderService } from "../../pipeline/renderService.js";

export async function registerJobRoutes(app: FastifyInstance, service: RenderService): Promise<void> {
  app.get<{ Params: { jobId: string } }>("/v1/jobs/:jobId", async (req, reply) => {
    const jobId = req.params.jobId.trim();
    if (!isJobId(jobId)) {
      return reply
        .code(httpStatusForReasonCode("invalid_job_id"))
        .send(buildContractError("invalid_job_id", { job_id: req.params.jobId }));
    }

    const status = service.status(jobId);
    if (!status) {
      // finished jobs are forgotten; their outputs are reachable by fingerprint
      return reply
        .code(httpStatusForReasonCode("unknown_job"))
        .send(buildContractError("unknown_job", { job_id: jobId }));
    }
    return reply.send(status);
  });
}
