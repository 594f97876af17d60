import type { FastifyInstance } from "fastify";

import {
  assertUploadBody,
  errorPayloadFromUnknown,
  httpStatusForReasonCode,
} from "../../contracts/render_contract.js";
import type { RenderService } from "../../pipeline/renderService.js";

export const UPLOAD_CONTENT_TYPES = ["application/octet-stream", "model/stl"];

export async function registerSubmissionRoutes(
  app: FastifyInstance,
  service: RenderService,
  opts: { maxUploadBytes: number },
): Promise<void> {
  app.addContentTypeParser(
    UPLOAD_CONTENT_TYPES,
    { parseAs: "buffer", bodyLimit: opts.maxUploadBytes },
    (_req, body, done) => {
      done(null, body);
    },
  );

  app.post<{ Body: unknown }>("/v1/submissions", async (req, reply) => {
    try {
      assertUploadBody(req.body);
      const result = await service.submit(req.body);
      return reply.code(result.status === "cached" ? 200 : 202).send(result);
    } catch (err) {
      const payload = errorPayloadFromUnknown(err, "internal_error");
      if (payload.reason_code === "internal_error") {
        req.log.error({ event: "submission.failed", err_message: payload.reason });
      }
      return reply.code(httpStatusForReasonCode(payload.reason_code)).send(payload);
    }
  });
}
