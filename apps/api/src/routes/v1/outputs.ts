import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";

import type { FastifyInstance } from "fastify";

import {
  assertOutputName,
  buildContractError,
  errorPayloadFromUnknown,
  httpStatusForReasonCode,
} from "../../contracts/render_contract.js";

export async function registerOutputRoutes(app: FastifyInstance, opts: { outputDir: string }): Promise<void> {
  app.get<{ Params: { name: string } }>("/v1/outputs/:name", async (req, reply) => {
    const name = req.params.name;
    try {
      assertOutputName(name);
    } catch (err) {
      const payload = errorPayloadFromUnknown(err, "invalid_output_name");
      return reply.code(httpStatusForReasonCode(payload.reason_code)).send(payload);
    }

    const filePath = path.join(opts.outputDir, name);
    try {
      const info = await stat(filePath);
      if (!info.isFile()) throw new Error("not a file");
    } catch {
      return reply
        .code(httpStatusForReasonCode("output_not_found"))
        .send(buildContractError("output_not_found", { name }));
    }

    return reply
      .type("image/png")
      .header("cache-control", "public, max-age=31536000, immutable")
      .send(createReadStream(filePath));
  });
}
