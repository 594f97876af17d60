import type { FastifyInstance } from "fastify";

import type { AppConfig } from "../../config.js";
import type { CorrelationRegistry } from "../../pipeline/correlationRegistry.js";
import type { NotificationChannel } from "../../pipeline/notificationChannel.js";
import type { RenderService } from "../../pipeline/renderService.js";
import { registerChannelRoutes } from "./channel.js";
import { registerJobRoutes } from "./jobs.js";
import { registerOutputRoutes } from "./outputs.js";
import { registerSubmissionRoutes } from "./submissions.js";

export async function registerV1Routes(
  app: FastifyInstance,
  service: RenderService,
  registry: CorrelationRegistry<NotificationChannel>,
  config: AppConfig,
): Promise<void> {
  await registerSubmissionRoutes(app, service, { maxUploadBytes: config.maxUploadBytes });
  await registerJobRoutes(app, service);
  await registerChannelRoutes(app, service, registry);
  await registerOutputRoutes(app, { outputDir: config.outputDir });
}
