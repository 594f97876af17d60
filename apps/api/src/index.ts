import { mkdir } from "node:fs/promises";

import { loadConfig } from "./config.js";
import { CacheCorruptError, DedupCache } from "./pipeline/dedupCache.js";
import { StlPngTransformer } from "./render/stlPngTransformer.js";
import { buildServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  await mkdir(config.uploadDir, { recursive: true });
  await mkdir(config.outputDir, { recursive: true });

  const cache = await DedupCache.open(config.cacheFile);
  const transformer = new StlPngTransformer({ width: config.renderSize, height: config.renderSize });
  const app = await buildServer({ config, cache, transformer });
  app.log.info({ event: "cache.loaded", entries: cache.size, path: cache.path });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ event: "process.shutdown", signal });
    void app.close().then(
      () => {
        process.exitCode = 0;
      },
      (err: unknown) => {
        app.log.error({ event: "process.shutdown_failed", err_message: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof CacheCorruptError ? `fatal: ${err.message}` : err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
