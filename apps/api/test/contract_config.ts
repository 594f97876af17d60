import assert from "node:assert/strict";
import path from "node:path";

import { loadConfig } from "../src/config.js";

async function main(): Promise<void> {
  {
    const config = loadConfig({});
    const dataDir = path.resolve("data");
    assert.deepEqual(config, {
      port: 3000,
      host: "127.0.0.1",
      dataDir,
      uploadDir: path.join(dataDir, "uploads"),
      outputDir: path.join(dataDir, "output"),
      cacheFile: path.join(dataDir, "file_hashes.json"),
      queueCapacity: 100,
      maxUploadBytes: 50 * 1024 * 1024,
      ticketTtlMs: 600_000,
      ticketSweepMs: 60_000,
      renderSize: 1024,
      logLevel: "info",
    });
  }

  {
    const config = loadConfig({
      PORT: "8080",
      HOST: " 0.0.0.0 ",
      DATA_DIR: "/srv/render",
      OUTPUT_DIR: "/var/renders",
      QUEUE_CAPACITY: "5",
      RENDER_SIZE: "256",
      LOG_LEVEL: "DEBUG",
    });
    assert.equal(config.port, 8080);
    assert.equal(config.host, "0.0.0.0");
    assert.equal(config.dataDir, "/srv/render");
    assert.equal(config.uploadDir, "/srv/render/uploads");
    assert.equal(config.outputDir, "/var/renders");
    assert.equal(config.cacheFile, "/srv/render/file_hashes.json");
    assert.equal(config.queueCapacity, 5);
    assert.equal(config.renderSize, 256);
    assert.equal(config.logLevel, "debug");
  }

  assert.throws(() => loadConfig({ PORT: "0" }), /PORT must be an integer between 1 and 65535/);
  assert.throws(() => loadConfig({ PORT: "70000" }), /PORT must be/);
  assert.throws(() => loadConfig({ QUEUE_CAPACITY: "-1" }), /QUEUE_CAPACITY must be a positive integer/);
  assert.throws(() => loadConfig({ MAX_UPLOAD_BYTES: "1.5" }), /MAX_UPLOAD_BYTES must be a positive integer/);
  assert.throws(() => loadConfig({ TICKET_TTL_MS: "soon" }), /TICKET_TTL_MS must be a positive integer/);
  assert.throws(() => loadConfig({ LOG_LEVEL: "loud" }), /LOG_LEVEL must be one of/);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
