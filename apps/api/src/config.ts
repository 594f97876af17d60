import path from "node:path";

export interface AppConfig {
  port: number;
  host: string;
  dataDir: string;
  uploadDir: string;
  outputDir: string;
  cacheFile: string;
  queueCapacity: number;
  maxUploadBytes: number;
  ticketTtlMs: number;
  ticketSweepMs: number;
  renderSize: number;
  logLevel: string;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function parsePort(raw: string | undefined): number {
  if (!raw) return 3000;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0 || n > 65535) {
    throw new Error("PORT must be an integer between 1 and 65535");
  }
  return n;
}

function parsePositiveInt(
  raw: string | undefined,
  name: string,
  defaultValue: number,
): number {
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return n;
}

function parseOptionalPath(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const v = raw.trim();
  return v.length ? path.resolve(v) : undefined;
}

function parseLogLevel(raw: string | undefined): string {
  if (!raw) return "info";
  const value = raw.trim().toLowerCase();
  if (!(LOG_LEVELS as readonly string[]).includes(value)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join("/")}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = parseOptionalPath(env.DATA_DIR) ?? path.resolve("data");

  return {
    port: parsePort(env.PORT),
    host: env.HOST?.trim() || "127.0.0.1",
    dataDir,
    uploadDir: parseOptionalPath(env.UPLOAD_DIR) ?? path.join(dataDir, "uploads"),
    outputDir: parseOptionalPath(env.OUTPUT_DIR) ?? path.join(dataDir, "output"),
    cacheFile: parseOptionalPath(env.CACHE_FILE) ?? path.join(dataDir, "file_hashes.json"),
    queueCapacity: parsePositiveInt(env.QUEUE_CAPACITY, "QUEUE_CAPACITY", 100),
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, "MAX_UPLOAD_BYTES", 50 * 1024 * 1024),
    ticketTtlMs: parsePositiveInt(env.TICKET_TTL_MS, "TICKET_TTL_MS", 10 * 60 * 1000),
    ticketSweepMs: parsePositiveInt(env.TICKET_SWEEP_MS, "TICKET_SWEEP_MS", 60 * 1000),
    renderSize: parsePositiveInt(env.RENDER_SIZE, "RENDER_SIZE", 1024),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
