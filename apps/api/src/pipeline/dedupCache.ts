import { readFile } from "node:fs/promises";

import { atomicWriteFile } from "../storage/atomicWrite.js";
import { isFingerprint, type Fingerprint } from "./fingerprint.js";

export class CacheCorruptError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`dedup cache at ${filePath} is corrupt: ${reason}`, options);
    this.name = "CacheCorruptError";
    this.filePath = filePath;
  }
}

export class CachePersistenceError extends Error {
  readonly fingerprint: Fingerprint;

  constructor(fingerprint: Fingerprint, options: { cause: unknown }) {
    const detail = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`failed to persist dedup cache entry ${fingerprint}: ${detail}`, options);
    this.name = "CachePersistenceError";
    this.fingerprint = fingerprint;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function parseEntries(filePath: string, raw: string): Map<Fingerprint, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CacheCorruptError(filePath, err instanceof Error ? err.message : "invalid JSON");
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new CacheCorruptError(filePath, "top-level value must be an object");
  }

  const entries = new Map<Fingerprint, string>();
  for (const [key, value] of Object.entries(parsed)) {
    if (!isFingerprint(key)) {
      throw new CacheCorruptError(filePath, `key ${JSON.stringify(key)} is not a fingerprint`);
    }
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new CacheCorruptError(filePath, `value for ${key} must be a non-empty string`);
    }
    entries.set(key, value);
  }
  return entries;
}

/**
 * Persistent fingerprint -> output reference map.
 *
 * Writes are write-through: `record` updates the in-memory map and then
 * rewrites the whole file. Flushes run one at a time in call order, each
 * serialising the map as it is when that flush starts, so the file always
 * holds a complete map and the latest write wins. A failed flush keeps the
 * in-memory entry; the next successful flush or a restart reconciles disk.
 */
export class DedupCache {
  private readonly filePath: string;
  private readonly entriesByFingerprint: Map<Fingerprint, string>;
  private flushChain: Promise<void> = Promise.resolve();

  private constructor(filePath: string, entries: Map<Fingerprint, string>) {
    this.filePath = filePath;
    this.entriesByFingerprint = entries;
  }

  /** Missing file means an empty cache; anything unreadable or unparseable is fatal. */
  static async open(filePath: string): Promise<DedupCache> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return new DedupCache(filePath, new Map());
      const detail = err instanceof Error ? err.message : String(err);
      throw new CacheCorruptError(filePath, `unreadable: ${detail}`, { cause: err });
    }
    return new DedupCache(filePath, parseEntries(filePath, raw));
  }

  get size(): number {
    return this.entriesByFingerprint.size;
  }

  get path(): string {
    return this.filePath;
  }

  lookup(fingerprint: Fingerprint): string | null {
    return this.entriesByFingerprint.get(fingerprint) ?? null;
  }

  entries(): Array<[Fingerprint, string]> {
    return [...this.entriesByFingerprint.entries()];
  }

  async record(fingerprint: Fingerprint, outputRef: string): Promise<void> {
    if (!isFingerprint(fingerprint)) {
      throw new TypeError(`not a fingerprint: ${fingerprint}`);
    }
    if (outputRef.trim().length === 0) {
      throw new TypeError("outputRef must be a non-empty string");
    }

    this.entriesByFingerprint.set(fingerprint, outputRef);

    const flush = this.flushChain.then(() => this.flush());
    // the caller observes the failure; later flushes still run
    this.flushChain = flush.catch(() => undefined);
    try {
      await flush;
    } catch (err) {
      throw new CachePersistenceError(fingerprint, { cause: err });
    }
  }

  private async flush(): Promise<void> {
    const snapshot = Object.fromEntries(this.entriesByFingerprint);
    await atomicWriteFile(this.filePath, JSON.stringify(snapshot, null, 2));
  }
}
