import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";

export type Fingerprint = string;

const FINGERPRINT_RE = /^[0-9a-f]{64}$/;

export class InputUnreadableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputUnreadableError";
  }
}

export function isFingerprint(value: unknown): value is Fingerprint {
  return typeof value === "string" && FINGERPRINT_RE.test(value);
}

export function deriveFingerprint(bytes: Uint8Array): Fingerprint {
  return createHash("sha256").update(bytes).digest("hex");
}

export async function deriveFingerprintFromStream(stream: Readable): Promise<Fingerprint> {
  const hash = createHash("sha256");
  try {
    for await (const chunk of stream) {
      hash.update(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
  } catch (err) {
    throw new InputUnreadableError(
      `content stream could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return hash.digest("hex");
}

export function deriveFingerprintFromFile(filePath: string): Promise<Fingerprint> {
  return deriveFingerprintFromStream(createReadStream(filePath));
}
