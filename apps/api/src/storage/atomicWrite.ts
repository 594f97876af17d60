import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Writes to a sibling temp file and renames it over the target, so readers
 * see either the previous content or the new content, never a partial file.
 */
export async function atomicWriteFile(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = path.dirname(filePath);
  const tmp = `${filePath}.tmp.${randomBytes(4).toString("hex")}`;

  await mkdir(dir, { recursive: true });
  try {
    await writeFile(tmp, content, { mode: 0o644 });
    await rename(tmp, filePath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
