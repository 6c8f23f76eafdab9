/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a crash or a failed download never leaves a
 * partial file at the target path. Parallel tasks writing into sibling
 * directories may race on parent creation; `mkdir -p` semantics make that
 * harmless.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Create the parent directory of a file (idempotent)
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
}

/**
 * Temporary sibling path, unique per process and call
 */
function tempPathFor(filePath: string): string {
  const nonce = Math.random().toString(36).slice(2, 8);
  return `${filePath}.${process.pid}.${Date.now()}.${nonce}.tmp`;
}

/**
 * Run `write` against a temporary path, then rename it onto `filePath`
 *
 * @example
 * ```typescript
 * await withAtomicFile('/data/resource/abc', async (tmp) => {
 *   await pipeline(body, createWriteStream(tmp));
 * });
 * ```
 */
export async function withAtomicFile(
  filePath: string,
  write: (tempPath: string) => Promise<void>
): Promise<void> {
  await ensureParentDir(filePath);
  const tempPath = tempPathFor(filePath);

  try {
    await write(tempPath);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}

/**
 * Atomically write string or binary data to a file
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  await withAtomicFile(filePath, async (tempPath) => {
    await writeFile(tempPath, data);
  });
}
