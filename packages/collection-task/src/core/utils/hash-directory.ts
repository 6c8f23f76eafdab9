/**
 * Directory content hashing for dependency fingerprints
 */

import { createHash } from 'node:crypto';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

async function listFiles(root: string, dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await listFiles(root, full, out);
    } else if (entry.isFile()) {
      out.push(relative(root, full).split(sep).join('/'));
    }
  }
}

/**
 * SHA-256 over every file under `dir`, in sorted relative-path order
 *
 * Both the path and the bytes of each file feed the digest, so renames and
 * edits both change it. A missing directory hashes as empty.
 */
export async function hashDirectory(dir: string): Promise<string> {
  const hash = createHash('sha256');

  const exists = await stat(dir).then(
    (s) => s.isDirectory(),
    () => false
  );
  if (!exists) {
    return hash.digest('hex');
  }

  const files: string[] = [];
  await listFiles(dir, dir, files);
  files.sort();

  for (const file of files) {
    hash.update(file);
    hash.update('\0');
    hash.update(await readFile(join(dir, file)));
    hash.update('\0');
  }

  return hash.digest('hex');
}
