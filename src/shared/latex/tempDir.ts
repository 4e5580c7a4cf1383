/**
 * Scoped temporary directories.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Create a fresh directory under the OS temp dir, run `fn` in it and remove
 * the directory afterwards, whether `fn` resolves or throws.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
