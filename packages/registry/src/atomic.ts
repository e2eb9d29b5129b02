/**
 * Temp-then-rename replacement
 *
 * The artifact is built under a unique temporary name in the destination's
 * directory and renamed over the destination, so readers see either the old
 * or the new file. The temporary is removed when building or renaming fails.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export function temporaryPathFor(finalPath: string): string {
  const dir = path.dirname(finalPath);
  const base = path.basename(finalPath);
  return path.join(dir, `.${base}.${uuidv4().slice(0, 8)}.tmp`);
}

/**
 * Build a file at a temporary path with `build`, then rename it over `finalPath`
 */
export async function replaceAtomically(
  finalPath: string,
  build: (tempPath: string) => Promise<void>
): Promise<void> {
  const tempPath = temporaryPathFor(finalPath);
  try {
    await build(tempPath);
    await fs.rename(tempPath, finalPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Write `content` to `finalPath` atomically, flushing before the rename
 */
export async function writeFileAtomic(
  finalPath: string,
  content: string,
  mode: number = 0o644
): Promise<void> {
  await replaceAtomically(finalPath, async (tempPath) => {
    const handle = await fs.open(tempPath, 'wx', mode);
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    // open() honours the umask
    await fs.chmod(tempPath, mode);
  });
}

/**
 * Copy `source` to `finalPath` atomically with the given permission bits
 */
export async function copyFileAtomic(source: string, finalPath: string, mode: number): Promise<void> {
  await replaceAtomically(finalPath, async (tempPath) => {
    await fs.copyFile(source, tempPath);
    await fs.chmod(tempPath, mode);
  });
}
