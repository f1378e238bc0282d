import { open, rename, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';

/**
 * Write `data` to a temporary file beside `filePath`, flush it to disk, then
 * rename it over `filePath`. Readers see either the old or the new contents.
 * The temporary file is removed on every failure path.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.${String(process.pid)}.${randomBytes(4).toString('hex')}.tmp`;
  let handle: FileHandle | undefined;
  let renamed = false;

  try {
    handle = await open(tempPath, 'w');
    await handle.writeFile(data);
    await handle.sync();
    const written = handle;
    handle = undefined;
    await written.close();

    await rename(tempPath, filePath);
    renamed = true;
  } finally {
    if (handle) await handle.close();
    if (!renamed) await rm(tempPath, { force: true });
  }
}
