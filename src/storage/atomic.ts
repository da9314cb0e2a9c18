/**
 * Atomic file replacement: write a temp file beside the target, fsync,
 * then rename over it. Readers see the old file or the new one, never
 * a partial write. Each call gets its own temp file, so overlapping
 * writers never share one.
 */

import { mkdir, open, rename, rm } from 'node:fs/promises';
import * as path from 'node:path';

let tempCounter = 0;

export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${++tempCounter}.tmp`;
  const handle = await open(tempPath, 'w');
  try {
    await handle.writeFile(data);
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(tempPath, { force: true });
    throw error;
  }
  await handle.close();
  await rename(tempPath, filePath);
}
