/**
 * Atomic file replacement
 *
 * @package @crateflow/utils
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Write a file atomically using temp file + rename
 *
 * The temp file lives in the target's directory so the rename never crosses
 * a filesystem boundary. Readers see either the previous content or the new
 * content, never a partial write.
 *
 * @param filePath - Target file path
 * @param content - Content to write
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.tmp.${Date.now()}.${randomBytes(8).toString('hex')}`;
  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
