/**
 * Path Helpers
 *
 * Real-path utilities. Workspace member directories are compared by their
 * real path, so a member reached through a symlink or a Windows 8.3 short
 * name (e.g., RUNNER~1) is still recognised as the same directory.
 *
 * @package @crateflow/utils
 */

import { tmpdir } from 'node:os';
import { realpathSync } from 'node:fs';

/**
 * Get the temp directory as a real path
 *
 * On macOS tmpdir() is a symlink into /private, and on Windows it may be an
 * 8.3 short name; both break equality checks against paths the filesystem
 * reports back.
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}

/**
 * Resolve a path to its real form, or return it unchanged if it does not exist
 */
export function normalizePath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}
