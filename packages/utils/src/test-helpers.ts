/**
 * Shared Test Helpers
 *
 * Common utilities for tests across all packages
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { normalizedTmpdir } from './path-helpers.js';

/**
 * Create a unique temporary test directory
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(async () => {
 *   testDir = await createTempTestDir();
 * });
 * ```
 */
export async function createTempTestDir(): Promise<string> {
  // eslint-disable-next-line sonarjs/pseudo-random -- Safe for test directory uniqueness
  const testDir = join(normalizedTmpdir(), `crateflow-test-${Date.now()}-${Math.random()}`);
  await mkdir(testDir, { recursive: true });
  return testDir;
}

/**
 * Write a tree of files below a root directory
 *
 * @param root - Directory to write into
 * @param files - Map of relative path to file content
 *
 * @example
 * ```typescript
 * await writeFileTree(testDir, {
 *   'Cargo.toml': '[workspace]\nmembers = ["crates/*"]\n',
 *   'crates/utils/Cargo.toml': '[package]\nname = "utils"\nversion = "0.1.0"\n',
 * });
 * ```
 */
export async function writeFileTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
}
