/**
 * Cargo Manifest Reader
 *
 * Reads Cargo.toml files from disk and hands their parsed tables to the core.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { ConfigurationError, type ManifestDocument, type ManifestSource } from '@crateflow/core';
import { logDebug } from '@crateflow/utils';
import { parse as parseToml } from 'smol-toml';

export const MANIFEST_FILE_NAME = 'Cargo.toml';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Manifest source backed by the filesystem
 *
 * @example
 * ```typescript
 * const source = new CargoManifestSource();
 * const root = await findWorkspaceRoot(process.cwd(), source);
 * ```
 */
export class CargoManifestSource implements ManifestSource {
  public async readManifest(directory: string): Promise<ManifestDocument | undefined> {
    const path = join(directory, MANIFEST_FILE_NAME);

    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }

    try {
      const data = parseToml(content);
      logDebug('workspace', `Parsed ${path}`);
      return { path, data };
    } catch (error) {
      throw new ConfigurationError(
        `Invalid manifest ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_MANIFEST',
        { cause: error },
      );
    }
  }
}
