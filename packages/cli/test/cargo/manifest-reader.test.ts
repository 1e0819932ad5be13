import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { ConfigurationError } from '@crateflow/core';
import { createTempTestDir, writeFileTree } from '@crateflow/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { CargoManifestSource } from '../../src/cargo/manifest-reader.js';

describe('CargoManifestSource', () => {
  let testDir: string;
  const source = new CargoManifestSource();

  beforeEach(async () => {
    testDir = await createTempTestDir();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should parse Cargo.toml into plain tables', async () => {
    await writeFileTree(testDir, {
      'Cargo.toml': '[package]\nname = "core"\nversion.workspace = true\n\n[dependencies]\nutils = { path = "../utils" }\n',
    });

    const manifest = await source.readManifest(testDir);

    expect(manifest).toEqual({
      path: join(testDir, 'Cargo.toml'),
      data: {
        package: { name: 'core', version: { workspace: true } },
        dependencies: { utils: { path: '../utils' } },
      },
    });
  });

  it('should return undefined when the directory has no manifest', async () => {
    expect(await source.readManifest(testDir)).toBeUndefined();
  });

  it('should return undefined when the directory does not exist', async () => {
    expect(await source.readManifest(join(testDir, 'missing'))).toBeUndefined();
  });

  it('should fail with INVALID_MANIFEST for malformed TOML', async () => {
    await writeFileTree(testDir, { 'Cargo.toml': '[package\nname = "core"\n' });

    const error: unknown = await source.readManifest(testDir).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: 'INVALID_MANIFEST' });
    expect(error instanceof Error ? error.message : '').toContain(`Invalid manifest ${join(testDir, 'Cargo.toml')}: `);
  });
});
