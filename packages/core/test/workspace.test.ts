/**
 * Tests for workspace discovery and plan loading
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { createTempTestDir, writeFileTree } from '@crateflow/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigurationError, CycleError } from '../src/errors.js';
import { discoverWorkspace, findWorkspaceRoot, loadPublishPlan } from '../src/workspace.js';

import { FakeManifestSource } from './helpers/fixtures.js';

describe('workspace', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir();
    // Member directories must exist for glob expansion; manifests come from the fake source
    await writeFileTree(testDir, {
      'crates/utils/src/lib.rs': '',
      'crates/core/src/lib.rs': '',
      'crates/app/src/main.rs': '',
      'crates/scratch/notes.txt': '',
    });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function at(relative: string): string {
    return join(testDir, relative);
  }

  function chainWorkspace(overrides: Record<string, unknown> = {}): FakeManifestSource {
    return new FakeManifestSource({
      [testDir]: {
        workspace: {
          members: ['crates/*'],
          exclude: ['crates/scratch'],
          package: { version: '0.1.0' },
          dependencies: { utils: { path: 'crates/utils', version: '0.1.0' } },
        },
      },
      [at('crates/utils')]: { package: { name: 'utils', version: { workspace: true } } },
      [at('crates/core')]: {
        package: { name: 'core', version: { workspace: true } },
        dependencies: { utils: { workspace: true } },
      },
      [at('crates/app')]: {
        package: { name: 'app', version: '0.2.0', publish: false },
        dependencies: { core: { path: '../core' }, serde: '1.0' },
      },
      ...overrides,
    });
  }

  describe('findWorkspaceRoot', () => {
    it('should return the start directory when it is the root', async () => {
      expect(await findWorkspaceRoot(testDir, chainWorkspace())).toBe(testDir);
    });

    it('should walk up from a member directory', async () => {
      expect(await findWorkspaceRoot(at('crates/core'), chainWorkspace())).toBe(testDir);
    });

    it('should fail with MISSING_WORKSPACE when no manifest has a workspace table', async () => {
      const source = new FakeManifestSource({ [at('crates/core')]: { package: { name: 'core' } } });

      await expect(findWorkspaceRoot(at('crates/core'), source)).rejects.toThrow(ConfigurationError);
      await expect(findWorkspaceRoot(at('crates/core'), source)).rejects.toThrow('No Cargo workspace found');
    });
  });

  describe('discoverWorkspace', () => {
    it('should normalize every member with inherited values', async () => {
      const workspace = await discoverWorkspace(testDir, chainWorkspace());

      expect(workspace.root).toBe(testDir);
      expect(workspace.packages.map(pkg => [pkg.name, pkg.version, pkg.publishable])).toEqual([
        ['app', '0.2.0', false],
        ['core', '0.1.0', true],
        ['utils', '0.1.0', true],
      ]);
      expect(workspace.packages.map(pkg => pkg.workspaceDependencies)).toEqual([['core'], ['utils'], []]);
      expect(workspace.warnings).toEqual([]);
    });

    it('should warn about member directories without a manifest', async () => {
      const source = chainWorkspace({
        [testDir]: { workspace: { members: ['crates/*'], package: { version: '0.1.0' }, dependencies: { utils: { path: 'crates/utils' } } } },
      });

      const workspace = await discoverWorkspace(testDir, source);

      expect(workspace.warnings).toEqual([{
        code: 'MISSING_MANIFEST',
        directory: at('crates/scratch'),
        message: `Workspace member ${at('crates/scratch')} has no Cargo.toml`,
      }]);
      expect(workspace.packages).toHaveLength(3);
    });

    it('should include a root package', async () => {
      const source = chainWorkspace({
        [testDir]: {
          package: { name: 'umbrella', version: '1.0.0' },
          dependencies: { app: { path: 'crates/app' } },
          workspace: { members: ['crates/app'] },
        },
        [at('crates/app')]: { package: { name: 'app', version: '0.2.0' } },
      });

      const workspace = await discoverWorkspace(testDir, source);

      expect(workspace.packages.map(pkg => pkg.name)).toEqual(['umbrella', 'app']);
      expect(workspace.packages[0].workspaceDependencies).toEqual(['app']);
      expect(workspace.packages[0].manifestPath).toBe(join(testDir, 'Cargo.toml'));
    });

    it('should record a virtual member as skipped', async () => {
      const source = chainWorkspace({
        [testDir]: { workspace: { members: ['crates/utils', 'crates/scratch'] } },
        [at('crates/utils')]: { package: { name: 'utils', version: '0.1.0' } },
        [at('crates/scratch')]: { workspace: {} },
      });

      const workspace = await discoverWorkspace(testDir, source);

      expect(workspace.skipped).toEqual([
        { directory: at('crates/scratch'), reason: 'virtual manifest (no [package] section)' },
      ]);
    });

    it('should fail when the root has no workspace table', async () => {
      const source = new FakeManifestSource({ [testDir]: { package: { name: 'solo' } } });

      await expect(discoverWorkspace(testDir, source)).rejects.toThrow('has no [workspace] table');
    });

    it('should fail with INVALID_MANIFEST for malformed manifest data', async () => {
      const source = chainWorkspace({ [at('crates/core')]: { package: { name: 42 } } });

      await expect(discoverWorkspace(testDir, source)).rejects.toThrow(
        `Invalid manifest ${join(at('crates/core'), 'Cargo.toml')}`
      );
    });
  });

  describe('loadPublishPlan', () => {
    it('should order the workspace for publishing', async () => {
      const { plan } = await loadPublishPlan(testDir, chainWorkspace());

      expect(plan.packages.map(pkg => pkg.name)).toEqual(['utils', 'core', 'app']);
    });

    it('should surface cycles', async () => {
      const source = chainWorkspace({
        [at('crates/utils')]: {
          package: { name: 'utils', version: '0.1.0' },
          dependencies: { app: { path: '../app' } },
        },
      });

      await expect(loadPublishPlan(testDir, source)).rejects.toThrow(CycleError);
      await expect(loadPublishPlan(testDir, source)).rejects.toThrow(
        'Circular dependency detected: app -> core -> utils -> app'
      );
    });
  });
});
