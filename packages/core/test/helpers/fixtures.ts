/**
 * Shared fixtures for core tests
 */

import { join } from 'node:path';

import { buildDependencyGraph } from '../../src/graph.js';
import type { ManifestDocument, ManifestSource } from '../../src/manifest-schema.js';
import { createPublishPlan } from '../../src/topo-sort.js';
import type { PackageRecord, PublishPlan } from '../../src/types.js';

export const TEST_ROOT = '/ws';

/**
 * Build a package record directly, bypassing manifests
 */
export function makeRecord(
  name: string,
  workspaceDependencies: string[] = [],
  overrides: Partial<PackageRecord> = {}
): PackageRecord {
  return {
    name,
    version: '0.1.0',
    path: join(TEST_ROOT, 'crates', name),
    manifestPath: join(TEST_ROOT, 'crates', name, 'Cargo.toml'),
    publishable: true,
    workspaceDependencies: [...workspaceDependencies].sort(),
    externalPathDependencies: [],
    ...overrides,
  };
}

export function makePlan(records: PackageRecord[]): PublishPlan {
  return createPublishPlan(buildDependencyGraph(records));
}

/**
 * utils <- core <- app
 */
export function chainRecords(): PackageRecord[] {
  return [
    makeRecord('app', ['core']),
    makeRecord('core', ['utils']),
    makeRecord('utils'),
  ];
}

/**
 * Manifest source backed by a map of directory to parsed manifest data
 */
export class FakeManifestSource implements ManifestSource {
  public readonly reads: string[] = [];

  constructor(private readonly manifests: Record<string, unknown>) {}

  public async readManifest(directory: string): Promise<ManifestDocument | undefined> {
    this.reads.push(directory);
    if (!(directory in this.manifests)) {
      return undefined;
    }
    return { path: join(directory, 'Cargo.toml'), data: this.manifests[directory] };
  }
}
