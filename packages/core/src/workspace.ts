/**
 * Workspace Discovery
 *
 * Locates the workspace root, reads every member manifest through a
 * {@link ManifestSource}, and chains resolver, normalizer, graph builder and
 * sorter into a publish plan.
 *
 * @packageDocumentation
 */

import { dirname, join, resolve } from 'node:path';

import { logDebug, normalizePath } from '@crateflow/utils';

import { ConfigurationError } from './errors.js';
import { buildDependencyGraph } from './graph.js';
import { normalizeManifest, type WorkspaceContext } from './manifest-normalizer.js';
import { parseRawManifest, type ManifestSource, type RawManifest, type WorkspaceSection } from './manifest-schema.js';
import { resolveMembers } from './member-resolver.js';
import { createPublishPlan } from './topo-sort.js';
import type { DiscoveredWorkspace, DiscoveryWarning, PublishPlan } from './types.js';

export interface DiscoverOptions {
  /** Count dev-dependencies as ordering edges (default: true) */
  includeDevDependencies?: boolean;
}

/**
 * Find the nearest directory at or above `startDir` whose manifest has a
 * `[workspace]` table
 *
 * @throws ConfigurationError MISSING_WORKSPACE when no ancestor qualifies
 */
export async function findWorkspaceRoot(startDir: string, source: ManifestSource): Promise<string> {
  let current = normalizePath(resolve(startDir));

  for (;;) {
    const document = await source.readManifest(current);
    if (document !== undefined && parseRawManifest(document).workspace !== undefined) {
      logDebug('workspace', 'Found workspace root', { root: current, startDir });
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new ConfigurationError(
        `No Cargo workspace found at or above ${startDir} (no Cargo.toml with a [workspace] table)`,
        'MISSING_WORKSPACE',
      );
    }
    current = parent;
  }
}

async function readRootManifest(
  root: string,
  source: ManifestSource
): Promise<{ manifest: RawManifest; workspace: WorkspaceSection }> {
  const document = await source.readManifest(root);
  if (document === undefined) {
    throw new ConfigurationError(`No Cargo.toml found in workspace root ${root}`, 'MISSING_WORKSPACE');
  }

  const manifest = parseRawManifest(document);
  if (manifest.workspace === undefined) {
    throw new ConfigurationError(
      `${document.path} has no [workspace] table`,
      'MISSING_WORKSPACE',
    );
  }

  return { manifest, workspace: manifest.workspace };
}

/**
 * Discover and normalize every package of a workspace
 *
 * The root manifest's own `[package]`, if any, is a member too. Member
 * directories without a Cargo.toml are reported as warnings.
 *
 * @param root - Workspace root (see {@link findWorkspaceRoot})
 *
 * @example
 * ```typescript
 * const workspace = await discoverWorkspace('/ws', new CargoManifestSource());
 * for (const warning of workspace.warnings) {
 *   console.warn(warning.message);
 * }
 * ```
 */
export async function discoverWorkspace(
  root: string,
  source: ManifestSource,
  options: DiscoverOptions = {}
): Promise<DiscoveredWorkspace> {
  const realRoot = normalizePath(resolve(root));
  const { manifest: rootManifest, workspace } = await readRootManifest(realRoot, source);

  const { directories, warnings: patternWarnings } = await resolveMembers(
    realRoot,
    workspace.members ?? [],
    { exclude: workspace.exclude },
  );
  const warnings: DiscoveryWarning[] = [...patternWarnings];

  const manifests = new Map<string, { manifest: RawManifest; manifestPath: string }>();
  if (rootManifest.package !== undefined) {
    manifests.set(realRoot, { manifest: rootManifest, manifestPath: join(realRoot, 'Cargo.toml') });
  }

  for (const directory of directories) {
    if (manifests.has(directory)) {
      continue;
    }

    const document = await source.readManifest(directory);
    if (document === undefined) {
      warnings.push({
        code: 'MISSING_MANIFEST',
        directory,
        message: `Workspace member ${directory} has no Cargo.toml`,
      });
      continue;
    }

    manifests.set(directory, { manifest: parseRawManifest(document), manifestPath: document.path });
  }

  const context: WorkspaceContext = {
    root: realRoot,
    memberDirectories: new Set(manifests.keys()),
    sharedPackage: workspace.package ?? {},
    sharedDependencies: workspace.dependencies ?? {},
    includeDevDependencies: options.includeDevDependencies ?? true,
  };

  const result: DiscoveredWorkspace = { root: realRoot, packages: [], skipped: [], warnings };

  for (const { manifest, manifestPath } of manifests.values()) {
    const normalized = normalizeManifest(manifest, manifestPath, context);
    if (normalized.kind === 'package') {
      result.packages.push(normalized.record);
    } else {
      result.skipped.push({ directory: normalized.directory, reason: normalized.reason });
    }
  }

  logDebug('workspace', 'Discovered workspace', {
    root: realRoot,
    packages: result.packages.map(pkg => pkg.name),
    skipped: result.skipped.length,
    warnings: warnings.length,
  });

  return result;
}

/**
 * Discover a workspace and compute its publish plan
 *
 * @throws ConfigurationError for workspace and manifest problems
 * @throws CycleError when members depend on each other in a cycle
 */
export async function loadPublishPlan(
  root: string,
  source: ManifestSource,
  options: DiscoverOptions = {}
): Promise<{ workspace: DiscoveredWorkspace; plan: PublishPlan }> {
  const workspace = await discoverWorkspace(root, source, options);
  const graph = buildDependencyGraph(workspace.packages);
  return { workspace, plan: createPublishPlan(graph) };
}
