/**
 * Manifest Normalizer
 *
 * Turns one member's structured Cargo.toml data into a frozen PackageRecord.
 * Pure function of (manifest, manifest path, workspace context): workspace
 * level values are passed in explicitly, never read from ambient state.
 */

import { dirname, resolve } from 'node:path';

import { normalizePath } from '@crateflow/utils';

import { ConfigurationError } from './errors.js';
import type {
  DependencySections,
  DependencySpec,
  DependencyTable,
  PackageSection,
  RawManifest,
  SharedPackageFields,
} from './manifest-schema.js';
import type { PackageRecord } from './types.js';

/**
 * Read-only workspace values consulted during normalization
 */
export interface WorkspaceContext {
  /** Absolute, real workspace root */
  readonly root: string;
  /** Real paths of every member directory that has a manifest */
  readonly memberDirectories: ReadonlySet<string>;
  /** `[workspace.package]` */
  readonly sharedPackage: Readonly<SharedPackageFields>;
  /** `[workspace.dependencies]` */
  readonly sharedDependencies: Readonly<DependencyTable>;
  /** Count `dev-dependencies` as ordering edges */
  readonly includeDevDependencies: boolean;
}

export type NormalizeResult =
  | { kind: 'package'; record: PackageRecord }
  | { kind: 'skipped'; directory: string; reason: string };

/** Version cargo assumes when a manifest omits it */
const DEFAULT_VERSION = '0.0.0';

function inheritanceError(packageName: string, field: string, table: string): ConfigurationError {
  return new ConfigurationError(
    `Package "${packageName}" sets ${field}.workspace = true, but ${table} does not define "${field}"`,
    'INHERITANCE_UNRESOLVED',
    { packageName },
  );
}

function resolveVersion(name: string, value: PackageSection['version'], context: WorkspaceContext): string {
  if (value === undefined) {
    return DEFAULT_VERSION;
  }
  if (typeof value === 'string') {
    return value;
  }
  const shared = context.sharedPackage.version;
  if (shared === undefined) {
    throw inheritanceError(name, 'version', '[workspace.package]');
  }
  return shared;
}

function isPublishDisabled(flag: boolean | string[]): boolean {
  return flag === false || (Array.isArray(flag) && flag.length === 0);
}

function resolvePublishable(name: string, value: PackageSection['publish'], context: WorkspaceContext): boolean {
  if (value === undefined) {
    return true;
  }
  if (typeof value === 'boolean' || Array.isArray(value)) {
    return !isPublishDisabled(value);
  }
  const shared = context.sharedPackage.publish;
  if (shared === undefined) {
    throw inheritanceError(name, 'publish', '[workspace.package]');
  }
  return !isPublishDisabled(shared);
}

interface DependencyTarget {
  /** Package name the dependency refers to (rename-aware) */
  packageName: string;
  /** Absolute path when the dependency is path-based */
  path?: string;
}

/**
 * Work out what a dependency entry points at
 *
 * `{ workspace = true }` entries take their path from
 * `[workspace.dependencies]`, where paths are relative to the workspace root.
 */
function resolveDependencyTarget(
  ownerName: string,
  key: string,
  spec: DependencySpec,
  packageDirectory: string,
  context: WorkspaceContext
): DependencyTarget {
  if (typeof spec === 'string') {
    return { packageName: key };
  }

  if (spec.workspace === true) {
    const shared = Object.hasOwn(context.sharedDependencies, key) ? context.sharedDependencies[key] : undefined;
    if (shared === undefined) {
      throw new ConfigurationError(
        `Package "${ownerName}" sets dependency "${key}" to workspace = true, ` +
        `but [workspace.dependencies] has no "${key}" entry`,
        'INHERITANCE_UNRESOLVED',
        { packageName: ownerName },
      );
    }
    if (typeof shared === 'string') {
      return { packageName: spec.package ?? key };
    }
    return {
      packageName: spec.package ?? shared.package ?? key,
      path: shared.path === undefined ? undefined : resolve(context.root, shared.path),
    };
  }

  return {
    packageName: spec.package ?? key,
    path: spec.path === undefined ? undefined : resolve(packageDirectory, spec.path),
  };
}

function collectDependencyTables(manifest: RawManifest, includeDev: boolean): DependencyTable[] {
  const sections: DependencySections[] = [manifest, ...Object.values(manifest.target ?? {})];
  const tables: DependencyTable[] = [];

  for (const section of sections) {
    for (const table of [
      section['dependencies'],
      section['build-dependencies'],
      includeDev ? section['dev-dependencies'] : undefined,
    ]) {
      if (table !== undefined) {
        tables.push(table);
      }
    }
  }

  return tables;
}

/**
 * Normalize one manifest into a package record
 *
 * A dependency becomes a workspace dependency if and only if its path
 * resolves to a member directory. Registry dependencies are excluded even
 * when their name matches a member.
 *
 * @param manifest - Validated manifest data
 * @param manifestPath - Absolute path of the Cargo.toml
 * @param context - Workspace values for inheritance and membership
 * @returns The record, or a skip decision for virtual manifests
 * @throws ConfigurationError INHERITANCE_UNRESOLVED when a `workspace = true`
 *   field has no workspace value
 *
 * @example
 * ```typescript
 * const result = normalizeManifest(manifest, '/ws/crates/core/Cargo.toml', context);
 * if (result.kind === 'package') {
 *   console.log(result.record.version);
 * }
 * ```
 */
export function normalizeManifest(
  manifest: RawManifest,
  manifestPath: string,
  context: WorkspaceContext
): NormalizeResult {
  const directory = normalizePath(dirname(manifestPath));
  const section = manifest.package;

  if (section === undefined) {
    return { kind: 'skipped', directory, reason: 'virtual manifest (no [package] section)' };
  }

  const name = section.name;
  const internal = new Set<string>();
  const externalPaths = new Set<string>();

  for (const table of collectDependencyTables(manifest, context.includeDevDependencies)) {
    for (const [key, spec] of Object.entries(table)) {
      const target = resolveDependencyTarget(name, key, spec, directory, context);
      if (target.path === undefined) {
        continue;
      }

      const dependencyDirectory = normalizePath(target.path);
      if (context.memberDirectories.has(dependencyDirectory)) {
        internal.add(target.packageName);
      } else {
        externalPaths.add(dependencyDirectory);
      }
    }
  }

  const record: PackageRecord = Object.freeze({
    name,
    version: resolveVersion(name, section.version, context),
    path: directory,
    manifestPath,
    publishable: resolvePublishable(name, section.publish, context),
    workspaceDependencies: Object.freeze([...internal].sort()),
    externalPathDependencies: Object.freeze([...externalPaths].sort()),
  });

  return { kind: 'package', record };
}
