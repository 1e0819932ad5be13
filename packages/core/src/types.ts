/**
 * Core types for crateflow
 *
 * Records produced by workspace discovery and consumed by the graph builder,
 * sorter and scheduler. All records are frozen once built.
 */

/**
 * One workspace member, normalized from its Cargo.toml
 */
export interface PackageRecord {
  /** Package name, unique within the workspace */
  readonly name: string;

  /** Resolved version (never a `{ workspace = true }` marker) */
  readonly version: string;

  /** Absolute package directory */
  readonly path: string;

  /** Absolute path of the package's Cargo.toml */
  readonly manifestPath: string;

  /** False only when the manifest sets `publish = false` or `publish = []` */
  readonly publishable: boolean;

  /** Sorted names of other members this package depends on */
  readonly workspaceDependencies: readonly string[];

  /** Path dependencies that point outside the workspace (not ordering edges) */
  readonly externalPathDependencies: readonly string[];
}

/**
 * Non-fatal discovery problem, surfaced to the caller
 */
export interface DiscoveryWarning {
  code: 'EMPTY_PATTERN' | 'MISSING_MANIFEST';
  message: string;
  /** Member pattern that matched nothing */
  pattern?: string;
  /** Member directory without a Cargo.toml */
  directory?: string;
}

/**
 * Directory that was read but produced no package record
 */
export interface SkippedManifest {
  directory: string;
  reason: string;
}

/**
 * Edge from a dependent (`from`) to its dependency (`to`), as node indices
 */
export interface GraphEdge {
  readonly from: number;
  readonly to: number;
}

/**
 * Dependency graph stored as an arena of records plus index-based edges
 *
 * Nodes are ordered by name, so index order is the lexicographic tie-break
 * order used by the sorter.
 */
export interface DependencyGraph {
  readonly nodes: readonly PackageRecord[];
  readonly indexByName: ReadonlyMap<string, number>;
  readonly edges: readonly GraphEdge[];
  /** For each node, indices of the nodes it depends on (ascending) */
  readonly dependenciesOf: readonly (readonly number[])[];
  /** For each node, indices of the nodes that depend on it (ascending) */
  readonly dependentsOf: readonly (readonly number[])[];
}

/**
 * Publish order: every dependency precedes its dependents
 */
export interface PublishPlan {
  readonly packages: readonly PackageRecord[];
  /** Short SHA-256 over the ordered packages, versions and edges */
  readonly fingerprint: string;
}

/**
 * Result of workspace discovery
 */
export interface DiscoveredWorkspace {
  /** Absolute, real workspace root */
  root: string;
  packages: PackageRecord[];
  skipped: SkippedManifest[];
  warnings: DiscoveryWarning[];
}
