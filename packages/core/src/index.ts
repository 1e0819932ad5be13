/**
 * @crateflow/core
 *
 * Dependency-ordered, resumable publishing for Cargo workspaces.
 *
 * ## Features
 *
 * - **Member Discovery**: Literal and glob `members`, `exclude`, root packages
 * - **Inheritance**: `version.workspace = true` and `{ workspace = true }` dependencies
 * - **Deterministic Order**: Kahn's algorithm with a lexicographic tie-break
 * - **Cycle Reports**: A concrete cycle, never a partial order
 * - **Resumable Runs**: Atomic checkpoint validated against the current plan
 *
 * ## Example Usage
 *
 * ```typescript
 * import { FileCheckpointStore, loadPublishPlan, runPublishPlan } from '@crateflow/core';
 *
 * const { workspace, plan } = await loadPublishPlan('/ws', manifestSource);
 *
 * const report = await runPublishPlan(plan, {
 *   publish: cargoPublish,
 *   checkpointStore: new FileCheckpointStore(workspace.root, 'target/crateflow-checkpoint.yaml'),
 *   resume: true,
 * });
 *
 * if (report.status === 'failed') {
 *   console.error(report.failed?.error.message);
 * }
 * ```
 *
 * @packageDocumentation
 */

export type {
  PackageRecord,
  DiscoveryWarning,
  SkippedManifest,
  GraphEdge,
  DependencyGraph,
  PublishPlan,
  DiscoveredWorkspace,
} from './types.js';

export {
  CrateflowError,
  ConfigurationError,
  CycleError,
  CorruptCheckpointError,
  StaleCheckpointError,
  PublishActionError,
  isCrateflowError,
  type ErrorKind,
  type ErrorCode,
  type ConfigurationErrorCode,
} from './errors.js';

export {
  RawManifestSchema,
  DependencySpecSchema,
  PackageSectionSchema,
  WorkspaceSectionSchema,
  parseRawManifest,
  type RawManifest,
  type DependencySpec,
  type DependencyTable,
  type PackageSection,
  type WorkspaceSection,
  type SharedPackageFields,
  type ManifestDocument,
  type ManifestSource,
} from './manifest-schema.js';

export { resolveMembers, type ResolveMembersOptions, type ResolvedMembers } from './member-resolver.js';

export { normalizeManifest, type WorkspaceContext, type NormalizeResult } from './manifest-normalizer.js';

export { buildDependencyGraph, compareNames } from './graph.js';

export { sortTopologically, createPublishPlan, fingerprintPlan, type SortResult } from './topo-sort.js';

export {
  CHECKPOINT_FORMAT_VERSION,
  CheckpointSchema,
  createEmptyCheckpoint,
  findCheckpointProblems,
  validateCheckpoint,
  FileCheckpointStore,
  InMemoryCheckpointStore,
  type Checkpoint,
  type CompletedEntry,
  type CheckpointStore,
  type CheckpointValidationOptions,
} from './checkpoint.js';

export {
  runPublishPlan,
  type PublishAction,
  type PublishRequest,
  type PublishedCheck,
  type PublishOptions,
  type PublishReport,
  type PublishFailure,
  type PackageOutcome,
  type SkippedPackage,
  type SkipReason,
} from './scheduler.js';

export {
  findWorkspaceRoot,
  discoverWorkspace,
  loadPublishPlan,
  type DiscoverOptions,
} from './workspace.js';
