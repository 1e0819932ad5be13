/**
 * Graph Builder
 *
 * Links normalized package records into an index-based dependency graph.
 */

import { logDebug } from '@crateflow/utils';

import { ConfigurationError } from './errors.js';
import type { DependencyGraph, GraphEdge, PackageRecord } from './types.js';

/**
 * Code-unit string comparison, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Build the dependency graph for a set of workspace packages
 *
 * @param records - Every normalized package of the workspace
 * @returns Graph whose nodes are sorted by name
 * @throws ConfigurationError DUPLICATE_PACKAGE when two members share a name
 * @throws ConfigurationError DANGLING_DEPENDENCY when a package depends on a
 *   member name that is not in the set
 *
 * @example
 * ```typescript
 * const graph = buildDependencyGraph(workspace.packages);
 * const core = graph.indexByName.get('core');
 * ```
 */
export function buildDependencyGraph(records: readonly PackageRecord[]): DependencyGraph {
  const byName = new Map<string, PackageRecord>();

  for (const record of records) {
    const existing = byName.get(record.name);
    if (existing !== undefined) {
      throw new ConfigurationError(
        `Duplicate package name "${record.name}" in ${existing.manifestPath} and ${record.manifestPath}`,
        'DUPLICATE_PACKAGE',
        { packageName: record.name },
      );
    }
    byName.set(record.name, record);
  }

  const nodes = [...byName.values()].sort((a, b) => compareNames(a.name, b.name));
  const indexByName = new Map<string, number>(nodes.map((node, index) => [node.name, index]));

  const edges: GraphEdge[] = [];
  const dependenciesOf: number[][] = nodes.map(() => []);
  const dependentsOf: number[][] = nodes.map(() => []);

  nodes.forEach((node, from) => {
    for (const dependency of node.workspaceDependencies) {
      const to = indexByName.get(dependency);
      if (to === undefined) {
        throw new ConfigurationError(
          `Package "${node.name}" depends on workspace package "${dependency}", ` +
          `which is not a member of the workspace (excluded or misnamed?)`,
          'DANGLING_DEPENDENCY',
          { packageName: node.name },
        );
      }
      edges.push({ from, to });
      dependenciesOf[from].push(to);
      dependentsOf[to].push(from);
    }
  });

  for (const list of dependenciesOf) {
    list.sort((a, b) => a - b);
  }

  logDebug('graph', 'Built dependency graph', { nodes: nodes.length, edges: edges.length });

  return { nodes, indexByName, edges, dependenciesOf, dependentsOf };
}
