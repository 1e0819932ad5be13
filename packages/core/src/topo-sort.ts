/**
 * Topological Sorter
 *
 * Kahn's algorithm with a lexicographic tie-break: among packages whose
 * dependencies are all emitted, the smallest name goes first. An unchanged
 * workspace therefore always yields the same order, which checkpoint resume
 * relies on.
 */

import { createHash } from 'node:crypto';

import { logDebug } from '@crateflow/utils';

import { CycleError } from './errors.js';
import type { DependencyGraph, PackageRecord, PublishPlan } from './types.js';

export type SortResult =
  | { ok: true; order: PackageRecord[] }
  | {
      ok: false;
      /** Concrete cycle, first name repeated at the end */
      cycle: string[];
      /** Every package that could not be ordered, sorted by name */
      unresolved: string[];
    };

/**
 * Insert into an ascending array, keeping it sorted
 */
function insertSorted(values: number[], value: number): void {
  let low = 0;
  let high = values.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (values[mid] < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  values.splice(low, 0, value);
}

/**
 * Walk from the smallest unemitted node along unemitted dependencies until a
 * node repeats. Every unemitted node still has at least one unemitted
 * dependency, so the walk always closes a cycle.
 */
function findCycle(graph: DependencyGraph, emitted: readonly boolean[]): string[] {
  const start = emitted.indexOf(false);
  const path: number[] = [];
  const positionInPath = new Map<number, number>();

  let current = start;
  let position = positionInPath.get(current);
  while (position === undefined) {
    positionInPath.set(current, path.length);
    path.push(current);

    const next = graph.dependenciesOf[current].find(dependency => !emitted[dependency]);
    if (next === undefined) {
      throw new Error(`Package "${graph.nodes[current].name}" is unresolved but has no unresolved dependency`);
    }
    current = next;
    position = positionInPath.get(current);
  }

  return [...path.slice(position), current].map(index => graph.nodes[index].name);
}

/**
 * Sort the graph so that every dependency precedes its dependents
 *
 * @returns The order, or a concrete cycle when the graph is cyclic. A partial
 *   order is never returned as success.
 *
 * @example
 * ```typescript
 * const result = sortTopologically(graph);
 * if (!result.ok) {
 *   console.error(`Cycle: ${result.cycle.join(' -> ')}`);
 * }
 * ```
 */
export function sortTopologically(graph: DependencyGraph): SortResult {
  const nodeCount = graph.nodes.length;
  const unresolvedCount = graph.dependenciesOf.map(dependencies => dependencies.length);
  const emitted: boolean[] = new Array<boolean>(nodeCount).fill(false);
  const order: PackageRecord[] = [];

  // Node indices follow name order, so the smallest index is the smallest name
  const ready: number[] = [];
  unresolvedCount.forEach((count, index) => {
    if (count === 0) {
      ready.push(index);
    }
  });

  for (let next = ready.shift(); next !== undefined; next = ready.shift()) {
    emitted[next] = true;
    order.push(graph.nodes[next]);

    for (const dependent of graph.dependentsOf[next]) {
      unresolvedCount[dependent] -= 1;
      if (unresolvedCount[dependent] === 0) {
        insertSorted(ready, dependent);
      }
    }
  }

  if (order.length === nodeCount) {
    return { ok: true, order };
  }

  const unresolved = graph.nodes.filter((_, index) => !emitted[index]).map(node => node.name);
  const cycle = findCycle(graph, emitted);
  logDebug('graph', 'Dependency cycle detected', { cycle, unresolved });

  return { ok: false, cycle, unresolved };
}

/**
 * Fingerprint a publish order
 *
 * Covers each package's name, version and workspace dependencies in plan
 * order, so any change to membership, versions, edges or order changes it.
 *
 * @returns First 16 hex characters of a SHA-256 digest
 */
export function fingerprintPlan(packages: readonly PackageRecord[]): string {
  const lines = packages.map(
    pkg => `${pkg.name}@${pkg.version} -> ${pkg.workspaceDependencies.join(',')}`
  );
  return createHash('sha256').update(lines.join('\n')).digest('hex').substring(0, 16);
}

/**
 * Build the publish plan for a graph
 *
 * @throws CycleError naming a concrete cycle
 */
export function createPublishPlan(graph: DependencyGraph): PublishPlan {
  const result = sortTopologically(graph);

  if (!result.ok) {
    throw new CycleError(result.cycle);
  }

  return {
    packages: Object.freeze(result.order),
    fingerprint: fingerprintPlan(result.order),
  };
}
