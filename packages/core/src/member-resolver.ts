/**
 * Member Resolver
 *
 * Expands `[workspace] members` and `exclude` entries (literal paths and glob
 * patterns such as `crates/*`) into candidate package directories.
 */

import { statSync } from 'node:fs';
import { isAbsolute, relative, resolve } from 'node:path';

import { logDebug, normalizePath } from '@crateflow/utils';
import fg from 'fast-glob';

import type { DiscoveryWarning } from './types.js';

export interface ResolveMembersOptions {
  /** `[workspace] exclude` entries, relative to the root */
  exclude?: readonly string[];
}

export interface ResolvedMembers {
  /** Real, absolute, de-duplicated directories in ascending order */
  directories: string[];
  /** One EMPTY_PATTERN warning per pattern left with no directory after exclusion */
  warnings: DiscoveryWarning[];
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Expand one pattern to real directory paths
 *
 * Glob patterns go through fast-glob; literal paths are checked directly so
 * that names containing glob-special characters are not misread.
 */
async function expandPattern(root: string, pattern: string): Promise<string[]> {
  if (fg.isDynamicPattern(pattern)) {
    const matches = await fg(pattern, {
      cwd: root,
      onlyDirectories: true,
      absolute: true,
      followSymbolicLinks: true,
      ignore: ['**/target', '**/target/**', '**/.git', '**/.git/**'],
    });
    return matches.map(match => normalizePath(resolve(match)));
  }

  const literal = resolve(root, pattern);
  return isDirectory(literal) ? [normalizePath(literal)] : [];
}

function isWithin(directory: string, ancestor: string): boolean {
  const rel = relative(ancestor, directory);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Resolve member patterns to package directories
 *
 * Directories equal to, or nested below, an excluded entry are removed. A
 * pattern left with no directory (no match, or only excluded matches) is
 * reported as a warning and is never fatal.
 *
 * @param root - Absolute workspace root
 * @param patterns - `[workspace] members` entries
 *
 * @example
 * ```typescript
 * const { directories, warnings } = await resolveMembers('/ws', ['crates/*', 'tools/cli']);
 * ```
 */
export async function resolveMembers(
  root: string,
  patterns: readonly string[],
  options: ResolveMembersOptions = {}
): Promise<ResolvedMembers> {
  const excluded: string[] = [];
  for (const pattern of options.exclude ?? []) {
    excluded.push(...await expandPattern(root, pattern));
  }
  const isExcluded = (directory: string): boolean => excluded.some(ancestor => isWithin(directory, ancestor));

  const warnings: DiscoveryWarning[] = [];
  const found = new Set<string>();

  for (const pattern of patterns) {
    const matches = await expandPattern(root, pattern);
    const kept = matches.filter(match => !isExcluded(match));

    if (kept.length === 0) {
      warnings.push({
        code: 'EMPTY_PATTERN',
        pattern,
        message: matches.length === 0
          ? `Workspace member pattern "${pattern}" did not match any directory`
          : `Workspace member pattern "${pattern}" only matched excluded directories`,
      });
      continue;
    }

    for (const match of kept) {
      found.add(match);
    }
  }

  const directories = [...found].sort();

  logDebug('workspace', 'Resolved workspace members', {
    patterns: [...patterns],
    exclude: [...(options.exclude ?? [])],
    directories,
  });

  return { directories, warnings };
}
