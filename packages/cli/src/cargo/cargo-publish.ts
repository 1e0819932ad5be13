/**
 * Cargo Publish Adapter
 *
 * Publish action and "already published" check implemented with the cargo
 * binary. Commands run without a shell so tokens are passed verbatim.
 */

import type { PublishAction, PublishedCheck, PublishRequest } from '@crateflow/core';
import { logDebug, safeExecResult } from '@crateflow/utils';

/**
 * stderr fragments cargo prints when the version is already in the registry
 */
const ALREADY_UPLOADED_PATTERNS: ReadonlyArray<(stderr: string) => boolean> = [
  stderr => stderr.includes('already exists on crates.io index'),
  stderr => stderr.includes('crate version') && stderr.includes('is already uploaded'),
];

/**
 * Build the `cargo publish` argument list
 *
 * @example
 * buildPublishArgs({ name: 'core', version: '0.1.0', path: '/ws/core', dryRun: true });
 * // ['publish', '--dry-run']
 */
export function buildPublishArgs(request: PublishRequest): string[] {
  const args = ['publish'];
  if (request.dryRun) {
    args.push('--dry-run');
  }
  if (request.registry !== undefined) {
    args.push('--registry', request.registry);
  }
  if (request.token !== undefined) {
    args.push('--token', request.token);
  }
  return args;
}

/**
 * Whether failed `cargo publish` output means the version is already uploaded
 */
export function isAlreadyUploaded(stderr: string): boolean {
  return ALREADY_UPLOADED_PATTERNS.some(matches => matches(stderr));
}

/**
 * `cargo publish` run in the package directory
 *
 * A version the registry already has counts as success, so retrying an
 * interrupted run is safe.
 */
export const cargoPublish: PublishAction = async (request) => {
  logDebug('exec', `cargo publish for ${request.name}@${request.version}`, {
    cwd: request.path,
    dryRun: request.dryRun,
    registry: request.registry,
  });

  const result = safeExecResult('cargo', buildPublishArgs(request), {
    cwd: request.path,
    encoding: 'utf8',
  });

  if (result.error !== undefined) {
    throw new Error(`Could not run cargo: ${result.error.message}`);
  }

  if (result.status === 0) {
    return;
  }

  const stderr = result.stderr.toString();
  if (isAlreadyUploaded(stderr)) {
    logDebug('publish', `${request.name}@${request.version} is already uploaded; treating as published`);
    return;
  }

  throw new Error(`cargo publish exited with code ${result.status}\n${stderr.trim()}`);
};

/**
 * Parse the version `cargo search` reports for an exact crate name
 *
 * Lines look like `serde = "1.0.197"    # A serialization framework`.
 *
 * @returns The reported version, or undefined when the crate is not listed
 */
export function parseSearchVersion(stdout: string, name: string): string | undefined {
  for (const line of stdout.split('\n')) {
    const match = /^([\w-]+) = "([^"]+)"/.exec(line.trim());
    if (match !== null && match[1] === name) {
      return match[2];
    }
  }
  return undefined;
}

/**
 * `cargo search <name> --limit 1`, compared against the local version
 *
 * @throws Error when cargo cannot be run or the search fails
 */
export const cargoIsPublished: PublishedCheck = async (name, version, registry) => {
  const args = ['search', name, '--limit', '1'];
  if (registry !== undefined) {
    args.push('--registry', registry);
  }

  const result = safeExecResult('cargo', args, { encoding: 'utf8' });

  if (result.error !== undefined) {
    throw new Error(`Could not run cargo: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new Error(`cargo search exited with code ${result.status}: ${result.stderr.toString().trim()}`);
  }

  const published = parseSearchVersion(result.stdout.toString(), name);
  logDebug('exec', `cargo search ${name}`, { local: version, registry: published });
  return published === version;
};
