/**
 * Publish Settings
 *
 * Merges `crateflow publish` flags over `crateflow.config.yaml` values.
 * Flags win; the config file wins over built-in defaults.
 */

import type { CrateflowConfig } from '@crateflow/config';
import { ConfigurationError } from '@crateflow/core';
import type { OptionValues } from 'commander';

import { flagOption, stringOption } from './command-context.js';

export interface PublishSettings {
  dryRun: boolean;
  skipPublished: boolean;
  resume: boolean;
  intervalMs: number;
  token?: string;
  registry?: string;
  checkpointFile: string;
  strictCheckpoint: boolean;
}

/**
 * Parse `--publish-interval <secs>`
 *
 * @throws ConfigurationError INVALID_CONFIG unless the value is a whole number of seconds
 */
export function parseIntervalSecs(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(
      `--publish-interval must be a whole number of seconds (got "${value}")`,
      'INVALID_CONFIG',
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Resolve the effective settings for a publish run
 *
 * @example
 * ```typescript
 * const settings = resolvePublishSettings({ dryRun: true }, config);
 * ```
 */
export function resolvePublishSettings(flags: OptionValues, config: CrateflowConfig): PublishSettings {
  const interval = stringOption(flags, 'publishInterval');
  const intervalSecs = interval === undefined ? config.publish.intervalSecs : parseIntervalSecs(interval);

  return {
    dryRun: flagOption(flags, 'dryRun') || config.publish.dryRun,
    skipPublished: flagOption(flags, 'skipPublished') || config.publish.skipPublished,
    resume: flagOption(flags, 'resume'),
    intervalMs: intervalSecs * 1000,
    token: stringOption(flags, 'token'),
    registry: stringOption(flags, 'registry') ?? config.publish.registry,
    checkpointFile: config.checkpoint.file,
    strictCheckpoint: config.checkpoint.strict,
  };
}
