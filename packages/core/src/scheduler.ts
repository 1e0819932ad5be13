/**
 * Publish Scheduler
 *
 * Walks a publish plan strictly in order, one action at a time, consulting
 * and updating the checkpoint so that an interrupted run can be resumed.
 *
 * The scheduler never talks to a registry itself: the publish action and the
 * "already published" check are supplied by the caller.
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'node:timers/promises';

import { logDebug, logWarning } from '@crateflow/utils';

import type { CheckpointStore } from './checkpoint.js';
import { ConfigurationError, PublishActionError } from './errors.js';
import type { PackageRecord, PublishPlan } from './types.js';

/**
 * What the publish action is asked to do for one package
 */
export interface PublishRequest {
  name: string;
  version: string;
  /** Absolute package directory */
  path: string;
  /** Verify only (e.g. `cargo publish --dry-run`) */
  dryRun: boolean;
  token?: string;
  registry?: string;
}

/**
 * Publish one package; rejects with a descriptive error on failure
 */
export type PublishAction = (request: PublishRequest) => Promise<void>;

/**
 * Report whether `name@version` is already present in the registry
 */
export type PublishedCheck = (name: string, version: string, registry?: string) => Promise<boolean>;

export type SkipReason = 'not-publishable' | 'checkpointed' | 'already-published';

export interface SkippedPackage {
  name: string;
  reason: SkipReason;
}

export interface PackageOutcome {
  dryRun: boolean;
  durationSecs: number;
}

export interface PublishOptions {
  /** Action invoked for every package that is not skipped */
  publish: PublishAction;

  /** Where completed packages are recorded */
  checkpointStore: CheckpointStore;

  /** Skip packages recorded in a valid checkpoint (default: false) */
  resume?: boolean;

  /** Require the checkpoint fingerprint to match the plan when resuming (default: true) */
  strictCheckpoint?: boolean;

  /** Skip packages the registry already has; requires `isPublished` (default: false) */
  skipPublished?: boolean;

  isPublished?: PublishedCheck;

  /** Ask the action to verify only, and leave the checkpoint untouched (default: false) */
  dryRun?: boolean;

  /** Pause between consecutive real publishes (default: 0) */
  intervalMs?: number;

  token?: string;

  registry?: string;

  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;

  /** Callback before the action is invoked for a package */
  onPackageStart?: (_record: PackageRecord, _dryRun: boolean) => void;

  /** Callback after the action succeeded for a package */
  onPackageComplete?: (_record: PackageRecord, _outcome: PackageOutcome) => void;

  /** Callback when a package is skipped */
  onPackageSkipped?: (_record: PackageRecord, _reason: SkipReason) => void;
}

export interface PublishFailure {
  name: string;
  error: PublishActionError;
}

/**
 * Outcome of a scheduler run
 */
export interface PublishReport {
  status: 'completed' | 'failed';
  /** Packages the action succeeded for, in order */
  published: string[];
  skipped: SkippedPackage[];
  dryRun: boolean;
  /** Present when status is 'failed' */
  failed?: PublishFailure;
  /** Packages not yet done, starting with the failed one */
  remaining: string[];
}

function validateOptions(options: PublishOptions): void {
  if (options.skipPublished === true && options.isPublished === undefined) {
    throw new ConfigurationError(
      'skipPublished requires an isPublished check',
      'INVALID_CONFIG',
    );
  }

  const intervalMs = options.intervalMs ?? 0;
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new ConfigurationError(
      `Publish interval must be a non-negative number of milliseconds (got ${intervalMs})`,
      'INVALID_CONFIG',
    );
  }
}

/**
 * Ask the registry check, publishing anyway if the check itself fails
 */
async function checkAlreadyPublished(
  record: PackageRecord,
  isPublished: PublishedCheck,
  registry: string | undefined
): Promise<boolean> {
  try {
    return await isPublished(record.name, record.version, registry);
  } catch (error) {
    logWarning(
      'publish',
      `Could not check whether ${record.name}@${record.version} is published; publishing it`,
      error instanceof Error ? error : new Error(String(error)),
    );
    return false;
  }
}

/**
 * Prepare the checkpoint for a run and return the names it already covers
 *
 * Resuming validates the checkpoint before anything is published. A fresh,
 * real run discards any previous checkpoint.
 */
async function prepareCheckpoint(plan: PublishPlan, options: PublishOptions): Promise<Set<string>> {
  const store = options.checkpointStore;

  if (options.resume === true) {
    const checkpoint = await store.validate(plan, { strict: options.strictCheckpoint ?? true });
    const done = new Set(checkpoint.completed.map(entry => entry.name));
    logDebug('checkpoint', 'Resuming from checkpoint', { location: store.location, completed: [...done] });
    return done;
  }

  if (options.dryRun !== true) {
    await store.clear();
  }
  return new Set();
}

/**
 * Run the publish action across a plan
 *
 * Configuration, structural and resume errors reject before any action is
 * invoked. A failing action does not reject: it stops the run and is reported
 * in the returned report, with every earlier success kept in the checkpoint.
 *
 * @throws ConfigurationError INVALID_CONFIG for inconsistent options
 * @throws CorruptCheckpointError / StaleCheckpointError when resuming from an
 *   unusable checkpoint
 *
 * @example
 * ```typescript
 * const report = await runPublishPlan(plan, {
 *   publish: cargoPublish,
 *   checkpointStore: new FileCheckpointStore(root, 'target/crateflow-checkpoint.yaml'),
 *   resume: true,
 *   onPackageStart: (pkg) => console.log(`Publishing ${pkg.name}...`),
 * });
 * ```
 */
export async function runPublishPlan(plan: PublishPlan, options: PublishOptions): Promise<PublishReport> {
  validateOptions(options);

  const dryRun = options.dryRun ?? false;
  const intervalMs = options.intervalMs ?? 0;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const store = options.checkpointStore;

  const done = await prepareCheckpoint(plan, options);

  const published: string[] = [];
  const skipped: SkippedPackage[] = [];
  let hasPublished = false;

  const skip = (record: PackageRecord, reason: SkipReason): void => {
    skipped.push({ name: record.name, reason });
    logDebug('publish', `Skipping ${record.name}`, { reason });
    options.onPackageSkipped?.(record, reason);
  };

  for (const [index, record] of plan.packages.entries()) {
    if (!record.publishable) {
      skip(record, 'not-publishable');
      continue;
    }

    if (done.has(record.name)) {
      skip(record, 'checkpointed');
      continue;
    }

    if (options.skipPublished === true && options.isPublished !== undefined &&
        await checkAlreadyPublished(record, options.isPublished, options.registry)) {
      if (!dryRun) {
        await store.recordSuccess(record, plan.fingerprint);
      }
      skip(record, 'already-published');
      continue;
    }

    if (!dryRun && hasPublished && intervalMs > 0) {
      logDebug('publish', `Waiting ${intervalMs}ms before publishing ${record.name}`);
      await sleep(intervalMs);
    }

    options.onPackageStart?.(record, dryRun);
    const startTime = Date.now();

    try {
      await options.publish({
        name: record.name,
        version: record.version,
        path: record.path,
        dryRun,
        token: options.token,
        registry: options.registry,
      });
    } catch (error) {
      const failure = new PublishActionError(record.name, error);
      logDebug('publish', failure.message);
      return {
        status: 'failed',
        published,
        skipped,
        dryRun,
        failed: { name: record.name, error: failure },
        remaining: plan.packages.slice(index).map(pkg => pkg.name),
      };
    }

    const durationSecs = Number.parseFloat(((Date.now() - startTime) / 1000).toFixed(1));

    if (!dryRun) {
      await store.recordSuccess(record, plan.fingerprint);
      hasPublished = true;
    }

    published.push(record.name);
    options.onPackageComplete?.(record, { dryRun, durationSecs });
  }

  if (!dryRun) {
    await store.clear();
  }

  return { status: 'completed', published, skipped, dryRun, remaining: [] };
}
