/**
 * Error taxonomy
 *
 * Configuration and structural errors abort before any crate is published.
 * Resume errors abort before any crate is published and are never resolved by
 * discarding the checkpoint. Action errors abort only the rest of the plan.
 *
 * @packageDocumentation
 */

export type ErrorKind = 'configuration' | 'structural' | 'resume' | 'action';

export type ConfigurationErrorCode =
  | 'MISSING_WORKSPACE'
  | 'INVALID_MANIFEST'
  | 'INHERITANCE_UNRESOLVED'
  | 'DUPLICATE_PACKAGE'
  | 'DANGLING_DEPENDENCY'
  | 'INVALID_CONFIG';

export type ErrorCode =
  | ConfigurationErrorCode
  | 'CIRCULAR_DEPENDENCY'
  | 'CHECKPOINT_CORRUPT'
  | 'CHECKPOINT_STALE'
  | 'PUBLISH_FAILED';

interface CrateflowErrorOptions {
  packageName?: string;
  cause?: unknown;
}

/**
 * Base class for every error crateflow raises on purpose
 */
export abstract class CrateflowError extends Error {
  public abstract readonly kind: ErrorKind;
  public readonly code: ErrorCode;
  public readonly packageName?: string;

  constructor(message: string, code: ErrorCode, options: CrateflowErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.packageName = options.packageName;
  }
}

/**
 * Workspace or manifest misconfiguration (missing workspace, unresolvable
 * inheritance, duplicate names, dangling dependency)
 */
export class ConfigurationError extends CrateflowError {
  public readonly kind = 'configuration' as const;

  constructor(message: string, code: ConfigurationErrorCode, options: CrateflowErrorOptions = {}) {
    super(message, code, options);
  }
}

/**
 * The workspace dependency graph contains a cycle
 */
export class CycleError extends CrateflowError {
  public readonly kind = 'structural' as const;

  /** Concrete cycle, first name repeated at the end (e.g. ['a', 'b', 'a']) */
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, 'CIRCULAR_DEPENDENCY', {
      packageName: cycle[0],
    });
    this.cycle = cycle;
  }
}

/**
 * Checkpoint file exists but cannot be parsed or fails schema validation
 */
export class CorruptCheckpointError extends CrateflowError {
  public readonly kind = 'resume' as const;
  public readonly location: string;

  constructor(location: string, reason: string, options: CrateflowErrorOptions = {}) {
    super(
      `Checkpoint ${location} is unreadable: ${reason}\n` +
      `Inspect or delete it to start a fresh publish run.`,
      'CHECKPOINT_CORRUPT',
      options,
    );
    this.location = location;
  }
}

/**
 * Checkpoint no longer matches the freshly computed publish plan
 */
export class StaleCheckpointError extends CrateflowError {
  public readonly kind = 'resume' as const;
  public readonly location: string;
  public readonly problems: readonly string[];

  constructor(location: string, problems: readonly string[]) {
    super(
      `Checkpoint ${location} does not match the current workspace:\n` +
      problems.map(problem => `  - ${problem}`).join('\n') +
      `\nDelete it to start a fresh publish run.`,
      'CHECKPOINT_STALE',
    );
    this.location = location;
    this.problems = problems;
  }
}

/**
 * The publish action failed for one package
 */
export class PublishActionError extends CrateflowError {
  public readonly kind = 'action' as const;

  constructor(packageName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to publish ${packageName}: ${reason}`, 'PUBLISH_FAILED', { packageName, cause });
  }
}

/**
 * Narrow an unknown thrown value to a crateflow error
 */
export function isCrateflowError(value: unknown): value is CrateflowError {
  return value instanceof CrateflowError;
}
