/**
 * Checkpoint Store
 *
 * Records which packages already completed the publish action, so an
 * interrupted run can resume. The file is YAML so it can be inspected by
 * hand, and deleting it is equivalent to starting fresh.
 *
 * @packageDocumentation
 */

import { readFile, rm } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

import { formatZodIssues } from '@crateflow/config';
import { logDebug, writeFileAtomic } from '@crateflow/utils';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import { CorruptCheckpointError, StaleCheckpointError } from './errors.js';
import type { PackageRecord, PublishPlan } from './types.js';

export const CHECKPOINT_FORMAT_VERSION = 1;

export const CompletedEntrySchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  completedAt: z.string().datetime(),
}).strict();

export type CompletedEntry = z.infer<typeof CompletedEntrySchema>;

/**
 * Checkpoint Schema
 *
 * `completed` is ordered by completion time and only ever appended to.
 */
export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_FORMAT_VERSION),

  /** Real path of the workspace root the checkpoint belongs to */
  workspaceRoot: z.string().min(1),

  /** Fingerprint of the plan the entries were recorded against */
  planFingerprint: z.string().optional(),

  completed: z.array(CompletedEntrySchema),

  updatedAt: z.string().datetime(),
}).strict();

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointValidationOptions {
  /**
   * Require the stored plan fingerprint to equal the current plan's
   * (default: true). Lenient mode only checks names, versions and order.
   */
  strict?: boolean;
}

export function createEmptyCheckpoint(workspaceRoot: string): Checkpoint {
  return {
    version: CHECKPOINT_FORMAT_VERSION,
    workspaceRoot,
    completed: [],
    updatedAt: new Date().toISOString(),
  };
}

/**
 * List every way a checkpoint disagrees with a freshly computed plan
 *
 * An empty checkpoint never disagrees: it cannot cause a package to be
 * skipped.
 *
 * @returns Human-readable problems, empty when the checkpoint is usable
 */
export function findCheckpointProblems(
  checkpoint: Checkpoint,
  plan: PublishPlan,
  workspaceRoot: string,
  options: CheckpointValidationOptions = {}
): string[] {
  if (checkpoint.completed.length === 0) {
    return [];
  }

  const problems: string[] = [];

  if (checkpoint.workspaceRoot !== workspaceRoot) {
    problems.push(`checkpoint belongs to workspace ${checkpoint.workspaceRoot}, not ${workspaceRoot}`);
  }

  if ((options.strict ?? true) && checkpoint.planFingerprint !== plan.fingerprint) {
    problems.push(
      `publish plan changed since the checkpoint was written ` +
      `(checkpoint ${checkpoint.planFingerprint ?? 'has no fingerprint'}, current ${plan.fingerprint})`
    );
  }

  const planIndex = new Map(plan.packages.map((pkg, index) => [pkg.name, index]));
  let previous: { name: string; index: number } | undefined;

  for (const entry of checkpoint.completed) {
    const index = planIndex.get(entry.name);
    if (index === undefined) {
      problems.push(`"${entry.name}" is recorded as published but is no longer in the publish plan`);
      continue;
    }

    const planned = plan.packages[index];
    if (planned.version !== entry.version) {
      problems.push(`"${entry.name}" was published at ${entry.version} but the plan now has ${planned.version}`);
    }

    if (previous !== undefined && index < previous.index) {
      problems.push(`"${entry.name}" was published after "${previous.name}" but now comes before it in the plan`);
    }
    previous = { name: entry.name, index };
  }

  return problems;
}

/**
 * Throw unless the checkpoint matches the plan
 *
 * @throws StaleCheckpointError listing every problem
 */
export function validateCheckpoint(
  checkpoint: Checkpoint,
  plan: PublishPlan,
  location: string,
  workspaceRoot: string,
  options: CheckpointValidationOptions = {}
): Checkpoint {
  const problems = findCheckpointProblems(checkpoint, plan, workspaceRoot, options);
  if (problems.length > 0) {
    throw new StaleCheckpointError(location, problems);
  }
  return checkpoint;
}

/**
 * Read/write contract for checkpoint persistence
 */
export interface CheckpointStore {
  /** Where the checkpoint lives (file path, or a label for non-file stores) */
  readonly location: string;

  /**
   * Load the checkpoint
   *
   * @returns An empty checkpoint when none exists
   * @throws CorruptCheckpointError when stored data is unreadable
   */
  load(): Promise<Checkpoint>;

  /**
   * Append a completed package and persist all-or-nothing
   *
   * Creates the checkpoint on first use. Recording an already-recorded name
   * is a no-op.
   */
  recordSuccess(record: PackageRecord, planFingerprint: string): Promise<Checkpoint>;

  /**
   * Load and check the checkpoint against a fresh plan
   *
   * @throws StaleCheckpointError on any mismatch; the checkpoint is kept
   */
  validate(plan: PublishPlan, options?: CheckpointValidationOptions): Promise<Checkpoint>;

  /** Remove the checkpoint (missing is fine) */
  clear(): Promise<void>;
}

/**
 * Shared append and validation logic; subclasses provide storage
 */
abstract class BaseCheckpointStore implements CheckpointStore {
  public abstract readonly location: string;

  constructor(protected readonly workspaceRoot: string) {}

  public abstract load(): Promise<Checkpoint>;

  public abstract clear(): Promise<void>;

  protected abstract persist(checkpoint: Checkpoint): Promise<void>;

  public async recordSuccess(record: PackageRecord, planFingerprint: string): Promise<Checkpoint> {
    const current = await this.load();

    if (current.completed.some(entry => entry.name === record.name)) {
      return current;
    }

    const now = new Date().toISOString();
    const next: Checkpoint = {
      ...current,
      planFingerprint,
      completed: [...current.completed, { name: record.name, version: record.version, completedAt: now }],
      updatedAt: now,
    };

    await this.persist(next);
    logDebug('checkpoint', `Recorded ${record.name}@${record.version}`, { location: this.location });
    return next;
  }

  public async validate(plan: PublishPlan, options: CheckpointValidationOptions = {}): Promise<Checkpoint> {
    const checkpoint = await this.load();
    return validateCheckpoint(checkpoint, plan, this.location, this.workspaceRoot, options);
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * YAML checkpoint file, replaced atomically on every write
 *
 * @example
 * ```typescript
 * const store = new FileCheckpointStore('/ws', 'target/crateflow-checkpoint.yaml');
 * await store.validate(plan);
 * ```
 */
export class FileCheckpointStore extends BaseCheckpointStore {
  public readonly location: string;

  /**
   * @param workspaceRoot - Real workspace root (stored as the checkpoint's identity)
   * @param file - Checkpoint path, absolute or relative to the workspace root
   */
  constructor(workspaceRoot: string, file: string) {
    super(workspaceRoot);
    this.location = isAbsolute(file) ? file : resolve(workspaceRoot, file);
  }

  public async load(): Promise<Checkpoint> {
    let content: string;
    try {
      content = await readFile(this.location, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return createEmptyCheckpoint(this.workspaceRoot);
      }
      throw new CorruptCheckpointError(
        this.location,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new CorruptCheckpointError(
        this.location,
        `invalid YAML (${error instanceof Error ? error.message : String(error)})`,
        { cause: error },
      );
    }

    const result = CheckpointSchema.safeParse(raw);
    if (!result.success) {
      throw new CorruptCheckpointError(this.location, formatZodIssues(result.error.errors).join('; '));
    }

    return result.data;
  }

  public async clear(): Promise<void> {
    await rm(this.location, { force: true });
    logDebug('checkpoint', 'Cleared checkpoint', { location: this.location });
  }

  protected async persist(checkpoint: Checkpoint): Promise<void> {
    await writeFileAtomic(this.location, stringifyYaml(checkpoint));
  }
}

/**
 * Checkpoint held in memory (tests, previews)
 */
export class InMemoryCheckpointStore extends BaseCheckpointStore {
  public readonly location = 'memory';
  private checkpoint: Checkpoint | undefined;

  constructor(workspaceRoot: string, initial?: Checkpoint) {
    super(workspaceRoot);
    this.checkpoint = initial;
  }

  public async load(): Promise<Checkpoint> {
    return this.checkpoint ?? createEmptyCheckpoint(this.workspaceRoot);
  }

  public async clear(): Promise<void> {
    this.checkpoint = undefined;
  }

  /** Whether a checkpoint currently exists */
  public hasCheckpoint(): boolean {
    return this.checkpoint !== undefined;
  }

  protected async persist(checkpoint: Checkpoint): Promise<void> {
    this.checkpoint = checkpoint;
  }
}
