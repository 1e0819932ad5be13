/**
 * Configuration Schema with Zod Validation
 *
 * Runtime validation and type safety for crateflow.config.yaml.
 */

import { z } from 'zod';

import { CHECKPOINT_DEFAULTS, PUBLISH_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * Publish Config Schema
 */
export const PublishConfigSchema = z.object({
  /** Run `cargo publish --dry-run` and never write a checkpoint (default: false) */
  dryRun: z.boolean().default(PUBLISH_DEFAULTS.DRY_RUN),

  /** Skip crates whose version is already on the registry (default: false) */
  skipPublished: z.boolean().default(PUBLISH_DEFAULTS.SKIP_PUBLISHED),

  /** Seconds to wait between consecutive publishes (default: 0) */
  intervalSecs: z.number().int().nonnegative().default(PUBLISH_DEFAULTS.INTERVAL_SECS),

  /** Optional: alternate registry name from .cargo/config.toml */
  registry: z.string().min(1, 'registry cannot be empty').optional(),

  /** Count dev-dependencies when ordering (default: true) */
  includeDevDependencies: z.boolean().default(PUBLISH_DEFAULTS.INCLUDE_DEV_DEPENDENCIES),
}).strict();

export type PublishConfig = z.infer<typeof PublishConfigSchema>;

/**
 * Checkpoint Config Schema
 */
export const CheckpointConfigSchema = z.object({
  /** Checkpoint file path, relative to the workspace root */
  file: z.string().min(1, 'checkpoint file cannot be empty').default(CHECKPOINT_DEFAULTS.FILE),

  /**
   * Require the stored plan fingerprint to match on resume (default: true)
   *
   * When false, resume only checks that every completed crate is still in
   * the plan with the same version and relative order.
   */
  strict: z.boolean().default(CHECKPOINT_DEFAULTS.STRICT),
}).strict();

export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;

/**
 * Full Configuration Schema
 *
 * Root configuration object for crateflow. Every section is optional.
 */
export const CrateflowConfigSchema = z.object({
  publish: PublishConfigSchema.optional().default({}),

  checkpoint: CheckpointConfigSchema.optional().default({}),
}).strict();

/** Resolved configuration (defaults applied) */
export type CrateflowConfig = z.infer<typeof CrateflowConfigSchema>;

/**
 * Validate configuration object
 *
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(CrateflowConfigSchema);

/**
 * Safe validation function for CrateflowConfig
 */
export const safeValidateConfig = createSafeValidator(CrateflowConfigSchema);

/**
 * Configuration used when no crateflow.config.yaml exists
 */
export function defaultConfig(): CrateflowConfig {
  return validateConfig({});
}
