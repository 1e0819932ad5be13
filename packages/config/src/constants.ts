/**
 * Configuration Constants
 *
 * Single source of truth for default publish and checkpoint settings.
 *
 * @packageDocumentation
 */

/**
 * Default publish settings
 *
 * @example
 * ```typescript
 * import { PUBLISH_DEFAULTS } from '@crateflow/config';
 *
 * const intervalSecs = options.publishInterval ?? PUBLISH_DEFAULTS.INTERVAL_SECS;
 * ```
 */
export const PUBLISH_DEFAULTS = {
  DRY_RUN: false as const,

  SKIP_PUBLISHED: false as const,

  /**
   * Seconds to wait between two real publishes.
   * crates.io rate-limits new crate uploads, so large first releases often need 60+
   */
  INTERVAL_SECS: 0 as const,

  /**
   * Count dev-dependencies as ordering edges.
   * cargo verifies dev-dependencies that carry a version against the registry
   */
  INCLUDE_DEV_DEPENDENCIES: true as const,
} as const;

/**
 * Default checkpoint settings
 */
export const CHECKPOINT_DEFAULTS = {
  /** Checkpoint file, relative to the workspace root (inside cargo's target dir) */
  FILE: 'target/crateflow-checkpoint.yaml' as const,

  /** Require the stored plan fingerprint to match the current plan */
  STRICT: true as const,
} as const;
